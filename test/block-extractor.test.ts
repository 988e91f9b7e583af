import { describe, it, expect, vi } from "vitest";
import { buildHtmlRules, categoryOrder, extractBlocks } from "../src/utils/block-extractor.js";
import { PHP_TAG_PATTERN } from "../src/constants.js";

const passthrough = (body: string) => body;

function extract(source: string, options: { preservePatterns?: RegExp[]; preserveLineBreaks?: boolean } = {}) {
  const rules = buildHtmlRules({
    preservePatterns: options.preservePatterns ?? [],
    preserveLineBreaks: options.preserveLineBreaks ?? false,
    compressNested: passthrough,
  });
  return extractBlocks(source, rules);
}

describe("extractBlocks", () => {
  it("replaces pre content with a placeholder and keeps the tags", () => {
    const { skeleton, blocks } = extract("<div><pre>  a  </pre></div>");
    expect(skeleton).toBe("<div><pre>%%%~COMPRESS~PRE~0~%%%</pre></div>");
    expect(blocks.list("PRE")).toEqual(["  a  "]);
  });

  it("leaves whitespace-only regions in place", () => {
    const { skeleton, blocks } = extract("<pre>   </pre><style>\n</style>");
    expect(skeleton).toBe("<pre>   </pre><style>\n</style>");
    expect(blocks.count("PRE")).toBe(0);
    expect(blocks.count("STYLE")).toBe(0);
  });

  it("routes scripts by their type attribute", () => {
    const { skeleton, blocks } = extract(
      '<script>var a;</script><script type="text/x-custom">raw</script>' +
        '<script type="text/x-jquery-tmpl"><b> x </b></script><script type="Application/JavaScript">go()</script>'
    );
    expect(skeleton).toBe(
      "<script>%%%~COMPRESS~SCRIPT~0~%%%</script>" +
        '<script type="text/x-custom">%%%~COMPRESS~SKIP~0~%%%</script>' +
        '<script type="text/x-jquery-tmpl"><b> x </b></script>' +
        '<script type="Application/JavaScript">%%%~COMPRESS~SCRIPT~1~%%%</script>'
    );
    expect(blocks.list("SCRIPT")).toEqual(["var a;", "go()"]);
    expect(blocks.list("SKIP")).toEqual(["raw"]);
  });

  it("drops skip markers and shares the skip index with opaque scripts", () => {
    const { skeleton, blocks } = extract(
      'a<!-- {{{ -->  keep   this  <!-- }}} -->b<script type="text/plain">y</script>'
    );
    expect(skeleton).toBe('a%%%~COMPRESS~SKIP~0~%%%b<script type="text/plain">%%%~COMPRESS~SKIP~1~%%%</script>');
    expect(blocks.list("SKIP")).toEqual(["  keep   this  ", "y"]);
  });

  it("captures event handler values in both quote styles", () => {
    const { skeleton, blocks } = extract(`<a onclick="go(1)" onmouseover='hi()' onblur="">`);
    expect(skeleton).toBe(
      `<a onclick="%%%~COMPRESS~EVENT~0~%%%" onmouseover='%%%~COMPRESS~EVENT~1~%%%' onblur="">`
    );
    expect(blocks.list("EVENT")).toEqual(["go(1)", "hi()"]);
  });

  it("compresses conditional comment bodies through the nested callback", () => {
    const compressNested = vi.fn((body: string) => body.trim());
    const rules = buildHtmlRules({ preservePatterns: [], preserveLineBreaks: false, compressNested });
    const { skeleton, blocks } = extractBlocks("<!--[if IE]>  <p>x</p>  <![endif]-->", rules);

    expect(compressNested).toHaveBeenCalledWith("  <p>x</p>  ");
    expect(skeleton).toBe("%%%~COMPRESS~COND~0~%%%");
    expect(blocks.list("COND")).toEqual(["<!--[if IE]><p>x</p><![endif]-->"]);
  });

  it("gives each user pattern its own namespace", () => {
    const { skeleton, blocks } = extract("{{a}} <% b %> {{c}}", { preservePatterns: [/\{\{.*?\}\}/g, /<%.*?%>/gs] });
    expect(skeleton).toBe("%%%~COMPRESS~USER0~0~%%% %%%~COMPRESS~USER1~0~%%% %%%~COMPRESS~USER0~1~%%%");
    expect(blocks.list("USER0")).toEqual(["{{a}}", "{{c}}"]);
    expect(blocks.list("USER1")).toEqual(["<% b %>"]);
  });

  it("runs user patterns before every built-in category", () => {
    const { skeleton, blocks } = extract("<pre><?php echo 1; ?></pre>", { preservePatterns: [PHP_TAG_PATTERN] });
    expect(skeleton).toBe("<pre>%%%~COMPRESS~PRE~0~%%%</pre>");
    expect(blocks.list("PRE")).toEqual(["%%%~COMPRESS~USER0~0~%%%"]);
  });

  it("does not re-match regions already taken by an earlier pass", () => {
    const { blocks } = extract("<!-- {{{ --><pre> x </pre><!-- }}} -->");
    expect(blocks.count("PRE")).toBe(0);
    expect(blocks.list("SKIP")).toEqual(["<pre> x </pre>"]);
  });

  it("extracts style and textarea content", () => {
    const { skeleton } = extract("<style> .a{} </style><textarea> t </textarea>");
    expect(skeleton).toBe(
      "<style>%%%~COMPRESS~STYLE~0~%%%</style><textarea>%%%~COMPRESS~TEXTAREA~0~%%%</textarea>"
    );
  });

  it("keeps one newline per line-break run when enabled", () => {
    const { skeleton, blocks } = extract("<p>a\n  \n\tb</p> c \r\nd", { preserveLineBreaks: true });
    expect(skeleton).toBe("<p>a%%%~COMPRESS~LT~0~%%%b</p> c%%%~COMPRESS~LT~1~%%%d");
    expect(blocks.list("LT")).toEqual(["\n", "\r\n"]);
  });

  it("ignores line breaks when preservation is off", () => {
    const { skeleton } = extract("a\nb");
    expect(skeleton).toBe("a\nb");
  });
});

describe("categoryOrder", () => {
  it("lists user categories first and line breaks last", () => {
    const rules = buildHtmlRules({
      preservePatterns: [/a/g, /b/g],
      preserveLineBreaks: true,
      compressNested: passthrough,
    });
    expect(categoryOrder(rules)).toEqual([
      "USER0",
      "USER1",
      "SKIP",
      "COND",
      "EVENT",
      "PRE",
      "SCRIPT",
      "STYLE",
      "TEXTAREA",
      "LT",
    ]);
  });
});
