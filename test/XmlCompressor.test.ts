import { describe, it, expect } from "vitest";
import { XmlCompressor } from "../src/XmlCompressor.js";
import { CompressorError } from "../src/errors.js";
import type { XmlCompressorOptions } from "../src/types.js";

describe("XmlCompressor", () => {
  it("removes comments and insignificant whitespace", () => {
    const xml =
      '<?xml version="1.0"?>\n<!-- c -->\n<root  a = "1" >\n  <item>  x  </item>\n' +
      "  <data><![CDATA[  <keep>  ]]></data>\n</root>\n";
    expect(new XmlCompressor().compress(xml)).toBe(
      '<?xml version="1.0"?><root a="1"><item>  x  </item><data><![CDATA[  <keep>  ]]></data></root>'
    );
  });

  it("keeps intertag whitespace when asked to", () => {
    const compressor = new XmlCompressor({ removeIntertagSpaces: false });
    expect(compressor.compress("<a>\n  <b/>\n</a>")).toBe("<a>\n  <b/>\n</a>");
  });

  it("keeps comments when asked to", () => {
    const compressor = new XmlCompressor({ removeComments: false });
    expect(compressor.compress("<a><!-- c --></a>")).toBe("<a><!-- c --></a>");
  });

  it("returns the input unchanged when disabled", () => {
    const xml = "  <a>  </a>  ";
    expect(new XmlCompressor({ enabled: false }).compress(xml)).toBe(xml);
  });

  it("rejects mistyped options", () => {
    const options: XmlCompressorOptions = JSON.parse('{"removeComments":1}');
    expect(() => new XmlCompressor(options)).toThrow(CompressorError);
  });
});
