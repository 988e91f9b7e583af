import { describe, it, expect } from "vitest";
import {
  SKELETON_STEPS,
  removeComments,
  removeFormAttributes,
  removeInputAttributes,
  removeIntertagSpaces,
  removeLinkAttributes,
  removeMultiSpaces,
  removeQuotes,
  removeScriptAttributes,
  removeSpacesInsideTags,
  removeStyleAttributes,
  removeSurroundingSpaces,
  removeUrlScheme,
  simplifyBooleanAttributes,
  simplifyDoctype,
  surroundingSpacesPattern,
  transformSkeleton,
} from "../src/utils/skeleton-transformer.js";
import { REGEX_HTTPS_URL_ATTR, REGEX_HTTP_URL_ATTR } from "../src/constants.js";

const allOff = {
  removeComments: false,
  simpleDoctype: false,
  removeScriptAttributes: false,
  removeStyleAttributes: false,
  removeLinkAttributes: false,
  removeFormAttributes: false,
  removeInputAttributes: false,
  simpleBooleanAttributes: false,
  removeHttpProtocol: false,
  removeHttpsProtocol: false,
  removeIntertagSpaces: false,
  removeMultiSpaces: false,
  removeSpacesInsideTags: false,
  removeQuotes: false,
  removeSurroundingSpaces: "",
};

describe("skeleton steps", () => {
  it("removes plain comments but not conditional ones", () => {
    expect(removeComments("<!-- c --><p>a</p><!---->")).toBe("<p>a</p>");
    expect(removeComments("<!--[if IE]>x<![endif]-->")).toBe("<!--[if IE]>x<![endif]-->");
  });

  it("replaces any doctype with the HTML5 one", () => {
    expect(
      simplifyDoctype(
        '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN" "http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd"><html>'
      )
    ).toBe("<!DOCTYPE html><html>");
  });

  it("drops default script type and language", () => {
    expect(removeScriptAttributes('<script type="text/javascript" language="javascript" src="a.js">')).toBe(
      '<script   src="a.js">'
    );
  });

  it("drops the default style type", () => {
    expect(removeStyleAttributes('<style type="text/css">')).toBe("<style >");
  });

  it("drops link type only on stylesheets", () => {
    expect(
      removeLinkAttributes(
        '<link rel="stylesheet" type="text/css" href="a.css"><link rel="icon" type="text/plain" href="b">'
      )
    ).toBe('<link rel="stylesheet"  href="a.css"><link rel="icon" type="text/plain" href="b">');
  });

  it("drops default form method and input type", () => {
    expect(removeFormAttributes('<form method="GET" action="/s">')).toBe('<form  action="/s">');
    expect(removeInputAttributes('<input type="text" name="q">')).toBe('<input  name="q">');
  });

  it("shortens boolean attributes", () => {
    expect(simplifyBooleanAttributes('<input checked="checked" name="c">')).toBe('<input checked name="c">');
  });

  it("removes the scheme from URL attributes", () => {
    expect(removeUrlScheme('<a href="http://x.com">', REGEX_HTTP_URL_ATTR)).toBe('<a href="//x.com">');
    expect(removeUrlScheme('<img src="https://x/y.png">', REGEX_HTTPS_URL_ATTR)).toBe('<img src="//x/y.png">');
    expect(removeUrlScheme('<img src="https://x/y.png">', REGEX_HTTP_URL_ATTR)).toBe('<img src="https://x/y.png">');
  });

  it("keeps the scheme on rel=external tags", () => {
    expect(removeUrlScheme('<a href="http://x.com" rel="external">', REGEX_HTTP_URL_ATTR)).toBe(
      '<a href="http://x.com" rel="external">'
    );
    expect(removeUrlScheme('<a rel="alternate external" href="https://x.com">', REGEX_HTTPS_URL_ATTR)).toBe(
      '<a rel="alternate external" href="https://x.com">'
    );
  });

  it("treats placeholders as tag boundaries when removing intertag spaces", () => {
    expect(removeIntertagSpaces("<p>a</p>  <p>b</p>")).toBe("<p>a</p><p>b</p>");
    expect(removeIntertagSpaces("<div> %%%~COMPRESS~PRE~0~%%% </div>")).toBe("<div>%%%~COMPRESS~PRE~0~%%%</div>");
    expect(removeIntertagSpaces("%%%~COMPRESS~SKIP~0~%%%  %%%~COMPRESS~SKIP~1~%%%")).toBe(
      "%%%~COMPRESS~SKIP~0~%%%%%%~COMPRESS~SKIP~1~%%%"
    );
  });

  it("collapses whitespace runs", () => {
    expect(removeMultiSpaces("<p>  a \n\t b </p>")).toBe("<p> a b </p>");
  });

  it("tightens attributes and tag ends", () => {
    expect(removeSpacesInsideTags('<a href = "x" >')).toBe('<a href="x">');
    expect(removeSpacesInsideTags("<p   >")).toBe("<p>");
    expect(removeSpacesInsideTags("<br />")).toBe("<br/>");
    expect(removeSpacesInsideTags('<img src="a" />')).toBe('<img src="a"/>');
  });

  it("keeps the space between an unquoted value and a self-closing slash", () => {
    expect(removeSpacesInsideTags("<input value=abc />")).toBe("<input value=abc />");
    expect(removeSpacesInsideTags("<img src=a.png />")).toBe("<img src=a.png />");
    expect(removeSpacesInsideTags("<a href=/x/y />")).toBe("<a href=/x/y />");
  });

  it("unquotes simple attribute values", () => {
    expect(removeQuotes(`<div class="a-b_1" id='x' title="two words">`)).toBe(
      '<div class=a-b_1 id=x title="two words">'
    );
    expect(removeQuotes('<img src="a"/>')).toBe("<img src=a />");
  });

  it("removes spaces around the min block tags", () => {
    expect(removeSurroundingSpaces("<div> <p> a </p> </div>", "min")).toBe("<div><p>a</p></div>");
  });

  it("removes spaces around the max block tags", () => {
    expect(removeSurroundingSpaces("<table> <tr> <td> 1 </td> </tr> </table>", "max")).toBe(
      "<table><tr><td>1</td></tr></table>"
    );
  });

  it("removes spaces around a custom tag list only", () => {
    expect(removeSurroundingSpaces("<div> <span> x </span> </div>", "div")).toBe("<div><span> x </span></div>");
    expect(removeSurroundingSpaces("<div> <pre> x </pre> </div>", "p")).toBe("<div> <pre> x </pre> </div>");
  });

  it("removes spaces around every tag with all", () => {
    expect(removeSurroundingSpaces("<b> x </b> y", "all")).toBe("<b>x</b>y");
  });

  it("builds no pattern for a blank tag list", () => {
    expect(surroundingSpacesPattern("")).toBeUndefined();
    expect(surroundingSpacesPattern(" , ")).toBeUndefined();
  });
});

describe("transformSkeleton", () => {
  it("only trims when every step is off", () => {
    expect(transformSkeleton("  <p>  a  </p>  ", allOff)).toBe("<p>  a  </p>");
  });

  it("keeps the edges when trimming is turned off", () => {
    expect(transformSkeleton("  <p>a</p>  ", allOff, false)).toBe("  <p>a</p>  ");
  });

  it("applies only the enabled steps", () => {
    expect(transformSkeleton("<!-- x --><p>  a  </p>", { ...allOff, removeMultiSpaces: true })).toBe(
      "<!-- x --><p> a </p>"
    );
  });

  it("applies steps in a fixed order", () => {
    expect(SKELETON_STEPS.map((step) => step.name)).toEqual([
      "remove-comments",
      "simple-doctype",
      "remove-script-attributes",
      "remove-style-attributes",
      "remove-link-attributes",
      "remove-form-attributes",
      "remove-input-attributes",
      "simple-boolean-attributes",
      "remove-http-protocol",
      "remove-https-protocol",
      "remove-intertag-spaces",
      "remove-multi-spaces",
      "remove-spaces-inside-tags",
      "remove-quotes",
      "remove-surrounding-spaces",
    ]);
  });
});
