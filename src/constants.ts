// Placeholder sigils. Input containing these exact sequences is not supported.
export const PLACEHOLDER_OPEN = "%%%~";
export const PLACEHOLDER_CLOSE = "~%%%";
export const PLACEHOLDER_NAMESPACE = "COMPRESS";

// Block-level tag presets for surrounding-space removal
export const BLOCK_TAGS_MIN = "html,head,body,br,p";
export const BLOCK_TAGS_MAX =
  BLOCK_TAGS_MIN +
  ",h1,h2,h3,h4,h5,h6,blockquote,center,dl,fieldset,form,frame,frameset,hr,noframes,ol,table,tbody,tr,td,th,tfoot,thead,ul";
export const ALL_TAGS = "all";

// Script types that are template markup rather than code
export const TEMPLATE_SCRIPT_TYPES: ReadonlyArray<string> = ["text/x-jquery-tmpl"];
export const JAVASCRIPT_TYPES: ReadonlyArray<string> = ["", "text/javascript", "application/javascript"];

export const CANONICAL_DOCTYPE = "<!DOCTYPE html>";

// Built-in preserve rules for server-side markup
export const PHP_TAG_PATTERN = /<\?php.*?\?>/gis;
export const SERVER_SCRIPT_TAG_PATTERN = /<%.*?%>/gs;
export const SERVER_SIDE_INCLUDE_PATTERN = /<!--\s*#.*?-->/gs;

// Regex - protected regions
export const REGEX_SKIP_BLOCK = /<!--\s*\{\{\{\s*-->(.*?)<!--\s*\}\}\}\s*-->/gis;
export const REGEX_CONDITIONAL_COMMENT = /(<!(?:--)?\[[^\]]+?\]>)(.*?)(<!\[[^\]]+\]-->)/gis;
export const REGEX_EVENT_DOUBLE_QUOTED = /(\son[a-z]+\s*=\s*")([^"\\\r\n]*(?:\\.[^"\\\r\n]*)*)(")/gi;
export const REGEX_EVENT_SINGLE_QUOTED = /(\son[a-z]+\s*=\s*')([^'\\\r\n]*(?:\\.[^'\\\r\n]*)*)(')/gi;
export const REGEX_PRE = /(<pre[^>]*?>)(.*?)(<\/pre>)/gis;
export const REGEX_SCRIPT = /(<script[^>]*?>)(.*?)(<\/script>)/gis;
export const REGEX_STYLE = /(<style[^>]*?>)(.*?)(<\/style>)/gis;
export const REGEX_TEXTAREA = /(<textarea[^>]*?>)(.*?)(<\/textarea>)/gis;
export const REGEX_LINE_BREAK = /(?:[ \t]*(\r?\n)[ \t]*)+/g;
export const REGEX_CDATA_SECTION = /<!\[CDATA\[.*?\]\]>/gis;
export const REGEX_CDATA_WRAPPER = /^\s*<!\[CDATA\[(.*?)\]\]>\s*$/is;

// Regex - skeleton rewrites
export const REGEX_COMMENT = /<!---->|<!--[^[].*?-->/gis;
export const REGEX_XML_COMMENT = /<!--.*?-->/gs;
export const REGEX_DOCTYPE = /<!DOCTYPE[^>]*>/gi;
export const REGEX_JS_TYPE_ATTR = /(<script[^>]*)type\s*=\s*(["']*)(?:text|application)\/javascript\2([^>]*>)/gis;
export const REGEX_JS_LANGUAGE_ATTR = /(<script[^>]*)language\s*=\s*(["']*)javascript\2([^>]*>)/gis;
export const REGEX_STYLE_TYPE_ATTR = /(<style[^>]*)type\s*=\s*(["']*)text\/css\2([^>]*>)/gis;
export const REGEX_LINK_TYPE_ATTR = /(<link[^>]*)type\s*=\s*(["']*)text\/(?:css|plain)\2([^>]*>)/gis;
export const REGEX_FORM_METHOD_ATTR = /(<form[^>]*)method\s*=\s*(["']*)get\2([^>]*>)/gis;
export const REGEX_INPUT_TYPE_ATTR = /(<input[^>]*)type\s*=\s*(["']*)text\2([^>]*>)/gis;
export const REGEX_BOOLEAN_ATTR = /(<\w+[^>]*)(checked|selected|disabled|readonly)\s*=\s*(["']*)\w*\3([^>]*>)/gis;
export const REGEX_HTTP_URL_ATTR = /(<[^>]+?(?:href|src|cite|action)\s*=\s*['"])http:(\/\/[^>]+?>)/gis;
export const REGEX_HTTPS_URL_ATTR = /(<[^>]+?(?:href|src|cite|action)\s*=\s*['"])https:(\/\/[^>]+?>)/gis;
export const REGEX_STYLESHEET_REL = /^(?:alternate\s+)?stylesheet$/i;
export const REGEX_EXTERNAL_REL = /^(?:alternate\s+)?external$/i;
export const REGEX_JAVASCRIPT_PROTOCOL = /^javascript:\s*(.+)$/is;
export const REGEX_INTERTAG_SPACE = />\s+</g;
export const REGEX_MULTI_SPACE = /\s+/g;
export const REGEX_SPACE_INSIDE_TAG = /\s+(?=[^<]*?>)/g;
export const REGEX_TAG_PROPERTY = /(\s\w+)\s*=\s*(?=[^<]*?>)/gi;
export const REGEX_TAG_END_SPACE = /(<(?:[^>]+?))(?:\s+?)(\/?>)/gs;
export const REGEX_TAG_LAST_UNQUOTED_VALUE = /=\s*[^\s"'=<>`]+$/;
export const REGEX_TAG_QUOTED_VALUE = /\s*=\s*(["'])([a-z0-9_-]+?)\1(\/?)(?=[^<]*?>)/gi;
export const REGEX_WHITESPACE_CHAR = /\s/g;
