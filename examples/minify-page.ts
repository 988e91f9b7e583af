import { HtmlCompressor, PHP_TAG_PATTERN } from "../src/index.js";

/**
 * Minifying a page with HtmlCompressor
 *
 * Good for: server-rendered pages, email templates, static site output.
 * Template directives and preformatted blocks come through untouched.
 */

const page = `<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.0 Strict//EN" "http://www.w3.org/TR/xhtml1/DTD/xhtml1-strict.dtd">
<html>
  <head>
    <!-- page styles -->
    <link rel="stylesheet" type="text/css" href="http://cdn.example.com/site.css">
    <style type="text/css">
      body  { margin: 0;   padding: 0; }
    </style>
  </head>
  <body>
    <h1 class="title">  Hello,   <?php echo $name; ?>  </h1>
    <pre>
  indented
      text
    </pre>
    <a href="http://example.com/next" onclick="javascript: track('next')">Next</a>
    <script type="text/javascript">
      var  greeting = "hi" ;
      console.log( greeting );
    </script>
  </body>
</html>`;

function main() {
  const compressor = new HtmlCompressor({
    preservePatterns: [PHP_TAG_PATTERN],
    removeIntertagSpaces: true,
    removeQuotes: true,
    simpleDoctype: true,
    removeScriptAttributes: true,
    removeStyleAttributes: true,
    removeLinkAttributes: true,
    removeHttpProtocol: true,
    removeJavaScriptProtocol: true,
    compressJavaScript: true,
    compressCss: true,
    generateStatistics: true,
  });

  console.log("🗜️  Compressing page...");
  const result = compressor.compress(page);

  console.log(`Result:\n${result}`);
  const statistics = compressor.getStatistics();
  if (statistics) {
    console.log(`📊 ${statistics.toString()}`);
  }
}

main();
