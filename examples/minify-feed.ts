import { XmlCompressor } from "../src/index.js";

/**
 * Minifying an XML feed. CDATA sections are kept as they are.
 */

const feed = `<?xml version="1.0" encoding="UTF-8"?>
<!-- generated nightly -->
<rss version="2.0">
  <channel>
    <title>  Example feed  </title>
    <item>
      <description><![CDATA[  <p>Some   <b>markup</b></p>  ]]></description>
    </item>
  </channel>
</rss>`;

function main() {
  const compressor = new XmlCompressor();

  console.log("🗜️  Compressing feed...");
  console.log(compressor.compress(feed));
}

main();
