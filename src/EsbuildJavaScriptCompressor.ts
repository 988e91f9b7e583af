import { createRequire } from "node:module";
import type * as Esbuild from "esbuild";
import type { ICompressor } from "./ICompressor.js";
import type { JavaScriptCompressorOptions } from "./types.js";
import { CompressorError, errorMessage } from "./errors.js";

const requireOptional = createRequire(import.meta.url);

/**
 * EsbuildJavaScriptCompressor - minifies inline scripts with esbuild's
 * synchronous transform API.
 *
 * esbuild is loaded on first use, so a compressor can be constructed (and the
 * HTML pipeline can run with script minification off) without it installed.
 */
export class EsbuildJavaScriptCompressor implements ICompressor {
  private readonly options: Required<JavaScriptCompressorOptions>;
  private esbuild: typeof Esbuild | undefined;

  private static readonly DEFAULT_OPTIONS: Required<JavaScriptCompressorOptions> = {
    minifyIdentifiers: true,
    minifySyntax: true,
    minifyWhitespace: true,
  };

  constructor(options: JavaScriptCompressorOptions = {}) {
    this.options = { ...EsbuildJavaScriptCompressor.DEFAULT_OPTIONS, ...options };
  }

  /**
   * @throws {CompressorError} ERR_COMPRESSOR_UNAVAILABLE when esbuild cannot be loaded,
   *   ERR_COMPRESSOR_FAILED when the script does not parse.
   */
  compress(source: string): string {
    const esbuild = this.load();
    try {
      const result = esbuild.transformSync(source, {
        loader: "js",
        minifyIdentifiers: this.options.minifyIdentifiers,
        minifySyntax: this.options.minifySyntax,
        minifyWhitespace: this.options.minifyWhitespace,
      });
      return result.code.trim();
    } catch (error: unknown) {
      throw new CompressorError(
        `JavaScript minification failed: ${errorMessage(error)}`,
        "ERR_COMPRESSOR_FAILED",
        error instanceof Error ? error : undefined
      );
    }
  }

  private load(): typeof Esbuild {
    if (this.esbuild) return this.esbuild;
    try {
      const loaded: typeof Esbuild = requireOptional("esbuild");
      this.esbuild = loaded;
      return loaded;
    } catch (error: unknown) {
      throw new CompressorError(
        `esbuild could not be loaded: ${errorMessage(error)}`,
        "ERR_COMPRESSOR_UNAVAILABLE",
        error instanceof Error ? error : undefined
      );
    }
  }
}
