import { createRequire } from "node:module";
import type * as Csso from "csso";
import type { ICompressor } from "./ICompressor.js";
import type { CssCompressorOptions } from "./types.js";
import { CompressorError, errorMessage } from "./errors.js";

const requireOptional = createRequire(import.meta.url);

/**
 * CssoCssCompressor - minifies inline styles with csso. Loaded on first use.
 */
export class CssoCssCompressor implements ICompressor {
  private readonly options: Required<CssCompressorOptions>;
  private csso: typeof Csso | undefined;

  private static readonly DEFAULT_OPTIONS: Required<CssCompressorOptions> = {
    restructure: true,
  };

  constructor(options: CssCompressorOptions = {}) {
    this.options = { ...CssoCssCompressor.DEFAULT_OPTIONS, ...options };
  }

  /**
   * @throws {CompressorError} ERR_COMPRESSOR_UNAVAILABLE or ERR_COMPRESSOR_FAILED.
   */
  compress(source: string): string {
    const csso = this.load();
    try {
      return csso.minify(source, { restructure: this.options.restructure }).css;
    } catch (error: unknown) {
      throw new CompressorError(
        `CSS minification failed: ${errorMessage(error)}`,
        "ERR_COMPRESSOR_FAILED",
        error instanceof Error ? error : undefined
      );
    }
  }

  private load(): typeof Csso {
    if (this.csso) return this.csso;
    try {
      const loaded: typeof Csso = requireOptional("csso");
      this.csso = loaded;
      return loaded;
    } catch (error: unknown) {
      throw new CompressorError(
        `csso could not be loaded: ${errorMessage(error)}`,
        "ERR_COMPRESSOR_UNAVAILABLE",
        error instanceof Error ? error : undefined
      );
    }
  }
}
