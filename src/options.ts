import { z } from "zod";
import type { ICompressor } from "./ICompressor.js";
import { CompressorError, errorMessage } from "./errors.js";

const compressorSchema = z.custom<ICompressor>(
  (value) =>
    typeof value === "object" && value !== null && "compress" in value && typeof value.compress === "function",
  { message: "Expected an object with a compress(source) method" }
);

export const HtmlCompressorOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    removeComments: z.boolean().default(true),
    removeMultiSpaces: z.boolean().default(true),
    removeSpacesInsideTags: z.boolean().default(true),
    removeIntertagSpaces: z.boolean().default(false),
    removeQuotes: z.boolean().default(false),
    preserveLineBreaks: z.boolean().default(false),
    simpleDoctype: z.boolean().default(false),
    removeScriptAttributes: z.boolean().default(false),
    removeStyleAttributes: z.boolean().default(false),
    removeLinkAttributes: z.boolean().default(false),
    removeFormAttributes: z.boolean().default(false),
    removeInputAttributes: z.boolean().default(false),
    simpleBooleanAttributes: z.boolean().default(false),
    removeJavaScriptProtocol: z.boolean().default(false),
    removeHttpProtocol: z.boolean().default(false),
    removeHttpsProtocol: z.boolean().default(false),
    removeSurroundingSpaces: z.string().default(""),
    preservePatterns: z.array(z.union([z.instanceof(RegExp), z.string()])).default([]),
    compressJavaScript: z.boolean().default(false),
    compressCss: z.boolean().default(false),
    javaScriptCompressor: compressorSchema.optional(),
    cssCompressor: compressorSchema.optional(),
    generateStatistics: z.boolean().default(false),
  })
  .strict();

export const XmlCompressorOptionsSchema = z
  .object({
    enabled: z.boolean().default(true),
    removeComments: z.boolean().default(true),
    removeIntertagSpaces: z.boolean().default(true),
  })
  .strict();

/**
 * Validates an options object against a schema.
 * @throws {CompressorError} ERR_INVALID_OPTIONS listing every offending field.
 */
export function validateOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.infer<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CompressorError(`Invalid compressor options: ${details}`, "ERR_INVALID_OPTIONS", result.error);
  }
  return result.data;
}

/**
 * Compiles preserve patterns into fresh global regular expressions, so a
 * caller's `lastIndex` never shifts where a scan starts. Strings get the `s`
 * flag; RegExp flags are kept except `y`, and `g` is added.
 * @throws {CompressorError} ERR_INVALID_PRESERVE_PATTERN for a string that does not compile.
 */
export function compilePreservePatterns(patterns: ReadonlyArray<RegExp | string>): RegExp[] {
  return patterns.map((pattern, index) => {
    if (pattern instanceof RegExp) {
      return new RegExp(pattern.source, `${pattern.flags.replace(/[gy]/g, "")}g`);
    }
    try {
      return new RegExp(pattern, "gs");
    } catch (error: unknown) {
      throw new CompressorError(
        `Preserve pattern #${index} is not a valid regular expression: ${errorMessage(error)}`,
        "ERR_INVALID_PRESERVE_PATTERN",
        error instanceof Error ? error : undefined
      );
    }
  });
}
