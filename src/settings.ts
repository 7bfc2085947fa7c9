import { homedir } from "os";
import { join } from "path";
import { RetrievalValidationError } from "./errors";

export type OutputFormat = "png" | "jpeg" | "webp" | "tiff";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["png", "jpeg", "webp", "tiff"];

export interface RetrievalConfig {
  /** Street names and points of interest drawn over the imagery. */
  labeled: boolean;
  cacheEnabled: boolean;
  outputFormat: OutputFormat;
  /** Market code for localized labels, e.g. "en-us". */
  cultureCode: string;
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  labeled: true,
  cacheEnabled: true,
  outputFormat: "png",
  cultureCode: "en-us"
};

export const APP_DATA_FOLDER = "aerial-image-retrieval";

const CULTURE_CODE_PATTERN = /^[\p{L}-]+$/u;

export function isValidCultureCode(code: string): boolean {
  return CULTURE_CODE_PATTERN.test(code);
}

export function resolveRetrievalConfig(
  overrides?: Partial<RetrievalConfig>
): Readonly<RetrievalConfig> {
  const config = { ...DEFAULT_RETRIEVAL_CONFIG, ...overrides };
  if (!isValidCultureCode(config.cultureCode)) {
    throw new RetrievalValidationError(
      `"${config.cultureCode}" is not a valid culture code.`,
      "cultureCode"
    );
  }
  if (!OUTPUT_FORMATS.includes(config.outputFormat)) {
    throw new RetrievalValidationError(
      `Unsupported output format "${config.outputFormat}".`,
      "outputFormat"
    );
  }
  return Object.freeze(config);
}

/**
 * Per-user application data directory. LOCALAPPDATA on Windows,
 * XDG_CACHE_HOME or ~/.cache elsewhere.
 */
export function resolveAppDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.LOCALAPPDATA || env.XDG_CACHE_HOME || join(homedir(), ".cache");
  return join(base, APP_DATA_FOLDER);
}
