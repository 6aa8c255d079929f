import { ConfigError } from "./errors";

export interface FetcherConfig {
  /** Pause after every page download, in milliseconds */
  pageDelayMs: number;
  /** Charset forced on text layers; the library's server omits it */
  textCharset: string;
  mergeCommand: string;
  textLayerCommand: string;
  maxPages: number;
  requireStructMap: boolean;
  outputDir: string;
  quiet: boolean;
  sourceTemplate: string;
  permission: string;
  imagePage: string;
  wikisource: string;
}

export const DEFAULT_CONFIG: FetcherConfig = {
  pageDelayMs: 1000,
  textCharset: "utf-8",
  mergeCommand: "djvm",
  textLayerCommand: "djvused",
  maxPages: 9999,
  requireStructMap: false,
  outputDir: ".",
  quiet: false,
  sourceTemplate: "Kramerius link",
  permission: "{{PD-old}}",
  imagePage: "1",
  wikisource: ":s:cs:Index:{{PAGENAME}}",
};

function parseNonNegativeInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false" || normalized === "") return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

/**
 * Build the fetcher configuration from environment variables.
 * Explicit overrides (CLI options) take precedence over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<FetcherConfig> = {},
): FetcherConfig {
  const config: FetcherConfig = { ...DEFAULT_CONFIG };

  if (env.DJVU_PAGE_DELAY_MS !== undefined) {
    config.pageDelayMs = parseNonNegativeInt("DJVU_PAGE_DELAY_MS", env.DJVU_PAGE_DELAY_MS);
  }
  if (env.DJVU_TEXT_CHARSET) config.textCharset = env.DJVU_TEXT_CHARSET;
  if (env.DJVU_MERGE_CMD) config.mergeCommand = env.DJVU_MERGE_CMD;
  if (env.DJVU_TEXT_CMD) config.textLayerCommand = env.DJVU_TEXT_CMD;
  if (env.DJVU_MAX_PAGES !== undefined) {
    config.maxPages = parseNonNegativeInt("DJVU_MAX_PAGES", env.DJVU_MAX_PAGES);
  }
  if (env.DJVU_REQUIRE_STRUCTMAP !== undefined) {
    config.requireStructMap = parseFlag("DJVU_REQUIRE_STRUCTMAP", env.DJVU_REQUIRE_STRUCTMAP);
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value });
    }
  }

  try {
    new TextDecoder(config.textCharset);
  } catch {
    throw new ConfigError(`Unsupported text charset: ${config.textCharset}`);
  }

  return config;
}
