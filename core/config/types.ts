/**
 * Configuration types for redcap-logic
 */

/**
 * Settings that change how raw response strings are classified.
 */
export interface ValueConfig {
  /**
   * Non-blank sentinels that mark a response as deliberately missing,
   * e.g. "NA-2" or "UNK". Checked before numeric parsing.
   */
  missingDataCodes: readonly string[];
  /**
   * Ordered date-fns format strings; the first one that parses wins.
   */
  dateFormats: readonly string[];
}

export interface TranslatorConfig {
  /** Maximum number of compiled predicates kept per translator */
  cacheSize: number;
}

/**
 * Shape of a project's redcap-logic.config.json. Every key is optional;
 * missing keys fall back to the defaults.
 */
export interface RedcapLogicConfigFile {
  missingDataCodes?: string[] | string;
  dateFormats?: string[];
  translatorCacheSize?: number;
}

export interface ResolvedConfig {
  values: ValueConfig;
  translator: TranslatorConfig;
}
