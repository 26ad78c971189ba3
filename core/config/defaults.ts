import type { ValueConfig, TranslatorConfig, ResolvedConfig } from './types';

/**
 * Date and datetime layouts the platform accepts for validated text fields:
 * Y-M-D, D-M-Y and M-D-Y, each optionally followed by hours and minutes,
 * with or without seconds. An ambiguous value such as 01-02-2024 matches
 * D-M-Y first.
 */
export const DEFAULT_DATE_FORMATS: readonly string[] = [
  'yyyy-M-d',
  'yyyy-M-d H:mm',
  'yyyy-M-d H:mm:ss',
  'd-M-yyyy',
  'd-M-yyyy H:mm',
  'd-M-yyyy H:mm:ss',
  'M-d-yyyy',
  'M-d-yyyy H:mm',
  'M-d-yyyy H:mm:ss'
];

export const DEFAULT_VALUE_CONFIG: ValueConfig = {
  missingDataCodes: [],
  dateFormats: DEFAULT_DATE_FORMATS
};

export const DEFAULT_TRANSLATOR_CONFIG: TranslatorConfig = {
  cacheSize: 512
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  values: DEFAULT_VALUE_CONFIG,
  translator: DEFAULT_TRANSLATOR_CONFIG
};

/**
 * Fills the gaps of a partial value config with the defaults.
 */
export function resolveValueConfig(partial?: Partial<ValueConfig>): ValueConfig {
  return {
    missingDataCodes: partial?.missingDataCodes ?? DEFAULT_VALUE_CONFIG.missingDataCodes,
    dateFormats: partial?.dateFormats ?? DEFAULT_VALUE_CONFIG.dateFormats
  };
}
