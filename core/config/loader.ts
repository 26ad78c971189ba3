import * as fs from 'fs';
import * as path from 'path';
import type { RedcapLogicConfigFile, ResolvedConfig } from './types';
import { DEFAULT_CONFIG } from './defaults';
import { normalizeMissingDataCodes } from './utils';
import { configLogger as logger } from '@core/utils/logger';

export const CONFIG_FILE_NAME = 'redcap-logic.config.json';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Checks a parsed JSON document against the config file shape, returning
 * the problems found rather than throwing.
 */
export function validateConfigFile(value: unknown): string[] {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return ['config must be a JSON object'];
  }

  const problems: string[] = [];
  const record: Record<string, unknown> = { ...value };

  const codes = record.missingDataCodes;
  if (codes !== undefined && typeof codes !== 'string' && !isStringArray(codes)) {
    problems.push('missingDataCodes must be a string or an array of strings');
  }

  const formats = record.dateFormats;
  if (formats !== undefined && !isStringArray(formats)) {
    problems.push('dateFormats must be an array of strings');
  }

  const cacheSize = record.translatorCacheSize;
  if (cacheSize !== undefined && (typeof cacheSize !== 'number' || !Number.isInteger(cacheSize) || cacheSize < 0)) {
    problems.push('translatorCacheSize must be a non-negative integer');
  }

  return problems;
}

function isConfigFile(value: unknown): value is RedcapLogicConfigFile {
  return validateConfigFile(value).length === 0;
}

/**
 * Load redcap-logic configuration from the project directory
 */
export class ConfigLoader {
  private readonly configPath: string;
  private cachedConfig?: ResolvedConfig;

  constructor(projectPath?: string) {
    this.configPath = path.join(projectPath ?? process.cwd(), CONFIG_FILE_NAME);
  }

  /**
   * Load the project file and merge it over the defaults
   */
  load(): ResolvedConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    this.cachedConfig = ConfigLoader.resolve(this.loadConfigFile());
    return this.cachedConfig;
  }

  static resolve(file: RedcapLogicConfigFile): ResolvedConfig {
    return {
      values: {
        missingDataCodes: file.missingDataCodes !== undefined
          ? normalizeMissingDataCodes(file.missingDataCodes)
          : DEFAULT_CONFIG.values.missingDataCodes,
        dateFormats: file.dateFormats ?? DEFAULT_CONFIG.values.dateFormats
      },
      translator: {
        cacheSize: file.translatorCacheSize ?? DEFAULT_CONFIG.translator.cacheSize
      }
    };
  }

  private loadConfigFile(): RedcapLogicConfigFile {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      logger.warn('Ignoring unreadable config file', {
        path: this.configPath,
        error: error instanceof Error ? error.message : String(error)
      });
      return {};
    }

    if (!isConfigFile(parsed)) {
      logger.warn('Ignoring invalid config file', {
        path: this.configPath,
        problems: validateConfigFile(parsed)
      });
      return {};
    }

    logger.debug('Loaded config file', { path: this.configPath });
    return parsed;
  }
}
