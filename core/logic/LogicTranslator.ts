import { parseLogic, preprocessLogic } from '@grammar/parser';
import { lowerLogic } from './lower';
import { compileExpression } from './compile';
import { CompiledPredicate, type DataTable, type EvaluateOptions } from './CompiledPredicate';
import type { TranslatorConfig } from '@core/config/types';
import { DEFAULT_TRANSLATOR_CONFIG } from '@core/config/defaults';
import { InputTypeError } from '@core/errors/InputTypeError';
import { translatorLogger as logger } from '@core/utils/logger';

export interface ILogicTranslator {
  translate(logic: string): CompiledPredicate;
}

/**
 * Translates branching logic into compiled, vectorized predicates.
 *
 * Translation runs preprocess, parse, lower and compile in that order.
 * Results are cached by the logic string as written; the cache keeps the
 * most recently used entries and evicts the oldest once it is full. A
 * cache size of 0 disables caching.
 */
export class LogicTranslator implements ILogicTranslator {
  private readonly cache = new Map<string, CompiledPredicate>();
  private readonly cacheSize: number;

  constructor(config: Partial<TranslatorConfig> = {}) {
    this.cacheSize = config.cacheSize ?? DEFAULT_TRANSLATOR_CONFIG.cacheSize;
  }

  /**
   * @throws {InputTypeError} If logic is not a string
   * @throws {LogicParseError} If logic is not valid branching logic
   */
  translate(logic: unknown): CompiledPredicate {
    if (typeof logic !== 'string') {
      throw new InputTypeError('Branching logic must be a string', logic);
    }

    const cached = this.cache.get(logic);
    if (cached) {
      // Re-insert so the entry counts as recently used
      this.cache.delete(logic);
      this.cache.set(logic, cached);
      logger.debug('Translation cache hit', { logic });
      return cached;
    }

    const tree = parseLogic(preprocessLogic(logic), logic);
    const { expression, fields } = lowerLogic(tree, logic);
    const predicate = new CompiledPredicate(logic, expression, fields, compileExpression(expression));

    logger.debug('Translated branching logic', {
      logic,
      fields: [...fields],
      expression: predicate.toString()
    });

    this.remember(logic, predicate);
    return predicate;
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private remember(logic: string, predicate: CompiledPredicate): void {
    if (this.cacheSize === 0) {
      return;
    }
    while (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
    }
    this.cache.set(logic, predicate);
  }
}

export const defaultTranslator = new LogicTranslator();

/**
 * Translate with the shared default translator.
 */
export function translate(logic: string): CompiledPredicate {
  return defaultTranslator.translate(logic);
}

/**
 * Evaluate a predicate, or a logic string translated on the fly, against a
 * table of raw string columns.
 */
export function evaluate(
  predicate: CompiledPredicate | string,
  table: DataTable,
  options: EvaluateOptions = {}
): boolean[] {
  const compiled = typeof predicate === 'string' ? defaultTranslator.translate(predicate) : predicate;
  return compiled.evaluate(table, options);
}
