import { RedcapValue } from './RedcapValue';
import { RedcapValueArray } from './RedcapValueArray';
import { InternTable } from './InternTable';
import { createClassifier, type Classification, type Classifier } from './classify';
import { resolveValueConfig } from '@core/config/defaults';
import type { ValueConfig } from '@core/config/types';
import { InputTypeError } from '@core/errors/InputTypeError';
import { valuesLogger as logger } from '@core/utils/logger';

export interface ValueFactoryOptions extends Partial<ValueConfig> {
  /**
   * Reuse one instance per raw string while it is alive. Saves memory on
   * large exports with few distinct responses; results are identical
   * either way.
   */
  intern?: boolean;
}

/**
 * Builds values and value arrays under one classification config.
 * Interning is per factory because the same raw string can classify
 * differently under a different set of missing-data codes.
 */
export class ValueFactory implements Classifier {
  readonly config: ValueConfig;
  private readonly classifier: Classifier;
  private readonly internTable?: InternTable<RedcapValue>;

  constructor(options: ValueFactoryOptions = {}) {
    this.config = resolveValueConfig(options);
    this.classifier = createClassifier(this.config);
    if (options.intern ?? true) {
      this.internTable = new InternTable<RedcapValue>();
    }
    logger.debug('Created value factory', {
      missingDataCodes: this.config.missingDataCodes,
      dateFormats: this.config.dateFormats.length,
      intern: this.internTable !== undefined
    });
  }

  classify(raw: unknown): Classification {
    return this.classifier.classify(raw);
  }

  /**
   * Wrap a raw response. Passing an existing value returns it unchanged.
   */
  makeValue(raw: unknown): RedcapValue {
    if (raw instanceof RedcapValue) {
      return raw;
    }
    if (typeof raw !== 'string') {
      throw new InputTypeError('Response values must be strings', raw);
    }

    const text: string = raw;
    const create = (): RedcapValue => {
      const { category, numericValue } = this.classifier.classify(text);
      return new RedcapValue(text, numericValue, category);
    };

    return this.internTable ? this.internTable.intern(text, create) : create();
  }

  makeArray(raws: Iterable<unknown>): RedcapValueArray {
    return RedcapValueArray.fromStrings(raws, this.classifier);
  }

  /** Live interned entries, for diagnostics */
  get internedCount(): number {
    return this.internTable?.size ?? 0;
  }
}

export const defaultValueFactory = new ValueFactory();

function factoryFor(config?: Partial<ValueConfig>): ValueFactory {
  return config ? new ValueFactory({ ...config, intern: false }) : defaultValueFactory;
}

/**
 * Wrap a raw response string using the default config, or the given one.
 */
export function makeValue(raw: unknown, config?: Partial<ValueConfig>): RedcapValue {
  return factoryFor(config).makeValue(raw);
}

/**
 * Classify a column of raw response strings.
 */
export function makeArray(raws: Iterable<unknown>, config?: Partial<ValueConfig>): RedcapValueArray {
  return factoryFor(config).makeArray(raws);
}
