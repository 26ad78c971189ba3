import type { FieldPredicate, IBranchingLogicService, MetadataRow } from './IBranchingLogicService';
import { checkboxColumns, choiceCodes, defaultTranslator, type CompiledPredicate, type DataTable, type LogicTranslator } from '@core/logic';
import { RedcapValueArray } from '@core/values/RedcapValueArray';
import { defaultValueFactory, ValueFactory } from '@core/values/ValueFactory';
import type { ValueConfig } from '@core/config/types';
import { LogicParseError } from '@core/errors/LogicParseError';
import { UnknownFieldError } from '@core/errors/UnknownFieldError';
import { branchingLogger as logger } from '@core/utils/logger';

export interface BranchingLogicServiceOptions {
  translator?: LogicTranslator;
  values?: Partial<ValueConfig>;
}

function rowCount(table: DataTable): number {
  for (const column of Object.values(table)) {
    return column.length;
  }
  return 0;
}

export class BranchingLogicService implements IBranchingLogicService {
  private readonly logic = new Map<string, string>();
  private readonly checkboxCodes = new Map<string, string[]>();
  private readonly translator: LogicTranslator;
  private readonly factory: ValueFactory;

  constructor(rows: readonly MetadataRow[], options: BranchingLogicServiceOptions = {}) {
    for (const row of rows) {
      this.logic.set(row.field_name, (row.branching_logic ?? '').trim());
      if (row.field_type === 'checkbox' && row.select_choices_or_calculations) {
        this.checkboxCodes.set(row.field_name, choiceCodes(row.select_choices_or_calculations));
      }
    }
    this.translator = options.translator ?? defaultTranslator;
    this.factory = options.values ? new ValueFactory({ ...options.values, intern: false }) : defaultValueFactory;
  }

  conditionalFields(): Map<string, string> {
    const conditional = new Map<string, string>();
    for (const [field, logic] of this.logic) {
      if (logic !== '') {
        conditional.set(field, logic);
      }
    }
    return conditional;
  }

  compileAll(): Map<string, FieldPredicate> {
    const compiled = new Map<string, FieldPredicate>();
    for (const [field, logic] of this.conditionalFields()) {
      try {
        compiled.set(field, this.translator.translate(logic));
      } catch (error) {
        if (!(error instanceof LogicParseError)) {
          throw error;
        }
        logger.warn('Skipping branching logic that does not parse', {
          field,
          logic,
          error: error.message
        });
        compiled.set(field, error);
      }
    }
    return compiled;
  }

  evaluateField(field: string, table: DataTable): boolean[] {
    const predicate = this.predicateFor(field);
    if (!predicate) {
      return new Array<boolean>(rowCount(table)).fill(true);
    }
    return predicate.evaluate(table, { factory: this.factory });
  }

  missingWhenShown(field: string, table: DataTable): boolean[] {
    const shown = this.evaluateField(field, table);
    const missing = this.missingMask(field, table);
    return shown.map((value, i) => value && missing[i]);
  }

  private predicateFor(field: string): CompiledPredicate | undefined {
    const logic = this.logic.get(field);
    if (logic === undefined) {
      throw new UnknownFieldError([field]);
    }
    return logic === '' ? undefined : this.translator.translate(logic);
  }

  private missingMask(field: string, table: DataTable): boolean[] {
    const own = table[field];
    if (own !== undefined) {
      return this.classified(own).isMissing();
    }

    // Checkbox fields export one column per option and none of their own
    const options = checkboxColumns(field, Object.keys(table), this.checkboxCodes.get(field));
    if (options.length === 0) {
      throw new UnknownFieldError([field]);
    }

    const unchecked = options.map(column => {
      const values = this.classified(table[column]);
      const blank = values.isMissing();
      const zero = values.equals('0');
      return blank.map((value, i) => value || zero[i]);
    });
    return unchecked[0].map((_, row) => unchecked.every(mask => mask[row]));
  }

  private classified(column: DataTable[string]): RedcapValueArray {
    return column instanceof RedcapValueArray ? column : this.factory.makeArray(column);
  }
}
