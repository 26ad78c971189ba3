import type { CompiledPredicate, DataTable } from '@core/logic';
import type { LogicParseError } from '@core/errors/LogicParseError';

/**
 * One row of a project's data dictionary. Only the columns the branching
 * layer reads are typed; exports carry many more.
 */
export interface MetadataRow {
  readonly field_name: string;
  readonly branching_logic?: string | null;
  readonly field_type?: string | null;
  /** For checkbox fields, "code, label | code, label" */
  readonly select_choices_or_calculations?: string | null;
  readonly [column: string]: unknown;
}

/**
 * Result of translating one field's branching logic.
 */
export type FieldPredicate = CompiledPredicate | LogicParseError;

/**
 * Applies a data dictionary's branching logic to exported records.
 */
export interface IBranchingLogicService {
  /**
   * Fields that carry non-blank branching logic, mapped to that logic.
   */
  conditionalFields(): Map<string, string>;

  /**
   * Translate every conditional field. Logic that fails to parse maps to
   * its LogicParseError instead of stopping the run.
   */
  compileAll(): Map<string, FieldPredicate>;

  /**
   * One boolean per record: whether the field is shown.
   * @throws {UnknownFieldError} If the field is not in the data dictionary
   * @throws {LogicParseError} If the field's logic does not parse
   */
  evaluateField(field: string, table: DataTable): boolean[];

  /**
   * One boolean per record: the field is shown but was left empty.
   * @throws {UnknownFieldError} If the field or its column is unknown
   */
  missingWhenShown(field: string, table: DataTable): boolean[];
}
