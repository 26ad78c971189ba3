/**
 * The closed set of response-value categories. The category decides how a
 * raw string behaves under equality, ordering and arithmetic.
 */
export enum Category {
  /** Empty response. Numerically 0, textually "" */
  Missing = 'MISSING',
  /** A response that parses fully as a signed decimal */
  Number = 'NUMBER',
  /** Free text */
  Text = 'TEXT',
  /** Text that matches one of the configured date layouts */
  Date = 'DATE',
  /** A configured missing-data code such as "NA-2" */
  Code = 'CODE'
}

/**
 * Text, dates and missing-data codes have no numeric value and behave the
 * same way in every operation.
 */
export function isTextual(category: Category): boolean {
  return category === Category.Text || category === Category.Date || category === Category.Code;
}
