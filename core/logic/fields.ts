/**
 * Export column for a field reference. Checkbox options are exported as
 * one column per option, `field___code`, with the code lower-cased and
 * "-" replaced by "_" (so `[cb(-1)]` reads `cb____1`).
 */
export function exportColumnName(field: string, choice: string | null): string {
  if (choice === null) {
    return field;
  }
  return `${field}___${choice.toLowerCase().replace(/-/g, '_')}`;
}

/**
 * Option codes of a choices setting such as "1, Yes | 2, No".
 */
export function choiceCodes(choices: string): string[] {
  return choices
    .split('|')
    .map(entry => entry.split(',')[0].trim())
    .filter(code => code.length > 0);
}

/**
 * Columns of a table that belong to a checkbox field. With the field's
 * option codes the columns are resolved exactly. Without them, an option
 * part starting with "_" is left out, since `sym____1` may just as well
 * be option 1 of a field named `sym_`.
 */
export function checkboxColumns(field: string, columns: Iterable<string>, codes?: readonly string[]): string[] {
  const available = [...columns];
  if (codes && codes.length > 0) {
    const options = new Set(codes.map(code => exportColumnName(field, code)));
    return available.filter(column => options.has(column));
  }
  const prefix = `${field}___`;
  return available.filter(column => column.startsWith(prefix) && /^[^_]/.test(column.slice(prefix.length)));
}
