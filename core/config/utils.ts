/**
 * Parse the missing-data-code setting of a project into the list of codes.
 * Examples: "NA-2, Not applicable | UNK, Unknown" -> ["NA-2", "UNK"]
 *
 * Each entry is "code, label"; entries are separated by "|". Blank entries
 * are dropped.
 */
export function parseMissingDataCodes(setting: string): string[] {
  return setting
    .split('|')
    .map(entry => entry.split(',')[0].trim())
    .filter(code => code.length > 0);
}

/**
 * Accepts either the raw project setting or an already split list.
 */
export function normalizeMissingDataCodes(codes: string | readonly string[]): string[] {
  if (typeof codes === 'string') {
    return parseMissingDataCodes(codes);
  }
  return codes.map(code => code.trim()).filter(code => code.length > 0);
}
