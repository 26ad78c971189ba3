/**
 * Quote characters that may open a literal, with the plain quote the
 * literal is rewritten to and the characters that may close it. Word
 * processors like to turn ' and " into their curly forms.
 */
const QUOTES: Record<string, { plain: string; closers: readonly string[] }> = {
  "'": { plain: "'", closers: ["'"] },
  '"': { plain: '"', closers: ['"'] },
  '‘': { plain: "'", closers: ['’', '‘'] },
  '’': { plain: "'", closers: ['’'] },
  '“': { plain: '"', closers: ['”', '“'] },
  '”': { plain: '"', closers: ['”'] }
};

/**
 * Normalize a logic string before parsing: curly quotes become plain
 * single or double quotes, and "!=" outside quotes becomes "<>". Text
 * inside a literal is left alone, so "O'Brien" stays double-quoted. The
 * output has the same length as the input, so parser columns still point
 * into the original string.
 */
export function preprocessLogic(logic: string): string {
  let output = '';
  let open: { plain: string; closers: readonly string[] } | null = null;

  for (let i = 0; i < logic.length; i++) {
    const ch = logic[i];

    if (open) {
      if (open.closers.includes(ch)) {
        output += open.plain;
        open = null;
      } else {
        output += ch;
      }
      continue;
    }

    const quote = QUOTES[ch];
    if (quote) {
      output += quote.plain;
      open = quote;
      continue;
    }

    if (ch === '!' && logic[i + 1] === '=') {
      output += '<>';
      i++;
      continue;
    }

    output += ch;
  }

  return output;
}
