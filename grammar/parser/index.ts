/**
 * Branching-logic parser entry point
 *
 * Compiles grammar/logic.peggy on first use and turns peggy syntax errors
 * into LogicParseError.
 */
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { generate, type Parser } from 'peggy';
import type { ExpressionNode } from '@grammar/types';
import { LogicParseError } from '@core/errors/LogicParseError';
import { grammarLogger as logger } from '@core/utils/logger';

export { preprocessLogic } from './preprocess';

const GRAMMAR_PATH = fileURLToPath(new URL('../logic.peggy', import.meta.url));

let parser: Parser | undefined;

// Shape of the errors thrown by peggy-generated parsers
interface PeggySyntaxError {
  message: string;
  location: {
    start: { offset: number; line: number; column: number };
  };
  expected: unknown[] | null;
  found: string | null;
}

function isPeggySyntaxError(error: unknown): error is PeggySyntaxError {
  return (
    error instanceof Error &&
    'location' in error &&
    typeof error.location === 'object' &&
    error.location !== null &&
    'start' in error.location &&
    'found' in error
  );
}

function describeExpectation(expectation: unknown): string | undefined {
  if (typeof expectation !== 'object' || expectation === null) {
    return undefined;
  }
  if ('description' in expectation && typeof expectation.description === 'string') {
    return expectation.description;
  }
  if ('text' in expectation && typeof expectation.text === 'string') {
    return JSON.stringify(expectation.text);
  }
  if ('type' in expectation && expectation.type === 'end') {
    return 'end of input';
  }
  return undefined;
}

/**
 * The compiled peggy parser for the logic grammar.
 */
export function getLogicParser(): Parser {
  if (!parser) {
    logger.debug('Compiling logic grammar', { path: GRAMMAR_PATH });
    parser = generate(readFileSync(GRAMMAR_PATH, 'utf8'));
  }
  return parser;
}

/**
 * Parse a preprocessed logic string into a concrete syntax tree.
 *
 * @param source The preprocessed logic string
 * @param original The string as the caller wrote it, used in error messages
 * @throws {LogicParseError} If the string is not valid branching logic
 */
export function parseLogic(source: string, original: string = source): ExpressionNode {
  try {
    const tree: ExpressionNode = getLogicParser().parse(source);
    return tree;
  } catch (error) {
    if (isPeggySyntaxError(error)) {
      const expected = (error.expected ?? [])
        .map(describeExpectation)
        .filter((item): item is string => item !== undefined);
      const { offset, line, column } = error.location.start;
      throw new LogicParseError(error.message, original, { offset, line, column }, {
        cause: error,
        expected: [...new Set(expected)],
        found: error.found
      });
    }
    throw error;
  }
}
