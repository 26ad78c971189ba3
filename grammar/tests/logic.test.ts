import { describe, it, expect } from 'vitest';
import { parseLogic, preprocessLogic } from '@grammar/parser';
import type { ComparisonNode, ExpressionNode } from '@grammar/types';
import { LogicParseError } from '@core/errors/LogicParseError';

function parse(logic: string): ExpressionNode {
  return parseLogic(preprocessLogic(logic), logic);
}

function comparison(node: ExpressionNode): ComparisonNode {
  if (node.type !== 'comparison') {
    throw new Error(`expected a comparison, got ${node.type}`);
  }
  return node;
}

describe('Logic grammar', () => {
  describe('comparisons', () => {
    it('parses a field against a number', () => {
      const node = comparison(parse('[age] >= 18'));
      expect(node.operator).toBe('>=');
      expect(node.left).toMatchObject({ type: 'field', name: 'age', choice: null });
      expect(node.right).toMatchObject({ type: 'number', text: '18' });
    });

    it('parses quoted literals', () => {
      const node = comparison(parse("[sex] = '1'"));
      expect(node.right).toMatchObject({ type: 'quoted', text: '1' });
    });

    it('parses double-quoted literals after preprocessing', () => {
      const node = comparison(parse('[sex] = "2"'));
      expect(node.right).toMatchObject({ type: 'quoted', text: '2' });
    });

    it('parses double-quoted literals containing an apostrophe', () => {
      const node = comparison(parse(`[surname] = "O'Brien"`));
      expect(node.right).toMatchObject({ type: 'quoted', text: "O'Brien" });
    });

    it('parses single-quoted literals containing double quotes', () => {
      const node = comparison(parse(`[a] = 'say "hi"'`));
      expect(node.right).toMatchObject({ type: 'quoted', text: 'say "hi"' });
    });

    it('parses checkbox references', () => {
      const node = comparison(parse("[symptoms(3)] = '1'"));
      expect(node.left).toMatchObject({ type: 'field', name: 'symptoms', choice: '3' });
    });

    it('parses signed and fractional numbers', () => {
      expect(comparison(parse('[x] > -1.5')).right).toMatchObject({ type: 'number', text: '-1.5' });
      expect(comparison(parse('[x] < .5e2')).right).toMatchObject({ type: 'number', text: '.5e2' });
    });

    it.each(['=', '<>', '<', '<=', '>', '>='])('parses the %s operator', operator => {
      expect(comparison(parse(`[a] ${operator} 1`)).operator).toBe(operator);
    });

    it('reads != as <>', () => {
      expect(comparison(parse('[a] != 1')).operator).toBe('<>');
    });

    it('parses field against field', () => {
      const node = comparison(parse('[a]<[b]'));
      expect(node.right).toMatchObject({ type: 'field', name: 'b' });
    });
  });

  describe('boolean structure', () => {
    it('binds and tighter than or', () => {
      const tree = parse('[a] = 1 or [b] = 2 and [c] = 3');
      expect(tree.type).toBe('or');
      if (tree.type === 'or') {
        expect(tree.operands.map(operand => operand.type)).toEqual(['comparison', 'and']);
      }
    });

    it('keeps chains n-ary', () => {
      const tree = parse('[a] = 1 AND [b] = 2 And [c] = 3');
      expect(tree.type).toBe('and');
      if (tree.type === 'and') {
        expect(tree.operands).toHaveLength(3);
      }
    });

    it('keeps explicit groups', () => {
      const tree = parse('([a] = 1 or [b] = 2) and [c] = 3');
      expect(tree.type).toBe('and');
      if (tree.type === 'and') {
        expect(tree.operands[0].type).toBe('group');
      }
    });

    it('negates a group', () => {
      const tree = parse('!([a] = 1)');
      expect(tree.type).toBe('not');
      if (tree.type === 'not') {
        expect(tree.operand.expression.type).toBe('comparison');
      }
    });

    it('does not treat keywords inside identifiers as operators', () => {
      const node = comparison(parse('[order_id] = 1'));
      expect(node.left).toMatchObject({ name: 'order_id' });
    });

    it('records node locations', () => {
      const node = comparison(parse('  [a] = 1'));
      expect(node.location.start).toEqual({ offset: 2, line: 1, column: 3 });
    });
  });

  describe('errors', () => {
    it('reports a missing operand with its column', () => {
      try {
        parse('[a] >=');
        expect.unreachable('parse should fail');
      } catch (error) {
        expect(error).toBeInstanceOf(LogicParseError);
        if (error instanceof LogicParseError) {
          expect(error.position?.column).toBe(7);
          expect(error.expected).toContain('field reference');
          expect(error.found).toBeNull();
          expect(error.logic).toBe('[a] >=');
        }
      }
    });

    it.each([
      '[a] = 1 and',
      '[a] 1',
      '([a] = 1',
      "[a] = 'open",
      '[a] = "open',
      '!([a] = 1',
      '[a] == 1',
      ''
    ])('rejects %j', logic => {
      expect(() => parse(logic)).toThrow(LogicParseError);
    });

    it('requires parentheses after !', () => {
      expect(() => parse('![a] = 1')).toThrow(LogicParseError);
    });
  });
});
