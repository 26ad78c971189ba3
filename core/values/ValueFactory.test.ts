import { describe, it, expect, vi } from 'vitest';
import { ValueFactory } from './ValueFactory';
import { InternTable } from './InternTable';
import { Category } from './Category';
import { InputTypeError } from '@core/errors/InputTypeError';

describe('ValueFactory', () => {
  it('reuses one instance per live raw string', () => {
    const factory = new ValueFactory();
    const first = factory.makeValue('1');
    const second = factory.makeValue('1');
    expect(second).toBe(first);
    factory.makeValue('2');
    expect(factory.internedCount).toBe(2);
  });

  it('builds fresh instances when interning is off', () => {
    const factory = new ValueFactory({ intern: false });
    const first = factory.makeValue('1');
    const second = factory.makeValue('1');
    expect(second).not.toBe(first);
    expect(second.equals(first)).toBe(true);
    expect(factory.internedCount).toBe(0);
  });

  it('returns an existing value unchanged', () => {
    const factory = new ValueFactory();
    const value = factory.makeValue('x');
    expect(factory.makeValue(value)).toBe(value);
  });

  it('rejects non-string input', () => {
    expect(() => new ValueFactory().makeValue(42)).toThrow(InputTypeError);
  });

  it('classifies with its own config', () => {
    const factory = new ValueFactory({ missingDataCodes: ['-99'], dateFormats: [] });
    expect(factory.makeValue('-99').category()).toBe(Category.Code);
    expect(factory.makeArray(['2024-01-15']).categories()).toEqual([Category.Text]);
    expect(factory.config.missingDataCodes).toEqual(['-99']);
  });
});

describe('InternTable', () => {
  it('creates an entry once per key', () => {
    const table = new InternTable<{ key: string }>();
    const create = vi.fn(() => ({ key: 'a' }));
    const first = table.intern('a', create);
    const second = table.intern('a', create);
    expect(second).toBe(first);
    expect(create).toHaveBeenCalledTimes(1);
    expect(table.get('a')).toBe(first);
  });

  it('forgets everything on clear', () => {
    const table = new InternTable<{ key: string }>();
    const kept = table.intern('a', () => ({ key: 'a' }));
    table.clear();
    expect(table.size).toBe(0);
    expect(table.get('a')).toBeUndefined();
    expect(kept.key).toBe('a');
  });
});
