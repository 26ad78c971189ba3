import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { openProject, DEFAULT_CONFIG, Category, makeValue, translate } from './index';

describe('API', () => {
  it('opens a project without a config file on the defaults', () => {
    const project = openProject(path.join(os.tmpdir(), 'redcap-logic-missing-project'));
    expect(project.config).toEqual(DEFAULT_CONFIG);
    expect(project.values.makeValue('12').category()).toBe(Category.Number);
    expect(project.translator.translate('[a] = 12').evaluate({ a: ['12'] }, { factory: project.values })).toEqual([true]);
  });

  it('exposes the value and translation helpers', () => {
    expect(makeValue('').equals(0)).toBe(true);
    expect(translate('[a] > 1').evaluateRow({ a: '2' })).toBe(true);
  });
});
