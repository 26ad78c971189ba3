import { describe, it, expect, beforeEach } from 'vitest';
import { BranchingLogicService } from './BranchingLogicService';
import type { MetadataRow } from './IBranchingLogicService';
import { CompiledPredicate, LogicTranslator, type DataTable } from '@core/logic';
import { LogicParseError } from '@core/errors/LogicParseError';
import { UnknownFieldError } from '@core/errors/UnknownFieldError';

const metadata: MetadataRow[] = [
  { field_name: 'sex', branching_logic: '' },
  { field_name: 'age' },
  { field_name: 'pregnant', branching_logic: "[sex] = '2'" },
  { field_name: 'weeks', branching_logic: " [pregnant] = '1' and [age] >= 18 " },
  { field_name: 'broken', branching_logic: '[age] >=' },
  { field_name: 'symptoms', branching_logic: "[sex] <> ''" },
  { field_name: 'notes', branching_logic: null }
];

const records: DataTable = {
  sex: ['1', '2', '2', ''],
  age: ['30', '19', '25', ''],
  pregnant: ['', '1', '', ''],
  weeks: ['', '', '', ''],
  symptoms___1: ['1', '0', '', '0'],
  symptoms___2: ['0', '0', '', '']
};

describe('BranchingLogicService', () => {
  let service: BranchingLogicService;

  beforeEach(() => {
    service = new BranchingLogicService(metadata, { translator: new LogicTranslator() });
  });

  describe('conditionalFields', () => {
    it('should list fields with non-blank logic', () => {
      expect([...service.conditionalFields().entries()]).toEqual([
        ['pregnant', "[sex] = '2'"],
        ['weeks', "[pregnant] = '1' and [age] >= 18"],
        ['broken', '[age] >='],
        ['symptoms', "[sex] <> ''"]
      ]);
    });
  });

  describe('compileAll', () => {
    it('should keep parse errors instead of throwing', () => {
      const compiled = service.compileAll();
      expect(compiled.size).toBe(4);
      expect(compiled.get('pregnant')).toBeInstanceOf(CompiledPredicate);
      expect(compiled.get('broken')).toBeInstanceOf(LogicParseError);
    });
  });

  describe('evaluateField', () => {
    it('should show fields without logic on every record', () => {
      expect(service.evaluateField('age', records)).toEqual([true, true, true, true]);
      expect(service.evaluateField('age', {})).toEqual([]);
    });

    it('should apply the field logic', () => {
      expect(service.evaluateField('pregnant', records)).toEqual([false, true, true, false]);
      expect(service.evaluateField('weeks', records)).toEqual([false, true, false, false]);
    });

    it('should reject fields missing from the data dictionary', () => {
      expect(() => service.evaluateField('height', records)).toThrow(UnknownFieldError);
    });

    it('should surface parse errors for a single field', () => {
      expect(() => service.evaluateField('broken', records)).toThrow(LogicParseError);
    });
  });

  describe('missingWhenShown', () => {
    it('should flag shown fields left blank', () => {
      expect(service.missingWhenShown('pregnant', records)).toEqual([false, false, true, false]);
      expect(service.missingWhenShown('weeks', records)).toEqual([false, true, false, false]);
    });

    it('should treat a checkbox with no option ticked as missing', () => {
      expect(service.missingWhenShown('symptoms', records)).toEqual([false, true, true, false]);
    });

    it('should not count the columns of a field whose name ends in "_"', () => {
      const checkboxes = new BranchingLogicService([
        { field_name: 'sym', branching_logic: '' },
        { field_name: 'sym_', branching_logic: '' }
      ], { translator: new LogicTranslator() });
      expect(checkboxes.missingWhenShown('sym', { sym___1: ['0'], sym____1: ['1'] })).toEqual([true]);
    });

    it('should resolve checkbox options from the data dictionary', () => {
      const checkboxes = new BranchingLogicService([
        {
          field_name: 'pain',
          branching_logic: '',
          field_type: 'checkbox',
          select_choices_or_calculations: '1, Mild | -1, Unknown'
        }
      ], { translator: new LogicTranslator() });
      expect(checkboxes.missingWhenShown('pain', { pain___1: ['0', '0'], pain____1: ['1', '0'] })).toEqual([false, true]);
    });

    it('should reject fields without any export column', () => {
      expect(() => service.missingWhenShown('notes', records)).toThrow('Unknown field: notes');
    });
  });
});
