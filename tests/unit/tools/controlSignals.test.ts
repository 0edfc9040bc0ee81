import { describe, expect, it } from 'vitest';

import { ControlParseError, ControlValidationError } from '../../../src/core/shared/errors/engine-errors';
import {
  extractControlSignal,
  genericControlSchema,
  objectiveCompleteSchema,
  prereqCompleteSchema,
  stripControlBlocks,
} from '../../../src/core/tools/controlSignals';

describe('extractControlSignal', () => {
  it('reads the directive embedded in model text', () => {
    const text = 'Nice reasoning there.\n<control>{"objective_complete": true}</control>';

    expect(extractControlSignal(text, objectiveCompleteSchema)).toEqual({ objective_complete: true });
  });

  it('returns null when the text has no delimiter pair', () => {
    expect(extractControlSignal('No directive here.', objectiveCompleteSchema)).toBeNull();
    expect(extractControlSignal('Only an opening <control>{"a": true}', genericControlSchema)).toBeNull();
  });

  it('tolerates whitespace and upper-case tags', () => {
    const text = '<CONTROL>\n  {"prereq_complete": false}\n</CONTROL>';

    expect(extractControlSignal(text, prereqCompleteSchema)).toEqual({ prereq_complete: false });
  });

  it('raises ControlParseError for a body that is not JSON', () => {
    const text = '<control>{objective_complete: yes}</control>';

    expect(() => extractControlSignal(text, objectiveCompleteSchema)).toThrow(ControlParseError);
    try {
      extractControlSignal(text, objectiveCompleteSchema);
    } catch (error: unknown) {
      expect(error instanceof ControlParseError ? error.rawBlock : null).toBe('{objective_complete: yes}');
    }
  });

  it('raises ControlValidationError when the body does not match the schema', () => {
    const wrongType = '<control>{"objective_complete": "yes"}</control>';
    const extraKey = '<control>{"objective_complete": true, "skip": true}</control>';

    expect(() => extractControlSignal(wrongType, objectiveCompleteSchema)).toThrow(ControlValidationError);
    expect(() => extractControlSignal(extraKey, objectiveCompleteSchema)).toThrow(ControlValidationError);
  });

  it('rejects text with more than one directive', () => {
    const text = '<control>{"objective_complete": true}</control> and <control>{"objective_complete": false}</control>';

    expect(() => extractControlSignal(text, objectiveCompleteSchema)).toThrow(
      'Expected one control block, found 2.',
    );
  });
});

describe('stripControlBlocks', () => {
  it('removes directives and the blank lines they leave behind', () => {
    const text = 'Well done.\n\n<control>{"objective_complete": true}</control>\n\n\nNext up.';

    expect(stripControlBlocks(text)).toBe('Well done.\n\nNext up.');
  });

  it('leaves plain text untouched apart from trimming', () => {
    expect(stripControlBlocks('  Just text.  ')).toBe('Just text.');
  });
});
