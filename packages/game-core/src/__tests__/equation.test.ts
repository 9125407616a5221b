// packages/game-core/src/__tests__/equation.test.ts
//
// Unit tests for validateEquation() and left-to-right evaluation.
// Each rejection rule is exercised on its own so the reported reason
// (incomplete / malformed / arithmetic) can be told apart.

import {
  MESSAGES,
  evaluateLeftToRight,
  validateEquation,
} from '../index.js';

describe('validateEquation', () => {
  it('accepts a correct one-operator equation', () => {
    expect(validateEquation('12+57=69')).toEqual({
      valid: true,
      equation: { operands: [12, 57], operators: ['+'], result: 69 },
    });
  });

  it('accepts two-operator equations', () => {
    expect(validateEquation('10+2-3=9').valid).toBe(true);
    expect(validateEquation('18/2*1=9').valid).toBe(true);
  });

  it('evaluates strictly left to right', () => {
    // (2+3)*4 = 20; with precedence it would be 14
    expect(validateEquation('2+3*4=20').valid).toBe(true);
    expect(validateEquation('2+3*4=14')).toEqual({
      valid: false,
      reason: 'arithmeticMismatch',
      message: MESSAGES.arithmeticMismatch,
    });
  });

  it('reports a short candidate as incomplete', () => {
    expect(validateEquation('12+57=6')).toEqual({
      valid: false,
      reason: 'incompleteInput',
      message: MESSAGES.incompleteInput,
    });
  });

  it.each([
    ['1257=690', 'no operator'],
    ['+12+5=17', 'leading operator'],
    ['12++5=17', 'doubled operator'],
    ['12+57=6=', 'second ='],
    ['12+57-69', 'no ='],
    ['=12+5=17', 'leading ='],
  ])('rejects %s as malformed (%s)', (candidate) => {
    expect(validateEquation(candidate)).toEqual({
      valid: false,
      reason: 'malformedEquation',
      message: MESSAGES.malformedEquation,
    });
  });

  it('reports a wrong result as an arithmetic mismatch', () => {
    expect(validateEquation('10+10=21')).toEqual({
      valid: false,
      reason: 'arithmeticMismatch',
      message: MESSAGES.arithmeticMismatch,
    });
  });

  it('rejects division by zero and inexact division', () => {
    const divisionError = {
      valid: false,
      reason: 'arithmeticMismatch',
      message: MESSAGES.divisionNotExact,
    };
    expect(validateEquation('10/0+1=1')).toEqual(divisionError);
    expect(validateEquation('10/3*3=9')).toEqual(divisionError);
  });

  it('ignores spaces before matching the grammar', () => {
    expect(validateEquation('12+5 =17').valid).toBe(true);
  });

  it('allows negative intermediate values', () => {
    // 1-5 = -4, then +9 = 5
    expect(validateEquation('1-5+9=05').valid).toBe(true);
  });

  it('accepts operands with leading zeros', () => {
    expect(validateEquation('01+01=02').valid).toBe(true);
  });
});

describe('evaluateLeftToRight', () => {
  it('folds operators in order', () => {
    expect(evaluateLeftToRight([9, 2, 3], ['-', '-'])).toBe(4);
    expect(evaluateLeftToRight([8, 4, 3], ['/', '*'])).toBe(6);
  });

  it('returns null on an invalid division or a shape mismatch', () => {
    expect(evaluateLeftToRight([7, 2], ['/'])).toBeNull();
    expect(evaluateLeftToRight([7, 0], ['/'])).toBeNull();
    expect(evaluateLeftToRight([7, 2], [])).toBeNull();
  });
});
