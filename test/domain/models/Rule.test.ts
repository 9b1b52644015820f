/**
 * Rule Domain Model Tests
 */
import { Conditions } from '../../../src/domain/models/Condition';
import { createRule, validateConditionTree } from '../../../src/domain/models/Rule';
import { ValidationError } from '../../../src/shared/errors';

describe('createRule', () => {
  const pdf = Conditions.extensionEquals('pdf');

  test('should apply defaults and trim names and destinations', () => {
    const rule = createRule({
      id: 'r1',
      name: '  PDFs  ',
      conditions: [pdf],
      action: { type: 'move', destination: '  Documents ' },
    });

    expect(rule.name).toBe('PDFs');
    expect(rule.action).toEqual({ type: 'move', destination: 'Documents' });
    expect(rule.tree).toEqual({ operator: 'single', conditions: [pdf] });
    expect(rule.exclusions).toEqual([]);
    expect(rule.enabled).toBe(true);
    expect(rule.sortOrder).toBe(0);
    expect(rule.category).toBeUndefined();
    expect(Object.isFrozen(rule)).toBe(true);
  });

  test('should reject an empty move destination', () => {
    expect(() =>
      createRule({ id: 'r1', name: 'Bad', conditions: [pdf], action: { type: 'move', destination: '   ' } }),
    ).toThrow(ValidationError);
  });

  test('should name the offending field', () => {
    try {
      createRule({ id: 'r1', name: 'Bad', conditions: [pdf], action: { type: 'move', destination: '' } });
      throw new Error('expected createRule to throw');
    } catch (error) {
      expect(error).toMatchObject({ field: 'action.destination' });
    }
  });

  test('should reject a single-operator rule with two conditions', () => {
    expect(() =>
      createRule({
        id: 'r1',
        name: 'Two',
        operator: 'single',
        conditions: [pdf, Conditions.nameContains('invoice')],
        action: { type: 'delete' },
      }),
    ).toThrow("Validation failed for 'conditions'");
  });

  test('should collapse structurally duplicate exclusions', () => {
    const rule = createRule({
      id: 'r1',
      name: 'PDFs',
      conditions: [pdf],
      exclusions: [Conditions.nameContains('Draft'), Conditions.nameContains('draft'), Conditions.nameContains('copy')],
      action: { type: 'delete' },
    });

    expect(rule.exclusions).toEqual([
      { type: 'nameContains', text: 'Draft' },
      { type: 'nameContains', text: 'copy' },
    ]);
  });

  test('should default a category scope to global', () => {
    const rule = createRule({
      id: 'r1',
      name: 'PDFs',
      conditions: [pdf],
      action: { type: 'delete' },
      category: { id: 'c1', name: 'Work' },
    });

    expect(rule.category).toEqual({ id: 'c1', name: 'Work', enabled: true, scope: { type: 'global' } });
  });
});

describe('validateConditionTree', () => {
  test('should require at least one condition for AND and OR', () => {
    expect(() => validateConditionTree({ operator: 'or', conditions: [] })).toThrow(ValidationError);
  });
});
