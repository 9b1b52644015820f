/**
 * Tests for the Condition Tree Evaluator
 */
import { Conditions } from '../../src/domain/models/Condition';
import { evaluateTree } from '../../src/main/services/rules/ConditionTreeEvaluator';
import { NOW, makeFile } from '../mocks/fixtures';

describe('evaluateTree', () => {
  const pdf = Conditions.extensionEquals('pdf');
  const invoice = Conditions.nameContains('invoice');
  const draft = Conditions.nameContains('draft');

  test('should require every condition for AND and list them all in the reason', () => {
    const file = makeFile('/Users/test/Downloads/invoice_2024.pdf');
    expect(evaluateTree({ operator: 'and', conditions: [pdf, invoice] }, [], file, NOW)).toEqual({
      matched: true,
      reason: "Extension: .pdf AND Contains: 'invoice'",
    });
  });

  test('should fail AND when any condition fails', () => {
    const file = makeFile('/Users/test/Downloads/receipt.pdf');
    expect(evaluateTree({ operator: 'and', conditions: [pdf, invoice] }, [], file, NOW)).toEqual({
      matched: false,
      reason: null,
    });
  });

  test('should list only the conditions that held for OR', () => {
    const file = makeFile('/Users/test/Downloads/receipt.pdf');
    expect(evaluateTree({ operator: 'or', conditions: [invoice, pdf] }, [], file, NOW)).toEqual({
      matched: true,
      reason: 'Extension: .pdf',
    });
  });

  test('should evaluate a single condition', () => {
    const file = makeFile('/Users/test/Downloads/notes.txt');
    expect(evaluateTree({ operator: 'single', conditions: [pdf] }, [], file, NOW).matched).toBe(false);
  });

  test('should let any exclusion override a primary match', () => {
    const file = makeFile('/Users/test/Downloads/invoice_draft.pdf');
    const result = evaluateTree(
      { operator: 'and', conditions: [pdf, invoice] },
      [Conditions.nameContains('copy'), draft],
      file,
      NOW,
    );
    expect(result).toEqual({ matched: false, reason: null });
  });

  test('should keep the match when no exclusion holds', () => {
    const file = makeFile('/Users/test/Downloads/invoice_final.pdf');
    const result = evaluateTree({ operator: 'single', conditions: [pdf] }, [draft], file, NOW);
    expect(result).toEqual({ matched: true, reason: 'Extension: .pdf' });
  });

  test('should return fresh results so a reason never leaks into a later non-match', () => {
    const tree = { operator: 'single' as const, conditions: [pdf] };
    const first = evaluateTree(tree, [], makeFile('/tmp/a.pdf'), NOW);
    const second = evaluateTree(tree, [], makeFile('/tmp/a.txt'), NOW);
    expect(first.reason).toBe('Extension: .pdf');
    expect(second.reason).toBeNull();
  });
});
