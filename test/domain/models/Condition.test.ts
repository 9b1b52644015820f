/**
 * Condition Domain Model Tests
 */
import {
  Conditions,
  conditionKey,
  conditionsEqual,
  describeCondition,
  parseCondition,
} from '../../../src/domain/models/Condition';
import { ValidationError } from '../../../src/shared/errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('Conditions factories', () => {
  test('should normalize extensions', () => {
    expect(Conditions.extensionEquals('.PDF')).toEqual({ type: 'extensionEquals', extension: 'pdf' });
  });

  test('should reject empty or whitespace text', () => {
    const error = captureError(() => Conditions.nameContains('   '));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'text' });
  });

  test('should reject an extension that is only dots', () => {
    expect(captureError(() => Conditions.extensionEquals('..'))).toMatchObject({ field: 'extension' });
  });

  test('should reject zero, negative and fractional day counts', () => {
    for (const days of [0, -3, 1.5]) {
      expect(captureError(() => Conditions.olderThan(days))).toMatchObject({ field: 'days' });
    }
  });

  test('should accept plural kind names', () => {
    expect(Conditions.kindEquals('Images')).toEqual({ type: 'kindEquals', kind: 'image' });
    expect(Conditions.kindEquals('code')).toEqual({ type: 'kindEquals', kind: 'code' });
  });

  test('should reject unknown kinds', () => {
    expect(captureError(() => Conditions.kindEquals('holograms'))).toMatchObject({ field: 'kind' });
  });

  test('should parse size literals into bytes', () => {
    expect(Conditions.largerThan('100MB')).toEqual({ type: 'largerThan', bytes: 104857600 });
    expect(Conditions.largerThan('1.5gb')).toEqual({ type: 'largerThan', bytes: 1610612736 });
  });

  test('should reject unitless and non-positive sizes', () => {
    expect(captureError(() => Conditions.largerThan('100'))).toMatchObject({ field: 'size' });
    expect(captureError(() => Conditions.largerThan(0))).toMatchObject({ field: 'size' });
  });

  test('should reject unknown source locations', () => {
    expect(captureError(() => Conditions.sourceLocation('attic'))).toMatchObject({ field: 'location' });
  });
});

describe('parseCondition', () => {
  test('should parse a plain day count as creation age', () => {
    expect(parseCondition('olderThan', '30')).toEqual({ type: 'olderThan', days: 30, field: 'created' });
  });

  test('should parse an extension-scoped day count', () => {
    expect(parseCondition('olderThan', 'pdf:30')).toEqual({
      type: 'olderThan',
      days: 30,
      field: 'created',
      extension: 'pdf',
    });
  });

  test('should map modified and accessed variants to their date field', () => {
    expect(parseCondition('modifiedOlderThan', '7')).toMatchObject({ field: 'modified', days: 7 });
    expect(parseCondition('accessedOlderThan', '90')).toMatchObject({ field: 'accessed', days: 90 });
  });

  test('should name the days field for non-numeric input', () => {
    const error = captureError(() => parseCondition('olderThan', 'soon'));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'days' });
  });
});

describe('condition equality', () => {
  test('should treat structurally equal conditions as equal', () => {
    expect(conditionsEqual(Conditions.extensionEquals('PDF'), Conditions.extensionEquals('.pdf'))).toBe(true);
    expect(conditionsEqual(Conditions.olderThan(30), Conditions.olderThan(30, 'modified'))).toBe(false);
  });

  test('should key nested negations recursively', () => {
    expect(conditionKey(Conditions.not(Conditions.extensionEquals('zip')))).toBe('not(ext:zip)');
  });
});

describe('describeCondition', () => {
  test('should describe each condition in lower case', () => {
    expect(describeCondition(Conditions.extensionEquals('pdf'))).toBe('extension: .pdf');
    expect(describeCondition(Conditions.nameContains('invoice'))).toBe("contains: 'invoice'");
    expect(describeCondition(Conditions.nameStartsWith('IMG_'))).toBe("starts with: 'IMG_'");
    expect(describeCondition(Conditions.largerThan('100MB'))).toBe('larger than 100MB');
    expect(describeCondition(Conditions.sourceLocation('downloads'))).toBe('from Downloads');
  });

  test('should describe date conditions by field with the extension scope first', () => {
    expect(describeCondition(Conditions.olderThan(30))).toBe('older than 30 days');
    expect(describeCondition(Conditions.olderThan(7, 'modified', 'dmg'))).toBe('.dmg not modified in 7 days');
    expect(describeCondition(Conditions.olderThan(90, 'accessed'))).toBe('not opened in 90 days');
  });

  test('should wrap negations', () => {
    expect(describeCondition(Conditions.not(Conditions.kindEquals('image')))).toBe('not (kind: image)');
  });
});
