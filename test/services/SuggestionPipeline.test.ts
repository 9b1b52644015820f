/**
 * Tests for the Suggestion Pipeline
 */
import { Conditions } from '../../src/domain/models/Condition';
import { createLearnedPattern } from '../../src/domain/models/LearnedPattern';
import { createRule } from '../../src/domain/models/Rule';
import { createPredictionContext } from '../../src/domain/models/Suggestion';
import RuleEngine from '../../src/main/services/rules/RuleEngine';
import PatternMatcher from '../../src/main/services/patterns/PatternMatcher';
import ModelSlot from '../../src/main/services/prediction/ModelSlot';
import PredictionGate from '../../src/main/services/prediction/PredictionGate';
import SuggestionPipeline from '../../src/main/services/SuggestionPipeline';
import { NOW, makeFile, makeRecord, stubModel } from '../mocks/fixtures';

describe('SuggestionPipeline', () => {
  const now = () => NOW;
  const context = createPredictionContext();

  const invoiceRule = createRule({
    id: 'invoices',
    name: 'Invoices',
    operator: 'and',
    conditions: [Conditions.extensionEquals('pdf'), Conditions.nameContains('invoice')],
    action: { type: 'move', destination: 'Documents' },
  });
  const pdfPattern = createLearnedPattern({
    id: 'pdf-pattern',
    extension: 'pdf',
    destination: 'Downloads/PDFs',
    occurrenceCount: 30,
    confidence: 0.9,
  });
  const screenshotPattern = createLearnedPattern({
    id: 'screens',
    extension: 'png',
    destination: 'Pictures/Screenshots',
    occurrenceCount: 10,
    confidence: 0.85,
  });

  let slot: ModelSlot;
  let ruleEngine: RuleEngine;
  let predictionGate: PredictionGate;
  let pipeline: SuggestionPipeline;

  beforeEach(() => {
    slot = new ModelSlot();
    ruleEngine = new RuleEngine({ now });
    predictionGate = new PredictionGate(slot, { now });
    pipeline = new SuggestionPipeline({
      ruleEngine,
      patternMatcher: new PatternMatcher({ now }),
      predictionGate,
      concurrency: 2,
    });
  });

  async function installModel(destination: string, score: number): Promise<void> {
    await slot.replace({ model: stubModel([{ destination, score }]), record: makeRecord() });
  }

  test('should prefer a rule over patterns and predictions', async () => {
    await installModel('Archive', 0.99);

    const result = await pipeline.suggest(
      makeFile('/Users/test/Downloads/invoice_2024.pdf'),
      [invoiceRule],
      [pdfPattern],
      [],
      context,
    );

    expect(result).toMatchObject({
      status: 'ready',
      destination: 'Documents',
      confidence: 0.95,
      matchReason: "Extension: .pdf AND Contains: 'invoice'",
      provenance: 'rule',
    });
  });

  test('should use a learned pattern when no rule matches', async () => {
    const result = await pipeline.suggest(
      makeFile('/Users/test/Desktop/screenshot.png'),
      [],
      [screenshotPattern],
      [],
      context,
    );

    expect(result).toEqual({
      filePath: '/Users/test/Desktop/screenshot.png',
      status: 'ready',
      destination: 'Pictures/Screenshots',
      confidence: 0.85,
      matchReason: 'Based on learned pattern: .png files → Pictures/Screenshots (10 moves)',
      provenance: 'pattern',
      matchedRuleId: null,
      matchedPatternId: 'screens',
      explanation: null,
      modelVersion: null,
    });
  });

  test('should fall back to a gated prediction', async () => {
    await installModel('Documents/Reports', 0.88);

    const result = await pipeline.suggest(makeFile('/tmp/quarterly.docx'), [invoiceRule], [], [], context);

    expect(result).toMatchObject({
      status: 'ready',
      destination: 'Documents/Reports',
      confidence: 0.88,
      provenance: 'mlPrediction',
      matchReason: 'Similar to 4 past DOCX files you moved to Documents/Reports',
      modelVersion: '1-2026-10-01T000000Z',
    });
  });

  test('should leave the file pending when no stage suggests anything', async () => {
    const result = await pipeline.suggest(makeFile('/tmp/quarterly.docx'), [invoiceRule], [], [], context);

    expect(result).toMatchObject({ status: 'pending', destination: null, provenance: 'none' });
  });

  test('should not fall back to the model when a negative pattern suppresses the pattern winner', async () => {
    const negative = createLearnedPattern({ ...screenshotPattern, id: 'neg', isNegative: true });

    const result = await pipeline.suggest(
      makeFile('/tmp/screenshot.png'),
      [],
      [screenshotPattern],
      [negative],
      createPredictionContext({ mlEnabled: false }),
    );

    expect(result.provenance).toBe('none');
  });

  test('should treat a failing stage as no suggestion', async () => {
    jest.spyOn(ruleEngine, 'evaluateFile').mockImplementation(() => {
      throw new Error('rule store unavailable');
    });
    jest.spyOn(predictionGate, 'predict').mockRejectedValue(new Error('model crashed'));

    const withPattern = await pipeline.suggest(makeFile('/tmp/shot.png'), [invoiceRule], [screenshotPattern], [], context);
    const withoutPattern = await pipeline.suggest(makeFile('/tmp/a.txt'), [invoiceRule], [], [], context);

    expect(withPattern.provenance).toBe('pattern');
    expect(withoutPattern).toMatchObject({ status: 'pending', provenance: 'none' });
  });

  test('should keep a skipped status', async () => {
    const result = await pipeline.suggest(makeFile('/tmp/a.txt', { status: 'skipped' }), [], [], [], context);

    expect(result.status).toBe('skipped');
  });

  test('should return batch results in input order', async () => {
    await installModel('Music', 0.9);
    const files = [
      makeFile('/Users/test/Downloads/invoice_1.pdf'),
      makeFile('/Users/test/Desktop/shot.png'),
      makeFile('/Users/test/Downloads/song.mp3'),
      makeFile('/Users/test/Downloads/invoice_2.pdf'),
    ];

    const results = await pipeline.suggestBatch(files, [invoiceRule], [screenshotPattern], [], context);

    expect(results.map((result) => [result.filePath, result.provenance, result.destination])).toEqual([
      ['/Users/test/Downloads/invoice_1.pdf', 'rule', 'Documents'],
      ['/Users/test/Desktop/shot.png', 'pattern', 'Pictures/Screenshots'],
      ['/Users/test/Downloads/song.mp3', 'mlPrediction', 'Music'],
      ['/Users/test/Downloads/invoice_2.pdf', 'rule', 'Documents'],
    ]);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });
});
