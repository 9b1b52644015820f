/**
 * Tests for the logger
 */
import log from 'electron-log/node';
import { Logger, LOG_LEVELS } from '../../src/shared/logger';

describe('Logger', () => {
  let infoSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(log, 'info').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(log, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should prefix the context and append data', () => {
    const logger = new Logger('RuleEngine');
    logger.setLevel(LOG_LEVELS.INFO);

    logger.info('Rule matched', { ruleId: 'r1' });

    expect(infoSpy).toHaveBeenCalledWith('[RuleEngine] Rule matched | {"ruleId":"r1"}');
  });

  test('should drop messages above the current level', () => {
    const logger = new Logger();
    logger.setLevel('error');

    logger.info('hidden');
    logger.error('shown');

    expect(infoSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('shown');
  });

  test('should let children follow the parent level', () => {
    const parent = new Logger();
    const child = parent.child('Child');
    parent.setLevel(LOG_LEVELS.ERROR);

    child.info('hidden');
    parent.setLevel(LOG_LEVELS.INFO);
    child.info('shown');

    expect(infoSpy).toHaveBeenCalledTimes(1);
    expect(infoSpy).toHaveBeenCalledWith('[Child] shown');
  });

  test('should serialize circular data and errors', () => {
    const logger = new Logger();
    logger.setLevel(LOG_LEVELS.INFO);
    const data: Record<string, unknown> = { name: 'loop' };
    data.self = data;

    expect(logger.formatMessage('msg', data)).toBe('msg | {"name":"loop","self":"[Circular Reference]"}');
    expect(logger.formatMessage('msg', {})).toBe('msg');
  });
});
