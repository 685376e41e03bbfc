import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger, createLogger } from '../../../core/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write JSON lines with metadata when not pretty', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger({ level: 'warn', service: 'road-reference:test', pretty: false });

    logger.info('not shown');
    logger.warn('Row dropped', { file: 'POINTS.DAT', line: 3 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0]?.[0]))).toMatchObject({
      level: 'warn',
      service: 'road-reference:test',
      message: 'Row dropped',
      file: 'POINTS.DAT',
      line: 3,
    });
  });

  describe('createLogger', () => {
    it('should tag lines with the module and honour LOG_LEVEL', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      // LOG_LEVEL is error under the test configuration
      const logger = createLogger({ module: 'orchestrator' });

      logger.warn('skipped');
      logger.error('Pipeline failed');

      expect(warn).not.toHaveBeenCalled();
      expect(String(error.mock.calls[0]?.[0])).toMatch(
        /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] ERROR road-reference:orchestrator: Pipeline failed$/
      );
    });
  });
});
