import { ConsoleLogger } from './consoleLogger';
import type { JudgeCompleted } from '../types/events';

const event: JudgeCompleted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'JudgeCompleted',
  payload: { judgeType: 'quality', score: 80, passed: true, parseStage: 'strict', durationMs: 5 },
};

describe('ConsoleLogger', () => {
  it('logs events as JSON only when verbose', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(logSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ verbose: true }).log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));

    logSpy.mockRestore();
  });

  it('writes debug/info/warn and handles error branches', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = new ConsoleLogger({ verbose: true });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');

    expect(debugSpy).toHaveBeenCalledWith('d');
    expect(infoSpy).toHaveBeenCalledWith('i');
    expect(warnSpy).toHaveBeenCalledWith('w');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));

    debugSpy.mockRestore();
    infoSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('drops debug output unless verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().debug('quiet');
    expect(debugSpy).not.toHaveBeenCalled();

    debugSpy.mockRestore();
  });
});
