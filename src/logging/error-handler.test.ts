import { describe, expect, it } from 'vitest';
import { ErrorHandler, ErrorLevel, toErrorLevel } from './error-handler';

function handler(level?: ErrorLevel, stacks = false) {
  const lines: string[] = [];
  const errors = new ErrorHandler({
    level,
    stacks,
    sink: (line) => lines.push(line),
    clock: () => new Date('2024-05-01T12:00:00.000Z'),
  });
  return { errors, lines };
}

describe('ErrorHandler', () => {
  it('writes records at or above the threshold', () => {
    const { errors, lines } = handler();
    errors.debug('walking');
    errors.info('started');
    errors.warn('Thermal data could not be fetched (HTTP 404)', { path: '/redfish/v1/Chassis/1/Thermal' });

    expect(lines).toEqual([
      '[2024-05-01T12:00:00.000Z] WARN: Thermal data could not be fetched (HTTP 404) {"path":"/redfish/v1/Chassis/1/Thermal"}',
    ]);
    expect(errors.getLogs()).toHaveLength(3);
    expect(errors.getLogs(ErrorLevel.DEBUG).map((log) => log.message)).toEqual(['walking']);
  });

  it('leaves out empty context', () => {
    const { errors, lines } = handler(ErrorLevel.INFO);
    errors.info('done', {});
    expect(lines).toEqual(['[2024-05-01T12:00:00.000Z] INFO: done']);
  });

  it('prints stacks only when asked to', () => {
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at test';

    const quiet = handler();
    quiet.errors.error('failed', error);
    expect(quiet.lines).toEqual(['[2024-05-01T12:00:00.000Z] ERROR: failed']);

    const verbose = handler(ErrorLevel.WARN, true);
    verbose.errors.error('failed', error);
    expect(verbose.lines).toEqual(['[2024-05-01T12:00:00.000Z] ERROR: failed', 'Error: boom\n    at test']);
  });

  it('keeps records below the threshold without writing them', () => {
    const { errors, lines } = handler(ErrorLevel.ERROR);
    errors.warn('hidden');
    expect(lines).toEqual([]);
    expect(errors.getLogs(ErrorLevel.WARN).map((log) => log.message)).toEqual(['hidden']);
  });

  it('maps config levels', () => {
    expect(toErrorLevel('debug')).toBe(ErrorLevel.DEBUG);
    expect(toErrorLevel('error')).toBe(ErrorLevel.ERROR);
  });
});
