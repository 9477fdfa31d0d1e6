import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, setLogLevel, serializeError } from '../observability/logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes one JSON line with bound fields', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const log = createLogger({ runId: 'run-1' }).child({ branchId: 42 });
    log.info('branch rebuilt', { rows: 3 });

    expect(out).toHaveBeenCalledTimes(1);
    const line = String(out.mock.calls[0]?.[0]);
    expect(line.endsWith('\n')).toBe(true);
    const entry = JSON.parse(line);
    expect(entry).toMatchObject({ level: 'info', message: 'branch rebuilt', runId: 'run-1', branchId: 42, rows: 3 });
  });

  it('sends errors to stderr', () => {
    const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    createLogger().error('failed');
    expect(err).toHaveBeenCalledTimes(1);
  });

  it('filters below the threshold', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    setLogLevel('warn');
    createLogger().info('hidden');
    expect(out).not.toHaveBeenCalled();
  });

  it('serializes error codes', () => {
    const error = Object.assign(new Error('nope'), { code: 'UPSTREAM_ERROR' });
    expect(serializeError(error)).toMatchObject({ code: 'UPSTREAM_ERROR', message: 'nope' });
    expect(serializeError('plain')).toEqual({ message: 'plain' });
  });
});
