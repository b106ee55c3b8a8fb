import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { errorFields, getLogLevel, logger, setLogLevel } from '../logger';
import { ConflictError } from '@queueline/shared';
import { RecordStoreQueryLogger } from '../drizzle-logger';

describe('logger', () => {
  const original = getLogLevel();
  const capture = () => ({
    stdout: vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
    stderr: vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
  });
  let stdout: ReturnType<typeof capture>['stdout'];
  let stderr: ReturnType<typeof capture>['stderr'];

  beforeEach(() => {
    ({ stdout, stderr } = capture());
  });

  afterEach(() => {
    setLogLevel(original);
    vi.restoreAllMocks();
  });

  it('writes one JSON line with the given fields', () => {
    setLogLevel('info');
    logger.info('Ticket issued', { locationId: 'L1', ticketNumber: 4 });
    expect(stdout).toHaveBeenCalledTimes(1);
    const line = String(stdout.mock.calls[0]?.[0]);
    expect(line.endsWith('\n')).toBe(true);
    const entry = JSON.parse(line);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Ticket issued',
      locationId: 'L1',
      ticketNumber: 4,
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('drops entries below the minimum level', () => {
    setLogLevel('warn');
    logger.info('quiet');
    logger.debug('quieter');
    expect(stdout).not.toHaveBeenCalled();
  });

  it('sends errors to stderr', () => {
    setLogLevel('debug');
    logger.error('Remote record store unreachable');
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stdout).not.toHaveBeenCalled();
  });

  it('keeps reserved fields from being overwritten', () => {
    setLogLevel('info');
    logger.info('real message', { message: 'spoofed', level: 'debug' });
    const entry = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(entry.message).toBe('real message');
    expect(entry.level).toBe('info');
  });
});

describe('errorFields', () => {
  it('keeps the AppError code', () => {
    const fields = errorFields(new ConflictError('busy'));
    expect(fields.code).toBe('CONFLICT');
    expect(fields.message).toBe('busy');
  });

  it('stringifies non-errors', () => {
    expect(errorFields('plain')).toEqual({ message: 'plain' });
  });
});

describe('RecordStoreQueryLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs truncated SQL and the parameter count at debug level', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const previous = getLogLevel();
    setLogLevel('debug');
    try {
      new RecordStoreQueryLogger().logQuery(`select ${'x'.repeat(300)}`, ['ticket#A#1', 2]);
    } finally {
      setLogLevel(previous);
    }
    const entry = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(entry.message).toBe('db:query');
    expect(entry.paramCount).toBe(2);
    expect(entry.query).toHaveLength(203);
    expect(entry.query.endsWith('...')).toBe(true);
  });
});
