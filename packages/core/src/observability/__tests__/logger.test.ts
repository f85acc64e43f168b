import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { log, setLogLevel } from '../logger';

beforeEach(() => {
  setLogLevel('info');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('writes one JSON line per entry with the import fields', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    log('info', 'Import completed', { importId: 'run-1', listsCreated: 2 });

    expect(stdout).toHaveBeenCalledTimes(1);
    const line = String(stdout.mock.calls[0]?.[0]);
    expect(line.endsWith('\n')).toBe(true);
    expect(JSON.parse(line)).toMatchObject({ level: 'info', message: 'Import completed', importId: 'run-1', listsCreated: 2 });
  });

  it('drops entries below the level set at run time', () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    setLogLevel('warn');
    log('info', 'Import started');
    log('error', 'Import failed');

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledTimes(1);
  });
});
