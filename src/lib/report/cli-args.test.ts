import { describe, expect, it } from 'vitest';

import { AppErrorException } from '@/lib/errors/error';
import { parseCliArgs } from '@/lib/report/cli-args';

describe('parseCliArgs', () => {
  it('returns empty filters without arguments', () => {
    expect(parseCliArgs([])).toEqual({ clusters: [], hosts: [] });
  });

  it('collects repeatable filters and the last output dir', () => {
    expect(
      parseCliArgs(['--cluster', 'Prod', '--host', 'esxi-01', '--out', 'a', '--host=esxi-02', '--out=b']),
    ).toEqual({ outputDir: 'b', clusters: ['Prod'], hosts: ['esxi-01', 'esxi-02'] });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('unknown argument --verbose');
  });

  it('rejects a flag without value', () => {
    expect(() => parseCliArgs(['--out'])).toThrow('--out requires a value');
    expect(() => parseCliArgs(['--host', '--out', 'x'])).toThrow('--host requires a value');
    expect(() => parseCliArgs(['--cluster='])).toThrow('--cluster requires a value');
  });

  it('raises config errors', () => {
    try {
      parseCliArgs(['extra']);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppErrorException);
      if (err instanceof AppErrorException) expect(err.appError.category).toBe('config');
    }
  });
});
