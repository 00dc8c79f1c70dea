import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createReportEnv } from '@/lib/env/server';

const REQUIRED = {
  VCENTER_ENDPOINT: 'https://vc.example.test',
  VCENTER_USERNAME: 'report@vsphere.local',
  VCENTER_PASSWORD: 'test-secret',
};

describe('createReportEnv', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies defaults', () => {
    const env = createReportEnv({ ...REQUIRED });

    expect(env.VCENTER_API_VERSION).toBe('7.0-8.x');
    expect(env.VCENTER_TIMEOUT_MS).toBe(30_000);
    expect(env.VCENTER_TLS_VERIFY).toBe(false);
    expect(env.REPORT_OUTPUT_DIR).toBe('reports');
    expect(env.REPORT_TIMEZONE).toBe('UTC');
    expect(env.REPORT_CLUSTERS).toEqual([]);
    expect(env.REPORT_HOSTS).toEqual([]);
    expect(env.REPORT_DEBUG).toBe(false);
  });

  it('parses boolean flags (true/false/1/0; case-insensitive)', () => {
    expect(createReportEnv({ ...REQUIRED, VCENTER_TLS_VERIFY: 'TRUE' }).VCENTER_TLS_VERIFY).toBe(true);
    expect(createReportEnv({ ...REQUIRED, VCENTER_TLS_VERIFY: '1' }).VCENTER_TLS_VERIFY).toBe(true);
    expect(createReportEnv({ ...REQUIRED, VCENTER_TLS_VERIFY: 'False' }).VCENTER_TLS_VERIFY).toBe(false);
    expect(createReportEnv({ ...REQUIRED, REPORT_DEBUG: '0' }).REPORT_DEBUG).toBe(false);
  });

  it('splits comma lists and coerces numbers', () => {
    const env = createReportEnv({
      ...REQUIRED,
      REPORT_CLUSTERS: 'Prod, Lab ,,',
      REPORT_HOSTS: 'esx01.lab.test',
      VCENTER_TIMEOUT_MS: '5000',
    });

    expect(env.REPORT_CLUSTERS).toEqual(['Prod', 'Lab']);
    expect(env.REPORT_HOSTS).toEqual(['esx01.lab.test']);
    expect(env.VCENTER_TIMEOUT_MS).toBe(5000);
  });

  it('treats empty strings as unset', () => {
    expect(createReportEnv({ ...REQUIRED, REPORT_OUTPUT_DIR: '' }).REPORT_OUTPUT_DIR).toBe('reports');
  });

  it('rejects a missing endpoint, a bad flag and an unknown time zone', () => {
    expect(() => createReportEnv({ ...REQUIRED, VCENTER_ENDPOINT: undefined })).toThrow();
    expect(() => createReportEnv({ ...REQUIRED, REPORT_DEBUG: 'yes' })).toThrow();
    expect(() => createReportEnv({ ...REQUIRED, REPORT_TIMEZONE: 'Mars/Olympus' })).toThrow();
  });
});
