import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const FLAG_VALUES = ['true', 'false', '1', '0'];

function booleanFlag(defaultValue: boolean) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => FLAG_VALUES.includes(value), { message: 'expected one of true/false/1/0' })
    .transform((value) => value === 'true' || value === '1')
    .default(defaultValue);
}

function commaList() {
  return z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    )
    .default([]);
}

export const reportEnvSchema = {
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  VCENTER_ENDPOINT: z.url(),
  VCENTER_USERNAME: z.string().min(1),
  VCENTER_PASSWORD: z.string().min(1),
  VCENTER_API_VERSION: z.enum(['6.5-6.7', '7.0-8.x']).default('7.0-8.x'),
  VCENTER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  // vCenter appliances usually ship self-signed certificates.
  VCENTER_TLS_VERIFY: booleanFlag(false),

  REPORT_OUTPUT_DIR: z.string().min(1).default('reports'),
  REPORT_TIMEZONE: z
    .string()
    .min(1)
    .refine((tz) => isValidTimeZone(tz), { message: 'unknown time zone' })
    .default('UTC'),
  REPORT_CLUSTERS: commaList(),
  REPORT_HOSTS: commaList(),
  REPORT_DEBUG: booleanFlag(false),
};

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function createReportEnv(runtimeEnv: Record<string, string | undefined>) {
  return createEnv({
    server: reportEnvSchema,
    runtimeEnv,
    emptyStringAsUndefined: true,
  });
}

export type ReportEnv = ReturnType<typeof createReportEnv>;
