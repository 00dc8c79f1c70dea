import { redactJsonSecrets } from '@/lib/redaction/redact-json';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type ServiceName = 'report';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  message?: string;
} & Record<string, unknown>;

const EXCERPT_LIMIT = 2000;

function getEnv() {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'development';
}

function getVersion() {
  return process.env.GIT_SHA ?? process.env.npm_package_version ?? 'unknown';
}

function isDebugEnabled(): boolean {
  const value = process.env.REPORT_DEBUG?.trim().toLowerCase();
  return value === 'true' || value === '1';
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

export function logEvent(input: LogEventInput) {
  if (input.level === 'debug' && !isDebugEnabled()) return;

  const base = {
    ts: new Date().toISOString(),
    env: getEnv(),
    version: getVersion(),
    service: 'report' satisfies ServiceName,
    ...input,
  };

  const event = truncateExcerptsDeep(redactJsonSecrets(base));
  console.log(JSON.stringify(event));
}
