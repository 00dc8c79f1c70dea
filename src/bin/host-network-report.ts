import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { createReportEnv } from '@/lib/env/server';
import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { parseCliArgs } from '@/lib/report/cli-args';
import { runReport } from '@/lib/report/run-report';

import { createVcenterSource } from '../../plugins/vcenter';

import type { ReportEnv } from '@/lib/env/server';
import type { AppError } from '@/lib/errors/error';
import type { CliArgs } from '@/lib/report/cli-args';

async function writeReportFile(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf8');
}

function loadConfig(): { args: CliArgs; env: ReportEnv } | null {
  try {
    return { args: parseCliArgs(process.argv.slice(2)), env: createReportEnv(process.env) };
  } catch (err) {
    const error: AppError =
      err instanceof AppErrorException
        ? err.appError
        : {
            code: ErrorCode.CONFIG_INVALID,
            category: 'config',
            message: 'invalid configuration',
            retryable: false,
            redacted_context: { cause: errorMessage(err) },
          };
    logEvent({ level: 'error', event_type: 'report.config.invalid', error });
    return null;
  }
}

async function main(): Promise<number> {
  const loaded = loadConfig();
  if (!loaded) return 2;
  const { args, env } = loaded;

  // fetch takes no per-request TLS option; verification is relaxed process-wide.
  if (!env.VCENTER_TLS_VERIFY) process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';

  const result = await runReport({
    source: createVcenterSource({
      endpoint: env.VCENTER_ENDPOINT,
      username: env.VCENTER_USERNAME,
      password: env.VCENTER_PASSWORD,
      preferredVersion: env.VCENTER_API_VERSION,
      timeoutMs: env.VCENTER_TIMEOUT_MS,
    }),
    config: {
      outputDir: args.outputDir ?? env.REPORT_OUTPUT_DIR,
      timeZone: env.REPORT_TIMEZONE,
      clusters: [...env.REPORT_CLUSTERS, ...args.clusters],
      hosts: [...env.REPORT_HOSTS, ...args.hosts],
    },
    writeFile: writeReportFile,
  });
  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[host-network-report] ${message}`);
    process.exitCode = 1;
  });
