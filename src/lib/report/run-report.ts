import path from 'node:path';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, errorMessage, toAppError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { renderHostReport, reportFileName } from '@/lib/report/html';
import { buildHostTables } from '@/lib/report/tables';
import { formatReportTimestamp } from '@/lib/timezone';
import { naturalCompare, reconcileHost } from '@/lib/topology/reconcile';

import type { AppError } from '@/lib/errors/error';
import type { InventorySource } from '@/lib/report/inventory-source';
import type { HostRef } from '@/lib/topology/model';

export type ReportConfig = {
  outputDir: string;
  timeZone: string;
  /** Cluster names or ids; empty selects every cluster. */
  clusters: string[];
  /** Host names or ids; empty selects every host. */
  hosts: string[];
};

export type HostFailure = { hostId: string; hostName: string; error: AppError };

export type RunReportResult = {
  exitCode: 0 | 1 | 2;
  written: string[];
  failures: HostFailure[];
  warnings: number;
};

export type WriteReportFile = (filePath: string, content: string) => Promise<void>;

function matches(filter: Set<string>, ...values: Array<string | undefined>): boolean {
  return values.some((value) => value !== undefined && filter.has(value.toLowerCase()));
}

/**
 * Applies cluster and host filters (case-insensitive, by name or id; both must match when both
 * are set) and sorts the result by host name.
 */
export function selectHosts(hosts: HostRef[], filters: Pick<ReportConfig, 'clusters' | 'hosts'>): HostRef[] {
  const clusters = new Set(filters.clusters.map((c) => c.toLowerCase()));
  const names = new Set(filters.hosts.map((h) => h.toLowerCase()));

  const selected = hosts.filter(
    (host) =>
      (clusters.size === 0 || matches(clusters, host.clusterName, host.clusterId)) &&
      (names.size === 0 || matches(names, host.name, host.hostId)),
  );

  const known = (values: Array<string | undefined>) =>
    new Set(values.flatMap((value) => (value ? [value.toLowerCase()] : [])));
  const knownClusters = known(hosts.flatMap((host) => [host.clusterName, host.clusterId]));
  const knownHosts = known(hosts.flatMap((host) => [host.name, host.hostId]));
  const unmatched = [
    ...filters.clusters.filter((value) => !knownClusters.has(value.toLowerCase())),
    ...filters.hosts.filter((value) => !knownHosts.has(value.toLowerCase())),
  ];
  if (unmatched.length > 0) {
    logEvent({ level: 'warn', event_type: 'report.filter.unmatched', values: unmatched });
  }

  return [...selected].sort((a, b) => naturalCompare(a.name, b.name) || naturalCompare(a.hostId, b.hostId));
}

function writeFailed(filePath: string, err: unknown): AppErrorException {
  return new AppErrorException({
    code: ErrorCode.REPORT_WRITE_FAILED,
    category: 'io',
    message: 'failed to write report',
    retryable: false,
    redacted_context: { path: filePath, cause: errorMessage(err) },
  });
}

async function closeSource(source: InventorySource): Promise<void> {
  try {
    await source.close();
  } catch (err) {
    logEvent({ level: 'warn', event_type: 'report.source.close_failed', error: toAppError(err, 'close') });
  }
}

/**
 * Collects, reconciles, renders and writes one report per selected host. A failing host is
 * logged and counted; the remaining hosts still run.
 */
export async function runReport(input: {
  source: InventorySource;
  config: ReportConfig;
  writeFile: WriteReportFile;
  now?: () => Date;
}): Promise<RunReportResult> {
  const { source, config, writeFile } = input;
  const now = input.now ?? (() => new Date());
  const startedAt = Date.now();

  let hosts: HostRef[];
  try {
    await source.open();
    hosts = await source.listHosts();
  } catch (err) {
    const error = toAppError(err, 'session');
    logEvent({ level: 'error', event_type: 'report.session.failed', error });
    await closeSource(source);
    return { exitCode: 2, written: [], failures: [], warnings: 0 };
  }

  const selected = selectHosts(hosts, config);
  logEvent({ level: 'info', event_type: 'report.hosts.selected', total: hosts.length, selected: selected.length });

  const written: string[] = [];
  const failures: HostFailure[] = [];
  const usedNames = new Set<string>();
  let warnings = 0;

  try {
    for (const host of selected) {
      let stage = 'collect';
      try {
        const inventory = await source.collectHost(host);
        stage = 'render';
        const topology = reconcileHost(inventory);
        const html = renderHostReport({
          topology,
          tables: buildHostTables(topology),
          generatedAt: formatReportTimestamp(now(), config.timeZone),
        });

        stage = 'write';
        let fileName = reportFileName(topology.host.name);
        if (usedNames.has(fileName)) fileName = reportFileName(`${topology.host.name}-${host.hostId}`);
        usedNames.add(fileName);
        const filePath = path.join(config.outputDir, fileName);
        try {
          await writeFile(filePath, html);
        } catch (err) {
          throw writeFailed(filePath, err);
        }

        written.push(filePath);
        warnings += topology.warnings.length;
        logEvent({
          level: 'info',
          event_type: 'report.host.written',
          host_id: host.hostId,
          host_name: topology.host.name,
          path: filePath,
          warnings: topology.warnings.length,
        });
      } catch (err) {
        const error = toAppError(err, stage);
        failures.push({ hostId: host.hostId, hostName: host.name, error });
        logEvent({ level: 'error', event_type: 'report.host.failed', host_id: host.hostId, host_name: host.name, error });
      }
    }
  } finally {
    await closeSource(source);
  }

  const exitCode = selected.length > 0 && failures.length === 0 ? 0 : 1;
  logEvent({
    level: exitCode === 0 ? 'info' : 'warn',
    event_type: 'report.run.finished',
    selected: selected.length,
    written: written.length,
    failed: failures.length,
    warnings,
    duration_ms: Date.now() - startedAt,
  });

  return { exitCode, written, failures, warnings };
}
