import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException, toAppError } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import {
  createSession,
  deleteSession,
  getVcenterSystemVersion,
  listClusters,
  listHosts,
  listHostsByCluster,
  resolveVcenterPlan,
} from './client';
import { attachSwitches, DV_PORTGROUP_PATH_SET, DVS_PATH_SET, parseDistributedSwitches, parseDvPortgroups } from './dvs';
import { HOST_NETWORK_PATH_SET, parseHostProperties } from './host-network';
import { parseNetworkHints } from './network-hint';
import { closeSoapSession, openSoapSession, queryNetworkHint, retrieveProperties } from './soap';

import type { InventorySource } from '@/lib/report/inventory-source';
import type { DvPortgroupInfo, HostRef, MoRef, NetworkHint, ReportWarning } from '@/lib/topology/model';
import type { RestClientOptions, SessionToken, VcenterPlan } from './client';
import type { DistributedSwitchInfo } from './dvs';
import type { SoapSession } from './soap';
import type { PreferredVcenterVersion, VcenterSourceConfig } from './types';

function parseMajorMinor(version: string): { major: number; minor: number } | null {
  const m = version.trim().match(/^(\d+)\.(\d+)/);
  if (!m) return null;
  const major = Number(m[1]);
  const minor = Number(m[2]);
  if (!Number.isFinite(major) || !Number.isFinite(minor)) return null;
  return { major, minor };
}

export function recommendPreferredVersion(detectedVersion: string | null): PreferredVcenterVersion | null {
  if (!detectedVersion) return null;
  const parsed = parseMajorMinor(detectedVersion);
  if (!parsed) return null;
  if (parsed.major >= 7) return '7.0-8.x';
  return '6.5-6.7';
}

function warningFrom(code: string, err: unknown, stage: string): ReportWarning {
  const appError = toAppError(err, stage);
  return { code, message: `${stage}: ${appError.message}`, context: { error_code: appError.code } };
}

function groupByType(refs: MoRef[]): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const ref of refs) {
    const ids = out.get(ref.type) ?? [];
    if (!ids.includes(ref.value)) ids.push(ref.value);
    out.set(ref.type, ids);
  }
  return out;
}

type State = {
  plan: VcenterPlan;
  token: SessionToken;
  soap: SoapSession;
};

/** vCenter-backed inventory: REST for enumeration, vim25 SOAP per host. */
export function createVcenterSource(config: VcenterSourceConfig): InventorySource {
  const restOpts: RestClientOptions = {
    endpoint: config.endpoint,
    timeoutMs: config.timeoutMs,
    fetchImpl: config.fetchImpl,
  };
  const credential = { username: config.username, password: config.password };
  let state: State | null = null;
  let pendingToken: { plan: VcenterPlan; token: SessionToken } | null = null;

  const requireState = (): State => {
    if (!state) {
      throw new AppErrorException({
        code: ErrorCode.INTERNAL_ERROR,
        category: 'unknown',
        message: 'vcenter source used before open()',
        retryable: false,
      });
    }
    return state;
  };

  async function checkVersion(plan: VcenterPlan, token: SessionToken): Promise<void> {
    const systemVersion = await getVcenterSystemVersion(restOpts, token, plan);
    const detected = systemVersion?.version ?? null;
    const recommended = recommendPreferredVersion(detected);
    if (recommended && recommended !== config.preferredVersion) {
      logEvent({
        level: 'warn',
        event_type: 'vcenter.api_version.mismatch',
        detected_version: detected,
        preferred_vcenter_version: config.preferredVersion,
        recommended_preferred_version: recommended,
      });
    }
  }

  async function collectDvPortgroups(session: SoapSession, networks: MoRef[]): Promise<DvPortgroupInfo[]> {
    const ids = networks.filter((ref) => ref.type === 'DistributedVirtualPortgroup').map((ref) => ref.value);
    if (ids.length === 0) return [];

    const portgroups = parseDvPortgroups(
      await retrieveProperties(session, { type: 'DistributedVirtualPortgroup', ids, pathSet: DV_PORTGROUP_PATH_SET }),
    );

    const switchRefs = portgroups.flatMap((pg) => (pg.dvsRef ? [pg.dvsRef] : []));
    const switches: DistributedSwitchInfo[] = [];
    for (const [type, switchIds] of groupByType(switchRefs)) {
      switches.push(
        ...parseDistributedSwitches(await retrieveProperties(session, { type, ids: switchIds, pathSet: DVS_PATH_SET })),
      );
    }
    return attachSwitches(portgroups, switches);
  }

  return {
    async open() {
      const plan = resolveVcenterPlan(config.preferredVersion);
      const token = await createSession(restOpts, credential, plan);
      pendingToken = { plan, token };
      await checkVersion(plan, token);

      const soap = await openSoapSession({ ...restOpts, ...credential });
      state = { plan, token, soap };
      pendingToken = null;
      logEvent({ level: 'info', event_type: 'vcenter.session.opened', api_root: plan.apiRoot });
    },

    async listHosts() {
      const { plan, token } = requireState();
      const [hosts, clusters] = await Promise.all([
        listHosts(restOpts, token, plan),
        listClusters(restOpts, token, plan),
      ]);

      const clusterOf = new Map<string, { id: string; name?: string }>();
      await Promise.all(
        clusters.map(async (cluster) => {
          const members = await listHostsByCluster(restOpts, token, cluster.cluster, plan);
          for (const member of members) clusterOf.set(member.host, { id: cluster.cluster, name: cluster.name });
        }),
      );

      return hosts.map((summary): HostRef => {
        const cluster = clusterOf.get(summary.host);
        return {
          hostId: summary.host,
          name: summary.name ?? summary.host,
          clusterId: cluster?.id,
          clusterName: cluster?.name,
          connectionState: summary.connection_state,
          powerState: summary.power_state,
        };
      });
    },

    async collectHost(host) {
      const { soap } = requireState();
      const objects = await retrieveProperties(soap, {
        type: 'HostSystem',
        ids: [host.hostId],
        pathSet: HOST_NETWORK_PATH_SET,
      });
      const object = objects.find((o) => o.obj.value === host.hostId);
      if (!object) {
        throw new AppErrorException({
          code: ErrorCode.HOST_NOT_FOUND,
          category: 'parse',
          message: 'host not returned by property collector',
          retryable: false,
          redacted_context: { host_id: host.hostId },
        });
      }

      const parsed = parseHostProperties(object.props);
      const warnings: ReportWarning[] = object.missing.map((entry) => ({
        code: 'PROPERTY_MISSING',
        message: entry.fault ? `${entry.path} not returned (${entry.fault})` : `${entry.path} not returned`,
        context: { path: entry.path },
      }));

      let dvPortgroups: DvPortgroupInfo[] = [];
      try {
        dvPortgroups = await collectDvPortgroups(soap, parsed.networks);
      } catch (err) {
        warnings.push(warningFrom('DV_PORTGROUPS_UNAVAILABLE', err, 'collect_dv_portgroups'));
        logEvent({
          level: 'warn',
          event_type: 'vcenter.dv_portgroups.failed',
          host_id: host.hostId,
          error: toAppError(err, 'collect_dv_portgroups'),
        });
      }

      let hints: NetworkHint[] | null = null;
      if (!parsed.networkSystem) {
        warnings.push({ code: 'HINTS_UNAVAILABLE', message: 'host has no network system' });
      } else {
        try {
          hints = parseNetworkHints(await queryNetworkHint(soap, parsed.networkSystem));
        } catch (err) {
          warnings.push(warningFrom('HINTS_UNAVAILABLE', err, 'query_network_hint'));
          logEvent({
            level: 'warn',
            event_type: 'vcenter.network_hint.failed',
            host_id: host.hostId,
            error: toAppError(err, 'query_network_hint'),
          });
        }
      }

      return {
        host: { ...host, name: parsed.name ?? host.name },
        product: parsed.product,
        network: parsed.network,
        dvPortgroups,
        hints,
        warnings,
      };
    },

    async close() {
      const current = state;
      const rest = current ?? pendingToken;
      state = null;
      pendingToken = null;

      if (current) {
        try {
          await closeSoapSession(current.soap);
        } catch (err) {
          logEvent({ level: 'warn', event_type: 'vcenter.session.close_failed', error: toAppError(err, 'soap_logout') });
        }
      }
      if (rest) {
        try {
          await deleteSession(restOpts, rest.token, rest.plan);
        } catch (err) {
          logEvent({ level: 'warn', event_type: 'vcenter.session.close_failed', error: toAppError(err, 'rest_logout') });
        }
      }
    },
  };
}
