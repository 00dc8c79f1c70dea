/**
 * vSphere Automation API Client (inventory enumeration only)
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/v7.0U2/
 */

import { errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { badResponseError, httpError, networkError } from './errors';
import { isRecord } from './xml';

import type { PreferredVcenterVersion } from './types';

export type SessionToken = string;

export type RestClientOptions = {
  endpoint: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

const REST_DEBUG_EXCERPT_LIMIT = 2000;

function joinUrl(base: string, path: string) {
  return `${base.replace(/\/+$/, '')}${path}`;
}

function excerpt(text: string, limit = REST_DEBUG_EXCERPT_LIMIT): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

function unwrapValue(data: unknown): unknown {
  // Some vSphere Automation API deployments (the /rest root) wrap payloads as `{ value: ... }`.
  if (isRecord(data) && 'value' in data) return data.value;
  return data;
}

function unwrapArray(data: unknown, op: string): unknown[] {
  const unwrapped = unwrapValue(data);
  if (Array.isArray(unwrapped)) return unwrapped;
  throw badResponseError(op, `expected array, got ${typeof unwrapped}`);
}

async function request(
  opts: RestClientOptions,
  op: string,
  url: string,
  init: RequestInit,
): Promise<{ status: number; ok: boolean; headers: Headers; bodyText: string }> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs ?? 30_000);
  const start = Date.now();
  try {
    const res = await fetchImpl(url, { ...init, signal: controller.signal });
    const bodyText = await res.text();
    logEvent({
      level: 'debug',
      event_type: 'vcenter.rest.response',
      op,
      method: init.method ?? 'GET',
      url,
      status: res.status,
      duration_ms: Date.now() - start,
      body_length: bodyText.length,
      ...(res.ok ? {} : { body_excerpt: excerpt(bodyText) }),
    });
    return { status: res.status, ok: res.ok, headers: res.headers, bodyText };
  } catch (err) {
    throw networkError(op, url, err);
  } finally {
    clearTimeout(timeout);
  }
}

async function getJson(opts: RestClientOptions, op: string, url: string, token: SessionToken): Promise<unknown> {
  const res = await request(opts, op, url, {
    method: 'GET',
    headers: { 'vmware-api-session-id': token, accept: 'application/json' },
  });
  if (!res.ok) throw httpError({ op, status: res.status, bodyText: res.bodyText });
  try {
    const data: unknown = JSON.parse(res.bodyText);
    return data;
  } catch {
    throw badResponseError(op, 'invalid json');
  }
}

export type VcenterApiRoot = 'api' | 'rest';

export type VcenterPlan = {
  apiRoot: VcenterApiRoot;
  sessionPath: string;
  hostByClusterFilter: 'clusters' | 'filter.clusters';
};

export function resolveVcenterPlan(preferred: PreferredVcenterVersion): VcenterPlan {
  if (preferred === '6.5-6.7') {
    return { apiRoot: 'rest', sessionPath: '/rest/com/vmware/cis/session', hostByClusterFilter: 'filter.clusters' };
  }
  return { apiRoot: 'api', sessionPath: '/api/session', hostByClusterFilter: 'clusters' };
}

function plannedUrl(opts: RestClientOptions, plan: VcenterPlan, apiPath: string): string {
  const path = plan.apiRoot === 'api' ? apiPath : apiPath.replace(/^\/api\//, '/rest/');
  return joinUrl(opts.endpoint, path);
}

function unwrapValueDeep(data: unknown, maxDepth = 3): unknown {
  let current: unknown = data;
  for (let i = 0; i < maxDepth; i++) {
    if (isRecord(current) && 'value' in current) {
      current = current.value;
      continue;
    }
    break;
  }
  return current;
}

function parseSessionToken(bodyText: string): SessionToken | null {
  if (bodyText.trim().length === 0) return null;
  let data: unknown;
  try {
    data = JSON.parse(bodyText);
  } catch {
    // Some older setups answer with a non-JSON body and only set the header.
    return null;
  }
  const unwrapped = unwrapValueDeep(data);
  if (typeof unwrapped === 'string' && unwrapped.trim().length > 0) return unwrapped;
  return null;
}

function getSessionTokenFromHeaders(headers: Headers): SessionToken | null {
  const value = headers.get('vmware-api-session-id')?.trim();
  return value ? value : null;
}

export async function createSession(
  opts: RestClientOptions,
  credential: { username: string; password: string },
  plan: VcenterPlan,
): Promise<SessionToken> {
  const auth = Buffer.from(`${credential.username}:${credential.password}`).toString('base64');
  const op = `createSession(${plan.apiRoot})`;
  const res = await request(opts, op, joinUrl(opts.endpoint, plan.sessionPath), {
    method: 'POST',
    headers: {
      Authorization: `Basic ${auth}`,
      // Some deployments/proxies require Content-Type for POST even with an empty body.
      'content-type': 'application/json',
      accept: 'application/json',
    },
  });
  if (!res.ok) throw httpError({ op, status: res.status, bodyText: res.bodyText });

  const token = parseSessionToken(res.bodyText) ?? getSessionTokenFromHeaders(res.headers);
  if (!token) throw badResponseError(op, 'missing session token');
  return token;
}

export async function deleteSession(opts: RestClientOptions, token: SessionToken, plan: VcenterPlan): Promise<void> {
  const op = `deleteSession(${plan.apiRoot})`;
  const res = await request(opts, op, joinUrl(opts.endpoint, plan.sessionPath), {
    method: 'DELETE',
    headers: { 'vmware-api-session-id': token },
  });
  if (!res.ok) throw httpError({ op, status: res.status, bodyText: res.bodyText });
}

/** Host summary from list API */
export type HostSummary = {
  host: string;
  name?: string;
  connection_state?: string;
  power_state?: string;
};

export type ClusterSummary = {
  cluster: string;
  name?: string;
};

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function toHostSummaries(items: unknown[]): HostSummary[] {
  const out: HostSummary[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const host = optionalString(item.host);
    if (!host) continue;
    out.push({
      host,
      name: optionalString(item.name),
      connection_state: optionalString(item.connection_state),
      power_state: optionalString(item.power_state),
    });
  }
  return out;
}

export async function listHosts(opts: RestClientOptions, token: SessionToken, plan: VcenterPlan): Promise<HostSummary[]> {
  const data = await getJson(opts, 'listHosts', plannedUrl(opts, plan, '/api/vcenter/host'), token);
  return toHostSummaries(unwrapArray(data, 'listHosts'));
}

/**
 * List Hosts filtered by cluster
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/v7.0U2/vcenter/api/vcenter/host/get/
 */
export async function listHostsByCluster(
  opts: RestClientOptions,
  token: SessionToken,
  clusterId: string,
  plan: VcenterPlan,
): Promise<HostSummary[]> {
  const apiPath = `/api/vcenter/host?${plan.hostByClusterFilter}=${encodeURIComponent(clusterId)}`;
  const data = await getJson(opts, 'listHostsByCluster', plannedUrl(opts, plan, apiPath), token);
  return toHostSummaries(unwrapArray(data, 'listHostsByCluster'));
}

export async function listClusters(
  opts: RestClientOptions,
  token: SessionToken,
  plan: VcenterPlan,
): Promise<ClusterSummary[]> {
  const data = await getJson(opts, 'listClusters', plannedUrl(opts, plan, '/api/vcenter/cluster'), token);
  const out: ClusterSummary[] = [];
  for (const item of unwrapArray(data, 'listClusters')) {
    if (!isRecord(item)) continue;
    const cluster = optionalString(item.cluster);
    if (cluster) out.push({ cluster, name: optionalString(item.name) });
  }
  return out;
}

/**
 * vCenter system version info
 * @see https://developer.broadcom.com/xapis/vsphere-automation-api/latest/vcenter/api/vcenter/system/version/get/
 */
export type VcenterSystemVersion = {
  product?: string;
  version?: string;
  build?: string;
};

export async function getVcenterSystemVersion(
  opts: RestClientOptions,
  token: SessionToken,
  plan: VcenterPlan,
): Promise<VcenterSystemVersion | null> {
  // The endpoint only exists on 7.0+; older servers answer 404.
  if (plan.apiRoot === 'rest') return null;
  const url = plannedUrl(opts, plan, '/api/appliance/system/version');
  let res: Awaited<ReturnType<typeof request>>;
  try {
    res = await request(opts, 'getVcenterSystemVersion', url, {
      method: 'GET',
      headers: { 'vmware-api-session-id': token, accept: 'application/json' },
    });
  } catch (err) {
    logEvent({ level: 'warn', event_type: 'vcenter.api_version.unavailable', cause: errorMessage(err) });
    return null;
  }
  if (!res.ok) return null;

  let data: unknown;
  try {
    data = JSON.parse(res.bodyText);
  } catch {
    return null;
  }
  const obj = unwrapValue(data);
  if (!isRecord(obj)) return null;
  return {
    product: optionalString(obj.product),
    version: optionalString(obj.version),
    build: optionalString(obj.build),
  };
}
