import { logEvent } from '@/lib/logging/logger';

import { badResponseError, httpError, networkError } from './errors';
import { childOf, escapeXml, isRecord, parseSoapFault, soapBodyOf, toArray, toMoRef, toText, xsiTypeOf } from './xml';

import type { MoRef } from '@/lib/topology/model';

export type SoapClientOptions = {
  endpoint: string;
  username: string;
  password: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export type SoapSession = {
  sdkEndpoint: string;
  cookie: string;
  sessionManager: string;
  propertyCollector: string;
  timeoutMs: number;
  fetchImpl: typeof fetch;
};

export type ObjectContent = {
  obj: MoRef;
  props: Map<string, unknown>;
  /** Property paths the server could not return, with the fault type when given. */
  missing: Array<{ path: string; fault?: string }>;
};

export function toSdkEndpoint(endpoint: string): string {
  const trimmed = endpoint.replace(/\/+$/, '');
  if (trimmed.endsWith('/sdk')) return trimmed;
  return `${trimmed}/sdk`;
}

function soapEnvelope(innerXml: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/" xmlns:vim25="urn:vim25">
  <soapenv:Body>
    ${innerXml}
  </soapenv:Body>
</soapenv:Envelope>`;
}

async function soapPost(input: {
  op: string;
  sdkEndpoint: string;
  bodyXml: string;
  cookie?: string;
  timeoutMs: number;
  fetchImpl: typeof fetch;
}): Promise<{ status: number; headers: Headers; bodyText: string }> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), input.timeoutMs);
  const start = Date.now();
  try {
    const res = await input.fetchImpl(input.sdkEndpoint, {
      method: 'POST',
      headers: {
        'content-type': 'text/xml; charset=utf-8',
        ...(input.cookie ? { cookie: input.cookie } : {}),
      },
      body: input.bodyXml,
      signal: controller.signal,
    });
    const bodyText = await res.text();
    logEvent({
      level: 'debug',
      event_type: 'vcenter.soap.response',
      op: input.op,
      status: res.status,
      duration_ms: Date.now() - start,
      body_length: bodyText.length,
    });
    return { status: res.status, headers: res.headers, bodyText };
  } catch (err) {
    throw networkError(input.op, input.sdkEndpoint, err);
  } finally {
    clearTimeout(timeout);
  }
}

function isOk(status: number): boolean {
  return status >= 200 && status < 300;
}

function extractCookie(headers: Headers): string | undefined {
  const setCookie = headers.get('set-cookie');
  if (!setCookie) return undefined;
  return setCookie.split(';')[0];
}

export function parseRetrieveServiceContent(xml: string): { sessionManager: string; propertyCollector: string } {
  const returnval = childOf(childOf(soapBodyOf(xml), 'RetrieveServiceContentResponse'), 'returnval');

  const sessionManager = toText(returnval?.sessionManager);
  const propertyCollector = toText(returnval?.propertyCollector);
  if (!sessionManager || !propertyCollector) throw badResponseError('RetrieveServiceContent');

  return { sessionManager, propertyCollector };
}

export async function openSoapSession(opts: SoapClientOptions): Promise<SoapSession> {
  const sdkEndpoint = toSdkEndpoint(opts.endpoint);
  const timeoutMs = opts.timeoutMs ?? 30_000;
  const fetchImpl = opts.fetchImpl ?? fetch;

  // 1) Retrieve service content (SessionManager + PropertyCollector).
  const serviceContentRes = await soapPost({
    op: 'RetrieveServiceContent',
    sdkEndpoint,
    timeoutMs,
    fetchImpl,
    bodyXml: soapEnvelope(
      `<vim25:RetrieveServiceContent>
        <vim25:_this type="ServiceInstance">ServiceInstance</vim25:_this>
      </vim25:RetrieveServiceContent>`,
    ),
  });
  if (!isOk(serviceContentRes.status)) {
    throw httpError({
      op: 'RetrieveServiceContent',
      status: serviceContentRes.status,
      bodyText: serviceContentRes.bodyText,
    });
  }
  const { sessionManager, propertyCollector } = parseRetrieveServiceContent(serviceContentRes.bodyText);

  // 2) Login and keep the session cookie.
  const loginRes = await soapPost({
    op: 'Login',
    sdkEndpoint,
    timeoutMs,
    fetchImpl,
    bodyXml: soapEnvelope(
      `<vim25:Login>
        <vim25:_this type="SessionManager">${escapeXml(sessionManager)}</vim25:_this>
        <vim25:userName>${escapeXml(opts.username)}</vim25:userName>
        <vim25:password>${escapeXml(opts.password)}</vim25:password>
      </vim25:Login>`,
    ),
  });
  if (!isOk(loginRes.status)) {
    throw httpError({ op: 'Login', status: loginRes.status, bodyText: loginRes.bodyText });
  }
  const cookie = extractCookie(loginRes.headers);
  if (!cookie) throw badResponseError('Login', 'missing session cookie');

  return { sdkEndpoint, cookie, sessionManager, propertyCollector, timeoutMs, fetchImpl };
}

export async function closeSoapSession(session: SoapSession): Promise<void> {
  const res = await soapPost({
    op: 'Logout',
    sdkEndpoint: session.sdkEndpoint,
    timeoutMs: session.timeoutMs,
    fetchImpl: session.fetchImpl,
    cookie: session.cookie,
    bodyXml: soapEnvelope(
      `<vim25:Logout>
        <vim25:_this type="SessionManager">${escapeXml(session.sessionManager)}</vim25:_this>
      </vim25:Logout>`,
    ),
  });
  if (!isOk(res.status)) throw httpError({ op: 'Logout', status: res.status, bodyText: res.bodyText });
}

function parseObjectContents(objects: unknown): ObjectContent[] {
  const out: ObjectContent[] = [];

  for (const object of toArray(objects)) {
    if (!isRecord(object)) continue;
    const obj = toMoRef(object.obj);
    if (!obj) continue;

    const props = new Map<string, unknown>();
    for (const propSet of toArray(object.propSet)) {
      if (!isRecord(propSet)) continue;
      const name = toText(propSet.name);
      if (name) props.set(name, propSet.val);
    }

    const missing: ObjectContent['missing'] = [];
    for (const entry of toArray(object.missingSet)) {
      if (!isRecord(entry)) continue;
      const path = toText(entry.path);
      if (!path) continue;
      const fault = xsiTypeOf(childOf(childOf(entry, 'fault'), 'fault'));
      missing.push(fault ? { path, fault } : { path });
    }

    out.push({ obj, props, missing });
  }

  return out;
}

export function parseRetrievePropertiesExResult(xml: string): ObjectContent[] {
  const returnval = childOf(childOf(soapBodyOf(xml), 'RetrievePropertiesExResponse'), 'returnval');
  return parseObjectContents(returnval?.objects);
}

export function parseRetrievePropertiesResult(xml: string): ObjectContent[] {
  const response = childOf(soapBodyOf(xml), 'RetrievePropertiesResponse');
  return parseObjectContents(response?.returnval);
}

/**
 * Reads `pathSet` of the given objects in one property-collector round trip.
 * Old vim25 endpoints without `RetrievePropertiesEx` fall back to `RetrieveProperties`.
 */
export async function retrieveProperties(
  session: SoapSession,
  input: { type: string; ids: string[]; pathSet: string[] },
): Promise<ObjectContent[]> {
  const ids = input.ids.filter((id) => id.trim().length > 0);
  if (ids.length === 0) return [];

  const propSetXml = [
    `<vim25:type>${escapeXml(input.type)}</vim25:type>`,
    ...input.pathSet.map((p) => `<vim25:pathSet>${escapeXml(p)}</vim25:pathSet>`),
  ].join('');
  const objectSetXml = ids
    .map(
      (id) =>
        `<vim25:objectSet><vim25:obj type="${escapeXml(input.type)}">${escapeXml(id)}</vim25:obj></vim25:objectSet>`,
    )
    .join('');
  const specSetXml = `<vim25:specSet>
          <vim25:propSet>${propSetXml}</vim25:propSet>
          ${objectSetXml}
        </vim25:specSet>`;

  const retrieveExRes = await soapPost({
    op: 'RetrievePropertiesEx',
    sdkEndpoint: session.sdkEndpoint,
    timeoutMs: session.timeoutMs,
    fetchImpl: session.fetchImpl,
    cookie: session.cookie,
    bodyXml: soapEnvelope(
      `<vim25:RetrievePropertiesEx>
        <vim25:_this type="PropertyCollector">${escapeXml(session.propertyCollector)}</vim25:_this>
        ${specSetXml}
        <vim25:options></vim25:options>
      </vim25:RetrievePropertiesEx>`,
    ),
  });
  if (isOk(retrieveExRes.status)) return parseRetrievePropertiesExResult(retrieveExRes.bodyText);

  const faultLower = parseSoapFault(retrieveExRes.bodyText)?.faultString?.toLowerCase();
  const exUnsupported =
    retrieveExRes.status === 500 &&
    faultLower?.includes('unable to resolve wsdl method name') &&
    faultLower.includes('retrievepropertiesex');
  if (!exUnsupported) {
    throw httpError({ op: 'RetrievePropertiesEx', status: retrieveExRes.status, bodyText: retrieveExRes.bodyText });
  }

  const retrieveRes = await soapPost({
    op: 'RetrieveProperties',
    sdkEndpoint: session.sdkEndpoint,
    timeoutMs: session.timeoutMs,
    fetchImpl: session.fetchImpl,
    cookie: session.cookie,
    bodyXml: soapEnvelope(
      `<vim25:RetrieveProperties>
        <vim25:_this type="PropertyCollector">${escapeXml(session.propertyCollector)}</vim25:_this>
        ${specSetXml}
      </vim25:RetrieveProperties>`,
    ),
  });
  if (!isOk(retrieveRes.status)) {
    throw httpError({ op: 'RetrieveProperties', status: retrieveRes.status, bodyText: retrieveRes.bodyText });
  }
  return parseRetrievePropertiesResult(retrieveRes.bodyText);
}

export function parseQueryNetworkHintResult(xml: string): unknown[] {
  const response = childOf(soapBodyOf(xml), 'QueryNetworkHintResponse');
  return toArray(response?.returnval);
}

/** Physical NIC hints (CDP/LLDP, observed subnets) for every adapter of one host. */
export async function queryNetworkHint(session: SoapSession, networkSystemId: string): Promise<unknown[]> {
  const res = await soapPost({
    op: 'QueryNetworkHint',
    sdkEndpoint: session.sdkEndpoint,
    timeoutMs: session.timeoutMs,
    fetchImpl: session.fetchImpl,
    cookie: session.cookie,
    bodyXml: soapEnvelope(
      `<vim25:QueryNetworkHint>
        <vim25:_this type="HostNetworkSystem">${escapeXml(networkSystemId)}</vim25:_this>
      </vim25:QueryNetworkHint>`,
    ),
  });
  if (!isOk(res.status)) throw httpError({ op: 'QueryNetworkHint', status: res.status, bodyText: res.bodyText });
  return parseQueryNetworkHintResult(res.bodyText);
}
