import { expect, it } from 'vitest';

import { ErrorCode } from '@/lib/errors/error-codes';
import { AppErrorException } from '@/lib/errors/error';

import {
  closeSoapSession,
  openSoapSession,
  parseRetrievePropertiesExResult,
  retrieveProperties,
  toSdkEndpoint,
} from '../soap';
import {
  fakeFetch,
  LOGIN_OK,
  LOGOUT_OK,
  SERVICE_CONTENT,
  soapEnvelope,
  soapFault,
  soapMethodOf,
  xmlResponse,
} from './helpers';

import type { SoapSession } from '../soap';

const COOKIE = 'vmware_soap_session="5f3a"';

function sessionWith(fetchImpl: typeof fetch): SoapSession {
  return {
    sdkEndpoint: 'https://vc.test/sdk',
    cookie: COOKIE,
    sessionManager: 'SessionManager',
    propertyCollector: 'propertyCollector',
    timeoutMs: 1000,
    fetchImpl,
  };
}

async function appErrorOf(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (err) {
    if (err instanceof AppErrorException) return err.appError;
    throw err;
  }
  throw new Error('expected rejection');
}

const HOST_NAME_RESULT = `<objects>
  <obj type="HostSystem">host-1</obj>
  <propSet><name>name</name><val xsi:type="xsd:string">esxi-01</val></propSet>
</objects>`;

it('normalizes the sdk endpoint', () => {
  expect(toSdkEndpoint('https://vc.test')).toBe('https://vc.test/sdk');
  expect(toSdkEndpoint('https://vc.test/')).toBe('https://vc.test/sdk');
  expect(toSdkEndpoint('https://vc.test/sdk/')).toBe('https://vc.test/sdk');
});

it('reports missing properties with their fault type', () => {
  const xml = soapEnvelope(`<RetrievePropertiesExResponse xmlns="urn:vim25"><returnval>
<objects>
  <obj type="HostSystem">host-1</obj>
  <propSet><name>name</name><val xsi:type="xsd:string">esxi-01</val></propSet>
  <missingSet>
    <path>config.firewall</path>
    <fault><fault xsi:type="NoPermission"><object type="HostSystem">host-1</object><privilegeId>System.Read</privilegeId></fault></fault>
  </missingSet>
</objects>
</returnval></RetrievePropertiesExResponse>`);

  const [object] = parseRetrievePropertiesExResult(xml);

  expect(object?.obj).toEqual({ type: 'HostSystem', value: 'host-1' });
  expect(object?.props.get('name')).toEqual({ '#text': 'esxi-01', '@_xsiType': 'xsd:string' });
  expect(object?.missing).toEqual([{ path: 'config.firewall', fault: 'NoPermission' }]);
});

it('opens a session with escaped credentials and keeps the cookie', async () => {
  const { fetchImpl, requests } = fakeFetch((req) => {
    const method = soapMethodOf(req.body);
    if (method === 'RetrieveServiceContent') return xmlResponse(SERVICE_CONTENT);
    if (method === 'Login') return xmlResponse(LOGIN_OK, 200, { 'set-cookie': `${COOKIE}; Path=/; HttpOnly` });
    return xmlResponse(soapFault('unexpected'), 500);
  });

  const session = await openSoapSession({
    endpoint: 'https://vc.test',
    username: 'report@vsphere.local',
    password: 'p&ss<1>',
    fetchImpl,
  });

  expect(session).toMatchObject({
    sdkEndpoint: 'https://vc.test/sdk',
    cookie: COOKIE,
    sessionManager: 'SessionManager',
    propertyCollector: 'propertyCollector',
    timeoutMs: 30_000,
  });
  expect(requests.map((r) => soapMethodOf(r.body))).toEqual(['RetrieveServiceContent', 'Login']);
  expect(requests[1]?.body).toContain('<vim25:password>p&amp;ss&lt;1&gt;</vim25:password>');
});

it('maps an invalid login fault to an auth error', async () => {
  const { fetchImpl } = fakeFetch((req) =>
    soapMethodOf(req.body) === 'RetrieveServiceContent'
      ? xmlResponse(SERVICE_CONTENT)
      : xmlResponse(
          soapFault(
            'Cannot complete login due to an incorrect user name or password.',
            '<InvalidLoginFault xmlns="urn:vim25" xsi:type="InvalidLogin"></InvalidLoginFault>',
          ),
          500,
        ),
  );

  const error = await appErrorOf(
    openSoapSession({ endpoint: 'https://vc.test', username: 'report', password: 'test-secret', fetchImpl }),
  );

  expect(error).toEqual({
    code: ErrorCode.VCENTER_AUTH_FAILED,
    category: 'auth',
    message: 'authentication failed',
    retryable: false,
    redacted_context: {
      op: 'Login',
      status: 500,
      fault: 'Cannot complete login due to an incorrect user name or password.',
      fault_type: 'InvalidLoginFault',
    },
  });
});

it('fails the login when no session cookie is returned', async () => {
  const { fetchImpl } = fakeFetch((req) =>
    xmlResponse(soapMethodOf(req.body) === 'RetrieveServiceContent' ? SERVICE_CONTENT : LOGIN_OK),
  );

  const error = await appErrorOf(
    openSoapSession({ endpoint: 'https://vc.test', username: 'report', password: 'test-secret', fetchImpl }),
  );

  expect(error.code).toBe(ErrorCode.VCENTER_BAD_RESPONSE);
  expect(error.redacted_context).toEqual({ op: 'Login', detail: 'missing session cookie' });
});

it('retrieves properties with the session cookie', async () => {
  const { fetchImpl, requests } = fakeFetch(() =>
    xmlResponse(
      soapEnvelope(
        `<RetrievePropertiesExResponse xmlns="urn:vim25"><returnval>${HOST_NAME_RESULT}</returnval></RetrievePropertiesExResponse>`,
      ),
    ),
  );

  const objects = await retrieveProperties(sessionWith(fetchImpl), {
    type: 'HostSystem',
    ids: ['host-1'],
    pathSet: ['name'],
  });

  expect(objects.map((o) => o.obj.value)).toEqual(['host-1']);
  expect(requests[0]?.headers.get('cookie')).toBe(COOKIE);
  expect(requests[0]?.body).toContain('<vim25:obj type="HostSystem">host-1</vim25:obj>');
  expect(requests[0]?.body).toContain('<vim25:pathSet>name</vim25:pathSet>');
});

it('falls back to RetrieveProperties on servers without the Ex method', async () => {
  const { fetchImpl, requests } = fakeFetch((req) =>
    soapMethodOf(req.body) === 'RetrievePropertiesEx'
      ? xmlResponse(soapFault('Unable to resolve WSDL method name RetrievePropertiesEx'), 500)
      : xmlResponse(
          soapEnvelope(`<RetrievePropertiesResponse xmlns="urn:vim25"><returnval>
  <obj type="HostSystem">host-1</obj>
  <propSet><name>name</name><val xsi:type="xsd:string">esxi-01</val></propSet>
</returnval></RetrievePropertiesResponse>`),
        ),
  );

  const objects = await retrieveProperties(sessionWith(fetchImpl), {
    type: 'HostSystem',
    ids: ['host-1'],
    pathSet: ['name'],
  });

  expect(requests.map((r) => soapMethodOf(r.body))).toEqual(['RetrievePropertiesEx', 'RetrieveProperties']);
  expect(objects).toHaveLength(1);
  expect(objects[0]?.props.get('name')).toEqual({ '#text': 'esxi-01', '@_xsiType': 'xsd:string' });
});

it('raises permission faults without falling back', async () => {
  const { fetchImpl, requests } = fakeFetch(() =>
    xmlResponse(
      soapFault(
        'Permission to perform this operation was denied.',
        '<NoPermissionFault xmlns="urn:vim25" xsi:type="NoPermission"><privilegeId>System.Read</privilegeId></NoPermissionFault>',
      ),
      500,
    ),
  );

  const error = await appErrorOf(
    retrieveProperties(sessionWith(fetchImpl), { type: 'HostSystem', ids: ['host-1'], pathSet: ['name'] }),
  );

  expect(requests).toHaveLength(1);
  expect(error.code).toBe(ErrorCode.VCENTER_PERMISSION_DENIED);
  expect(error.category).toBe('permission');
});

it('skips the round trip when there is nothing to retrieve', async () => {
  const { fetchImpl, requests } = fakeFetch(() => xmlResponse(''));

  await expect(
    retrieveProperties(sessionWith(fetchImpl), { type: 'HostSystem', ids: [' '], pathSet: ['name'] }),
  ).resolves.toEqual([]);
  expect(requests).toHaveLength(0);
});

it('maps transport failures to network errors', async () => {
  const fetchImpl: typeof fetch = async () => {
    throw new TypeError('fetch failed');
  };

  const error = await appErrorOf(
    retrieveProperties(sessionWith(fetchImpl), { type: 'HostSystem', ids: ['host-1'], pathSet: ['name'] }),
  );

  expect(error).toEqual({
    code: ErrorCode.VCENTER_NETWORK_ERROR,
    category: 'network',
    message: 'RetrievePropertiesEx request failed',
    retryable: true,
    redacted_context: { op: 'RetrievePropertiesEx', url: 'https://vc.test/sdk', cause: 'fetch failed' },
  });
});

it('logs out with the session cookie', async () => {
  const { fetchImpl, requests } = fakeFetch(() => xmlResponse(LOGOUT_OK));

  await closeSoapSession(sessionWith(fetchImpl));

  expect(soapMethodOf(requests[0]?.body ?? '')).toBe('Logout');
  expect(requests[0]?.headers.get('cookie')).toBe(COOKIE);
});
