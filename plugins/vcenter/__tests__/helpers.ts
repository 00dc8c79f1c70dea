import { readFileSync } from 'node:fs';

export function loadFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export function soapEnvelope(body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<soapenv:Envelope xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/" xmlns:xsd="http://www.w3.org/2001/XMLSchema" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
<soapenv:Body>${body}</soapenv:Body>
</soapenv:Envelope>`;
}

export function soapFault(faultString: string, detail = ''): string {
  return soapEnvelope(
    `<soapenv:Fault><faultcode>ServerFaultCode</faultcode><faultstring>${faultString}</faultstring>${
      detail ? `<detail>${detail}</detail>` : ''
    }</soapenv:Fault>`,
  );
}

export const SERVICE_CONTENT = soapEnvelope(`<RetrieveServiceContentResponse xmlns="urn:vim25"><returnval>
  <rootFolder type="Folder">group-d1</rootFolder>
  <propertyCollector type="PropertyCollector">propertyCollector</propertyCollector>
  <about><fullName>VMware vCenter Server 8.0.2</fullName><apiVersion>8.0.2.0</apiVersion></about>
  <sessionManager type="SessionManager">SessionManager</sessionManager>
</returnval></RetrieveServiceContentResponse>`);

export const LOGIN_OK = soapEnvelope(
  `<LoginResponse xmlns="urn:vim25"><returnval><key>52a1</key><userName>VSPHERE.LOCAL\\report</userName></returnval></LoginResponse>`,
);

export const LOGOUT_OK = soapEnvelope(`<LogoutResponse xmlns="urn:vim25"></LogoutResponse>`);

/** Name of the vim25 method a SOAP request body invokes. */
export function soapMethodOf(body: string): string | undefined {
  return body.match(/<soapenv:Body>\s*<vim25:(\w+)/)?.[1];
}

export type RecordedRequest = { url: string; method: string; headers: Headers; body: string };

/** In-process `fetch` stand-in: records each request and answers with `respond`. */
export function fakeFetch(respond: (req: RecordedRequest) => Response | Promise<Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const req: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : '',
    };
    requests.push(req);
    return respond(req);
  };
  return { fetchImpl, requests };
}

export function xmlResponse(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/xml; charset=utf-8', ...headers } });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } });
}
