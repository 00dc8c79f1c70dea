import { XMLParser } from 'fast-xml-parser';

import type { MoRef } from '@/lib/topology/model';

export type XmlNode = Record<string, unknown>;

// Attributes are kept: managed object references carry their type in `type`, data objects their
// concrete class in `xsi:type`. A moref-valued property carries both, so `xsi:type` is renamed to
// `xsiType` before namespace prefixes are stripped.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

export function parseXml(xml: string): XmlNode {
  const parsed: unknown = parser.parse(xml.replace(/\sxsi:type=/g, ' xsiType='));
  return isRecord(parsed) ? parsed : {};
}

export function isRecord(value: unknown): value is XmlNode {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

export function childOf(node: unknown, key: string): XmlNode | undefined {
  if (!isRecord(node)) return undefined;
  const value = node[key];
  return isRecord(value) ? value : undefined;
}

export function toStringValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (isRecord(value)) return toStringValue(value['#text']);
  return undefined;
}

/** Like `toStringValue`, but blank strings become `undefined`. */
export function toText(value: unknown): string | undefined {
  const text = toStringValue(value)?.trim();
  return text ? text : undefined;
}

export function toNumberValue(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  const text = toText(value);
  if (text === undefined) return undefined;
  const num = Number(text);
  return Number.isFinite(num) ? num : undefined;
}

export function toBooleanValue(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) {
    if (value === 1) return true;
    if (value === 0) return false;
  }
  const normalized = toText(value)?.toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return undefined;
}

export function toStringList(value: unknown): string[] {
  return toArray(value)
    .map((item) => toText(item))
    .filter((item): item is string => item !== undefined);
}

export function toMoRef(value: unknown): MoRef | undefined {
  if (!isRecord(value)) return undefined;
  const type = toText(value['@_type']);
  const ref = toText(value['#text']);
  if (!type || !ref) return undefined;
  return { type, value: ref };
}

/** Concrete data object class without its namespace prefix (`VmwareDistributedVirtualSwitchVlanIdSpec`). */
export function xsiTypeOf(value: unknown): string | undefined {
  const type = isRecord(value) ? toText(value['@_xsiType']) : undefined;
  return type?.replace(/^[^:]*:/, '');
}

/** Unwraps `Envelope.Body` of a SOAP response. */
export function soapBodyOf(xml: string): XmlNode | undefined {
  const parsed = parseXml(xml);
  return childOf(childOf(parsed, 'Envelope'), 'Body');
}

export type SoapFault = { faultString?: string; faultType?: string };

export function parseSoapFault(xml: string): SoapFault | undefined {
  try {
    const fault = childOf(soapBodyOf(xml), 'Fault');
    if (!fault) return undefined;
    const detail = childOf(fault, 'detail');
    const faultType = detail ? Object.keys(detail).find((key) => !key.startsWith('@_') && key !== '#text') : undefined;
    return { faultString: toText(fault.faultstring), faultType };
  } catch {
    return undefined;
  }
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
