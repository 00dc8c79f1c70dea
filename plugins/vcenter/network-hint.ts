import { childOf, isRecord, toArray, toNumberValue, toText } from './xml';

import type { CdpInfo, LldpInfo, NetworkHint } from '@/lib/topology/model';
import type { XmlNode } from './xml';

function parseCdp(node: XmlNode | undefined): CdpInfo | undefined {
  if (!node) return undefined;
  const info: CdpInfo = {
    deviceId: toText(node.devId),
    portId: toText(node.portId),
    address: toText(node.address),
    hardwarePlatform: toText(node.hardwarePlatform),
    softwareVersion: toText(node.softwareVersion),
    systemName: toText(node.systemName),
    managementAddress: toText(node.mgmtAddr),
    nativeVlan: toNumberValue(node.vlan),
  };
  return info.deviceId || info.portId ? info : undefined;
}

function lldpParameters(node: XmlNode): Map<string, string> {
  const out = new Map<string, string>();
  for (const param of toArray(node.parameter)) {
    if (!isRecord(param)) continue;
    const key = toText(param.key);
    const value = toText(param.value);
    if (key && value) out.set(key.toLowerCase(), value);
  }
  return out;
}

function parseLldp(node: XmlNode | undefined): LldpInfo | undefined {
  if (!node) return undefined;
  const params = lldpParameters(node);
  const info: LldpInfo = {
    chassisId: toText(node.chassisId),
    portId: toText(node.portId),
    systemName: params.get('system name'),
    portDescription: params.get('port description'),
    managementAddress: params.get('management address'),
    vlanId: toNumberValue(params.get('vlan id')),
  };
  return info.chassisId || info.portId ? info : undefined;
}

/** Decodes `PhysicalNicHintInfo[]` from `QueryNetworkHint`. */
export function parseNetworkHints(nodes: unknown[]): NetworkHint[] {
  const out: NetworkHint[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const device = toText(node.device);
    if (!device) continue;

    const vlans = new Set<number>();
    for (const subnet of toArray(node.subnet)) {
      if (!isRecord(subnet)) continue;
      const vlanId = toNumberValue(subnet.vlanId);
      if (vlanId !== undefined) vlans.add(vlanId);
    }

    out.push({
      device,
      cdp: parseCdp(childOf(node, 'connectedSwitchPort')),
      lldp: parseLldp(childOf(node, 'lldpInfo')),
      observedVlans: Array.from(vlans).sort((a, b) => a - b),
    });
  }

  return out;
}
