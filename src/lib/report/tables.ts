import { UNKNOWN } from '@/lib/topology/vlan';

import type { AdapterView, HostTopology, KernelNicView, SwitchClaim, SwitchUplink } from '@/lib/topology/reconcile';
import type { FirewallRule, FirewallRuleset } from '@/lib/topology/model';

export const NONE = 'none';
export const NOT_AVAILABLE = 'n/a';

export type ReportTable = {
  id: string;
  title: string;
  columns: string[];
  rows: string[][];
};

const SERVICE_LABELS: Record<string, string> = {
  management: 'Management',
  vmotion: 'vMotion',
  faultToleranceLogging: 'Fault tolerance logging',
  vSphereReplication: 'vSphere Replication',
  vSphereReplicationNFC: 'vSphere Replication NFC',
  vsan: 'vSAN',
  vsanWitness: 'vSAN witness',
  vSphereProvisioning: 'Provisioning',
  vSphereBackupNFC: 'vSphere Backup NFC',
  nvmeTcp: 'NVMe over TCP',
  nvmeRdma: 'NVMe over RDMA',
  ptp: 'PTP',
};

function text(value: string | number | undefined): string {
  if (value === undefined) return NOT_AVAILABLE;
  const s = String(value).trim();
  return s ? s : NOT_AVAILABLE;
}

function yesNo(value: boolean | undefined): string {
  if (value === undefined) return NOT_AVAILABLE;
  return value ? 'yes' : 'no';
}

function list(values: string[]): string {
  return values.length > 0 ? values.join(', ') : NONE;
}

function serviceLabel(nicType: string): string {
  return SERVICE_LABELS[nicType] ?? nicType;
}

function formatUplink(uplink: SwitchUplink): string {
  return uplink.uplink === undefined
    ? `${uplink.device} (${uplink.teaming})`
    : `${uplink.device} (${uplink.uplink}, ${uplink.teaming})`;
}

function formatKernelNicOnSwitch(view: KernelNicView): string {
  return `${view.nic.device} (VLAN ${view.vlan})`;
}

function formatClaim(claim: SwitchClaim): string {
  const target = claim.uplink === undefined ? claim.switchName : `${claim.switchName}/${claim.uplink}`;
  return `${target} (${claim.teaming})`;
}

function formatLink(adapter: AdapterView): string {
  const { linkSpeedMb, fullDuplex } = adapter.nic;
  if (linkSpeedMb === null) return 'down';
  if (fullDuplex === null) return `${linkSpeedMb} Mb/s`;
  return `${linkSpeedMb} Mb/s ${fullDuplex ? 'full' : 'half'} duplex`;
}

function formatRule(rule: FirewallRule): string {
  const ports =
    rule.port === undefined
      ? NOT_AVAILABLE
      : rule.endPort !== undefined && rule.endPort !== rule.port
        ? `${rule.port}-${rule.endPort}`
        : String(rule.port);
  return `${ports}/${text(rule.protocol)} ${text(rule.direction)}`;
}

function formatAllowedHosts(ruleset: FirewallRuleset): string {
  if (ruleset.allowedHosts.allIp === true) return 'all';
  return list([...ruleset.allowedHosts.addresses, ...ruleset.allowedHosts.networks]);
}

function blockedOrAllowed(value: boolean | undefined): string {
  if (value === undefined) return NOT_AVAILABLE;
  return value ? 'blocked' : 'allowed';
}

function summaryTable(topology: HostTopology): ReportTable {
  const { host, config } = topology;
  const count = (kind: 'standard' | 'distributed') => topology.switches.filter((sw) => sw.kind === kind).length;
  return {
    id: 'summary',
    title: 'Summary',
    columns: ['Property', 'Value'],
    rows: [
      ['Host', host.name],
      ['Cluster', text(host.clusterName)],
      ['Product', text(topology.product)],
      ['Connection state', text(host.connectionState)],
      ['Power state', text(host.powerState)],
      ['Physical adapters', String(topology.adapters.length)],
      ['Standard switches', String(count('standard'))],
      ['Distributed switches', String(count('distributed'))],
      ['Kernel interfaces', String(topology.kernelNics.length)],
      ['Firewall incoming', blockedOrAllowed(config.firewall?.incomingBlocked)],
      ['Firewall outgoing', blockedOrAllowed(config.firewall?.outgoingBlocked)],
      ['Neighbor discovery', topology.hintsAvailable ? 'available' : 'unavailable'],
    ],
  };
}

function standardSwitchTable(topology: HostTopology): ReportTable {
  return {
    id: 'standard-switches',
    title: 'Standard switches',
    columns: [
      'Switch',
      'Ports',
      'Available ports',
      'MTU',
      'Uplinks',
      'Load balancing',
      'Notify switches',
      'Promiscuous',
      'MAC changes',
      'Forged transmits',
      'Discovery',
      'Kernel interfaces',
    ],
    rows: topology.switches
      .filter((sw) => sw.kind === 'standard')
      .map((sw) => [
        sw.name,
        text(sw.numPorts),
        text(sw.numPortsAvailable),
        text(sw.mtu),
        list(sw.uplinks.map(formatUplink)),
        text(sw.teaming?.policy),
        yesNo(sw.teaming?.notifySwitches),
        yesNo(sw.security?.allowPromiscuous),
        yesNo(sw.security?.macChanges),
        yesNo(sw.security?.forgedTransmits),
        sw.linkDiscovery
          ? `${text(sw.linkDiscovery.protocol)} (${text(sw.linkDiscovery.operation)})`
          : NOT_AVAILABLE,
        list(sw.kernelNics.map(formatKernelNicOnSwitch)),
      ]),
  };
}

function distributedSwitchTable(topology: HostTopology): ReportTable {
  return {
    id: 'distributed-switches',
    title: 'Distributed switches',
    columns: ['Switch', 'UUID', 'MTU', 'Ports', 'Uplinks', 'Kernel interfaces'],
    rows: topology.switches
      .filter((sw) => sw.kind === 'distributed')
      .map((sw) => [
        sw.name,
        sw.key,
        text(sw.mtu),
        text(sw.numPorts),
        list(sw.uplinks.map(formatUplink)),
        list(sw.kernelNics.map(formatKernelNicOnSwitch)),
      ]),
  };
}

function portgroupTable(topology: HostTopology): ReportTable {
  return {
    id: 'port-groups',
    title: 'Port groups',
    columns: ['Port group', 'Type', 'Switch', 'VLAN', 'Active uplinks', 'Standby uplinks', 'Kernel interfaces'],
    rows: topology.portgroups.map((pg) => [
      pg.name,
      pg.kind,
      pg.switchName,
      pg.vlan,
      list(pg.active),
      list(pg.standby),
      list(pg.kernelNics),
    ]),
  };
}

function kernelInterfaceTable(topology: HostTopology): ReportTable {
  return {
    id: 'kernel-interfaces',
    title: 'Kernel interfaces',
    columns: [
      'Interface',
      'Switch',
      'Port group',
      'VLAN',
      'IPv4 address',
      'Subnet mask',
      'DHCP',
      'IPv6 addresses',
      'MAC',
      'MTU',
      'TCP/IP stack',
      'Services',
    ],
    rows: topology.kernelNics.map((view) => [
      view.nic.device,
      view.switchName ?? UNKNOWN,
      text(view.portgroupName),
      view.vlan,
      text(view.nic.ipAddress),
      text(view.nic.subnetMask),
      yesNo(view.nic.dhcp),
      list(view.nic.ipv6Addresses),
      text(view.nic.mac),
      text(view.nic.mtu),
      text(view.nic.netStack),
      list(view.services.map(serviceLabel)),
    ]),
  };
}

function dnsTable(topology: HostTopology): ReportTable {
  const dns = topology.config.dns;
  return {
    id: 'dns',
    title: 'DNS',
    columns: ['Property', 'Value'],
    rows: [
      ['Host name', text(dns?.hostName)],
      ['Domain', text(dns?.domainName)],
      ['DHCP', yesNo(dns?.dhcp)],
      ['Servers', dns ? list(dns.servers) : NOT_AVAILABLE],
      ['Search domains', dns ? list(dns.searchDomains) : NOT_AVAILABLE],
    ],
  };
}

function routingTable(topology: HostTopology): ReportTable {
  const { routing, routes, netStacks } = topology.config;
  const rows: string[][] = [];

  if (routing?.defaultGateway) rows.push(['default (IPv4)', routing.defaultGateway, text(routing.gatewayDevice)]);
  if (routing?.ipv6DefaultGateway) {
    rows.push(['default (IPv6)', routing.ipv6DefaultGateway, text(routing.ipv6GatewayDevice)]);
  }
  for (const stack of netStacks) {
    if (stack.defaultGateway) rows.push([`default (${stack.name ?? stack.key})`, stack.defaultGateway, NOT_AVAILABLE]);
  }
  for (const route of routes) {
    const destination = route.prefixLength === undefined ? route.network : `${route.network}/${route.prefixLength}`;
    rows.push([destination, text(route.gateway), text(route.deviceName)]);
  }

  return { id: 'routing', title: 'Routing', columns: ['Destination', 'Gateway', 'Interface'], rows };
}

function firewallTable(topology: HostTopology): ReportTable {
  const rulesets = topology.config.firewall?.rulesets ?? [];
  return {
    id: 'firewall',
    title: 'Firewall',
    columns: ['Ruleset', 'Service', 'Enabled', 'Required', 'Rules', 'Allowed hosts'],
    rows: rulesets.map((ruleset) => [
      ruleset.label ?? ruleset.key,
      text(ruleset.service),
      yesNo(ruleset.enabled),
      yesNo(ruleset.required),
      list(ruleset.rules.map(formatRule)),
      formatAllowedHosts(ruleset),
    ]),
  };
}

function timeTable(topology: HostTopology): ReportTable {
  const { time, services } = topology.config;
  const ntpd = services.find((service) => service.key === 'ntpd');
  const offset = time?.timeZone?.gmtOffset;
  return {
    id: 'time',
    title: 'Time synchronisation',
    columns: ['Property', 'Value'],
    rows: [
      ['Time zone', text(time?.timeZone?.name ?? time?.timeZone?.key)],
      ['GMT offset (s)', text(offset)],
      ['NTP servers', time ? list(time.ntpServers) : NOT_AVAILABLE],
      ['NTP service running', yesNo(ntpd?.running)],
      ['NTP service policy', text(ntpd?.policy)],
    ],
  };
}

function physicalAdapterTable(topology: HostTopology): ReportTable {
  return {
    id: 'physical-adapters',
    title: 'Physical adapters',
    columns: ['Adapter', 'Driver', 'MAC', 'PCI', 'Link', 'Switches'],
    rows: topology.adapters.map((adapter) => [
      adapter.nic.device,
      text(adapter.nic.driver),
      text(adapter.nic.mac),
      text(adapter.nic.pci),
      formatLink(adapter),
      list(adapter.claims.map(formatClaim)),
    ]),
  };
}

function neighborRow(adapter: AdapterView): string[] {
  if (adapter.hintStatus === 'unavailable') {
    return [adapter.nic.device, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE];
  }
  const cdp = adapter.hint?.cdp;
  const lldp = adapter.hint?.lldp;
  const protocols = [cdp ? 'CDP' : undefined, lldp ? 'LLDP' : undefined].filter((p): p is string => p !== undefined);
  return [
    adapter.nic.device,
    list(protocols),
    text(cdp?.deviceId ?? lldp?.systemName ?? lldp?.chassisId),
    text(cdp?.portId ?? lldp?.portId ?? lldp?.portDescription),
    text(cdp?.address ?? cdp?.managementAddress ?? lldp?.managementAddress),
    text(cdp?.hardwarePlatform),
    list((adapter.hint?.observedVlans ?? []).map(String)),
  ];
}

function neighborTable(topology: HostTopology): ReportTable {
  return {
    id: 'neighbor-discovery',
    title: 'Neighbor discovery',
    columns: ['Adapter', 'Protocol', 'Switch', 'Port', 'Address', 'Platform', 'Observed VLANs'],
    rows: topology.adapters.map(neighborRow),
  };
}

function warningTable(topology: HostTopology): ReportTable {
  return {
    id: 'warnings',
    title: 'Warnings',
    columns: ['Code', 'Message'],
    rows: topology.warnings.map((warning) => [warning.code, warning.message]),
  };
}

/** Flat tables for one reconciled host, in report order. */
export function buildHostTables(topology: HostTopology): ReportTable[] {
  return [
    summaryTable(topology),
    standardSwitchTable(topology),
    distributedSwitchTable(topology),
    portgroupTable(topology),
    kernelInterfaceTable(topology),
    dnsTable(topology),
    routingTable(topology),
    firewallTable(topology),
    timeTable(topology),
    physicalAdapterTable(topology),
    neighborTable(topology),
    warningTable(topology),
  ];
}
