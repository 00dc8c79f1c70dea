import {
  childOf,
  isRecord,
  toArray,
  toBooleanValue,
  toMoRef,
  toNumberValue,
  toStringList,
  toText,
} from './xml';

import type {
  DnsConfig,
  FirewallConfig,
  FirewallRuleset,
  HostNetworkConfig,
  HostService,
  IpRoute,
  KernelNic,
  MoRef,
  NetStackInstance,
  NicTeamingPolicy,
  PhysicalNic,
  ProxySwitch,
  RouteConfig,
  SecurityPolicy,
  StandardPortgroup,
  StandardSwitch,
  TimeConfig,
  VnicServiceSelection,
} from '@/lib/topology/model';
import type { XmlNode } from './xml';

export const HOST_NETWORK_PATH_SET = [
  'name',
  'summary.config.product.fullName',
  'config.network',
  'config.firewall',
  'config.dateTimeInfo',
  'config.service',
  'config.virtualNicManagerInfo.netConfig',
  'configManager.networkSystem',
  'network',
];

function records(value: unknown): XmlNode[] {
  return toArray(value).filter(isRecord);
}

function parseSecurity(node: XmlNode | undefined): SecurityPolicy | undefined {
  if (!node) return undefined;
  return {
    allowPromiscuous: toBooleanValue(node.allowPromiscuous),
    macChanges: toBooleanValue(node.macChanges),
    forgedTransmits: toBooleanValue(node.forgedTransmits),
  };
}

function parseTeaming(node: XmlNode | undefined): NicTeamingPolicy | undefined {
  if (!node) return undefined;
  const order = childOf(node, 'nicOrder');
  return {
    policy: toText(node.policy),
    notifySwitches: toBooleanValue(node.notifySwitches),
    rollingOrder: toBooleanValue(node.rollingOrder),
    nicOrder: order ? { active: toStringList(order.activeNic), standby: toStringList(order.standbyNic) } : undefined,
  };
}

function parsePhysicalNic(node: XmlNode): PhysicalNic | null {
  const key = toText(node.key);
  const device = toText(node.device);
  if (!key || !device) return null;

  const linkSpeed = childOf(node, 'linkSpeed');
  return {
    key,
    device,
    driver: toText(node.driver),
    mac: toText(node.mac),
    pci: toText(node.pci),
    linkSpeedMb: linkSpeed ? (toNumberValue(linkSpeed.speedMb) ?? null) : null,
    fullDuplex: linkSpeed ? (toBooleanValue(linkSpeed.duplex) ?? null) : null,
    wakeOnLanSupported: toBooleanValue(node.wakeOnLanSupported),
  };
}

function parseStandardSwitch(node: XmlNode): StandardSwitch | null {
  const key = toText(node.key);
  const name = toText(node.name);
  if (!key || !name) return null;

  const spec = childOf(node, 'spec');
  const policy = childOf(spec, 'policy');
  const discovery = childOf(childOf(spec, 'bridge'), 'linkDiscoveryProtocolConfig');

  return {
    key,
    name,
    numPorts: toNumberValue(node.numPorts),
    numPortsAvailable: toNumberValue(node.numPortsAvailable),
    mtu: toNumberValue(node.mtu) ?? toNumberValue(spec?.mtu),
    pnicKeys: toStringList(node.pnic),
    teaming: parseTeaming(childOf(policy, 'nicTeaming')),
    security: parseSecurity(childOf(policy, 'security')),
    linkDiscovery: discovery
      ? { protocol: toText(discovery.protocol), operation: toText(discovery.operation) }
      : undefined,
  };
}

function parsePortgroup(node: XmlNode): StandardPortgroup | null {
  const key = toText(node.key);
  const spec = childOf(node, 'spec');
  const name = toText(spec?.name);
  const vswitchName = toText(spec?.vswitchName);
  if (!key || !name || !vswitchName) return null;

  const policy = childOf(node, 'computedPolicy') ?? childOf(spec, 'policy');
  return {
    key,
    name,
    vswitchName,
    vlanId: toNumberValue(spec?.vlanId),
    teaming: parseTeaming(childOf(policy, 'nicTeaming')),
    security: parseSecurity(childOf(policy, 'security')),
  };
}

function parseProxySwitch(node: XmlNode): ProxySwitch | null {
  const key = toText(node.key);
  const dvsUuid = toText(node.dvsUuid);
  if (!key || !dvsUuid) return null;

  const uplinkPortNames: Record<string, string> = {};
  for (const port of records(node.uplinkPort)) {
    const portKey = toText(port.key);
    const portName = toText(port.value);
    if (portKey && portName) uplinkPortNames[portKey] = portName;
  }

  const backing = childOf(childOf(node, 'spec'), 'backing');
  const uplinkBindings = records(backing?.pnicSpec).flatMap((spec) => {
    const pnicDevice = toText(spec.pnicDevice);
    if (!pnicDevice) return [];
    return [{ pnicDevice, uplinkPortKey: toText(spec.uplinkPortKey), uplinkPortgroupKey: toText(spec.uplinkPortgroupKey) }];
  });

  return {
    key,
    dvsUuid,
    dvsName: toText(node.dvsName) ?? dvsUuid,
    mtu: toNumberValue(node.mtu),
    numPorts: toNumberValue(node.numPorts),
    pnicKeys: toStringList(node.pnic),
    uplinkBindings,
    uplinkPortNames,
  };
}

function parseKernelNic(node: XmlNode): KernelNic | null {
  const key = toText(node.key);
  const device = toText(node.device);
  if (!key || !device) return null;

  const spec = childOf(node, 'spec');
  const ip = childOf(spec, 'ip');
  const dvPort = childOf(spec, 'distributedVirtualPort');
  const switchUuid = toText(dvPort?.switchUuid);
  const ipv6Addresses = records(childOf(ip, 'ipV6Config')?.ipV6Address).flatMap((addr) => {
    const address = toText(addr.ipAddress);
    if (!address) return [];
    const prefix = toNumberValue(addr.prefixLength);
    return [prefix === undefined ? address : `${address}/${prefix}`];
  });

  return {
    key,
    device,
    portgroup: toText(node.portgroup),
    dhcp: toBooleanValue(ip?.dhcp),
    ipAddress: toText(ip?.ipAddress),
    subnetMask: toText(ip?.subnetMask),
    ipv6Addresses,
    mac: toText(spec?.mac),
    mtu: toNumberValue(spec?.mtu),
    netStack: toText(spec?.netStackInstanceKey),
    dvPort: switchUuid
      ? { switchUuid, portgroupKey: toText(dvPort?.portgroupKey), portKey: toText(dvPort?.portKey) }
      : undefined,
  };
}

function parseDns(node: XmlNode | undefined): DnsConfig | undefined {
  if (!node) return undefined;
  return {
    dhcp: toBooleanValue(node.dhcp),
    hostName: toText(node.hostName),
    domainName: toText(node.domainName),
    servers: toStringList(node.address),
    searchDomains: toStringList(node.searchDomain),
  };
}

function parseRouting(node: XmlNode | undefined): RouteConfig | undefined {
  if (!node) return undefined;
  return {
    defaultGateway: toText(node.defaultGateway),
    gatewayDevice: toText(node.gatewayDevice),
    ipv6DefaultGateway: toText(node.ipV6DefaultGateway),
    ipv6GatewayDevice: toText(node.ipV6GatewayDevice),
  };
}

function parseRoutes(node: XmlNode | undefined): IpRoute[] {
  return records(node?.ipRoute).flatMap((route) => {
    const network = toText(route.network);
    if (!network) return [];
    return [
      {
        network,
        prefixLength: toNumberValue(route.prefixLength),
        gateway: toText(route.gateway),
        deviceName: toText(route.deviceName),
      },
    ];
  });
}

function parseNetStacks(value: unknown): NetStackInstance[] {
  return records(value).flatMap((stack) => {
    const key = toText(stack.key);
    if (!key) return [];
    const routing = childOf(stack, 'ipRouteConfig');
    return [
      {
        key,
        name: toText(stack.name),
        defaultGateway: toText(routing?.defaultGateway),
        ipv6DefaultGateway: toText(routing?.ipV6DefaultGateway),
        dnsServers: toStringList(childOf(stack, 'dnsConfig')?.address),
      },
    ];
  });
}

export function parseNetworkInfo(val: unknown): Omit<HostNetworkConfig, 'firewall' | 'time' | 'services' | 'vnicServices'> {
  const network = isRecord(val) ? val : {};
  const parsePnics = records(network.pnic).map(parsePhysicalNic);
  const parseSwitches = records(network.vswitch).map(parseStandardSwitch);
  const parseProxies = records(network.proxySwitch).map(parseProxySwitch);
  const parsePortgroups = records(network.portgroup).map(parsePortgroup);
  const parseVnics = records(network.vnic).map(parseKernelNic);

  return {
    physicalNics: parsePnics.filter((n): n is PhysicalNic => n !== null),
    standardSwitches: parseSwitches.filter((s): s is StandardSwitch => s !== null),
    proxySwitches: parseProxies.filter((p): p is ProxySwitch => p !== null),
    portgroups: parsePortgroups.filter((p): p is StandardPortgroup => p !== null),
    kernelNics: parseVnics.filter((v): v is KernelNic => v !== null),
    dns: parseDns(childOf(network, 'dnsConfig')),
    routing: parseRouting(childOf(network, 'ipRouteConfig')),
    routes: parseRoutes(childOf(network, 'routeTableInfo')),
    netStacks: parseNetStacks(network.netStackInstance),
  };
}

function parseRuleset(node: XmlNode): FirewallRuleset | null {
  const key = toText(node.key);
  if (!key) return null;

  const allowed = childOf(node, 'allowedHosts');
  const networks = records(allowed?.ipNetwork).flatMap((net) => {
    const address = toText(net.network);
    if (!address) return [];
    const prefix = toNumberValue(net.prefixLength);
    return [prefix === undefined ? address : `${address}/${prefix}`];
  });

  return {
    key,
    label: toText(node.label),
    enabled: toBooleanValue(node.enabled),
    required: toBooleanValue(node.required),
    service: toText(node.service),
    rules: records(node.rule).map((rule) => ({
      port: toNumberValue(rule.port),
      endPort: toNumberValue(rule.endPort),
      direction: toText(rule.direction),
      portType: toText(rule.portType),
      protocol: toText(rule.protocol),
    })),
    allowedHosts: {
      allIp: toBooleanValue(allowed?.allIp),
      addresses: toStringList(allowed?.ipAddress),
      networks,
    },
  };
}

export function parseFirewall(val: unknown): FirewallConfig | undefined {
  if (!isRecord(val)) return undefined;
  const policy = childOf(val, 'defaultPolicy');
  return {
    incomingBlocked: toBooleanValue(policy?.incomingBlocked),
    outgoingBlocked: toBooleanValue(policy?.outgoingBlocked),
    rulesets: records(val.ruleset)
      .map(parseRuleset)
      .filter((r): r is FirewallRuleset => r !== null),
  };
}

export function parseDateTimeInfo(val: unknown): TimeConfig | undefined {
  if (!isRecord(val)) return undefined;
  const tz = childOf(val, 'timeZone');
  return {
    timeZone: tz
      ? {
          key: toText(tz.key),
          name: toText(tz.name),
          description: toText(tz.description),
          gmtOffset: toNumberValue(tz.gmtOffset),
        }
      : undefined,
    ntpServers: toStringList(childOf(val, 'ntpConfig')?.server),
  };
}

export function parseServices(val: unknown): HostService[] {
  return records(isRecord(val) ? val.service : undefined).flatMap((service) => {
    const key = toText(service.key);
    if (!key) return [];
    return [
      {
        key,
        label: toText(service.label),
        running: toBooleanValue(service.running),
        policy: toText(service.policy),
      },
    ];
  });
}

/** `config.virtualNicManagerInfo.netConfig`: which vmk serves which traffic type. */
export function parseVnicServices(val: unknown): VnicServiceSelection[] {
  const configs = records(isRecord(val) ? val.VirtualNicManagerNetConfig : undefined);
  return configs.flatMap((config) => {
    const nicType = toText(config.nicType);
    if (!nicType) return [];

    const selected = new Set(toStringList(config.selectedVnic));
    const devices = records(config.candidateVnic)
      .filter((candidate) => {
        const key = toText(candidate.key);
        return key !== undefined && selected.has(key);
      })
      .map((candidate) => toText(candidate.device))
      .filter((device): device is string => device !== undefined);

    return [{ nicType, devices }];
  });
}

export type ParsedHostProperties = {
  name?: string;
  product?: string;
  networkSystem?: string;
  /** Networks the host is attached to (standard networks and distributed port groups). */
  networks: MoRef[];
  network: HostNetworkConfig;
};

export function parseHostProperties(props: Map<string, unknown>): ParsedHostProperties {
  const networksVal = props.get('network');
  const networkRefs = toArray(isRecord(networksVal) ? networksVal.ManagedObjectReference : undefined)
    .map(toMoRef)
    .filter((ref): ref is MoRef => ref !== undefined);

  return {
    name: toText(props.get('name')),
    product: toText(props.get('summary.config.product.fullName')),
    networkSystem: toText(props.get('configManager.networkSystem')),
    networks: networkRefs,
    network: {
      ...parseNetworkInfo(props.get('config.network')),
      firewall: parseFirewall(props.get('config.firewall')),
      time: parseDateTimeInfo(props.get('config.dateTimeInfo')),
      services: parseServices(props.get('config.service')),
      vnicServices: parseVnicServices(props.get('config.virtualNicManagerInfo.netConfig')),
    },
  };
}
