/**
 * Host network inventory as collected from a management server, before reconciliation.
 *
 * Keys (`key-vim.host.PhysicalNic-vmnic0`, ...) are the server's own identifiers; devices
 * (`vmnic0`, `vmk1`) are what the report shows.
 */

export type MoRef = { type: string; value: string };

export type NicOrder = { active: string[]; standby: string[] };

export type NicTeamingPolicy = {
  policy?: string;
  notifySwitches?: boolean;
  rollingOrder?: boolean;
  /** Device names for standard switches, uplink port names for distributed port groups. */
  nicOrder?: NicOrder;
};

export type SecurityPolicy = {
  allowPromiscuous?: boolean;
  macChanges?: boolean;
  forgedTransmits?: boolean;
};

export type PhysicalNic = {
  key: string;
  device: string;
  driver?: string;
  mac?: string;
  pci?: string;
  /** `null` when the link is down. */
  linkSpeedMb: number | null;
  fullDuplex: boolean | null;
  wakeOnLanSupported?: boolean;
};

export type StandardSwitch = {
  key: string;
  name: string;
  numPorts?: number;
  numPortsAvailable?: number;
  mtu?: number;
  pnicKeys: string[];
  teaming?: NicTeamingPolicy;
  security?: SecurityPolicy;
  linkDiscovery?: { protocol?: string; operation?: string };
};

export type StandardPortgroup = {
  key: string;
  name: string;
  vswitchName: string;
  vlanId?: number;
  /** Effective policy (computed by the host when available). */
  teaming?: NicTeamingPolicy;
  security?: SecurityPolicy;
};

export type DvsUplinkBinding = {
  pnicDevice: string;
  uplinkPortKey?: string;
  uplinkPortgroupKey?: string;
};

export type ProxySwitch = {
  key: string;
  dvsUuid: string;
  dvsName: string;
  mtu?: number;
  numPorts?: number;
  pnicKeys: string[];
  uplinkBindings: DvsUplinkBinding[];
  /** uplink port key -> uplink name (`Uplink 1`, ...). */
  uplinkPortNames: Record<string, string>;
};

export type DistributedPortBinding = {
  switchUuid: string;
  portgroupKey?: string;
  portKey?: string;
};

export type KernelNic = {
  key: string;
  device: string;
  /** Standard port group name; empty for distributed bindings. */
  portgroup?: string;
  dhcp?: boolean;
  ipAddress?: string;
  subnetMask?: string;
  ipv6Addresses: string[];
  mac?: string;
  mtu?: number;
  netStack?: string;
  dvPort?: DistributedPortBinding;
};

export type DnsConfig = {
  dhcp?: boolean;
  hostName?: string;
  domainName?: string;
  servers: string[];
  searchDomains: string[];
};

export type RouteConfig = {
  defaultGateway?: string;
  gatewayDevice?: string;
  ipv6DefaultGateway?: string;
  ipv6GatewayDevice?: string;
};

export type IpRoute = {
  network: string;
  prefixLength?: number;
  gateway?: string;
  deviceName?: string;
};

export type NetStackInstance = {
  key: string;
  name?: string;
  defaultGateway?: string;
  ipv6DefaultGateway?: string;
  dnsServers: string[];
};

export type FirewallRule = {
  port?: number;
  endPort?: number;
  direction?: string;
  portType?: string;
  protocol?: string;
};

export type FirewallRuleset = {
  key: string;
  label?: string;
  enabled?: boolean;
  required?: boolean;
  service?: string;
  rules: FirewallRule[];
  allowedHosts: { allIp?: boolean; addresses: string[]; networks: string[] };
};

export type FirewallConfig = {
  incomingBlocked?: boolean;
  outgoingBlocked?: boolean;
  rulesets: FirewallRuleset[];
};

export type HostService = {
  key: string;
  label?: string;
  running?: boolean;
  policy?: string;
};

export type TimeConfig = {
  timeZone?: { key?: string; name?: string; description?: string; gmtOffset?: number };
  ntpServers: string[];
};

/** Kernel interfaces selected for one traffic type (`management`, `vmotion`, ...). */
export type VnicServiceSelection = {
  nicType: string;
  devices: string[];
};

export type HostNetworkConfig = {
  physicalNics: PhysicalNic[];
  standardSwitches: StandardSwitch[];
  proxySwitches: ProxySwitch[];
  portgroups: StandardPortgroup[];
  kernelNics: KernelNic[];
  dns?: DnsConfig;
  routing?: RouteConfig;
  routes: IpRoute[];
  netStacks: NetStackInstance[];
  firewall?: FirewallConfig;
  time?: TimeConfig;
  services: HostService[];
  vnicServices: VnicServiceSelection[];
};

export type VlanSpec =
  | { kind: 'vlan'; id: number }
  | { kind: 'trunk'; ranges: Array<{ start: number; end: number }> }
  | { kind: 'pvlan'; id: number };

export type DvPortgroupInfo = {
  key: string;
  name: string;
  dvsRef?: MoRef;
  dvsUuid?: string;
  dvsName?: string;
  vlan?: VlanSpec;
  uplinkOrder?: NicOrder;
  isUplink: boolean;
};

export type CdpInfo = {
  deviceId?: string;
  portId?: string;
  address?: string;
  hardwarePlatform?: string;
  softwareVersion?: string;
  systemName?: string;
  managementAddress?: string;
  nativeVlan?: number;
};

export type LldpInfo = {
  chassisId?: string;
  portId?: string;
  systemName?: string;
  portDescription?: string;
  managementAddress?: string;
  vlanId?: number;
};

export type NetworkHint = {
  device: string;
  cdp?: CdpInfo;
  lldp?: LldpInfo;
  observedVlans: number[];
};

export type ReportWarning = {
  code: string;
  message: string;
  context?: Record<string, string | number | boolean>;
};

export type HostRef = {
  hostId: string;
  name: string;
  clusterId?: string;
  clusterName?: string;
  connectionState?: string;
  powerState?: string;
};

export type HostNetworkInventory = {
  host: HostRef;
  product?: string;
  network: HostNetworkConfig;
  dvPortgroups: DvPortgroupInfo[];
  /** `null` when the neighbor-discovery query could not be made. */
  hints: NetworkHint[] | null;
  warnings: ReportWarning[];
};
