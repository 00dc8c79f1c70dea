import { formatVlan, UNKNOWN } from '@/lib/topology/vlan';

import type {
  DvPortgroupInfo,
  HostNetworkConfig,
  HostNetworkInventory,
  HostRef,
  KernelNic,
  NetworkHint,
  NicOrder,
  NicTeamingPolicy,
  PhysicalNic,
  ProxySwitch,
  ReportWarning,
  SecurityPolicy,
  StandardPortgroup,
  StandardSwitch,
} from '@/lib/topology/model';

export type SwitchKind = 'standard' | 'distributed';
export type TeamingState = 'active' | 'standby' | 'unused' | 'unknown';
export type HintStatus = 'found' | 'missing' | 'unavailable';

export type SwitchClaim = {
  kind: SwitchKind;
  switchName: string;
  /** Uplink port name on a distributed switch. */
  uplink?: string;
  teaming: TeamingState;
};

export type AdapterView = {
  nic: PhysicalNic;
  claims: SwitchClaim[];
  hint?: NetworkHint;
  hintStatus: HintStatus;
};

export type SwitchUplink = {
  device: string;
  uplink?: string;
  teaming: TeamingState;
};

export type KernelNicView = {
  nic: KernelNic;
  switchKind?: SwitchKind;
  /** `undefined` when the interface could not be placed on a switch. */
  switchName?: string;
  portgroupName?: string;
  vlan: string;
  services: string[];
};

export type SwitchView = {
  kind: SwitchKind;
  key: string;
  name: string;
  mtu?: number;
  numPorts?: number;
  numPortsAvailable?: number;
  teaming?: NicTeamingPolicy;
  security?: SecurityPolicy;
  linkDiscovery?: { protocol?: string; operation?: string };
  uplinks: SwitchUplink[];
  kernelNics: KernelNicView[];
};

export type PortgroupView = {
  kind: SwitchKind;
  name: string;
  switchName: string;
  vlan: string;
  active: string[];
  standby: string[];
  kernelNics: string[];
};

export type HostTopology = {
  host: HostRef;
  product?: string;
  config: HostNetworkConfig;
  adapters: AdapterView[];
  switches: SwitchView[];
  portgroups: PortgroupView[];
  kernelNics: KernelNicView[];
  hintsAvailable: boolean;
  warnings: ReportWarning[];
};

const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

/** `vmnic2` before `vmnic10`; ties fall back to code-unit order so sorting stays total. */
export function naturalCompare(a: string, b: string): number {
  const byCollator = collator.compare(a, b);
  if (byCollator !== 0) return byCollator;
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortBy<T>(items: T[], key: (item: T) => string): T[] {
  return [...items].sort((a, b) => naturalCompare(key(a), key(b)));
}

function teamingState(order: NicOrder | undefined, member: string | undefined): TeamingState {
  if (!order || member === undefined) return 'unknown';
  if (order.active.includes(member)) return 'active';
  if (order.standby.includes(member)) return 'standby';
  return 'unused';
}

/** Merges the uplink orders of every port group on one distributed switch. */
function distributedTeamingState(orders: NicOrder[], uplink: string | undefined): TeamingState {
  if (orders.length === 0 || uplink === undefined) return 'unknown';
  if (orders.some((order) => order.active.includes(uplink))) return 'active';
  if (orders.some((order) => order.standby.includes(uplink))) return 'standby';
  return 'unused';
}

type ProxyMember = { device: string; uplink?: string };

function proxyMembers(proxy: ProxySwitch, nicByKey: Map<string, PhysicalNic>): ProxyMember[] {
  const members = new Map<string, ProxyMember>();
  for (const key of proxy.pnicKeys) {
    const device = nicByKey.get(key)?.device;
    if (device) members.set(device, { device });
  }
  for (const binding of proxy.uplinkBindings) {
    const uplink = binding.uplinkPortKey ? proxy.uplinkPortNames[binding.uplinkPortKey] : undefined;
    members.set(binding.pnicDevice, { device: binding.pnicDevice, uplink });
  }
  return Array.from(members.values());
}

function standardMembers(sw: StandardSwitch, nicByKey: Map<string, PhysicalNic>): string[] {
  return sw.pnicKeys.map((key) => nicByKey.get(key)?.device ?? key);
}

type Context = {
  nicByKey: Map<string, PhysicalNic>;
  proxyByUuid: Map<string, ProxySwitch>;
  standardByName: Map<string, StandardSwitch>;
  portgroupByName: Map<string, StandardPortgroup>;
  dvPortgroupByKey: Map<string, DvPortgroupInfo>;
  servicesByDevice: Map<string, string[]>;
  ordersByDvs: Map<string, NicOrder[]>;
};

function buildContext(inventory: HostNetworkInventory): Context {
  const { network, dvPortgroups } = inventory;

  const servicesByDevice = new Map<string, string[]>();
  for (const selection of network.vnicServices) {
    for (const device of selection.devices) {
      const list = servicesByDevice.get(device) ?? [];
      list.push(selection.nicType);
      servicesByDevice.set(device, list);
    }
  }

  const ordersByDvs = new Map<string, NicOrder[]>();
  for (const pg of dvPortgroups) {
    if (pg.isUplink || !pg.dvsUuid || !pg.uplinkOrder) continue;
    const list = ordersByDvs.get(pg.dvsUuid) ?? [];
    list.push(pg.uplinkOrder);
    ordersByDvs.set(pg.dvsUuid, list);
  }

  return {
    nicByKey: new Map(network.physicalNics.map((nic) => [nic.key, nic])),
    proxyByUuid: new Map(network.proxySwitches.map((proxy) => [proxy.dvsUuid, proxy])),
    standardByName: new Map(network.standardSwitches.map((sw) => [sw.name, sw])),
    portgroupByName: new Map(network.portgroups.map((pg) => [pg.name, pg])),
    dvPortgroupByKey: new Map(dvPortgroups.map((pg) => [pg.key, pg])),
    servicesByDevice,
    ordersByDvs,
  };
}

function placeKernelNic(nic: KernelNic, ctx: Context): KernelNicView {
  const services = [...(ctx.servicesByDevice.get(nic.device) ?? [])].sort(naturalCompare);

  if (nic.dvPort) {
    const proxy = ctx.proxyByUuid.get(nic.dvPort.switchUuid);
    const pg = nic.dvPort.portgroupKey ? ctx.dvPortgroupByKey.get(nic.dvPort.portgroupKey) : undefined;
    return {
      nic,
      switchKind: proxy ? 'distributed' : undefined,
      switchName: proxy?.dvsName,
      portgroupName: pg?.name ?? nic.dvPort.portgroupKey,
      vlan: formatVlan(pg?.vlan),
      services,
    };
  }

  const pg = nic.portgroup ? ctx.portgroupByName.get(nic.portgroup) : undefined;
  const sw = pg ? ctx.standardByName.get(pg.vswitchName) : undefined;
  return {
    nic,
    switchKind: sw ? 'standard' : undefined,
    switchName: sw?.name,
    portgroupName: nic.portgroup,
    vlan: formatVlan(pg?.vlanId),
    services,
  };
}

/**
 * Maps physical adapters, standard and distributed switches, port groups, kernel interfaces and
 * neighbor hints of one host onto each other. Pure: the same inventory yields the same topology.
 */
export function reconcileHost(inventory: HostNetworkInventory): HostTopology {
  const { network } = inventory;
  const ctx = buildContext(inventory);
  const warnings = [...inventory.warnings];

  const kernelNics = sortBy(
    network.kernelNics.map((nic) => placeKernelNic(nic, ctx)),
    (view) => view.nic.device,
  );
  for (const view of kernelNics) {
    if (view.switchName === undefined) {
      warnings.push({
        code: 'KERNEL_NIC_UNPLACED',
        message: `${view.nic.device} is not attached to a known switch`,
        context: { device: view.nic.device },
      });
    }
  }

  const claimsByDevice = new Map<string, SwitchClaim[]>();
  const addClaim = (device: string, claim: SwitchClaim) => {
    const list = claimsByDevice.get(device) ?? [];
    list.push(claim);
    claimsByDevice.set(device, list);
  };

  const switches: SwitchView[] = [];

  for (const sw of network.standardSwitches) {
    const order = sw.teaming?.nicOrder;
    const uplinks = standardMembers(sw, ctx.nicByKey).map((device) => ({ device, teaming: teamingState(order, device) }));
    for (const uplink of uplinks) {
      addClaim(uplink.device, { kind: 'standard', switchName: sw.name, teaming: uplink.teaming });
    }
    switches.push({
      kind: 'standard',
      key: sw.key,
      name: sw.name,
      mtu: sw.mtu,
      numPorts: sw.numPorts,
      numPortsAvailable: sw.numPortsAvailable,
      teaming: sw.teaming,
      security: sw.security,
      linkDiscovery: sw.linkDiscovery,
      uplinks: sortBy(uplinks, (u) => u.device),
      kernelNics: kernelNics.filter((view) => view.switchKind === 'standard' && view.switchName === sw.name),
    });
  }

  for (const proxy of network.proxySwitches) {
    const orders = ctx.ordersByDvs.get(proxy.dvsUuid) ?? [];
    const uplinks = proxyMembers(proxy, ctx.nicByKey).map((member) => ({
      device: member.device,
      uplink: member.uplink,
      teaming: distributedTeamingState(orders, member.uplink),
    }));
    for (const uplink of uplinks) {
      addClaim(uplink.device, {
        kind: 'distributed',
        switchName: proxy.dvsName,
        uplink: uplink.uplink,
        teaming: uplink.teaming,
      });
    }
    switches.push({
      kind: 'distributed',
      key: proxy.dvsUuid,
      name: proxy.dvsName,
      mtu: proxy.mtu,
      numPorts: proxy.numPorts,
      uplinks: sortBy(uplinks, (u) => u.device),
      kernelNics: kernelNics.filter(
        (view) => view.switchKind === 'distributed' && view.nic.dvPort?.switchUuid === proxy.dvsUuid,
      ),
    });
  }

  const hintByDevice = new Map((inventory.hints ?? []).map((hint) => [hint.device, hint]));
  const adapters = sortBy(network.physicalNics, (nic) => nic.device).map((nic): AdapterView => {
    const hint = hintByDevice.get(nic.device);
    const claims = [...(claimsByDevice.get(nic.device) ?? [])].sort(
      (a, b) => naturalCompare(a.kind, b.kind) || naturalCompare(a.switchName, b.switchName),
    );
    return {
      nic,
      claims,
      hint,
      hintStatus: inventory.hints === null ? 'unavailable' : hint ? 'found' : 'missing',
    };
  });

  const portgroups: PortgroupView[] = [];
  for (const pg of network.portgroups) {
    portgroups.push({
      kind: 'standard',
      name: pg.name,
      switchName: pg.vswitchName,
      vlan: formatVlan(pg.vlanId),
      active: pg.teaming?.nicOrder?.active ?? [],
      standby: pg.teaming?.nicOrder?.standby ?? [],
      kernelNics: kernelNics
        .filter((view) => view.switchKind === 'standard' && view.portgroupName === pg.name)
        .map((view) => view.nic.device),
    });
  }
  for (const pg of inventory.dvPortgroups) {
    if (pg.isUplink) continue;
    const proxy = pg.dvsUuid ? ctx.proxyByUuid.get(pg.dvsUuid) : undefined;
    portgroups.push({
      kind: 'distributed',
      name: pg.name,
      switchName: pg.dvsName ?? proxy?.dvsName ?? UNKNOWN,
      vlan: formatVlan(pg.vlan),
      active: pg.uplinkOrder?.active ?? [],
      standby: pg.uplinkOrder?.standby ?? [],
      kernelNics: kernelNics.filter((view) => view.nic.dvPort?.portgroupKey === pg.key).map((view) => view.nic.device),
    });
  }

  return {
    host: inventory.host,
    product: inventory.product,
    config: network,
    adapters,
    switches: sortBy(switches, (sw) => `${sw.kind}:${sw.name}`),
    portgroups: sortBy(portgroups, (pg) => `${pg.kind}:${pg.switchName}:${pg.name}`),
    kernelNics,
    hintsAvailable: inventory.hints !== null,
    warnings,
  };
}
