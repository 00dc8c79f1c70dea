import { describe, expect, it } from 'vitest';

import { naturalCompare, reconcileHost } from '@/lib/topology/reconcile';
import { sampleInventory } from '@/test/fixtures/host-inventory';

import type { HostNetworkInventory } from '@/lib/topology/model';

describe('naturalCompare', () => {
  it('orders device numbers numerically', () => {
    expect(['vmnic10', 'vmnic2', 'vmnic1'].sort(naturalCompare)).toEqual(['vmnic1', 'vmnic2', 'vmnic10']);
  });

  it('breaks case-only ties deterministically', () => {
    expect(['b', 'B'].sort(naturalCompare)).toEqual(['B', 'b']);
    expect(['B', 'b'].sort(naturalCompare)).toEqual(['B', 'b']);
  });
});

describe('reconcileHost', () => {
  it('lists every adapter in natural order with the switches that claim it', () => {
    const topology = reconcileHost(sampleInventory());

    expect(topology.adapters.map((a) => a.nic.device)).toEqual(['vmnic0', 'vmnic1', 'vmnic2', 'vmnic3', 'vmnic10']);
    expect(topology.adapters.map((a) => a.claims)).toEqual([
      [{ kind: 'standard', switchName: 'vSwitch0', teaming: 'active' }],
      [{ kind: 'standard', switchName: 'vSwitch0', teaming: 'standby' }],
      [{ kind: 'distributed', switchName: 'dvs-prod', uplink: 'Uplink 1', teaming: 'active' }],
      [],
      [{ kind: 'distributed', switchName: 'dvs-prod', uplink: 'Uplink 2', teaming: 'standby' }],
    ]);
  });

  it('attaches neighbor hints by device', () => {
    const topology = reconcileHost(sampleInventory());
    const status = Object.fromEntries(topology.adapters.map((a) => [a.nic.device, a.hintStatus]));

    expect(status).toEqual({ vmnic0: 'found', vmnic1: 'missing', vmnic2: 'found', vmnic3: 'missing', vmnic10: 'missing' });
    expect(topology.adapters[0]?.hint?.cdp?.deviceId).toBe('core-sw-01');
    expect(topology.hintsAvailable).toBe(true);
  });

  it('marks hints unavailable when the query could not be made', () => {
    const topology = reconcileHost({ ...sampleInventory(), hints: null });

    expect(topology.hintsAvailable).toBe(false);
    expect(new Set(topology.adapters.map((a) => a.hintStatus))).toEqual(new Set(['unavailable']));
  });

  it('builds switch uplinks and the kernel interfaces riding each switch', () => {
    const topology = reconcileHost(sampleInventory());

    expect(topology.switches.map((sw) => `${sw.kind}:${sw.name}`)).toEqual([
      'distributed:dvs-prod',
      'standard:vSwitch0',
      'standard:vSwitch1',
    ]);
    const [dvs, vSwitch0, vSwitch1] = topology.switches;
    expect(dvs?.uplinks).toEqual([
      { device: 'vmnic2', uplink: 'Uplink 1', teaming: 'active' },
      { device: 'vmnic10', uplink: 'Uplink 2', teaming: 'standby' },
    ]);
    expect(dvs?.kernelNics.map((v) => v.nic.device)).toEqual(['vmk1']);
    expect(vSwitch0?.uplinks.map((u) => u.device)).toEqual(['vmnic0', 'vmnic1']);
    expect(vSwitch0?.kernelNics.map((v) => v.nic.device)).toEqual(['vmk0']);
    expect(vSwitch1?.uplinks).toEqual([]);
    expect(vSwitch1?.kernelNics).toEqual([]);
  });

  it('resolves kernel interface vlans and services', () => {
    const topology = reconcileHost(sampleInventory());

    expect(
      topology.kernelNics.map((v) => ({
        device: v.nic.device,
        switchName: v.switchName,
        portgroupName: v.portgroupName,
        vlan: v.vlan,
        services: v.services,
      })),
    ).toEqual([
      { device: 'vmk0', switchName: 'vSwitch0', portgroupName: 'Management Network', vlan: '10', services: ['management'] },
      { device: 'vmk1', switchName: 'dvs-prod', portgroupName: 'vMotion', vlan: '20', services: ['vmotion'] },
      { device: 'vmk2', switchName: undefined, portgroupName: 'Orphan', vlan: 'unknown', services: [] },
    ]);
    expect(topology.warnings).toEqual([
      { code: 'KERNEL_NIC_UNPLACED', message: 'vmk2 is not attached to a known switch', context: { device: 'vmk2' } },
    ]);
  });

  it('keeps the distributed port group key when the port group is not visible', () => {
    const inventory = sampleInventory();
    inventory.dvPortgroups = [];
    const vmk1 = reconcileHost(inventory).kernelNics.find((v) => v.nic.device === 'vmk1');

    expect(vmk1?.switchName).toBe('dvs-prod');
    expect(vmk1?.portgroupName).toBe('dvportgroup-12');
    expect(vmk1?.vlan).toBe('unknown');
  });

  it('reports distributed teaming as unknown when no port group carries an order', () => {
    const inventory = sampleInventory();
    inventory.dvPortgroups = inventory.dvPortgroups.map((pg) => ({ ...pg, uplinkOrder: undefined }));
    const dvs = reconcileHost(inventory).switches.find((sw) => sw.kind === 'distributed');

    expect(dvs?.uplinks.map((u) => u.teaming)).toEqual(['unknown', 'unknown']);
  });

  it('reports unused for an uplink the order leaves out', () => {
    const inventory = sampleInventory();
    inventory.dvPortgroups = inventory.dvPortgroups.map((pg) =>
      pg.uplinkOrder ? { ...pg, uplinkOrder: { active: ['Uplink 1'], standby: [] } } : pg,
    );
    const dvs = reconcileHost(inventory).switches.find((sw) => sw.kind === 'distributed');

    expect(dvs?.uplinks.map((u) => u.teaming)).toEqual(['active', 'unused']);
  });

  it('lists standard and non-uplink distributed port groups', () => {
    const topology = reconcileHost(sampleInventory());

    expect(topology.portgroups).toEqual([
      {
        kind: 'distributed',
        name: 'vMotion',
        switchName: 'dvs-prod',
        vlan: '20',
        active: ['Uplink 1'],
        standby: ['Uplink 2'],
        kernelNics: ['vmk1'],
      },
      {
        kind: 'standard',
        name: 'Management Network',
        switchName: 'vSwitch0',
        vlan: '10',
        active: ['vmnic0'],
        standby: ['vmnic1'],
        kernelNics: ['vmk0'],
      },
      {
        kind: 'standard',
        name: 'Isolated',
        switchName: 'vSwitch1',
        vlan: '0',
        active: [],
        standby: [],
        kernelNics: [],
      },
    ]);
  });

  it('is independent of input order', () => {
    const widen = (inv: HostNetworkInventory) => {
      inv.network.proxySwitches.push({
        key: 'key-vim.host.ProxySwitch-lab',
        dvsUuid: '50 00 00 00 00 00 00 01-00 00 00 00 00 00 00 02',
        dvsName: 'dvs-lab',
        pnicKeys: ['key-vim.host.PhysicalNic-vmnic3'],
        uplinkBindings: [],
        uplinkPortNames: {},
      });
      inv.network.vnicServices.push({ nicType: 'faultToleranceLogging', devices: ['vmk0'] });
      return inv;
    };
    const inventory = widen(sampleInventory());
    const shuffled = widen(sampleInventory());
    shuffled.network.physicalNics.reverse();
    shuffled.network.kernelNics.reverse();
    shuffled.network.standardSwitches.reverse();
    shuffled.network.portgroups.reverse();
    shuffled.network.proxySwitches.reverse();
    shuffled.network.vnicServices.reverse();
    shuffled.dvPortgroups.reverse();
    shuffled.hints?.reverse();

    const { config: _shuffledConfig, ...fromShuffled } = reconcileHost(shuffled);
    const { config: _config, ...fromOriginal } = reconcileHost(inventory);
    expect(fromShuffled).toEqual(fromOriginal);
  });
});
