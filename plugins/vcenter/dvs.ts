import { childOf, isRecord, toArray, toBooleanValue, toMoRef, toNumberValue, toStringList, toText, xsiTypeOf } from './xml';

import type { ObjectContent } from './soap';
import type { DvPortgroupInfo, MoRef, VlanSpec } from '@/lib/topology/model';

export const DV_PORTGROUP_PATH_SET = [
  'name',
  'key',
  'config.distributedVirtualSwitch',
  'config.defaultPortConfig',
  'config.uplink',
];

export const DVS_PATH_SET = ['name', 'uuid'];

/**
 * Decodes a `VmwareDistributedVirtualSwitchVlanSpec`. The concrete class decides the shape;
 * when the class is missing the shape is used instead.
 */
export function parseVlanSpec(node: unknown): VlanSpec | undefined {
  if (!isRecord(node)) return undefined;
  const type = xsiTypeOf(node);

  const pvlanId = toNumberValue(node.pvlanId);
  if (type === 'VmwareDistributedVirtualSwitchPvlanSpec' || (type === undefined && pvlanId !== undefined)) {
    return pvlanId === undefined ? undefined : { kind: 'pvlan', id: pvlanId };
  }

  const rangeNodes = toArray(node.vlanId).filter(isRecord);
  if (type === 'VmwareDistributedVirtualSwitchTrunkVlanSpec' || (type === undefined && rangeNodes.length > 0)) {
    const ranges = rangeNodes.flatMap((range) => {
      const start = toNumberValue(range.start);
      const end = toNumberValue(range.end);
      return start === undefined || end === undefined ? [] : [{ start, end }];
    });
    return ranges.length > 0 ? { kind: 'trunk', ranges } : undefined;
  }

  const id = toNumberValue(node.vlanId);
  return id === undefined ? undefined : { kind: 'vlan', id };
}

export function parseDvPortgroups(objects: ObjectContent[]): DvPortgroupInfo[] {
  return objects.flatMap((object) => {
    const name = toText(object.props.get('name'));
    if (!name) return [];

    const portConfig = object.props.get('config.defaultPortConfig');
    const uplinkOrder = childOf(childOf(portConfig, 'uplinkTeamingPolicy'), 'uplinkPortOrder');

    return [
      {
        key: toText(object.props.get('key')) ?? object.obj.value,
        name,
        dvsRef: toMoRef(object.props.get('config.distributedVirtualSwitch')),
        vlan: parseVlanSpec(childOf(portConfig, 'vlan')),
        uplinkOrder: uplinkOrder
          ? {
              active: toStringList(uplinkOrder.activeUplinkPort),
              standby: toStringList(uplinkOrder.standbyUplinkPort),
            }
          : undefined,
        isUplink: toBooleanValue(object.props.get('config.uplink')) ?? false,
      },
    ];
  });
}

export type DistributedSwitchInfo = { ref: MoRef; name?: string; uuid?: string };

export function parseDistributedSwitches(objects: ObjectContent[]): DistributedSwitchInfo[] {
  return objects.map((object) => ({
    ref: object.obj,
    name: toText(object.props.get('name')),
    uuid: toText(object.props.get('uuid')),
  }));
}

/** Fills `dvsUuid`/`dvsName` on each port group from the switches it references. */
export function attachSwitches(portgroups: DvPortgroupInfo[], switches: DistributedSwitchInfo[]): DvPortgroupInfo[] {
  const byRef = new Map(switches.map((sw) => [sw.ref.value, sw]));
  return portgroups.map((pg) => {
    const sw = pg.dvsRef ? byRef.get(pg.dvsRef.value) : undefined;
    if (!sw) return pg;
    return { ...pg, dvsUuid: sw.uuid ?? pg.dvsUuid, dvsName: sw.name ?? pg.dvsName };
  });
}
