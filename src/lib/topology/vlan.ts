import type { VlanSpec } from '@/lib/topology/model';

export const UNKNOWN = 'unknown';

/** `0-4094` style trunk list; single-id ranges collapse to the id. */
function formatRanges(ranges: Array<{ start: number; end: number }>): string {
  return ranges.map((r) => (r.start === r.end ? String(r.start) : `${r.start}-${r.end}`)).join(', ');
}

export function formatVlan(spec: VlanSpec | number | undefined): string {
  if (spec === undefined) return UNKNOWN;
  if (typeof spec === 'number') return String(spec);
  switch (spec.kind) {
    case 'vlan':
      return String(spec.id);
    case 'trunk':
      return `trunk ${formatRanges(spec.ranges)}`;
    case 'pvlan':
      return `pvlan ${spec.id}`;
  }
}
