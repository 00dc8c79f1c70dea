import type { HostNetworkInventory, HostRef } from '@/lib/topology/model';

/** Where host inventories come from. The runner owns the lifecycle: `open`, then `close` once. */
export interface InventorySource {
  open(): Promise<void>;
  listHosts(): Promise<HostRef[]>;
  collectHost(host: HostRef): Promise<HostNetworkInventory>;
  close(): Promise<void>;
}
