import { isRecord } from './Device.js';

/**
 * VLAN record exactly as returned by the controller
 */
export interface RawVlan {
  vlanNumber?: unknown;
  vlanName?: unknown;
}

/**
 * A VLAN that fell inside the configured range
 */
export interface VlanEntry {
  /** VLAN number (1-4094) */
  id: number;
  /** VLAN name, `VLAN<id>` when the controller omits it */
  name: string;
}

export function toRawVlan(value: unknown): RawVlan {
  return isRecord(value) ? value : {};
}
