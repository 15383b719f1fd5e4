import type { VlanEntry } from './Vlan.js';

/**
 * Inclusive VLAN ID range
 */
export interface VlanRange {
  start: number;
  end: number;
}

/**
 * Matching VLANs per device label, in device-list order
 */
export type FindingSet = Map<string, VlanEntry[]>;

/**
 * Outcome of one run of the checker
 */
export interface CheckResult {
  range: VlanRange;
  findings: FindingSet;
  /** Devices returned by the controller */
  devicesFound: number;
  /** Devices whose VLAN table was requested */
  devicesChecked: number;
  /** Devices skipped for lack of an identifier */
  devicesSkipped: number;
  /** Identifiers of devices whose VLAN request failed */
  fetchFailures: string[];
}

/**
 * Used and available VLAN IDs across all devices
 */
export interface RangeUsage {
  /** Unique VLAN IDs found in range, ascending */
  usedIds: number[];
  /** Range members not found on any device, ascending */
  availableIds: number[];
  /** Matching entries summed over devices */
  totalMatches: number;
}
