export type { Device } from './Device.js';
export { toDevice, deviceLabel, isRecord } from './Device.js';

export type { RawVlan, VlanEntry } from './Vlan.js';
export { toRawVlan } from './Vlan.js';

export type {
  VlanRange,
  FindingSet,
  CheckResult,
  RangeUsage,
} from './CheckResult.js';
