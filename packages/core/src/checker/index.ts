export type { VlanCheckerOptions } from './VlanChecker.js';
export { VlanChecker } from './VlanChecker.js';
export {
  isInRange,
  rangeIds,
  parseVlanNumber,
  filterVlansInRange,
  summarizeRange,
} from './RangeFilter.js';
