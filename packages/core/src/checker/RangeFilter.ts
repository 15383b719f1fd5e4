import { ParseError } from '../errors/CheckerError.js';
import type { Logger } from '../logging/Logger.js';
import type { RawVlan, VlanEntry } from '../types/Vlan.js';
import type { FindingSet, RangeUsage, VlanRange } from '../types/CheckResult.js';

export function isInRange(id: number, range: VlanRange): boolean {
  return range.start <= id && id <= range.end;
}

/**
 * Every VLAN ID of the range, ascending
 */
export function rangeIds(range: VlanRange): number[] {
  const ids: number[] = [];
  for (let id = range.start; id <= range.end; id++) {
    ids.push(id);
  }
  return ids;
}

/**
 * Coerce a controller `vlanNumber` to an integer.
 * Absent values count as 0, which no valid range contains.
 */
export function parseVlanNumber(value: unknown): number {
  if (value === undefined) return 0;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  throw new ParseError(`Invalid VLAN number: ${JSON.stringify(value) ?? String(value)}`);
}

/**
 * Keep the VLANs of one device whose number falls in the range.
 * Entries with an unparsable number are logged and dropped.
 */
export function filterVlansInRange(
  vlans: RawVlan[],
  range: VlanRange,
  deviceName: string,
  logger: Logger
): VlanEntry[] {
  const matches: VlanEntry[] = [];

  for (const vlan of vlans) {
    let id: number;
    try {
      id = parseVlanNumber(vlan.vlanNumber);
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      logger.warn(`Invalid VLAN number format in device ${deviceName}`);
      continue;
    }

    if (isInRange(id, range)) {
      matches.push({ id, name: vlanName(vlan.vlanName, id) });
    }
  }

  return matches;
}

function vlanName(value: unknown, id: number): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return `VLAN${id}`;
  return String(value);
}

/**
 * Unique used IDs, the available remainder of the range and the total
 * match count across all devices
 */
export function summarizeRange(findings: FindingSet, range: VlanRange): RangeUsage {
  const used = new Set<number>();
  let totalMatches = 0;

  for (const entries of findings.values()) {
    totalMatches += entries.length;
    for (const entry of entries) {
      used.add(entry.id);
    }
  }

  return {
    usedIds: [...used].sort((a, b) => a - b),
    availableIds: rangeIds(range).filter((id) => !used.has(id)),
    totalMatches,
  };
}
