import { summarizeRange } from '../checker/RangeFilter.js';
import type { CheckResult, VlanRange } from '../types/CheckResult.js';

const RULE_WIDTH = 70;
const BANNER_WIDTH = 50;
/** Available IDs are listed in full up to this many */
const FULL_LIST_LIMIT = 20;
/** Otherwise only this many are shown */
const PREVIEW_COUNT = 10;

/**
 * Header printed before the run starts
 */
export function formatBanner(baseUrl: string, range: VlanRange): string[] {
  return [
    'VLAN Range Checker',
    '-'.repeat(BANNER_WIDTH),
    `Target: ${baseUrl}`,
    `Range: VLANs ${range.start}-${range.end}`,
    '',
  ];
}

/**
 * Render the findings of a run as console lines
 */
export function formatReport(result: CheckResult): string[] {
  const { start, end } = result.range;
  const rule = '='.repeat(RULE_WIDTH);
  const lines = ['', rule, `VLAN RANGE CHECK RESULTS (${start}-${end})`, rule];

  if (result.findings.size === 0) {
    lines.push(
      '',
      `No VLANs in the range ${start}-${end} found on any monitored devices.`,
      'All VLANs in this range are available for use!'
    );
    if (result.fetchFailures.length > 0) {
      lines.push('', 'Summary:');
      appendFailures(lines, result);
    }
    return lines;
  }

  lines.push('', `Found VLANs in range ${start}-${end} on the following devices:`, '');

  for (const [device, vlans] of result.findings) {
    lines.push(device);
    for (const vlan of vlans) {
      lines.push(`   • VLAN ${vlan.id}: ${vlan.name}`);
    }
    lines.push(`   Count: ${vlans.length} VLANs`, '');
  }

  const usage = summarizeRange(result.findings, result.range);
  lines.push(
    'Summary:',
    `   • Devices with VLANs in range: ${result.findings.size}`,
    `   • Total VLANs found in range: ${usage.totalMatches}`,
    `   • Unique VLAN IDs in use: ${formatIdList(usage.usedIds)}`
  );

  const available = usage.availableIds;
  if (available.length > 0) {
    lines.push(`   • Available VLANs in range: ${available.length}`);
    if (available.length <= FULL_LIST_LIMIT) {
      lines.push(`   • Available VLAN IDs: ${formatIdList(available)}`);
    } else {
      lines.push(
        `   • First ${PREVIEW_COUNT} available: ${formatIdList(available.slice(0, PREVIEW_COUNT))}...`
      );
    }
  }

  appendFailures(lines, result);
  return lines;
}

function appendFailures(lines: string[], result: CheckResult): void {
  if (result.fetchFailures.length > 0) {
    lines.push(`   • Devices with VLAN fetch errors: ${result.fetchFailures.length}`);
  }
}

/**
 * Machine-readable report for `--json`
 */
export function formatReportJson(result: CheckResult): string {
  const usage = summarizeRange(result.findings, result.range);
  const payload = {
    range: result.range,
    devicesFound: result.devicesFound,
    devicesChecked: result.devicesChecked,
    devicesSkipped: result.devicesSkipped,
    fetchFailures: result.fetchFailures,
    findings: [...result.findings].map(([device, vlans]) => ({ device, vlans })),
    totalMatches: usage.totalMatches,
    usedIds: usage.usedIds,
    availableIds: usage.availableIds,
  };
  return JSON.stringify(payload, null, 2);
}

/** `[600, 601, 602]` */
export function formatIdList(ids: number[]): string {
  return `[${ids.join(', ')}]`;
}
