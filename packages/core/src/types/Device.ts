/**
 * A managed network device as reported by the controller
 */
export interface Device {
  /** Controller-assigned device identifier; devices without one are skipped */
  id?: string;
  /** Device hostname, `Unknown` when the controller omits it */
  hostname: string;
  /** Management IP address, `Unknown` when the controller omits it */
  managementIpAddress: string;
  /** Platform description (e.g., "Cisco Catalyst 9300 Switch") */
  type: string;
}

const UNKNOWN = 'Unknown';

/**
 * Normalize one element of the controller's device list
 */
export function toDevice(raw: unknown): Device {
  const record = isRecord(raw) ? raw : {};
  return {
    id: identifier(record.id),
    hostname: text(record.hostname) ?? UNKNOWN,
    managementIpAddress: text(record.managementIpAddress) ?? UNKNOWN,
    type: text(record.type) ?? UNKNOWN,
  };
}

/**
 * Label used to group findings, e.g. `edge-sw1 (10.10.20.81)`
 */
export function deviceLabel(device: Device): string {
  return `${device.hostname} (${device.managementIpAddress})`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A falsy id (`0`, `''`) counts as missing */
function identifier(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value !== 0) return String(value);
  if (typeof value === 'string' && value.trim()) return value.trim();
  return undefined;
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}
