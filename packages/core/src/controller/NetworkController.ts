import type { FetchError } from '../errors/CheckerError.js';
import type { Device } from '../types/Device.js';
import type { RawVlan } from '../types/Vlan.js';

export interface RequestOptions {
  /** Aborts the request; the call then fails with a CancelledError */
  signal?: AbortSignal;
}

/**
 * Result of a per-device VLAN request. Failures are returned, not thrown,
 * so one unreachable device does not stop the run.
 */
export type VlanFetchResult =
  | { ok: true; vlans: RawVlan[] }
  | { ok: false; error: FetchError };

/**
 * REST API of a network controller
 */
export interface NetworkController {
  /** Base URL requests are sent to */
  readonly baseUrl: string;

  /**
   * Exchange the configured credentials for a session token.
   * Throws AuthError.
   */
  authenticate(options?: RequestOptions): Promise<string>;

  /**
   * List every managed device. Throws EnumerationError.
   */
  listDevices(token: string, options?: RequestOptions): Promise<Device[]>;

  /**
   * Fetch one device's VLAN table
   */
  fetchDeviceVlans(
    token: string,
    deviceId: string,
    options?: RequestOptions
  ): Promise<VlanFetchResult>;
}
