import type { NetworkController } from '../controller/NetworkController.js';
import { CancelledError } from '../errors/CheckerError.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import { deviceLabel } from '../types/Device.js';
import type { CheckResult, FindingSet, VlanRange } from '../types/CheckResult.js';
import { filterVlansInRange } from './RangeFilter.js';

export interface VlanCheckerOptions {
  logger?: Logger;
  /** Aborting stops the run with a CancelledError */
  signal?: AbortSignal;
}

/**
 * Walks every managed device of a controller and collects the VLANs
 * that fall inside a range. Devices are queried one at a time, in the
 * order the controller lists them.
 */
export class VlanChecker {
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly controller: NetworkController,
    private readonly range: VlanRange,
    options: VlanCheckerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.signal = options.signal;
  }

  async check(): Promise<CheckResult> {
    const { start, end } = this.range;
    const request = { signal: this.signal };

    this.logger.info(`Connecting to controller: ${this.controller.baseUrl}`);
    this.logger.info(`Checking for VLANs in range ${start}-${end}...`);

    const token = await this.controller.authenticate(request);
    this.logger.info('Successfully authenticated');

    const devices = await this.controller.listDevices(token, request);
    this.logger.info(`Found ${devices.length} network devices to check`);

    const findings: FindingSet = new Map();
    const fetchFailures: string[] = [];
    let devicesChecked = 0;
    let devicesSkipped = 0;

    for (const device of devices) {
      if (this.signal?.aborted) throw new CancelledError();

      if (!device.id) {
        this.logger.warn(`Device ${device.hostname} has no ID, skipping`);
        devicesSkipped++;
        continue;
      }

      this.logger.info(
        `Checking: ${device.hostname} (${device.managementIpAddress}) - ${device.type}`
      );
      devicesChecked++;

      const result = await this.controller.fetchDeviceVlans(token, device.id, request);
      if (!result.ok) {
        this.logger.warn(result.error.message);
        fetchFailures.push(device.id);
        continue;
      }

      const matches = filterVlansInRange(
        result.vlans,
        this.range,
        device.hostname,
        this.logger
      );
      if (matches.length === 0) continue;

      // Devices sharing a hostname and IP are merged under one label
      const label = deviceLabel(device);
      findings.set(label, [...(findings.get(label) ?? []), ...matches]);
    }

    this.logger.info(`Completed checking ${devicesChecked} devices`);

    return {
      range: { start, end },
      findings,
      devicesFound: devices.length,
      devicesChecked,
      devicesSkipped,
      fetchFailures,
    };
  }
}
