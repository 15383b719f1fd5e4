import { VlanChecker } from '../src/checker/VlanChecker.js';
import type {
  NetworkController,
  VlanFetchResult,
} from '../src/controller/NetworkController.js';
import { AuthError, CancelledError, FetchError } from '../src/errors/CheckerError.js';
import type { Logger } from '../src/logging/Logger.js';
import type { Device } from '../src/types/Device.js';
import type { RawVlan } from '../src/types/Vlan.js';

interface FakeControllerOptions {
  devices?: Device[];
  vlans?: Record<string, RawVlan[] | 'fail'>;
  authFails?: boolean;
}

class FakeController implements NetworkController {
  readonly baseUrl = 'https://dnac.test';
  readonly vlanRequests: string[] = [];

  constructor(private readonly options: FakeControllerOptions) {}

  async authenticate(): Promise<string> {
    if (this.options.authFails) {
      throw new AuthError('Authentication failed: HTTP 401');
    }
    return 'test-token';
  }

  async listDevices(token: string): Promise<Device[]> {
    expect(token).toBe('test-token');
    return this.options.devices ?? [];
  }

  async fetchDeviceVlans(token: string, deviceId: string): Promise<VlanFetchResult> {
    expect(token).toBe('test-token');
    this.vlanRequests.push(deviceId);
    const vlans = this.options.vlans?.[deviceId] ?? [];
    if (vlans === 'fail') {
      return {
        ok: false,
        error: new FetchError(`Failed to get VLANs for device ${deviceId}: HTTP 500`, deviceId),
      };
    }
    return { ok: true, vlans };
  }
}

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => {
      lines.push(`INFO ${message}`);
    },
    warn: (message) => {
      lines.push(`WARN ${message}`);
    },
    error: (message) => {
      lines.push(`ERROR ${message}`);
    },
    debug: () => {},
  };
}

function device(id: string | undefined, hostname: string, ip: string): Device {
  return { id, hostname, managementIpAddress: ip, type: 'Switch' };
}

const RANGE = { start: 600, end: 699 };

test('collects in-range VLANs per device label', async () => {
  const controller = new FakeController({
    devices: [device('a', 'DeviceA', '10.0.0.1'), device('b', 'DeviceB', '10.0.0.2')],
    vlans: {
      a: [
        { vlanNumber: 1, vlanName: 'default' },
        { vlanNumber: 650, vlanName: 'Voice' },
      ],
      b: [{ vlanNumber: 10, vlanName: 'Data' }],
    },
  });

  const result = await new VlanChecker(controller, RANGE).check();

  expect([...result.findings]).toEqual([
    ['DeviceA (10.0.0.1)', [{ id: 650, name: 'Voice' }]],
  ]);
  expect(result.devicesFound).toBe(2);
  expect(result.devicesChecked).toBe(2);
  expect(result.devicesSkipped).toBe(0);
  expect(result.fetchFailures).toEqual([]);
  expect(result.range).toEqual(RANGE);
});

test('an empty device list yields no findings and no checks', async () => {
  const controller = new FakeController({ devices: [] });

  const result = await new VlanChecker(controller, RANGE).check();

  expect(result.findings.size).toBe(0);
  expect(result.devicesChecked).toBe(0);
  expect(controller.vlanRequests).toEqual([]);
});

test('devices without an id are skipped with a warning', async () => {
  const logger = recordingLogger();
  const controller = new FakeController({
    devices: [device(undefined, 'ghost', '10.0.0.9'), device('a', 'DeviceA', '10.0.0.1')],
    vlans: { a: [{ vlanNumber: 600 }] },
  });

  const result = await new VlanChecker(controller, RANGE, { logger }).check();

  expect(controller.vlanRequests).toEqual(['a']);
  expect(result.devicesSkipped).toBe(1);
  expect(result.devicesChecked).toBe(1);
  expect([...result.findings.keys()]).toEqual(['DeviceA (10.0.0.1)']);
  expect(logger.lines).toContain('WARN Device ghost has no ID, skipping');
});

test('a failed VLAN fetch does not stop later devices', async () => {
  const logger = recordingLogger();
  const controller = new FakeController({
    devices: [
      device('a', 'DeviceA', '10.0.0.1'),
      device('b', 'DeviceB', '10.0.0.2'),
      device('c', 'DeviceC', '10.0.0.3'),
    ],
    vlans: {
      a: [{ vlanNumber: 601, vlanName: 'Cams' }],
      b: 'fail',
      c: [{ vlanNumber: 602, vlanName: 'Badges' }],
    },
  });

  const result = await new VlanChecker(controller, RANGE, { logger }).check();

  expect(controller.vlanRequests).toEqual(['a', 'b', 'c']);
  expect([...result.findings.keys()]).toEqual(['DeviceA (10.0.0.1)', 'DeviceC (10.0.0.3)']);
  expect(result.fetchFailures).toEqual(['b']);
  expect(logger.lines).toContain('WARN Failed to get VLANs for device b: HTTP 500');
});

test('progress is logged in device-list order', async () => {
  const logger = recordingLogger();
  const controller = new FakeController({
    devices: [device('a', 'DeviceA', '10.0.0.1'), device('b', 'DeviceB', '10.0.0.2')],
  });

  await new VlanChecker(controller, RANGE, { logger }).check();

  expect(logger.lines).toEqual([
    'INFO Connecting to controller: https://dnac.test',
    'INFO Checking for VLANs in range 600-699...',
    'INFO Successfully authenticated',
    'INFO Found 2 network devices to check',
    'INFO Checking: DeviceA (10.0.0.1) - Switch',
    'INFO Checking: DeviceB (10.0.0.2) - Switch',
    'INFO Completed checking 2 devices',
  ]);
});

test('devices sharing a label are merged', async () => {
  const controller = new FakeController({
    devices: [device('a', 'dup', '10.0.0.1'), device('b', 'dup', '10.0.0.1')],
    vlans: {
      a: [{ vlanNumber: 610, vlanName: 'x' }],
      b: [{ vlanNumber: 620, vlanName: 'y' }],
    },
  });

  const result = await new VlanChecker(controller, RANGE).check();

  expect(result.findings.get('dup (10.0.0.1)')).toEqual([
    { id: 610, name: 'x' },
    { id: 620, name: 'y' },
  ]);
});

test('authentication failure stops before any device is queried', async () => {
  const controller = new FakeController({
    authFails: true,
    devices: [device('a', 'DeviceA', '10.0.0.1')],
  });

  await expect(new VlanChecker(controller, RANGE).check()).rejects.toThrow(AuthError);
  expect(controller.vlanRequests).toEqual([]);
});

test('an aborted signal cancels the run between devices', async () => {
  const interrupt = new AbortController();
  const controller = new FakeController({
    devices: [device('a', 'DeviceA', '10.0.0.1'), device('b', 'DeviceB', '10.0.0.2')],
  });
  const original = controller.fetchDeviceVlans.bind(controller);
  controller.fetchDeviceVlans = async (token, deviceId) => {
    const result = await original(token, deviceId);
    interrupt.abort();
    return result;
  };

  const run = new VlanChecker(controller, RANGE, { signal: interrupt.signal }).check();

  await expect(run).rejects.toThrow(CancelledError);
  expect(controller.vlanRequests).toEqual(['a']);
});
