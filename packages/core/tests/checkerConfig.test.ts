import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import {
  CheckerConfigDefaults,
  controllerBaseUrl,
  defaultConfig,
  loadCheckerConfig,
} from '../src/config/CheckerConfig.js';
import { ConfigError } from '../src/errors/CheckerError.js';

const CREDENTIALS = {
  VLAN_CHECKER_USERNAME: 'admin',
  VLAN_CHECKER_PASSWORD: 'test-secret',
};

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'vlan-config-'));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const path = join(workDir, name);
  writeFileSync(path, content, 'utf8');
  return path;
}

test('loadCheckerConfig applies defaults', () => {
  const config = loadCheckerConfig({ env: CREDENTIALS });

  expect(config.host).toBe(CheckerConfigDefaults.DEFAULT_HOST);
  expect(config.vlanStart).toBe(600);
  expect(config.vlanEnd).toBe(699);
  expect(config.timeoutMs).toBe(30000);
  expect(config.verifyTls).toBe(false);
  expect(config.tokenHeader).toBe('X-Auth-Token');
});

test('loadCheckerConfig reads a YAML file', () => {
  const path = writeConfig(
    'checker.yaml',
    ['host: dnac.test', 'vlanStart: 100', 'vlanEnd: "120"', 'verifyTls: true'].join('\n')
  );

  const config = loadCheckerConfig({ path, env: CREDENTIALS });

  expect(config.host).toBe('dnac.test');
  expect(config.vlanStart).toBe(100);
  expect(config.vlanEnd).toBe(120);
  expect(config.verifyTls).toBe(true);
});

test('the example config file loads with the documented defaults', () => {
  const path = resolve(__dirname, '..', '..', '..', 'config', 'checker.example.yaml');

  const config = loadCheckerConfig({ path, env: CREDENTIALS });

  expect(config).toEqual({ ...defaultConfig(), username: 'admin', password: 'test-secret' });
});

test('loadCheckerConfig reads a JSON file named by the environment', () => {
  const path = writeConfig('checker.json', JSON.stringify({ timeoutMs: 5000 }));

  const config = loadCheckerConfig({ env: { ...CREDENTIALS, VLAN_CHECKER_CONFIG: path } });

  expect(config.timeoutMs).toBe(5000);
});

test('environment wins over the file and overrides win over both', () => {
  const path = writeConfig('checker.yaml', 'vlanStart: 100\nvlanEnd: 200\nhost: file.test\n');

  const config = loadCheckerConfig({
    path,
    env: { ...CREDENTIALS, VLAN_START: '150', VLAN_CHECKER_HOST: 'env.test' },
    overrides: { vlanEnd: 180, host: undefined },
  });

  expect(config.vlanStart).toBe(150);
  expect(config.vlanEnd).toBe(180);
  expect(config.host).toBe('env.test');
});

test('missing credentials are a configuration error', () => {
  expect(() => loadCheckerConfig({ env: {} })).toThrow(ConfigError);
  expect(() => loadCheckerConfig({ env: { VLAN_CHECKER_USERNAME: 'admin' } })).toThrow(
    'Missing controller credentials'
  );
});

test('a reversed range is rejected', () => {
  expect(() =>
    loadCheckerConfig({ env: CREDENTIALS, overrides: { vlanStart: 700, vlanEnd: 600 } })
  ).toThrow('VLAN range start 700 is greater than end 600');
});

test('range bounds must be valid VLAN ids', () => {
  expect(() =>
    loadCheckerConfig({ env: CREDENTIALS, overrides: { vlanStart: 0 } })
  ).toThrow('vlanStart must be an integer between 1 and 4094, got 0');
  expect(() =>
    loadCheckerConfig({ env: { ...CREDENTIALS, VLAN_END: '5000' } })
  ).toThrow('vlanEnd must be an integer between 1 and 4094, got 5000');
});

test('non-numeric environment values are rejected', () => {
  expect(() => loadCheckerConfig({ env: { ...CREDENTIALS, VLAN_START: 'six' } })).toThrow(
    'VLAN_START must be an integer, got "six"'
  );
});

test('an explicit config path must exist', () => {
  expect(() =>
    loadCheckerConfig({ path: join(workDir, 'missing.yaml'), env: CREDENTIALS })
  ).toThrow(ConfigError);
});

test('a config file must hold a mapping', () => {
  const path = writeConfig('checker.yaml', '- 1\n- 2\n');
  expect(() => loadCheckerConfig({ path, env: CREDENTIALS })).toThrow('must contain a mapping');
});

test('controllerBaseUrl defaults to https and keeps explicit schemes', () => {
  const base = { ...defaultConfig(), username: 'admin', password: 'test-secret' };
  expect(controllerBaseUrl({ ...base, host: 'dnac.test' })).toBe('https://dnac.test');
  expect(controllerBaseUrl({ ...base, host: 'http://127.0.0.1:8080/' })).toBe(
    'http://127.0.0.1:8080'
  );
});
