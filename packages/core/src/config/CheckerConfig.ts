import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { ConfigError, describeError } from '../errors/CheckerError.js';
import { isRecord } from '../types/Device.js';
import type { VlanRange } from '../types/CheckResult.js';

/**
 * Checker configuration options
 */
export interface CheckerConfig {
  /** Controller host name, optionally with an http(s):// scheme */
  host: string;
  /** Username for the token request */
  username: string;
  /** Password for the token request */
  password: string;
  /** First VLAN ID of the range (inclusive) */
  vlanStart: number;
  /** Last VLAN ID of the range (inclusive) */
  vlanEnd: number;
  /** Per-request timeout in ms */
  timeoutMs: number;
  /**
   * Verify the controller's TLS certificate. Off by default because
   * controllers commonly present a self-signed certificate.
   */
  verifyTls: boolean;
  /** Token endpoint path */
  authPath: string;
  /** Device list endpoint path */
  deviceListPath: string;
  /** Per-device VLAN endpoint path; `{deviceId}` is replaced */
  deviceVlanPath: string;
  /** Header carrying the session token */
  tokenHeader: string;
}

export type CheckerConfigInput = Partial<CheckerConfig>;

/**
 * Default configuration values
 */
export const CheckerConfigDefaults = {
  DEFAULT_HOST: 'sandboxdnac.cisco.com',
  DEFAULT_VLAN_START: 600,
  DEFAULT_VLAN_END: 699,
  DEFAULT_TIMEOUT_MS: 30000,
  DEFAULT_AUTH_PATH: '/dna/system/api/v1/auth/token',
  DEFAULT_DEVICE_LIST_PATH: '/dna/intent/api/v1/network-device',
  DEFAULT_DEVICE_VLAN_PATH: '/dna/intent/api/v1/network-device/{deviceId}/vlan',
  DEFAULT_TOKEN_HEADER: 'X-Auth-Token',
  VLAN_ID_MIN: 1,
  VLAN_ID_MAX: 4094,
} as const;

export interface LoadCheckerConfigOptions {
  /** YAML or JSON file to read */
  path?: string;
  /** Values that win over file and environment (command-line flags) */
  overrides?: CheckerConfigInput;
  /** Environment to read overrides from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load checker configuration: defaults, then the config file, then
 * environment variables, then explicit overrides. The result is validated.
 */
export function loadCheckerConfig(
  options: LoadCheckerConfigOptions = {}
): CheckerConfig {
  const env = options.env ?? process.env;
  const path = options.path ?? envString(env, 'VLAN_CHECKER_CONFIG');

  const fromFile = path ? readConfigFile(path) : {};
  const fromEnv = readEnvOverrides(env);

  const cfg: CheckerConfig = {
    ...defaultConfig(),
    ...definedOnly(fromFile),
    ...definedOnly(fromEnv),
    ...definedOnly(options.overrides ?? {}),
  };

  validateCheckerConfig(cfg);
  return cfg;
}

export function defaultConfig(): CheckerConfig {
  return {
    host: CheckerConfigDefaults.DEFAULT_HOST,
    username: '',
    password: '',
    vlanStart: CheckerConfigDefaults.DEFAULT_VLAN_START,
    vlanEnd: CheckerConfigDefaults.DEFAULT_VLAN_END,
    timeoutMs: CheckerConfigDefaults.DEFAULT_TIMEOUT_MS,
    verifyTls: false,
    authPath: CheckerConfigDefaults.DEFAULT_AUTH_PATH,
    deviceListPath: CheckerConfigDefaults.DEFAULT_DEVICE_LIST_PATH,
    deviceVlanPath: CheckerConfigDefaults.DEFAULT_DEVICE_VLAN_PATH,
    tokenHeader: CheckerConfigDefaults.DEFAULT_TOKEN_HEADER,
  };
}

/**
 * Throw a ConfigError describing the first invalid setting
 */
export function validateCheckerConfig(cfg: CheckerConfig): void {
  if (!cfg.host.trim()) {
    throw new ConfigError('Missing controller host (VLAN_CHECKER_HOST or --host)');
  }
  if (!cfg.username || !cfg.password) {
    throw new ConfigError(
      'Missing controller credentials (VLAN_CHECKER_USERNAME and VLAN_CHECKER_PASSWORD)'
    );
  }

  const { VLAN_ID_MIN, VLAN_ID_MAX } = CheckerConfigDefaults;
  for (const [key, value] of [
    ['vlanStart', cfg.vlanStart],
    ['vlanEnd', cfg.vlanEnd],
  ] as const) {
    if (!Number.isInteger(value) || value < VLAN_ID_MIN || value > VLAN_ID_MAX) {
      throw new ConfigError(
        `${key} must be an integer between ${VLAN_ID_MIN} and ${VLAN_ID_MAX}, got ${value}`
      );
    }
  }
  if (cfg.vlanStart > cfg.vlanEnd) {
    throw new ConfigError(
      `VLAN range start ${cfg.vlanStart} is greater than end ${cfg.vlanEnd}`
    );
  }

  if (!Number.isInteger(cfg.timeoutMs) || cfg.timeoutMs <= 0) {
    throw new ConfigError(`timeoutMs must be a positive integer, got ${cfg.timeoutMs}`);
  }
  if (!cfg.deviceVlanPath.includes('{deviceId}')) {
    throw new ConfigError('deviceVlanPath must contain the {deviceId} placeholder');
  }
  if (!cfg.tokenHeader.trim()) {
    throw new ConfigError('tokenHeader must not be empty');
  }
}

export function rangeOf(cfg: CheckerConfig): VlanRange {
  return { start: cfg.vlanStart, end: cfg.vlanEnd };
}

/**
 * Base URL of the controller; bare host names default to https
 */
export function controllerBaseUrl(cfg: CheckerConfig): string {
  const host = cfg.host.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(host) ? host : `https://${host}`;
}

/**
 * Read a YAML or JSON config file. Unknown keys are ignored.
 */
export function readConfigFile(path: string): CheckerConfigInput {
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    const content = readFileSync(path, 'utf-8');
    parsed = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config file ${path}: ${describeError(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a mapping`);
  }

  return {
    host: fileString(parsed, 'host'),
    username: fileString(parsed, 'username'),
    password: fileString(parsed, 'password'),
    vlanStart: fileInt(parsed, 'vlanStart'),
    vlanEnd: fileInt(parsed, 'vlanEnd'),
    timeoutMs: fileInt(parsed, 'timeoutMs'),
    verifyTls: fileBool(parsed, 'verifyTls'),
    authPath: fileString(parsed, 'authPath'),
    deviceListPath: fileString(parsed, 'deviceListPath'),
    deviceVlanPath: fileString(parsed, 'deviceVlanPath'),
    tokenHeader: fileString(parsed, 'tokenHeader'),
  };
}

/**
 * Environment variable overrides
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): CheckerConfigInput {
  const cfg: CheckerConfigInput = {};

  const host = envString(env, 'VLAN_CHECKER_HOST');
  if (host) cfg.host = host;

  const username = envString(env, 'VLAN_CHECKER_USERNAME');
  if (username) cfg.username = username;

  const password = env.VLAN_CHECKER_PASSWORD;
  if (password) cfg.password = password;

  const vlanStart = envInt(env, 'VLAN_START');
  if (vlanStart !== undefined) cfg.vlanStart = vlanStart;

  const vlanEnd = envInt(env, 'VLAN_END');
  if (vlanEnd !== undefined) cfg.vlanEnd = vlanEnd;

  const timeoutMs = envInt(env, 'VLAN_CHECKER_TIMEOUT_MS');
  if (timeoutMs !== undefined) cfg.timeoutMs = timeoutMs;

  if ('VLAN_CHECKER_VERIFY_TLS' in env) {
    cfg.verifyTls = envBool(env, 'VLAN_CHECKER_VERIFY_TLS', false);
  }

  return cfg;
}

function definedOnly(input: CheckerConfigInput): CheckerConfigInput {
  const out: CheckerConfigInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

function fileString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new ConfigError(`Config key ${key} must be a string`);
}

function fileInt(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  const parsed = parseIntStrict(value);
  if (parsed === undefined) {
    throw new ConfigError(`Config key ${key} must be an integer`);
  }
  return parsed;
}

function fileBool(record: Record<string, unknown>, key: string): boolean | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  const parsed = parseBool(String(value));
  if (parsed === undefined) {
    throw new ConfigError(`Config key ${key} must be a boolean`);
  }
  return parsed;
}

/**
 * Parse an integer written as a number or a decimal string
 */
function parseIntStrict(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return undefined;
}

function parseBool(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no') return false;
  return undefined;
}

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() ? value.trim() : undefined;
}

function envBool(env: NodeJS.ProcessEnv, key: string, defaultValue: boolean): boolean {
  return parseBool(env[key] ?? '') ?? defaultValue;
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (!value) return undefined;
  const parsed = parseIntStrict(value);
  if (parsed === undefined) {
    throw new ConfigError(`${key} must be an integer, got "${value}"`);
  }
  return parsed;
}
