import { ConfigError, type CheckerConfigInput } from '@vlan-range-checker/core';

export interface CliArgs {
  configPath?: string;
  overrides: CheckerConfigInput;
  json: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: vlan-range-checker [options]

Reports which VLAN IDs in a range are in use on the controller's devices.

Options:
  --config <path>     YAML or JSON config file (env: VLAN_CHECKER_CONFIG)
  --host <host>       Controller host (env: VLAN_CHECKER_HOST)
  --username <name>   Controller username (env: VLAN_CHECKER_USERNAME)
  --password <pass>   Controller password (env: VLAN_CHECKER_PASSWORD)
  --start <id>        First VLAN ID of the range (env: VLAN_START)
  --end <id>          Last VLAN ID of the range (env: VLAN_END)
  --timeout <ms>      Per-request timeout (env: VLAN_CHECKER_TIMEOUT_MS)
  --verify-tls        Verify the controller's TLS certificate
  --json              Print the report as JSON
  --verbose           Log requests and error stacks
  -h, --help          Show this help`;

type ValueFlag = 'config' | 'host' | 'username' | 'password' | 'start' | 'end' | 'timeout';

const VALUE_FLAGS: readonly ValueFlag[] = [
  'config',
  'host',
  'username',
  'password',
  'start',
  'end',
  'timeout',
];

/**
 * Parse command-line arguments. Accepts `--flag value` and `--flag=value`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { overrides: {}, json: false, verbose: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }
    if (arg === '--json') {
      args.json = true;
      continue;
    }
    if (arg === '--verbose') {
      args.verbose = true;
      continue;
    }
    if (arg === '--verify-tls') {
      args.overrides.verifyTls = true;
      continue;
    }

    const [name, inline] = splitFlag(arg);
    const flag = VALUE_FLAGS.find((candidate) => candidate === name);
    if (!flag) {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }

    let value = inline;
    if (value === undefined) {
      value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Missing value for --${flag}`);
      }
      i += 1;
    }

    applyValue(args, flag, value);
  }

  return args;
}

function splitFlag(arg: string): [string | undefined, string | undefined] {
  if (!arg.startsWith('--')) return [undefined, undefined];
  const body = arg.slice(2);
  const eq = body.indexOf('=');
  return eq === -1 ? [body, undefined] : [body.slice(0, eq), body.slice(eq + 1)];
}

function applyValue(args: CliArgs, flag: ValueFlag, value: string): void {
  switch (flag) {
    case 'config':
      args.configPath = value;
      break;
    case 'host':
      args.overrides.host = value;
      break;
    case 'username':
      args.overrides.username = value;
      break;
    case 'password':
      args.overrides.password = value;
      break;
    case 'start':
      args.overrides.vlanStart = integerFlag(flag, value);
      break;
    case 'end':
      args.overrides.vlanEnd = integerFlag(flag, value);
      break;
    case 'timeout':
      args.overrides.timeoutMs = integerFlag(flag, value);
      break;
  }
}

function integerFlag(flag: ValueFlag, value: string): number {
  if (!/^\s*[+-]?\d+\s*$/.test(value)) {
    throw new ConfigError(`--${flag} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}
