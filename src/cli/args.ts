import { CliUsageError } from '../errors/index.js';
import { isReplyMatchable, toMatchKey } from '../utils/phone.js';

export interface CliArgs {
  simulate: boolean;
  only?: string;
  ratePerMinute?: number;
  contactsPath?: string;
  statePath?: string;
  help: boolean;
}

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { simulate: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--dry-run':
      case '--simulate':
      case '-n':
        args.simulate = true;
        break;
      case '--only': {
        const value = requireValue(argv, i, arg);
        if (!isReplyMatchable(toMatchKey(value))) {
          throw new CliUsageError(`--only needs a phone number with at least 10 digits, got "${value}"`);
        }
        args.only = value;
        i++;
        break;
      }
      case '--rate-per-minute':
      case '-r': {
        const value = requireValue(argv, i, arg);
        if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
          throw new CliUsageError(`${arg} must be a positive integer, got "${value}"`);
        }
        args.ratePerMinute = parseInt(value, 10);
        i++;
        break;
      }
      case '--contacts':
        args.contactsPath = requireValue(argv, i, arg);
        i++;
        break;
      case '--state':
        args.statePath = requireValue(argv, i, arg);
        i++;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

export const USAGE = `
text-followup: personalized text campaign with timed follow-ups

Usage:
  text-followup [options]

Options:
  --dry-run, --simulate, -n    Log what would be sent instead of sending
  --only <phone>               Process only this contact (matched on last 10 digits)
  --rate-per-minute, -r <n>    Maximum sends per minute (default 8)
  --contacts <path>            Contacts CSV (default ./contacts.csv)
  --state <path>               State file (default ./state.json)
  --help, -h                   Show this help message

Contacts CSV columns:
  phone, first_name, company, ..., msg1, fup1_days, fup1_msg, fup2_days, fup2_msg

Simulated runs still record progress in the state file unless
CAMPAIGN_SIMULATE_COMMIT_STATE=false is set.
`;
