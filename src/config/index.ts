import * as os from 'os';
import * as path from 'path';
import dotenv from 'dotenv';
import { ConfigError } from '../errors/index.js';

// Load .env file for local development
dotenv.config();

export { ConfigError };

export interface Config {
  nodeEnv: string;
  logLevel: string;
  campaign: {
    contactsPath: string;
    statePath: string;
    ratePerMinute: number;
  };
  messages: {
    chatDbPath: string;
    appleScriptPath: string;
    sendTimeoutMs: number;
  };
  simulation: {
    // When false, a simulated run leaves the state file untouched
    commitState: boolean;
  };
}

function getPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`Invalid value for ${name}: expected a positive integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < 1) {
    throw new ConfigError(`Invalid value for ${name}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

function getBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ConfigError(`Invalid value for ${name}: expected "true" or "false", got "${raw}"`);
}

function resolvePath(value: string | undefined, fallback: string): string {
  const chosen = value && value.trim() !== '' ? value.trim() : fallback;
  if (chosen.startsWith('~/')) {
    return path.join(os.homedir(), chosen.slice(2));
  }
  return path.resolve(chosen);
}

export function loadConfig(): Config {
  const cwd = process.cwd();

  return {
    nodeEnv: process.env.NODE_ENV || 'production',
    logLevel: process.env.LOG_LEVEL || 'info',
    campaign: {
      contactsPath: resolvePath(process.env.CAMPAIGN_CONTACTS_PATH, path.join(cwd, 'contacts.csv')),
      statePath: resolvePath(process.env.CAMPAIGN_STATE_PATH, path.join(cwd, 'state.json')),
      ratePerMinute: getPositiveInt('CAMPAIGN_RATE_PER_MINUTE', 8),
    },
    messages: {
      chatDbPath: resolvePath(process.env.CAMPAIGN_CHAT_DB_PATH, '~/Library/Messages/chat.db'),
      appleScriptPath: resolvePath(
        process.env.CAMPAIGN_APPLESCRIPT_PATH,
        path.join(cwd, 'applescript', 'send_message.applescript')
      ),
      sendTimeoutMs: getPositiveInt('CAMPAIGN_SEND_TIMEOUT_MS', 30_000),
    },
    simulation: {
      commitState: getBoolean('CAMPAIGN_SIMULATE_COMMIT_STATE', true),
    },
  };
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

// For testing purposes - reset the cached config
export function resetConfig(): void {
  _config = null;
}
