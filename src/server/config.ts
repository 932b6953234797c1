// config.ts
//
// .env template:
// SESSION_SECRET=<long random string>
// SENDER_EMAIL=alerts@example.com         # REQUIRED
// SENDER_PASSWORD=<gmail app password>    # REQUIRED
// RECIPIENT_FILE=clients.txt
// PORT=5050
// HOST=0.0.0.0
// NODE_ENV=development

import crypto from 'crypto';
import type { SenderCredentials } from '../shared/models/dto';
import type { ILogger } from './utils/ScopedLogger';

// Immutable configuration snapshot, built once at startup and passed by reference
export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly sessionSecret: string;
  readonly sender: Readonly<SenderCredentials>;
  readonly recipientFile: string;
  readonly production: boolean;
  readonly development: boolean;
}

export const REQUIRED_VARIABLES = ['SENDER_EMAIL', 'SENDER_PASSWORD'] as const;

export const DEFAULTS = {
  PORT: 5050,
  HOST: '0.0.0.0',
  RECIPIENT_FILE: 'clients.txt',
} as const;

export class ConfigurationError extends Error {
  readonly missingVariables: string[];

  constructor(missingVariables: string[]) {
    super(`Missing required environment variables: ${missingVariables.join(', ')}`);
    this.name = 'ConfigurationError';
    this.missingVariables = missingVariables;
  }

  /** Operator-facing explanation printed by the entrypoint before exiting. */
  describe(): string {
    const lines = [
      'CONFIGURATION ERROR:',
      this.message,
      '',
      'Please create a .env file with:',
      ...this.missingVariables.map((name) => `${name}=your_value_here`),
      '',
      'Example .env file structure:',
      'SESSION_SECRET=your_secure_random_key',
      'SENDER_EMAIL=your_email@gmail.com',
      'SENDER_PASSWORD=your_app_password',
    ];
    return lines.join('\n');
  }
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

function readPort(env: NodeJS.ProcessEnv): number {
  const raw = readString(env, 'PORT');
  const port = raw === undefined ? NaN : Number(raw);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULTS.PORT;
}

/**
 * Builds the AppConfig from the environment (dotenv is loaded by the entrypoint).
 * Throws ConfigurationError when SENDER_EMAIL or SENDER_PASSWORD is absent.
 * A missing SESSION_SECRET is replaced by a random one and a warning is logged.
 */
export function loadConfig(env: NodeJS.ProcessEnv, logger: ILogger): AppConfig {
  const senderAddress = readString(env, 'SENDER_EMAIL');
  const senderPassword = readString(env, 'SENDER_PASSWORD');

  const missing = REQUIRED_VARIABLES.filter((name) => readString(env, name) === undefined);
  if (missing.length > 0 || senderAddress === undefined || senderPassword === undefined) {
    throw new ConfigurationError([...missing]);
  }

  let sessionSecret = readString(env, 'SESSION_SECRET');
  if (sessionSecret === undefined) {
    sessionSecret = crypto.randomBytes(32).toString('hex');
    logger.warn('WARNING: Using auto-generated session secret. Set SESSION_SECRET in .env for production!');
  }

  const nodeEnv = readString(env, 'NODE_ENV');

  return Object.freeze({
    port: readPort(env),
    host: readString(env, 'HOST') ?? DEFAULTS.HOST,
    sessionSecret,
    sender: Object.freeze({ address: senderAddress, password: senderPassword }),
    recipientFile: readString(env, 'RECIPIENT_FILE') ?? DEFAULTS.RECIPIENT_FILE,
    production: nodeEnv === 'production',
    development: nodeEnv === 'development',
  });
}
