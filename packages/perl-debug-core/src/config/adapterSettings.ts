import { isRecord } from '../protocol/requestArguments';

export const LOG_LEVELS = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Host-wide settings. Per-session choices (program, arguments) come with the
 * launch request instead.
 */
export interface AdapterSettings {
  /** Perl interpreter used when a launch request names none. */
  perlPath: string;
  /** Extra interpreter switches placed before `-d`. */
  perlArgs: string[];
  /** Environment added to every debuggee. */
  env: Record<string, string>;
  /** How long to wait for the debugger's first prompt or an attach connection. */
  handshakeTimeoutMs: number;
  /** How long a stack, variable or evaluate query may take. */
  queryTimeoutMs: number;
  /** Source files kept classified at once. */
  cacheMaxEntries: number;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: Readonly<AdapterSettings> = Object.freeze({
  perlPath: 'perl',
  perlArgs: [],
  env: {},
  handshakeTimeoutMs: 10000,
  queryTimeoutMs: 5000,
  cacheMaxEntries: 256,
  logLevel: 'info',
});

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
    Object.setPrototypeOf(this, SettingsError.prototype);
  }
}

function positiveInteger(value: unknown, key: string, origin: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new SettingsError(`${origin}: '${key}' must be a positive integer`);
  }
  return value;
}

/**
 * Checks a parsed settings object. Unknown keys are rejected so that typos do
 * not silently fall back to defaults.
 */
export function validateSettings(
  value: unknown,
  origin: string,
): Partial<AdapterSettings> {
  if (!isRecord(value)) {
    throw new SettingsError(`${origin}: settings must be a JSON object`);
  }
  const settings: Partial<AdapterSettings> = {};
  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case 'perlPath':
        if (typeof entry !== 'string' || entry.length === 0) {
          throw new SettingsError(`${origin}: 'perlPath' must be a non-empty string`);
        }
        settings.perlPath = entry;
        break;
      case 'perlArgs':
        if (!Array.isArray(entry) || !entry.every((a) => typeof a === 'string')) {
          throw new SettingsError(`${origin}: 'perlArgs' must be an array of strings`);
        }
        settings.perlArgs = entry.map(String);
        break;
      case 'env': {
        if (!isRecord(entry)) {
          throw new SettingsError(`${origin}: 'env' must be an object`);
        }
        const env: Record<string, string> = {};
        for (const [name, v] of Object.entries(entry)) {
          if (typeof v !== 'string') {
            throw new SettingsError(`${origin}: 'env.${name}' must be a string`);
          }
          env[name] = v;
        }
        settings.env = env;
        break;
      }
      case 'handshakeTimeoutMs':
      case 'queryTimeoutMs':
      case 'cacheMaxEntries':
        settings[key] = positiveInteger(entry, key, origin);
        break;
      case 'logLevel':
        if (!isLogLevel(entry)) {
          throw new SettingsError(
            `${origin}: 'logLevel' must be one of ${LOG_LEVELS.join(', ')}`,
          );
        }
        settings.logLevel = entry;
        break;
      default:
        throw new SettingsError(`${origin}: unknown setting '${key}'`);
    }
  }
  return settings;
}
