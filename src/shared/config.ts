import { logger } from './logger.js';
import { ConfigError } from './errors.js';

export interface ClientSettings {
  // Endpoints
  baseUrl: string;
  rugcheckUrl: string;

  // Transport
  timeout: number; // seconds per request
  maxRetries: number; // retries after the first attempt
  retryDelay: number; // seconds between attempts
  requestDelay: number; // seconds between sequential calls in a batch

  // Logging
  verbose: boolean;

  // Used when a user agent can't be generated
  userAgents: string[];
}

const DEFAULT_CONFIG: ClientSettings = {
  baseUrl: 'https://gmgn.ai/defi/quotation/v1/rank',
  rugcheckUrl: 'https://api.rugcheck.xyz/v1',

  timeout: 60,
  maxRetries: 3,
  retryDelay: 1,
  requestDelay: 1,

  verbose: false,

  userAgents: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:82.0) Gecko/20100101 Firefox/82.0',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36'
  ]
};

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function booleanFromEnv(name: string): boolean | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function loadFromEnv(): Partial<ClientSettings> {
  const env: Partial<ClientSettings> = {};
  if (process.env.GMGN_BASE_URL) env.baseUrl = process.env.GMGN_BASE_URL;
  if (process.env.RUGCHECK_BASE_URL) env.rugcheckUrl = process.env.RUGCHECK_BASE_URL;

  const timeout = numberFromEnv('GMGN_TIMEOUT');
  if (timeout !== undefined) env.timeout = timeout;
  const maxRetries = numberFromEnv('GMGN_MAX_RETRIES');
  if (maxRetries !== undefined) env.maxRetries = maxRetries;
  const retryDelay = numberFromEnv('GMGN_RETRY_DELAY');
  if (retryDelay !== undefined) env.retryDelay = retryDelay;
  const requestDelay = numberFromEnv('GMGN_REQUEST_DELAY');
  if (requestDelay !== undefined) env.requestDelay = requestDelay;
  const verbose = booleanFromEnv('GMGN_VERBOSE');
  if (verbose !== undefined) env.verbose = verbose;

  return env;
}

const SETTING_KEYS: ReadonlyArray<keyof ClientSettings> = [
  'baseUrl',
  'rugcheckUrl',
  'timeout',
  'maxRetries',
  'retryDelay',
  'requestDelay',
  'verbose',
  'userAgents'
];

// An override left `undefined` keeps the value underneath it
function copyDefined<K extends keyof ClientSettings>(
  target: ClientSettings,
  source: Partial<ClientSettings>,
  key: K
) {
  const value: ClientSettings[K] | undefined = source[key];
  if (value !== undefined) target[key] = value;
}

export class Config {
  private config: ClientSettings;

  constructor(overrides?: Partial<ClientSettings>) {
    // explicit overrides > environment > defaults
    this.config = { ...DEFAULT_CONFIG, ...loadFromEnv() };
    if (overrides) {
      for (const key of SETTING_KEYS) copyDefined(this.config, overrides, key);
    }

    this.validateConfig();
  }

  static createDefault(): Config {
    return new Config();
  }

  static createVerbose(): Config {
    return new Config({ verbose: true });
  }

  get<K extends keyof ClientSettings>(key: K): ClientSettings[K] {
    return this.config[key];
  }

  set<K extends keyof ClientSettings>(key: K, value: ClientSettings[K]) {
    logger.warn(`Config updated: ${key} = ${String(value)}`);
    const previous = this.config[key];
    this.config[key] = value;
    try {
      this.validateConfig();
    } catch (error) {
      this.config[key] = previous;
      throw error;
    }
  }

  getAll(): ClientSettings {
    return { ...this.config, userAgents: [...this.config.userAgents] };
  }

  private validateConfig() {
    for (const key of ['baseUrl', 'rugcheckUrl'] as const) {
      try {
        new URL(this.config[key]);
      } catch {
        throw new ConfigError(`${key} is not a valid URL: "${this.config[key]}"`);
      }
    }

    if (!(this.config.timeout > 0)) {
      throw new ConfigError('timeout must be greater than 0 seconds');
    }

    if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 0 || this.config.maxRetries > 10) {
      throw new ConfigError('maxRetries must be an integer between 0 and 10');
    }

    if (!(this.config.retryDelay >= 0) || !(this.config.requestDelay >= 0)) {
      throw new ConfigError('retryDelay and requestDelay must be 0 or more seconds');
    }

    if (this.config.userAgents.length === 0) {
      throw new ConfigError('At least one fallback user agent must be defined');
    }

    logger.debug('Config validated successfully');
  }

  logConfig() {
    const { userAgents, ...rest } = this.config;
    logger.info('Current config:', { ...rest, userAgents: userAgents.length });
  }
}
