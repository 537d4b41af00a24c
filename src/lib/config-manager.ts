import {
  type ReplayConfig,
  type StoredReplayConfig,
  DEFAULT_REPLAY_CONFIG,
} from '../types/replay-config';
import { readJson, fileExists, getConfigPath, expandHome } from '../utils/file-utils';

export interface ReplayCliOptions {
  varnishlog?: string;
  input?: string;
  jsonLog?: string;
  timeout?: number;
  color?: boolean;
  verbose?: boolean;
}

/**
 * Strip whitespace and trailing slashes, then check that what is left is a
 * bare host with an optional port.
 * @throws Error if the host is empty or carries a path, query or credentials
 */
export function normalizeTargetHost(raw: string): string {
  const host = raw.trim().replace(/\/+$/, '');
  if (!host) {
    throw new Error('Target host must not be empty');
  }

  let parsed: URL;
  try {
    parsed = new URL(`http://${host}`);
  } catch {
    throw new Error(`Invalid target host: ${raw}`);
  }

  if (parsed.pathname !== '/' || parsed.search || parsed.hash || parsed.username || parsed.password) {
    throw new Error(`Invalid target host: ${raw}. Expected host[:port] without a scheme or path.`);
  }

  return host;
}

export function validateTimeout(timeout: number): void {
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(`Invalid timeout: ${timeout}. Must be a positive number of milliseconds.`);
  }
}

/**
 * Check the shape of ~/.varnish-replay/config.json
 * @throws Error naming the first offending key
 */
export function parseStoredConfig(data: unknown): StoredReplayConfig {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Config file must contain a JSON object');
  }

  const config: StoredReplayConfig = {};

  if ('varnishlogBinary' in data && data.varnishlogBinary !== undefined) {
    if (typeof data.varnishlogBinary !== 'string' || !data.varnishlogBinary) {
      throw new Error('Config "varnishlogBinary" must be a non-empty string');
    }
    config.varnishlogBinary = data.varnishlogBinary;
  }

  if ('varnishlogArgs' in data && data.varnishlogArgs !== undefined) {
    const args: unknown = data.varnishlogArgs;
    if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === 'string')) {
      throw new Error('Config "varnishlogArgs" must be an array of strings');
    }
    config.varnishlogArgs = args;
  }

  if ('requestTimeout' in data && data.requestTimeout !== undefined) {
    if (typeof data.requestTimeout !== 'number') {
      throw new Error('Config "requestTimeout" must be a number');
    }
    validateTimeout(data.requestTimeout);
    config.requestTimeout = data.requestTimeout;
  }

  return config;
}

export class ConfigManager {
  private configPath: string;

  constructor(configPath: string = getConfigPath()) {
    this.configPath = configPath;
  }

  /**
   * Load stored settings, or an empty object if there is no config file
   */
  async loadStoredConfig(): Promise<StoredReplayConfig> {
    if (!(await fileExists(this.configPath))) {
      return {};
    }

    let data: unknown;
    try {
      data = await readJson(this.configPath);
    } catch (error) {
      throw new Error(`Failed to read ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
      return parseStoredConfig(data);
    } catch (error) {
      throw new Error(`${this.configPath}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Defaults, then the config file, then command-line options
   */
  async resolve(host: string, options: ReplayCliOptions): Promise<ReplayConfig> {
    const stored = await this.loadStoredConfig();

    if (options.timeout !== undefined) {
      validateTimeout(options.timeout);
    }

    const input = options.input;
    const source = input === undefined ? 'varnishlog' : input === '-' ? 'stdin' : 'file';

    return {
      ...DEFAULT_REPLAY_CONFIG,
      ...stored,
      targetHost: normalizeTargetHost(host),
      source,
      inputPath: source === 'file' && input ? expandHome(input) : undefined,
      varnishlogBinary: options.varnishlog ?? stored.varnishlogBinary ?? DEFAULT_REPLAY_CONFIG.varnishlogBinary,
      verbose: options.verbose ?? DEFAULT_REPLAY_CONFIG.verbose,
      color: options.color ?? DEFAULT_REPLAY_CONFIG.color,
      jsonLogPath: options.jsonLog ? expandHome(options.jsonLog) : undefined,
      requestTimeout: options.timeout ?? stored.requestTimeout,
    };
  }
}

export const configManager = new ConfigManager();
