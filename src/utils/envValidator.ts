import * as path from 'path';
import { USER_AGENT } from '../config/appInfo';
import type { ExtractorConfig } from '../types';
import { ConfigError } from './errorHandler';

const DEFAULTS = {
  HYPIXEL_API_BASE: 'https://api.hypixel.net/v2',
  MOJANG_API_BASE: 'https://api.mojang.com',
  API_KEY_FILE: 'api_key.txt',
  REQUEST_DELAY_MS: 500,
  REQUEST_TIMEOUT_MS: 30000,
  MAX_ATTEMPTS: 3
};

type EnvSource = Record<string, string | undefined>;

/**
 * Turns an environment (normally `process.env` after dotenv has run) into
 * a typed extractor configuration.
 */
export class EnvValidator {
  private config: ExtractorConfig | null = null;
  readonly warnings: string[] = [];

  constructor(
    private readonly env: EnvSource,
    private readonly cwd: string = process.cwd()
  ) {}

  validateAndLoad(): ExtractorConfig {
    if (this.config) return this.config;

    const apiKey = this.env.HYPIXEL_API_KEY?.trim();
    const apiKeyFile = path.resolve(this.cwd, this.env.API_KEY_FILE || DEFAULTS.API_KEY_FILE);

    if (!apiKey) {
      this.warnings.push(`HYPIXEL_API_KEY not set. The key will be read from ${apiKeyFile}.`);
    }

    this.config = {
      hypixelApiBase: stripTrailingSlash(this.env.HYPIXEL_API_BASE || DEFAULTS.HYPIXEL_API_BASE),
      mojangApiBase: stripTrailingSlash(this.env.MOJANG_API_BASE || DEFAULTS.MOJANG_API_BASE),
      apiKey: apiKey || undefined,
      apiKeyFile,
      outputRoot: path.resolve(this.cwd, this.env.OUTPUT_ROOT || '.'),
      userAgent: USER_AGENT,
      requestDelayMs: this.readInteger('REQUEST_DELAY_MS', DEFAULTS.REQUEST_DELAY_MS, 0),
      requestTimeoutMs: this.readInteger('REQUEST_TIMEOUT_MS', DEFAULTS.REQUEST_TIMEOUT_MS, 1),
      maxAttempts: this.readInteger('MAX_ATTEMPTS', DEFAULTS.MAX_ATTEMPTS, 1)
    };

    return this.config;
  }

  private readInteger(name: string, fallback: number, min: number): number {
    const raw = this.env[name]?.trim();
    if (!raw) return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
  }
}

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, '');
