/**
 * SkyBlock Profile Extractor
 * Builds the pipeline (resolver -> enumerator -> selector -> orchestrator)
 * from an explicit configuration.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ExtractorConfig } from '../../types';
import { Reporter } from '../../utils/reporter';
import { ExtractionOrchestrator } from './extractionOrchestrator';
import { IdentityResolver } from './identityResolver';
import { ProfileEnumerator } from './profileEnumerator';
import { RateLimitedCaller, createRetryPolicy, type Sleep } from './rateLimitedCaller';

export interface ProfileExtractorOptions {
  reporter?: Reporter;
  sleep?: Sleep;
  // Overridable for tests
  hypixelClient?: AxiosInstance;
  mojangClient?: AxiosInstance;
}

export class ProfileExtractor {
  readonly hypixel: RateLimitedCaller;
  readonly mojang: RateLimitedCaller;
  readonly resolver: IdentityResolver;
  readonly enumerator: ProfileEnumerator;
  readonly orchestrator: ExtractionOrchestrator;

  constructor(config: ExtractorConfig, options: ProfileExtractorOptions = {}) {
    const reporter = options.reporter ?? new Reporter();
    const retryPolicy = createRetryPolicy(config.maxAttempts);

    this.hypixel = new RateLimitedCaller({
      client: options.hypixelClient ?? axios.create({ baseURL: config.hypixelApiBase, timeout: config.requestTimeoutMs }),
      userAgent: config.userAgent,
      apiKey: config.apiKey,
      requestDelayMs: config.requestDelayMs,
      retryPolicy,
      sleep: options.sleep,
      reporter
    });

    // Mojang lookups carry no API key
    this.mojang = new RateLimitedCaller({
      client: options.mojangClient ?? axios.create({ baseURL: config.mojangApiBase, timeout: config.requestTimeoutMs }),
      userAgent: config.userAgent,
      requestDelayMs: config.requestDelayMs,
      retryPolicy,
      sleep: options.sleep,
      reporter
    });

    this.resolver = new IdentityResolver(this.mojang);
    this.enumerator = new ProfileEnumerator(this.hypixel);
    this.orchestrator = new ExtractionOrchestrator(this.hypixel, reporter);
  }

  async testConnection(): Promise<boolean> {
    return this.hypixel.ping();
  }
}
