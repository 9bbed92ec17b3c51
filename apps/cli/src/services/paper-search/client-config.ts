import { CLIENT_VERSION } from '@paperhub/shared';
import type { AppConfig, ProviderConfig } from '../config';
import { buildUserAgent } from './http';
import type { ProviderClientOptions } from './types';

export function defaultUserAgent(config: AppConfig): string {
  return buildUserAgent({ ...config.userAgent, version: CLIENT_VERSION });
}

/** Map the loaded configuration onto client constructor options. */
export function providerOptionsFromConfig(
  config: AppConfig,
  provider: ProviderConfig
): ProviderClientOptions {
  return {
    baseUrl: provider.baseUrl,
    minIntervalMs: provider.minIntervalMs,
    userAgent: defaultUserAgent(config),
    maxConcurrent: config.http.maxConcurrent,
    retry: {
      maxAttempts: config.http.maxRetries,
      baseDelayMs: config.http.backoffBaseMs,
      maxDelayMs: config.http.backoffMaxMs,
    },
    searchTimeoutMs: config.http.searchTimeoutMs,
    downloadTimeoutMs: config.http.downloadTimeoutMs,
    chunkSize: config.downloads.chunkSize,
  };
}
