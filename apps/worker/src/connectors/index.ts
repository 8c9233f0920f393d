// Connector wiring - builds the provider registry from configuration

import type { AppConfig } from '@vidgen/core';
import { ProviderRegistry, ProviderRegistryBuilder } from '../connector-manager.js';
import { AliyunConnector } from './aliyun-connector.js';
import { ZhipuAIConnector } from './zhipuai-connector.js';
import { ArtifactResolver } from './artifact-resolver.js';
import type { AsyncRESTDependencies } from './protocol/async-rest-connector.js';

export * from './base-connector.js';
export * from './protocol/async-rest-connector.js';
export * from './protocol/http-client.js';
export * from './protocol/poll-schedule.js';
export * from './aliyun-connector.js';
export * from './zhipuai-connector.js';
export * from './artifact-resolver.js';

export function createArtifactResolver(config: AppConfig): ArtifactResolver {
  return new ArtifactResolver({
    dataDir: config.DATA_DIR,
    mediaBasePath: config.MEDIA_BASE_PATH,
    downloadBaseUrl: config.MEDIA_DOWNLOAD_BASE_URL,
    publicBaseUrl: config.PUBLIC_BASE_URL,
    cacheTtlMs: config.ARTIFACT_CACHE_TTL_HOURS * 3_600_000,
  });
}

export function createProviderRegistry(
  config: AppConfig,
  deps: AsyncRESTDependencies
): ProviderRegistry {
  const polling = {
    polling_interval_ms: config.POLL_INTERVAL_MS,
    polling_max_attempts: config.POLL_MAX_ATTEMPTS,
  };

  return new ProviderRegistryBuilder()
    .register(
      new AliyunConnector(
        {
          ...polling,
          base_url: config.ALIYUN_BASE_URL,
          api_url: config.ALIYUN_API_URL,
          api_key: config.ALIYUN_API_KEY,
          supported_models: config.ALIYUN_SUPPORTED_MODELS,
        },
        deps
      )
    )
    .register(
      new ZhipuAIConnector(
        {
          ...polling,
          base_url: config.ZHIPUAI_BASE_URL,
          api_key: config.ZHIPUAI_API_KEY,
          supported_models: config.ZHIPUAI_SUPPORTED_MODELS,
        },
        deps
      )
    )
    .build(config.DEFAULT_PROVIDER);
}
