// Runtime wiring shared by the worker process and the api's synchronous dispatch path

import type { AppConfig, JobStore } from '@vidgen/core';
import { createArtifactResolver, createProviderRegistry } from './connectors/index.js';
import type { ArtifactResolver } from './connectors/artifact-resolver.js';
import type { ProviderRegistry } from './connector-manager.js';
import { JobExecutor } from './job-executor.js';

export interface ExecutionRuntime {
  artifacts: ArtifactResolver;
  registry: ProviderRegistry;
  executor: JobExecutor;
}

export function createExecutionRuntime(config: AppConfig, store: JobStore): ExecutionRuntime {
  const artifacts = createArtifactResolver(config);
  const registry = createProviderRegistry(config, { artifacts });
  const executor = new JobExecutor(store, registry, { timeLimitMs: config.TASK_TIME_LIMIT * 1000 });
  return { artifacts, registry, executor };
}
