// Connector Manager - the provider registry, built once at startup and read-only afterwards

import { ProviderNotFoundError, VideoConnector, logger } from '@vidgen/core';

export class ProviderRegistry {
  private readonly connectors: ReadonlyMap<string, VideoConnector>;

  constructor(
    connectors: ReadonlyMap<string, VideoConnector>,
    readonly defaultProvider: string
  ) {
    this.connectors = new Map(connectors);
    if (!this.connectors.has(defaultProvider)) {
      throw new ProviderNotFoundError(defaultProvider, this.names());
    }
  }

  /** Exact, case-sensitive lookup. */
  get(name: string): VideoConnector {
    const connector = this.connectors.get(name);
    if (!connector) {
      throw new ProviderNotFoundError(name, this.names());
    }
    return connector;
  }

  getDefault(): VideoConnector {
    return this.get(this.defaultProvider);
  }

  /** Registration order. */
  listAll(): ReadonlyMap<string, VideoConnector> {
    return this.connectors;
  }

  names(): string[] {
    return [...this.connectors.keys()];
  }
}

export class ProviderRegistryBuilder {
  private readonly connectors = new Map<string, VideoConnector>();

  /** A later registration under the same name replaces the earlier one. */
  register(connector: VideoConnector): this {
    if (this.connectors.has(connector.provider_name)) {
      logger.warn(`Replacing connector registered as ${connector.provider_name}`);
    }
    this.connectors.set(connector.provider_name, connector);
    return this;
  }

  build(defaultProvider: string): ProviderRegistry {
    const registry = new ProviderRegistry(this.connectors, defaultProvider);
    logger.info(`Provider registry ready: ${registry.names().join(', ')}`, {
      default_provider: defaultProvider,
    });
    return registry;
  }
}
