// BaseConnector - model list and parameter validation shared by all video connectors

import {
  CallOptions,
  CanonicalResult,
  JobParameters,
  ModelKind,
  ValidationError,
  VideoConnector,
  hasValue,
  logger,
} from '@vidgen/core';

export interface ModelClassification<K extends string = ModelKind> {
  kind: K;
  matched: boolean; // false when the model id fell through to the default kind
}

export abstract class BaseConnector<K extends ModelKind = ModelKind> implements VideoConnector {
  abstract readonly provider_name: string;
  protected abstract readonly fallbackModels: readonly string[];

  /**
   * @param configuredModels comma list from configuration; the built-in list
   * is used when it is absent or empty
   */
  constructor(private readonly configuredModels?: readonly string[]) {}

  supportedModels(): string[] {
    const models =
      this.configuredModels && this.configuredModels.length > 0
        ? this.configuredModels
        : this.fallbackModels;
    return [...new Set(models)];
  }

  isSupported(model: string): boolean {
    return this.supportedModels().includes(model);
  }

  validateParameters(model: string, params: JobParameters): JobParameters {
    if (!this.isSupported(model)) {
      throw new ValidationError(
        `Unsupported model: ${model}. Supported models: ${this.supportedModels().join(', ')}`
      );
    }
    return this.normalizeParameters(model, { ...params });
  }

  abstract classifyModel(model: string): ModelClassification<K>;

  abstract callModel(
    model: string,
    params: JobParameters,
    options?: CallOptions
  ): Promise<CanonicalResult>;

  /** Receives a shallow copy of the caller's parameters. */
  protected abstract normalizeParameters(model: string, params: JobParameters): JobParameters;

  protected modelKind(model: string): K {
    const { kind, matched } = this.classifyModel(model);
    if (!matched) {
      logger.warn(`${this.provider_name}: unrecognised model family for ${model}, treating as ${kind}`);
    }
    return kind;
  }

  protected requireFields(model: string, params: JobParameters, fields: readonly string[]): void {
    const missing = fields.filter(field => !hasValue(params, field));
    if (missing.length > 0) {
      throw new ValidationError(`Model ${model} requires parameter(s): ${missing.join(', ')}`);
    }
  }

  /** Move a legacy alias onto its canonical field; the alias never survives. */
  protected consumeAlias(params: JobParameters, alias: string, canonical: string): void {
    const value = params[alias];
    if (value !== undefined && !hasValue(params, canonical)) {
      params[canonical] = value;
    }
    delete params[alias];
  }
}
