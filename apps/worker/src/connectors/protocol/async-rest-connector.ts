/**
 * AsyncRESTConnector - base class for providers that run generation as a remote job
 *
 * Every call follows the same path:
 * 1. Validate and normalize parameters
 * 2. Stage externally hosted input media (provider specific, default pass-through)
 * 3. Submit the creation request and extract the remote job id
 * 4. Poll the status endpoint on a fixed schedule until a terminal status
 * 5. Materialize produced media and build the canonical result
 */

import axios from 'axios';
import {
  CallOptions,
  CanonicalResult,
  JobParameters,
  ModelKind,
  RemoteCallError,
  RemoteTimeoutError,
  errorMessage,
  logger,
} from '@vidgen/core';
import { BaseConnector } from '../base-connector.js';
import type { ArtifactResolver } from '../artifact-resolver.js';
import { PollSchedule, Sleeper, timerSleeper } from './poll-schedule.js';
import { getString, truncateForLog } from './response-fields.js';
import type { HttpClient } from './http-client.js';

export interface AsyncRESTConnectorConfig {
  base_url: string;
  api_key: string;
  supported_models?: readonly string[];
  polling_interval_ms: number;
  polling_max_attempts: number;
  submit_timeout_ms?: number; // creation calls, default 120s
  poll_timeout_ms?: number; // status calls, default 30s
}

export interface AsyncRESTDependencies {
  artifacts: ArtifactResolver;
  http?: HttpClient;
  sleeper?: Sleeper;
  clock?: () => number;
}

export interface ProviderRequest {
  url: string;
  body: JobParameters;
  headers?: Record<string, string>;
}

export type PollOutcome =
  | { state: 'succeeded'; payload: unknown }
  | { state: 'failed'; error: string }
  | { state: 'running'; status?: string };

export abstract class AsyncRESTConnector<K extends ModelKind = ModelKind> extends BaseConnector<K> {
  protected readonly http: HttpClient;
  protected readonly artifacts: ArtifactResolver;
  protected readonly sleeper: Sleeper;
  protected readonly clock: () => number;

  constructor(
    protected readonly restConfig: AsyncRESTConnectorConfig,
    deps: AsyncRESTDependencies
  ) {
    super(restConfig.supported_models);
    this.artifacts = deps.artifacts;
    this.sleeper = deps.sleeper ?? timerSleeper;
    this.clock = deps.clock ?? Date.now;
    this.http =
      deps.http ??
      axios.create({
        timeout: restConfig.poll_timeout_ms ?? 30_000,
        headers: {
          'User-Agent': 'video-generation-worker/1.0',
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
      });
  }

  // ========================================
  // Provider specific pieces
  // ========================================

  protected abstract buildRequest(model: string, params: JobParameters): ProviderRequest;

  protected abstract extractRemoteJobId(data: unknown): string | undefined;

  protected abstract buildPollingUrl(remoteJobId: string): string;

  protected abstract parsePollingResponse(data: unknown): PollOutcome;

  protected abstract buildResult(
    model: string,
    params: JobParameters,
    payload: unknown,
    options: CallOptions
  ): Promise<CanonicalResult>;

  /** Replace input media references with provider-side references. */
  protected async stageInputs(
    _model: string,
    params: JobParameters,
    _options: CallOptions
  ): Promise<JobParameters> {
    return params;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.restConfig.api_key}` };
  }

  // ========================================
  // Call path
  // ========================================

  async callModel(
    model: string,
    params: JobParameters,
    options: CallOptions = {}
  ): Promise<CanonicalResult> {
    const startTime = this.clock();
    const normalized = this.validateParameters(model, params);
    const staged = await this.stageInputs(model, normalized, options);
    const request = this.buildRequest(model, staged);

    logger.info(`Submitting ${this.provider_name} generation job`, {
      provider: this.provider_name,
      model,
      jobId: options.jobId,
      url: request.url,
    });

    const remoteJobId = await this.submit(request, options);
    logger.info(`${this.provider_name} accepted job, remote id: ${remoteJobId}`, {
      jobId: options.jobId,
      remoteJobId,
    });

    const payload = await this.pollForCompletion(remoteJobId, options);
    const result = await this.buildResult(model, staged, payload, options);

    logger.info(`${this.provider_name} job completed in ${this.clock() - startTime}ms`, {
      jobId: options.jobId,
      remoteJobId,
      videos: result.videos.length,
    });
    return result;
  }

  private async submit(request: ProviderRequest, options: CallOptions): Promise<string> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(request.url, request.body, {
        headers: { ...this.authHeaders(), ...request.headers },
        timeout: this.restConfig.submit_timeout_ms ?? 120_000,
        signal: options.signal,
      });
      data = response.data;
    } catch (error) {
      throw this.toRemoteCallError(error, 'Generation request failed');
    }

    const remoteJobId = this.extractRemoteJobId(data);
    if (!remoteJobId) {
      throw new RemoteCallError(
        `${this.provider_name} response carried no job id: ${truncateForLog(data, 1000)}`,
        undefined,
        data
      );
    }
    return remoteJobId;
  }

  /**
   * Poll until the provider reports a terminal status. Client errors (4xx)
   * end the call; network errors and 5xx responses count as an attempt and
   * polling continues.
   */
  private async pollForCompletion(remoteJobId: string, options: CallOptions): Promise<unknown> {
    const schedule = new PollSchedule(
      this.restConfig.polling_interval_ms,
      this.restConfig.polling_max_attempts,
      this.clock
    );
    const pollingUrl = this.buildPollingUrl(remoteJobId);

    while (!schedule.exhausted) {
      await this.sleeper.sleep(schedule.delayUntilNextPoll(), options.signal);
      const attempt = schedule.recordAttempt();

      let data: unknown;
      try {
        const response = await this.http.get<unknown>(pollingUrl, {
          headers: this.authHeaders(),
          timeout: this.restConfig.poll_timeout_ms ?? 30_000,
          signal: options.signal,
        });
        data = response.data;
      } catch (error) {
        if (options.signal?.aborted) throw error;
        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        if (status !== undefined && status >= 400 && status < 500) {
          throw this.toRemoteCallError(error, 'Status request rejected');
        }
        logger.warn(`Polling attempt ${attempt} for ${remoteJobId} failed, will retry: ${errorMessage(error)}`);
        continue;
      }

      const outcome = this.parsePollingResponse(data);
      if (outcome.state === 'succeeded') {
        logger.info(`Remote job ${remoteJobId} succeeded after ${attempt} polls`);
        return outcome.payload;
      }
      if (outcome.state === 'failed') {
        logger.error(`Remote job ${remoteJobId} failed: ${outcome.error}`, { jobId: options.jobId });
        throw new RemoteCallError(outcome.error, undefined, data);
      }
      logger.debug(`Remote job ${remoteJobId} still running (attempt ${attempt})`, {
        status: outcome.status,
      });
    }

    throw new RemoteTimeoutError(
      `Remote job ${remoteJobId} did not reach a terminal status after ${schedule.attempts} polls`,
      remoteJobId,
      schedule.attempts
    );
  }

  protected toRemoteCallError(error: unknown, context: string): RemoteCallError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const responseData: unknown = error.response?.data;
      const detail =
        getString(responseData, 'message') ??
        getString(responseData, 'error', 'message') ??
        (responseData !== undefined ? truncateForLog(responseData) : error.message);
      const message = status
        ? `${context}: HTTP ${status} - ${detail}`
        : `${context}: ${error.message}`;
      logger.error(message, { provider: this.provider_name, status });
      return new RemoteCallError(message, status, responseData, { cause: error });
    }
    return new RemoteCallError(`${context}: ${errorMessage(error)}`, undefined, undefined, {
      cause: error,
    });
  }
}
