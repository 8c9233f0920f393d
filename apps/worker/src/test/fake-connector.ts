// Scriptable connector for executor, pool and api tests

import {
  CallOptions,
  CanonicalResult,
  JobParameters,
  ValidationError,
  VideoConnector,
  hasValue,
} from '@vidgen/core';

export type CallHandler = (
  model: string,
  params: JobParameters,
  options: CallOptions
) => Promise<CanonicalResult>;

export interface RecordedCall {
  model: string;
  params: JobParameters;
  options: CallOptions;
}

export function sampleResult(model: string, params: JobParameters): CanonicalResult {
  return {
    id: 'remote-result-1',
    model,
    model_type: 'text_to_video',
    created: '2024-01-01T00:00:00.000Z',
    videos: [
      {
        index: 0,
        url: 'https://cdn.test/out.mp4',
        local_path: '/data/videos/fake/out.mp4',
        file_url: '/media/videos/fake/out.mp4',
        download_url: 'http://localhost:8000/api/download/out.mp4',
        absolute_url: 'http://localhost:8000/media/videos/fake/out.mp4',
        metadata: { duration: 5 },
      },
    ],
    prompt: typeof params.prompt === 'string' ? params.prompt : undefined,
    parameters: params,
  };
}

/** Settles only when `signal` aborts, rejecting with a transport-style error. */
export function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('canceled'));
      return;
    }
    signal?.addEventListener('abort', () => reject(new Error('canceled')), { once: true });
  });
}

export class FakeConnector implements VideoConnector {
  readonly calls: RecordedCall[] = [];
  handler: CallHandler = async (model, params) => sampleResult(model, params);

  constructor(
    readonly provider_name = 'fake',
    private readonly models: readonly string[] = ['fake-video-1', 'fake-video-2']
  ) {}

  supportedModels(): string[] {
    return [...this.models];
  }

  validateParameters(model: string, params: JobParameters): JobParameters {
    if (!this.models.includes(model)) {
      throw new ValidationError(`Unsupported model: ${model}. Supported models: ${this.models.join(', ')}`);
    }
    if (!hasValue(params, 'prompt')) {
      throw new ValidationError(`Model ${model} requires parameter(s): prompt`);
    }
    return { ...params, model_type: 'text_to_video' };
  }

  async callModel(model: string, params: JobParameters, options: CallOptions = {}): Promise<CanonicalResult> {
    this.calls.push({ model, params, options });
    return this.handler(model, params, options);
  }
}
