// ZhipuAI connector - CogVideoX and Vidu video generation

import { v4 as uuidv4 } from 'uuid';
import {
  CallOptions,
  CanonicalResult,
  JobParameters,
  ModelKind,
  ParamValue,
  ValidationError,
  VideoArtifact,
  hasValue,
  readString,
} from '@vidgen/core';
import {
  AsyncRESTConnector,
  AsyncRESTConnectorConfig,
  AsyncRESTDependencies,
  PollOutcome,
  ProviderRequest,
} from './protocol/async-rest-connector.js';
import { getArray, getString } from './protocol/response-fields.js';
import type { ModelClassification } from './base-connector.js';

export const ZHIPUAI_DEFAULT_MODELS = [
  'cogvideox-2',
  'cogvideox-flash',
  'viduq1-text',
  'viduq1-image',
  'viduq1-start-end',
  'vidu2-image',
  'vidu2-start-end',
  'vidu2-reference',
] as const;

export type ZhipuProfile = 'cogvideox' | 'vidu_text' | 'vidu_image' | 'vidu_start_end' | 'vidu_reference';

const PROFILE_KIND: Readonly<Record<ZhipuProfile, ModelKind>> = {
  cogvideox: 'text_to_video',
  vidu_text: 'text_to_video',
  vidu_image: 'image_to_video',
  vidu_start_end: 'keyframe_to_video',
  vidu_reference: 'reference_to_video',
};

const COMMON_FIELDS = ['request_id', 'user_id'] as const;

// Fields forwarded to the creation endpoint for each request profile
export const ZHIPUAI_REQUEST_FIELDS: Readonly<Record<ZhipuProfile, readonly string[]>> = {
  cogvideox: ['prompt', 'quality', 'with_audio', 'image_url', 'size', 'fps', ...COMMON_FIELDS],
  vidu_text: ['prompt', 'style', 'duration', 'aspect_ratio', 'size', 'movement_amplitude', ...COMMON_FIELDS],
  vidu_image: ['image_url', 'prompt', 'duration', 'size', 'movement_amplitude', 'with_audio', ...COMMON_FIELDS],
  vidu_start_end: ['image_url', 'prompt', 'duration', 'size', 'movement_amplitude', 'with_audio', ...COMMON_FIELDS],
  vidu_reference: [
    'image_url',
    'prompt',
    'duration',
    'aspect_ratio',
    'size',
    'movement_amplitude',
    'with_audio',
    ...COMMON_FIELDS,
  ],
};

// Copied from the request onto every produced video
const VIDEO_METADATA_FIELDS = ['duration', 'size', 'fps'] as const;

export function classifyZhipuModel(model: string): { profile: ZhipuProfile; matched: boolean } {
  const id = model.toLowerCase();
  if (id.startsWith('cogvideox')) return { profile: 'cogvideox', matched: true };
  if (id.endsWith('-text')) return { profile: 'vidu_text', matched: true };
  if (id.includes('start-end')) return { profile: 'vidu_start_end', matched: true };
  if (id.includes('reference')) return { profile: 'vidu_reference', matched: true };
  if (id.endsWith('-image')) return { profile: 'vidu_image', matched: true };
  return { profile: 'cogvideox', matched: false };
}

function imageUrlList(value: ParamValue | undefined): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.every(item => typeof item === 'string' && item.length > 0)
    ? value.filter((item): item is string => typeof item === 'string')
    : undefined;
}

export class ZhipuAIConnector extends AsyncRESTConnector {
  readonly provider_name = 'zhipuai';
  protected readonly fallbackModels = ZHIPUAI_DEFAULT_MODELS;

  constructor(config: AsyncRESTConnectorConfig, deps: AsyncRESTDependencies) {
    super(config, deps);
  }

  classifyModel(model: string): ModelClassification {
    const { profile, matched } = classifyZhipuModel(model);
    return { kind: PROFILE_KIND[profile], matched };
  }

  protected normalizeParameters(model: string, params: JobParameters): JobParameters {
    const { profile } = classifyZhipuModel(model);
    const kind = this.modelKind(model);

    this.consumeAlias(params, 'source_image', 'image_url');

    switch (profile) {
      case 'cogvideox':
      case 'vidu_text':
        this.requireFields(model, params, ['prompt']);
        break;
      case 'vidu_image': {
        const image = params.image_url;
        const valid =
          (typeof image === 'string' && image.trim().length > 0) ||
          (imageUrlList(image)?.length ?? 0) > 0;
        if (!valid) {
          throw new ValidationError(`Model ${model} requires parameter(s): image_url`);
        }
        break;
      }
      case 'vidu_start_end': {
        const images = imageUrlList(params.image_url);
        if (!images || images.length !== 2) {
          throw new ValidationError(
            `Model ${model} requires image_url to be a list of exactly 2 image URLs (first and last frame)`
          );
        }
        break;
      }
      case 'vidu_reference': {
        const images = imageUrlList(params.image_url);
        if (!images || images.length < 1 || images.length > 3) {
          throw new ValidationError(`Model ${model} requires image_url to be a list of 1 to 3 image URLs`);
        }
        break;
      }
    }

    params.model_type = kind;
    return params;
  }

  protected buildRequest(model: string, params: JobParameters): ProviderRequest {
    const { profile } = classifyZhipuModel(model);
    const body: JobParameters = { model };
    for (const field of ZHIPUAI_REQUEST_FIELDS[profile]) {
      if (hasValue(params, field)) body[field] = params[field];
    }
    return { url: `${this.restConfig.base_url}/videos/generations`, body };
  }

  protected extractRemoteJobId(data: unknown): string | undefined {
    return getString(data, 'id');
  }

  protected buildPollingUrl(remoteJobId: string): string {
    return `${this.restConfig.base_url}/async-result/${remoteJobId}`;
  }

  protected parsePollingResponse(data: unknown): PollOutcome {
    const status = getString(data, 'task_status') ?? '';
    if (status === 'SUCCESS') {
      return { state: 'succeeded', payload: data };
    }
    if (status === 'FAIL') {
      return {
        state: 'failed',
        error: `Task failed: ${getString(data, 'error', 'message') ?? 'Unknown error'}`,
      };
    }
    return { state: 'running', status };
  }

  protected async buildResult(
    model: string,
    params: JobParameters,
    payload: unknown,
    options: CallOptions
  ): Promise<CanonicalResult> {
    const metadataBase: Record<string, ParamValue> = {};
    for (const field of VIDEO_METADATA_FIELDS) {
      const value = params[field];
      if (value !== undefined) metadataBase[field] = value;
    }

    const videos: VideoArtifact[] = [];
    for (const entry of getArray(payload, 'video_result')) {
      const url = getString(entry, 'url');
      if (!url) continue;
      const index = videos.length;
      const localPath = await this.artifacts.download(
        url,
        this.artifacts.videoPath(this.provider_name, index),
        options.signal
      );
      const metadata = { ...metadataBase };
      const cover = getString(entry, 'cover_image_url');
      if (cover) metadata.cover_image_url = cover;
      videos.push({
        index,
        url,
        local_path: localPath,
        ...this.artifacts.resolveDisplayUrls(localPath),
        metadata,
      });
    }

    return {
      id: getString(payload, 'request_id') ?? getString(payload, 'id') ?? uuidv4(),
      model,
      model_type: this.modelKind(model),
      created: new Date(this.clock()).toISOString(),
      videos,
      prompt: readString(params, 'prompt'),
      parameters: params,
    };
  }
}
