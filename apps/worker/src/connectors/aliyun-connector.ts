// Aliyun DashScope connector - wanx text/image/keyframe to video

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  CallOptions,
  CanonicalResult,
  InputStagingError,
  JobParameters,
  ModelKind,
  ParamValue,
  RemoteCallError,
  ValidationError,
  VideoArtifact,
  hasValue,
  isParamObject,
  readString,
} from '@vidgen/core';
import {
  AsyncRESTConnector,
  AsyncRESTConnectorConfig,
  AsyncRESTDependencies,
  PollOutcome,
  ProviderRequest,
} from './protocol/async-rest-connector.js';
import { getPath, getString, truncateForLog } from './protocol/response-fields.js';
import type { InputStager } from './artifact-resolver.js';
import type { ModelClassification } from './base-connector.js';

export type AliyunModelKind = Exclude<ModelKind, 'reference_to_video'>;

export const ALIYUN_DEFAULT_MODELS = [
  'wanx2.1-t2v-turbo',
  'wanx2.1-t2v-plus',
  'wanx2.1-i2v-turbo',
  'wanx2.1-i2v-plus',
  'wanx2.1-kf2v-plus',
] as const;

// Lossy on purpose: the provider only knows two tiers
export const SIZE_TO_RESOLUTION: Readonly<Record<string, string>> = {
  '1280*720': '720P',
  '720*1280': '720P',
  '960*960': '720P',
  '832*1088': '720P',
  '1088*832': '720P',
  '832*480': '480P',
  '480*832': '480P',
  '624*624': '480P',
};

export const DEFAULT_RESOLUTION = '720P';
export const DEFAULT_DURATION = 5;
export const MIN_DURATION = 3;
export const MAX_DURATION = 5;

const SUCCESS_STATUSES = new Set(['SUCCEEDED', 'SUCCESS', 'COMPLETE']);
const FAILURE_STATUSES = new Set(['FAILED', 'CANCELLED', 'ERROR']);

interface RequestShape {
  endpoint: string;
  input: readonly string[];
  inputDefaults?: JobParameters;
  inputConstants?: JobParameters;
  parameters: readonly string[];
}

export const ALIYUN_REQUEST_SHAPES: Readonly<Record<AliyunModelKind, RequestShape>> = {
  text_to_video: {
    endpoint: '/services/aigc/video-generation/video-synthesis',
    input: ['prompt', 'negative_prompt'],
    parameters: ['resolution', 'duration', 'prompt_extend', 'seed'],
  },
  image_to_video: {
    endpoint: '/services/aigc/video-generation/video-synthesis',
    input: ['prompt', 'img_url'],
    inputDefaults: { prompt: '' },
    parameters: ['resolution', 'duration', 'prompt_extend', 'seed'],
  },
  keyframe_to_video: {
    endpoint: '/services/aigc/image2video/video-synthesis',
    input: ['prompt', 'first_frame_url', 'last_frame_url'],
    inputConstants: { function: 'image_reference' },
    parameters: ['resolution', 'duration', 'prompt_extend', 'seed', 'obj_or_bg'],
  },
};

// Parameters that reference input media and must live in provider storage
const STAGED_FIELDS: Readonly<Record<AliyunModelKind, readonly string[]>> = {
  text_to_video: [],
  image_to_video: ['img_url'],
  keyframe_to_video: ['first_frame_url', 'last_frame_url'],
};

const REQUIRED_FIELDS: Readonly<Record<AliyunModelKind, readonly string[]>> = {
  text_to_video: ['prompt'],
  image_to_video: ['prompt', 'img_url'],
  keyframe_to_video: ['first_frame_url', 'last_frame_url'],
};

export function classifyAliyunModel(model: string): ModelClassification<AliyunModelKind> {
  const id = model.toLowerCase();
  if (id.includes('t2v')) return { kind: 'text_to_video', matched: true };
  if (id.includes('i2v')) return { kind: 'image_to_video', matched: true };
  if (id.includes('kf2v') || id.includes('keyframe')) return { kind: 'keyframe_to_video', matched: true };
  return { kind: 'text_to_video', matched: false };
}

function toDuration(value: ParamValue): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) {
    return Math.trunc(Number(value));
  }
  throw new ValidationError(`duration must be an integer number of seconds, got ${JSON.stringify(value)}`);
}

export interface AliyunConnectorConfig extends AsyncRESTConnectorConfig {
  api_url?: string; // replaces the model-kind endpoint when set
}

export class AliyunConnector extends AsyncRESTConnector<AliyunModelKind> {
  readonly provider_name = 'aliyun';
  protected readonly fallbackModels = ALIYUN_DEFAULT_MODELS;

  constructor(
    private readonly aliyunConfig: AliyunConnectorConfig,
    deps: AsyncRESTDependencies
  ) {
    super(aliyunConfig, deps);
  }

  classifyModel(model: string): ModelClassification<AliyunModelKind> {
    return classifyAliyunModel(model);
  }

  protected normalizeParameters(model: string, params: JobParameters): JobParameters {
    const kind = this.modelKind(model);

    this.consumeAlias(params, 'source_image', 'img_url');
    this.requireFields(model, params, REQUIRED_FIELDS[kind]);

    if (params.duration === undefined || params.duration === null) {
      params.duration = DEFAULT_DURATION;
    } else if (kind === 'keyframe_to_video') {
      toDuration(params.duration);
      params.duration = DEFAULT_DURATION;
    } else {
      params.duration = Math.min(Math.max(toDuration(params.duration), MIN_DURATION), MAX_DURATION);
    }

    if (params.size !== undefined) {
      const size = typeof params.size === 'string' ? params.size.trim() : '';
      params.resolution = SIZE_TO_RESOLUTION[size] ?? DEFAULT_RESOLUTION;
      delete params.size;
    } else if (!hasValue(params, 'resolution')) {
      params.resolution = DEFAULT_RESOLUTION;
    }

    if (params.prompt_extend === undefined) params.prompt_extend = true;
    if (params.seed === undefined) params.seed = -1; // random

    params.model_type = kind;
    return params;
  }

  protected buildRequest(model: string, params: JobParameters): ProviderRequest {
    const shape = ALIYUN_REQUEST_SHAPES[this.modelKind(model)];

    const input: JobParameters = { ...shape.inputDefaults };
    for (const field of shape.input) {
      if (hasValue(params, field)) input[field] = params[field];
    }
    Object.assign(input, shape.inputConstants);

    const parameters: JobParameters = {};
    for (const field of shape.parameters) {
      const value = params[field];
      if (value === undefined || value === null) continue;
      if (field === 'seed' && !(typeof value === 'number' && value > 0)) continue;
      parameters[field] = value;
    }

    return {
      url: this.aliyunConfig.api_url ?? `${this.restConfig.base_url}${shape.endpoint}`,
      body: { model, input, parameters },
      headers: {
        'X-DashScope-Async': 'enable',
        'X-DashScope-OssResourceResolve': 'enable',
      },
    };
  }

  protected async stageInputs(
    model: string,
    params: JobParameters,
    options: CallOptions
  ): Promise<JobParameters> {
    const staged = { ...params };
    for (const field of STAGED_FIELDS[this.modelKind(model)]) {
      const source = readString(staged, field);
      if (source) {
        staged[field] = await this.artifacts.ensureStaged(source, model, this.stager, options.signal);
      }
    }
    return staged;
  }

  protected extractRemoteJobId(data: unknown): string | undefined {
    return getString(data, 'output', 'task_id');
  }

  protected buildPollingUrl(remoteJobId: string): string {
    return `${this.restConfig.base_url}/tasks/${remoteJobId}`;
  }

  protected parsePollingResponse(data: unknown): PollOutcome {
    const status = getString(data, 'output', 'task_status') ?? '';
    if (SUCCESS_STATUSES.has(status)) {
      return { state: 'succeeded', payload: data };
    }
    if (FAILURE_STATUSES.has(status)) {
      const code = getString(data, 'output', 'code') ?? 'Unknown';
      const message = getString(data, 'output', 'message') ?? 'Unknown error';
      return { state: 'failed', error: `Task failed: ${code} - ${message}` };
    }
    return { state: 'running', status };
  }

  protected async buildResult(
    model: string,
    params: JobParameters,
    payload: unknown,
    options: CallOptions
  ): Promise<CanonicalResult> {
    const videoUrl = getString(payload, 'output', 'video_url');
    if (!videoUrl) {
      throw new RemoteCallError(
        `Failed to find video URL in response: ${truncateForLog(payload, 1000)}`,
        undefined,
        payload
      );
    }

    const localPath = await this.artifacts.download(
      videoUrl,
      this.artifacts.videoPath(this.provider_name, 0),
      options.signal
    );
    const metadata: Record<string, ParamValue> = {};
    if (params.duration !== undefined) metadata.duration = params.duration;
    if (params.resolution !== undefined) metadata.resolution = params.resolution;
    const videos: VideoArtifact[] = [
      {
        index: 0,
        url: videoUrl,
        local_path: localPath,
        ...this.artifacts.resolveDisplayUrls(localPath),
        metadata,
      },
    ];

    const usage = getPath(payload, 'usage');
    return {
      id: getString(payload, 'request_id') ?? uuidv4(),
      model,
      model_type: this.modelKind(model),
      created: new Date(this.clock()).toISOString(),
      videos,
      prompt: readString(params, 'prompt'),
      actual_prompt: getString(payload, 'output', 'actual_prompt'),
      resolution: readString(params, 'resolution'),
      usage: isParamObject(usage) ? usage : undefined,
      parameters: params,
    };
  }

  // ========================================
  // Staging handshake: policy -> multipart upload -> oss:// reference
  // ========================================

  private readonly stager: InputStager = {
    isProviderReference: (url: string) => url.startsWith('oss://'),
    upload: (localPath: string, model: string, signal?: AbortSignal) =>
      this.uploadToProviderStorage(localPath, model, signal),
  };

  private async uploadToProviderStorage(
    localPath: string,
    model: string,
    signal?: AbortSignal
  ): Promise<string> {
    const policyResponse = await this.http.get<unknown>(`${this.restConfig.base_url}/uploads`, {
      params: { action: 'getPolicy', model },
      headers: this.authHeaders(),
      timeout: 30_000,
      signal,
    });

    const policy = getPath(policyResponse.data, 'data');
    const uploadDir = getString(policy, 'upload_dir');
    const uploadHost = getString(policy, 'upload_host');
    if (!uploadDir || !uploadHost) {
      throw new InputStagingError('Upload policy response is missing upload_dir or upload_host');
    }

    const fileName = path.basename(localPath);
    const key = `${uploadDir}/${fileName}`;
    const form = new FormData();
    form.append('OSSAccessKeyId', getString(policy, 'oss_access_key_id') ?? '');
    form.append('Signature', getString(policy, 'signature') ?? '');
    form.append('policy', getString(policy, 'policy') ?? '');
    form.append('x-oss-object-acl', getString(policy, 'x_oss_object_acl') ?? '');
    form.append('x-oss-forbid-overwrite', getString(policy, 'x_oss_forbid_overwrite') ?? '');
    form.append('key', key);
    form.append('success_action_status', '200');
    form.append('file', new Blob([await fs.readFile(localPath)]), fileName);

    await this.http.post(uploadHost, form, {
      headers: { 'Content-Type': 'multipart/form-data' },
      timeout: 30_000,
      signal,
    });
    return `oss://${key}`;
  }
}
