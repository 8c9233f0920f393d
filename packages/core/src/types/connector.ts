// Provider connector contract - what every video generation provider exposes

export type ParamValue = string | number | boolean | null | ParamValue[] | { [key: string]: ParamValue };

export type JobParameters = Record<string, ParamValue>;

export type ModelKind =
  | 'text_to_video'
  | 'image_to_video'
  | 'keyframe_to_video'
  | 'reference_to_video';

export interface VideoArtifact {
  index: number;
  url: string; // remote source
  local_path: string; // '' when the download failed
  file_url: string;
  download_url: string;
  absolute_url: string;
  metadata: Record<string, ParamValue>;
}

export interface CanonicalResult {
  id: string;
  model: string;
  model_type: ModelKind;
  created: string;
  videos: VideoArtifact[];
  prompt?: string;
  actual_prompt?: string;
  resolution?: string;
  usage?: Record<string, ParamValue>;
  parameters: JobParameters;
}

export interface CallOptions {
  signal?: AbortSignal;
  jobId?: string;
}

export interface VideoConnector {
  readonly provider_name: string;
  supportedModels(): string[];
  /** Pure and deterministic. Throws ValidationError. */
  validateParameters(model: string, params: JobParameters): JobParameters;
  callModel(model: string, params: JobParameters, options?: CallOptions): Promise<CanonicalResult>;
}
