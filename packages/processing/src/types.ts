/**
 * Processing Types
 */

export interface BackendRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface BackendResult {
  exitCode: number;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

/**
 * Something that can run one ffmpeg-style invocation. The encoder only
 * depends on this; `FFmpeg` is the production implementation.
 */
export interface EncodeBackend {
  run(args: string[], options: BackendRunOptions): Promise<BackendResult>;
}
