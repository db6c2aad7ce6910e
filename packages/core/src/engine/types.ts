/**
 * Request to build one image from a build context.
 */
export type BuildImageRequest = {
  /** Absolute path of the build context */
  contextDir: string;
  /** Containerfile path, relative to the context */
  containerfile: string;
  /** Tag given to the produced image (e.g., imagewright/gopls:0.15.0) */
  tag: string;
  /** Build arguments (--build-arg) */
  buildArgs: Record<string, string>;
  /** Labels attached to the image */
  labels?: Record<string, string>;
  /** Disable the layer cache for this build */
  noCache?: boolean;
  /** Aborted on timeout or run cancellation; the backend stops the build */
  signal?: AbortSignal;
}

/**
 * Result of an image build.
 */
export type BuildImageResult = {
  /** Exit code of the build backend (0 = success) */
  exitCode: number;
  startedAt: Date;
  finishedAt: Date;
  /** True when the build was stopped through the request signal */
  aborted?: boolean;
  /** Error message if the backend could not run */
  error?: string;
}

/**
 * Facts about a built image.
 */
export type ImageInfo = {
  /** Image id or digest */
  id: string;
  /** Uncompressed image size in bytes */
  sizeBytes: number;
}

/**
 * Request to start an image with a fixed invocation.
 */
export type ProbeRequest = {
  image: string;
  args: string[];
  /** Overrides the image entrypoint */
  entrypoint?: string;
  timeoutSec: number;
}

export type ProbeResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}
