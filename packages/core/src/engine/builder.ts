import type {BuildImageRequest, BuildImageResult, ImageInfo, ProbeRequest, ProbeResult} from './types.js'

/**
 * Log line from an image build.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving build output in real time.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract container build backend.
 *
 * Implementations:
 * - `DockerCliBuilder`: Uses the Docker CLI
 *
 * The backend owns the image store and its concurrency safety. It is
 * responsible for:
 * - Building an image from a context, build arguments and a tag
 * - Streaming build output in real time
 * - Reporting image facts (size) for verification
 * - Starting an image with a probe invocation
 */
export abstract class ImageBuilder {
  /**
   * Verifies that the backend is available and functional.
   * @throws If the backend is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Builds an image. A non-zero exit code is returned, not thrown.
   * When `request.signal` aborts, the build is stopped and the result has
   * `aborted: true`.
   */
  abstract build(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult>

  /**
   * Looks up a built image.
   * @returns undefined when the reference does not resolve
   */
  abstract inspect(imageRef: string): Promise<ImageInfo | undefined>

  /**
   * Starts the image with a fixed invocation and waits for it to exit.
   * A timeout is reported through `timedOut`, not thrown.
   */
  abstract probe(request: ProbeRequest): Promise<ProbeResult>

  /**
   * Force-stop every build currently run by this process.
   * Called from signal handlers on a second interrupt.
   */
  abstract killRunningBuilds(): Promise<void>
}
