// ---------------------------------------------------------------------------
// Shared domain types.
//
// Used by the planner, the executor, the verifier and the report, and
// consumed by the CLI.
// ---------------------------------------------------------------------------

// -- Registry ---------------------------------------------------------------

export const sourceKinds = ['module-install', 'archive-download', 'package-manager-install'] as const
export type SourceKind = typeof sourceKinds[number]

export const buildStrategies = ['multi-stage-static', 'multi-stage-dynamic-libc', 'runtime-prune'] as const
export type BuildStrategy = typeof buildStrategies[number]

export const versionSourceTypes = ['npm', 'pypi', 'github', 'go', 'crates', 'custom'] as const
export type VersionSourceType = typeof versionSourceTypes[number]

/** Sentinel version resolved against the upstream release index at plan time. */
export const latestVersion = 'latest'

/** Longest timeout a timer can hold (2^31 - 1 ms). */
export const maxTimeoutSec = 2_147_483

/** Where the latest upstream version of a target is looked up. */
export type VersionSource = {
  type: VersionSourceType;
  /** Package or module name (npm, pypi, go, crates). */
  package?: string;
  /** `owner/name` GitHub repository (github). */
  repo?: string;
  /** Shell command printing the version on stdout (custom). */
  command?: string;
  /** Strip a leading `v` from the resolved version. */
  stripV?: boolean;
}

/** Fixed invocation used to check that a built image starts. */
export type ProbeSpec = {
  /** Arguments passed to the image (default: ["--version"]). */
  args?: string[];
  /** Overrides the image entrypoint. */
  entrypoint?: string;
  /** When true the probe output must contain the resolved version. */
  expectVersion?: boolean;
}

/** One buildable image target, as declared in the registry. */
export type RegistryEntry = {
  name: string;
  kind: SourceKind;
  /** Exact version, or "latest". */
  version: string;
  buildStrategy: BuildStrategy;
  /** Upper bound on the final image size. No size check when absent. */
  sizeBudgetBytes?: number;
  source?: VersionSource;
  /** Build context, relative to the registry file (default: name). */
  context?: string;
  /** Containerfile inside the context (default: "ContainerFile"). */
  containerfile?: string;
  buildArgs?: Record<string, string>;
  /** Overrides the strategy's default runtime base image. */
  runtimeBase?: string;
  probe?: ProbeSpec;
  /** Build timeout for this target, overriding the run default. */
  timeoutSec?: number;
}

// -- Planning ---------------------------------------------------------------

export type Selector =
  | {type: 'all'}
  | {type: 'names'; names: string[]}
  | {type: 'pattern'; pattern: string}

export type BaseImageClass = 'static' | 'libc' | 'runtime'

export type StrategyProfile = {
  strategy: BuildStrategy;
  baseImageClass: BaseImageClass;
  runtimeBase?: string;
}

export type TaskStatus =
  | 'Pending'
  | 'Building'
  | 'Succeeded'
  | 'BuildFailed'
  | 'Verifying'
  | 'Verified'
  | 'VerificationFailed'
  | 'PlanFailed'

export type TaskStage = 'plan' | 'build' | 'verify'

export type TaskError = {
  stage: TaskStage;
  code: string;
  message: string;
}

/** One planned unit of work. Owned by the run, never persisted. */
export type BuildTask = {
  /** Position in the plan. */
  index: number;
  /** Registry entry name (lookup only). */
  name: string;
  requestedVersion: string;
  resolvedVersion?: string;
  status: TaskStatus;
  imageTag?: string;
  strategy: StrategyProfile;
  /** Absolute build context directory. */
  contextDir: string;
  /** Containerfile path relative to the context. */
  containerfile: string;
  buildArgs: Record<string, string>;
  error?: TaskError;
}

// -- Results ----------------------------------------------------------------

export type BuildFailureReason = 'NonZeroExit' | 'Timeout' | 'Cancelled' | 'BackendError'

export type BuildResult = {
  name: string;
  outcome: 'succeeded' | 'failed';
  reason?: BuildFailureReason;
  /** Present only when the build succeeded. */
  imageRef?: string;
  exitCode?: number;
  /** Tail of the build output. */
  logExcerpt: string[];
  durationMs: number;
  sizeBytes?: number;
  error?: string;
}

export type VerificationCheck = {
  name: string;
  passed: boolean;
  detail: string;
}

export type VerificationReport = {
  name: string;
  checks: VerificationCheck[];
  overallPassed: boolean;
}

export type TaskFailure = {
  stage: TaskStage | 'cancelled';
  detail: string;
}

export type TaskReport = {
  task: BuildTask;
  result?: BuildResult;
  verification?: VerificationReport;
  failure?: TaskFailure;
}

export type RunReport = {
  tasks: TaskReport[];
  summary: Record<TaskStatus, number>;
  exitCode: number;
}

// -- Configuration ----------------------------------------------------------

/** Project-level configuration read from `.imagewright.yml`. */
export type ImagewrightConfig = {
  registry?: string;
  concurrency?: number;
  timeoutSec?: number;
  probeTimeoutSec?: number;
  imagePrefix?: string;
  noCache?: boolean;
  globalTriggers?: string[];
}
