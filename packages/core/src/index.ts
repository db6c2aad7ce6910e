// Engine layer
export {ImageBuilder, DockerCliBuilder, dockerBuildArgs, dockerProbeArgs, parseInspectOutput, type LogLine, type OnLogLine} from './engine/index.js'
export type {BuildImageRequest, BuildImageResult, ImageInfo, ProbeRequest, ProbeResult} from './engine/index.js'

// Registry
export {Registry, loadRegistry, parseRegistry, parseRegistryFile, formatFromPath, isRecord} from './registry.js'
export type {RegistryFormat, RegistrySource} from './registry.js'

// Planning
export {plan, parseSelector, selectEntries, resolveStrategy, toImageTag, defaultContainerfile, defaultImagePrefix} from './planner.js'
export type {PlanOptions} from './planner.js'
export {canTransition, transitionTask, isTerminalStatus, isFailedStatus} from './task-state.js'
export {UpstreamVersionResolver, resolveLatestVersions, escapeModulePath, describeSource, toResolutionError} from './version-resolver.js'
export type {VersionResolver, UpstreamVersionResolverOptions, LatestVersions} from './version-resolver.js'

// Execution and verification
export {BuildExecutor, type ExecuteOptions, type BuildExecutorOptions} from './build-executor.js'
export {Verifier, defaultProbeArgs, type VerifyOptions} from './verifier.js'
export {BuildOrchestrator, withConcurrency, defaultTimeoutSec, defaultProbeTimeoutSec} from './orchestrator.js'
export type {RunOptions, OrchestratorOptions} from './orchestrator.js'

// Changed targets
export {selectChangedTargets, listChangedFiles} from './changes.js'
export type {ChangedTargetsOptions, ChangedFilesOptions} from './changes.js'

// Reporting
export {aggregate, serializeReport, writeReport, formatReport} from './report.js'
export {ConsoleReporter, logger} from './reporter.js'
export type {
  Reporter,
  TargetRef,
  RunEvent,
  RunStartEvent,
  TargetPlanFailedEvent,
  TargetBuildingEvent,
  TargetLogEvent,
  TargetBuiltEvent,
  TargetBuildFailedEvent,
  TargetVerifyingEvent,
  TargetVerifiedEvent,
  TargetVerificationFailedEvent,
  RunCancelledEvent,
  RunFinishedEvent
} from './reporter.js'

// Utilities
export {formatSize, formatDuration, LogTail} from './utils.js'

// Domain types
export {sourceKinds, buildStrategies, versionSourceTypes, latestVersion, maxTimeoutSec} from './types.js'
export type {
  SourceKind,
  BuildStrategy,
  VersionSourceType,
  VersionSource,
  ProbeSpec,
  RegistryEntry,
  Selector,
  BaseImageClass,
  StrategyProfile,
  TaskStatus,
  TaskStage,
  TaskError,
  BuildTask,
  BuildFailureReason,
  BuildResult,
  VerificationCheck,
  VerificationReport,
  TaskFailure,
  TaskReport,
  RunReport,
  ImagewrightConfig
} from './types.js'

// Errors
export {
  ImagewrightError,
  ValidationError,
  UnknownVariantError,
  ConfigError,
  SelectionError,
  UnknownTargetError,
  DuplicateTargetError,
  EmptySelectionError,
  VersionResolutionError,
  InvalidTransitionError,
  DockerError,
  DockerNotAvailableError,
  BuildTimeoutError,
  BuildCancelledError
} from './errors.js'
