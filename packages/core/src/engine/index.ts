export {ImageBuilder, type LogLine, type OnLogLine} from './builder.js'
export {DockerCliBuilder, dockerBuildArgs, dockerProbeArgs, parseInspectOutput} from './docker-builder.js'
export type {BuildImageRequest, BuildImageResult, ImageInfo, ProbeRequest, ProbeResult} from './types.js'
