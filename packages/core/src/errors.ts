export class ImagewrightError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ImagewrightError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Registry errors ---------------------------------------------------------

export class ValidationError extends ImagewrightError {
  constructor(message: string, options?: {cause?: unknown; code?: string}) {
    super(options?.code ?? 'VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class UnknownVariantError extends ValidationError {
  constructor(
    readonly field: string,
    readonly value: string,
    readonly allowed: readonly string[],
    context: string
  ) {
    super(`${context}: unknown ${field} '${value}' (expected one of: ${allowed.join(', ')})`, {code: 'UNKNOWN_VARIANT'})
    this.name = 'UnknownVariantError'
  }
}

export class ConfigError extends ImagewrightError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONFIG_ERROR', message, options)
    this.name = 'ConfigError'
  }
}

// -- Selection errors --------------------------------------------------------

export class SelectionError extends ImagewrightError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'SelectionError'
  }
}

export class UnknownTargetError extends SelectionError {
  constructor(readonly targets: string[]) {
    super('UNKNOWN_TARGET', `Unknown target${targets.length > 1 ? 's' : ''}: ${targets.join(', ')}`)
    this.name = 'UnknownTargetError'
  }
}

export class DuplicateTargetError extends SelectionError {
  constructor(readonly targets: string[]) {
    super('DUPLICATE_TARGET', `Target requested more than once: ${targets.join(', ')}`)
    this.name = 'DuplicateTargetError'
  }
}

export class EmptySelectionError extends SelectionError {
  constructor(pattern: string) {
    super('EMPTY_SELECTION', `Pattern '${pattern}' matched no targets`)
    this.name = 'EmptySelectionError'
  }
}

// -- Planning errors ---------------------------------------------------------

export class VersionResolutionError extends ImagewrightError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VERSION_RESOLUTION_FAILED', message, options)
    this.name = 'VersionResolutionError'
  }

  override get transient(): boolean {
    return true
  }
}

export class InvalidTransitionError extends ImagewrightError {
  constructor(
    readonly target: string,
    readonly from: string,
    readonly to: string
  ) {
    super('INVALID_TRANSITION', `Target ${target}: invalid status transition ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

// -- Docker errors -----------------------------------------------------------

export class DockerError extends ImagewrightError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DockerError'
  }
}

export class DockerNotAvailableError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class BuildTimeoutError extends DockerError {
  constructor(timeoutSec: number, options?: {cause?: unknown}) {
    super('BUILD_TIMEOUT', `Build exceeded timeout of ${timeoutSec}s`, options)
    this.name = 'BuildTimeoutError'
  }
}

export class BuildCancelledError extends DockerError {
  constructor(options?: {cause?: unknown}) {
    super('BUILD_CANCELLED', 'Build cancelled', options)
    this.name = 'BuildCancelledError'
  }
}
