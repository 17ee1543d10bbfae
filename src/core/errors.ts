/**
 * Error taxonomy for the harvest engine.
 * Only SessionInitError and DiscoveryError end a job; the rest are local to one step.
 */
export type HarvestErrorCode =
  | 'SESSION_INIT'
  | 'DISCOVERY'
  | 'EXTRACTION_SKIP'
  | 'PUBLISH_FAILURE'
  | 'ENGINE_SHUTDOWN'
  | 'SESSION_CLOSED'
  | 'CONFIG_INVALID';

export class HarvestError extends Error {
  constructor(
    message: string,
    readonly code: HarvestErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SessionInitError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SESSION_INIT', options);
  }
}

export class DiscoveryError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DISCOVERY', options);
  }
}

export class ExtractionSkip extends HarvestError {
  constructor(
    readonly itemUrl: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'EXTRACTION_SKIP', options);
  }
}

export class PublishFailure extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PUBLISH_FAILURE', options);
  }
}

export class EngineShutdownError extends HarvestError {
  constructor(message = 'Search engine is shut down and no longer accepts submissions') {
    super(message, 'ENGINE_SHUTDOWN');
  }
}

export class SessionClosedError extends HarvestError {
  constructor(message = 'Page session is closed') {
    super(message, 'SESSION_CLOSED');
  }
}

export class ConfigValidationError extends HarvestError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
