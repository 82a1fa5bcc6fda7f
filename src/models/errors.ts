/**
 * Error kinds raised by the invocation engine.
 *
 * Only FormatError, exhausted provider retries and cancellation ever reach a
 * caller of generate(), and always wrapped in GenerationFailedError.
 * MalformedResponseError and ToolParseError are recovered internally.
 */

export type EngineErrorCode =
  | 'format_error'
  | 'transient_provider_error'
  | 'permanent_provider_error'
  | 'malformed_response'
  | 'tool_parse_error'
  | 'invocation_cancelled'
  | 'unknown_model'
  | 'generation_failed';

export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FormatError extends EngineError {
  readonly code = 'format_error';
}

/** Throttling or service-unavailable failure; eligible for a connection refresh. */
export class TransientProviderError extends EngineError {
  readonly code = 'transient_provider_error';

  constructor(message: string, readonly attempt: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class PermanentProviderError extends EngineError {
  readonly code = 'permanent_provider_error';

  constructor(message: string, readonly attempt: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedResponseError extends EngineError {
  readonly code = 'malformed_response';
}

export class ToolParseError extends EngineError {
  readonly code = 'tool_parse_error';

  constructor(message: string, readonly toolName: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvocationCancelledError extends EngineError {
  readonly code = 'invocation_cancelled';
}

export class UnknownModelError extends EngineError {
  readonly code = 'unknown_model';

  constructor(readonly modelName: string, available: string[]) {
    super(`Model '${modelName}' not found. Available models: ${available.join(', ')}`);
  }
}

export type GenerationPhase = 'formatting' | 'invoking' | 'extracting';

export class GenerationFailedError extends EngineError {
  readonly code = 'generation_failed';

  constructor(readonly phase: GenerationPhase, cause: unknown) {
    super(`Generation failed while ${phase}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
