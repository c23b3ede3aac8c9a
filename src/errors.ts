/**
 * Error taxonomy.
 *
 * Configuration and binding errors are raised at setup time. Tool errors never
 * leave a Tool's `invoke`; they are rendered into the tool's text outcome.
 * Model-client failures surface as ExternalServiceError on the session result.
 */

export type ErrorCode =
  | 'CONFIGURATION'
  | 'CAPABILITY_UNAVAILABLE'
  | 'DUPLICATE_AGENT'
  | 'PATH_ESCAPE'
  | 'TOOL_EXECUTION'
  | 'EXTERNAL_SERVICE'
  | 'PERSISTENCE'
  | 'SESSION_STATE';

export abstract class RoundtableError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RoundtableError {
  readonly code = 'CONFIGURATION';

  constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CapabilityUnavailable extends RoundtableError {
  readonly code = 'CAPABILITY_UNAVAILABLE';

  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" is not registered`);
  }
}

export class DuplicateAgentError extends RoundtableError {
  readonly code = 'DUPLICATE_AGENT';

  constructor(public readonly agentName: string) {
    super(`An agent named "${agentName}" already exists in this session`);
  }
}

export class PathEscapeError extends RoundtableError {
  readonly code = 'PATH_ESCAPE';

  constructor(public readonly requestedPath: string) {
    super(`Path escapes workspace: ${requestedPath}`);
  }
}

export class ToolExecutionError extends RoundtableError {
  readonly code = 'TOOL_EXECUTION';

  constructor(
    public readonly toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ExternalServiceError extends RoundtableError {
  readonly code = 'EXTERNAL_SERVICE';

  constructor(
    public readonly service: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class PersistenceError extends RoundtableError {
  readonly code = 'PERSISTENCE';

  constructor(
    public readonly destination: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class SessionStateError extends RoundtableError {
  readonly code = 'SESSION_STATE';

  constructor(message: string) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
