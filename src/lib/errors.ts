/**
 * Error taxonomy
 *
 * AdapterError and SynthesisError are recoverable and never reach an MCP
 * caller; StorageError is retried by the watcher and degrades to a cache
 * miss in the server.
 */

export type ContextErrorCode =
  | 'ADAPTER_FAILURE'
  | 'SYNTHESIS_FAILURE'
  | 'STORAGE_FAILURE'
  | 'TASK_NOT_FOUND'
  | 'CANCELLED'
  | 'TIMEOUT';

export class ContextError extends Error {
  readonly code: ContextErrorCode;

  constructor(code: ContextErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ContextError';
    this.code = code;
  }
}

/**
 * One source failed: network, auth, non-2xx response
 */
export class AdapterError extends ContextError {
  readonly source: string;
  readonly status?: number;

  constructor(source: string, message: string, options?: { status?: number; cause?: unknown }) {
    super('ADAPTER_FAILURE', `${source}: ${message}`, { cause: options?.cause });
    this.name = 'AdapterError';
    this.source = source;
    this.status = options?.status;
  }
}

export class SynthesisError extends ContextError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS_FAILURE', message, options);
    this.name = 'SynthesisError';
  }
}

export class StorageError extends ContextError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_FAILURE', message, options);
    this.name = 'StorageError';
  }
}

export class TaskNotFoundError extends ContextError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('TASK_NOT_FOUND', `No source returned any context for ${taskId}`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class CancelledError extends ContextError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

export class TimeoutError extends ContextError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, what = 'Operation') {
    super('TIMEOUT', `${what} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
