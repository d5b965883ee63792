export type EngineErrorCode =
  | 'invalid_board'
  | 'invalid_config'
  | 'episode_finished'
  | 'concurrent_mutation';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class BoardValidationError extends EngineError {
  constructor(message: string) {
    super('invalid_board', message);
  }
}

export class ConfigValidationError extends EngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('invalid_config', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class EpisodeFinishedError extends EngineError {
  constructor() {
    super('episode_finished', 'Episode is finished. Call reset() to start a new episode.');
  }
}

export class ConcurrentMutationError extends EngineError {
  constructor(operation: string) {
    super(
      'concurrent_mutation',
      `Registry mutation "${operation}" started while another mutation was in progress`,
    );
  }
}

export type PersistenceFailureReason = 'missing' | 'corrupt' | 'io' | 'unsupported';

export type PersistenceResult =
  | { ok: true; path: string }
  | { ok: false; reason: PersistenceFailureReason; message: string };

export function persistenceFailure(
  reason: PersistenceFailureReason,
  message: string,
): PersistenceResult {
  return { ok: false, reason, message };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
