/**
 * Error hierarchy for the configuration server.
 *
 * Every error carries a `kind` discriminator so callers (and tests) can branch
 * on the category without parsing message text. Context such as the failing
 * git stage or the captured stderr is kept in structured fields.
 */

export type ErrorKind = 'io' | 'parse' | 'decode' | 'git' | 'not_found' | 'bad_request' | 'unauthorized' | 'config';

export type GitStage = 'clone' | 'fetch' | 'reset' | 'ls-tree';

export abstract class ConfigServerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Filesystem access or process spawn failed.
 */
export class IoError extends ConfigServerError {
  readonly kind = 'io';

  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`IO error during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/**
 * A structured document (YAML) could not be parsed.
 */
export class ParseError extends ConfigServerError {
  readonly kind = 'parse';

  constructor(
    readonly file: string,
    readonly detail: string
  ) {
    super(`Failed to parse ${file}: ${detail}`);
  }
}

/**
 * Bytes were expected to be UTF-8 text and were not.
 */
export class DecodeError extends ConfigServerError {
  readonly kind = 'decode';

  constructor(readonly file: string) {
    super(`File is not valid UTF-8: ${file}`);
  }
}

export class GitOperationError extends ConfigServerError {
  readonly kind = 'git';

  constructor(
    readonly stage: GitStage,
    readonly stderr: string,
    readonly args: readonly string[] = []
  ) {
    super(`git ${stage} failed: ${stderr}`);
  }
}

export class NotFoundError extends ConfigServerError {
  readonly kind = 'not_found';

  constructor(readonly resource: string) {
    super(`Not found: ${resource}`);
  }
}

export class BadRequestError extends ConfigServerError {
  readonly kind = 'bad_request';
}

export class UnauthorizedError extends ConfigServerError {
  readonly kind = 'unauthorized';

  constructor() {
    super('Unauthorized');
  }
}

/**
 * Startup configuration is missing or invalid.
 */
export class ConfigurationError extends ConfigServerError {
  readonly kind = 'config';

  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export function isConfigServerError(err: unknown): err is ConfigServerError {
  return err instanceof ConfigServerError;
}
