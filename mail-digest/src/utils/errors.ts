/**
 * Error taxonomy
 *
 * MailDigestError (base)
 * ├── InputError              - missing/unparseable upload, bad batch count
 * ├── UpstreamMailError       - mail source unreachable or not authenticated
 * └── UpstreamCompletionError - completion API failed, timed out or returned garbage
 *
 * ConfigError stands apart: a startup fault in the process configuration,
 * never the outcome of a request.
 *
 * An empty body or a missing deadline is not an error and never raises one.
 */

export type ErrorKind = 'input' | 'upstream_mail' | 'upstream_completion';

export interface ErrorContext {
  messageId?: string;
  statusCode?: number;
  cause?: unknown;
}

export class MailDigestError extends Error {
  readonly kind: ErrorKind;
  readonly messageId?: string;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'MailDigestError';
    this.kind = kind;
    this.messageId = context.messageId;
  }
}

export class InputError extends MailDigestError {
  constructor(message: string, context: ErrorContext = {}) {
    super('input', message, context);
    this.name = 'InputError';
  }
}

export class UpstreamMailError extends MailDigestError {
  constructor(message: string, context: ErrorContext = {}) {
    super('upstream_mail', message, context);
    this.name = 'UpstreamMailError';
  }
}

export class UpstreamCompletionError extends MailDigestError {
  readonly statusCode?: number;

  constructor(message: string, context: ErrorContext = {}) {
    super('upstream_completion', message, context);
    this.name = 'UpstreamCompletionError';
    this.statusCode = context.statusCode;
  }
}

export class ConfigError extends Error {
  readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

export function isMailDigestError(error: unknown): error is MailDigestError {
  return error instanceof MailDigestError;
}

/**
 * Render any thrown value as a message
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
