import type { PolicySide, TreeKind } from '../types/policy.js';

export class PolicyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PolicyError';
  }
}

/** The input is not a well-formed policy document. */
export class PolicyDecodeError extends PolicyError {
  constructor(message: string, options?: ErrorOptions) {
    super(`failed to decode policy: ${message}`, options);
    this.name = 'PolicyDecodeError';
  }
}

/** A rule found a different kind of value than it works on. */
export class PolicyShapeError extends PolicyError {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly found: TreeKind,
  ) {
    super(`expected ${expected} at "${path}", found ${found}`);
    this.name = 'PolicyShapeError';
  }
}

export class PolicyComparisonError extends PolicyError {
  constructor(
    public readonly side: PolicySide,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`failed to prepare ${side} policy: ${detail}`, { cause });
    this.name = 'PolicyComparisonError';
  }
}

/**
 * A test case ran to completion but the found policy does not match the
 * expected one. `details` holds the diff.
 */
export class TestCaseFailedError extends PolicyError {
  constructor(
    message: string,
    public readonly details: string,
  ) {
    super(message);
    this.name = 'TestCaseFailedError';
  }
}

/** "outer: inner: innermost", following `cause` the way wrapped errors read. */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  let message = err.message;
  let cause: unknown = err.cause;
  while (cause !== undefined) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    if (!message.includes(detail)) message += `: ${detail}`;
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return message;
}
