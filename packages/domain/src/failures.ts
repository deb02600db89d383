import type { LoginFailure, LoginFailureKind, LoginStage } from './types.js';

// Kinds a fresh browser session can plausibly get past. OtpTimeout is included because a new
// attempt makes the site send a new code.
const RETRYABLE_LOGIN_FAILURES: ReadonlySet<LoginFailureKind> = new Set<LoginFailureKind>([
  'TransportError',
  'Timeout',
  'OtpTimeout'
]);

export function isRetryableLoginFailure(failure: LoginFailure): boolean {
  return RETRYABLE_LOGIN_FAILURES.has(failure.kind);
}

export function loginFailure(
  kind: LoginFailureKind,
  stage: LoginStage,
  message: string,
  diagnosticRef?: string
): LoginFailure {
  return diagnosticRef ? { kind, stage, message, diagnosticRef } : { kind, stage, message };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown_error';
}
