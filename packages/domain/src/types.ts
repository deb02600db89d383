export type StorageTier = 'persistent' | 'session' | 'cookie';

export const STORAGE_TIER_ORDER: readonly StorageTier[] = ['persistent', 'session', 'cookie'];

export type StorageSnapshot = Record<StorageTier, Record<string, string>>;

/** Storage tiers, then the callback response body, then the landing URL's query and fragment. */
export type TokenSource = StorageTier | 'response' | 'url';

export interface Credentials {
  readonly identifier: string;
  readonly secret: string;
  readonly pin?: string;
}

export interface OtpEvent {
  value: string;
  receivedAt: Date;
}

export interface ExtractedToken {
  value: string;
  sourceTier: TokenSource;
  sourceKey: string;
  extractedAt: Date;
}

export type LoginStage =
  | 'Idle'
  | 'NavigatedToLogin'
  | 'CredentialsSubmitted'
  | 'AwaitingOtp'
  | 'OtpSubmitted'
  | 'Authenticated'
  | 'TokenExtracted';

export type LoginFailureKind =
  | 'LoginFormError'
  | 'OtpPromptNotFound'
  | 'OtpTimeout'
  | 'OtpRejected'
  | 'TokenNotFound'
  | 'TransportError'
  | 'Timeout';

export interface LoginFailure {
  kind: LoginFailureKind;
  stage: LoginStage;
  message: string;
  diagnosticRef?: string;
}

export type LoginOutcome =
  | { ok: true; token: ExtractedToken }
  | { ok: false; failure: LoginFailure };

export type DispatchErrorKind = 'BackendRejected' | 'BackendTransientFailure';

export interface DispatchError {
  kind: DispatchErrorKind;
  message: string;
  status?: number;
}

export type RunFailure = LoginFailure | DispatchError;

export interface DispatchResult {
  status: 'success' | 'failed';
  attempts: number;
  lastError?: RunFailure;
}

export interface RunReport {
  runId: string;
  loginAttempts: number;
  startedAt: Date;
  finishedAt: Date;
  result: DispatchResult;
}
