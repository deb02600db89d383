import type { StorageSnapshot } from '@otp-relay/domain';

/** A bounded wait inside the browser elapsed. */
export class StepTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StepTimeoutError';
  }
}

/**
 * The browser operations the login flow needs. Lookups that are expected to miss return
 * false/null; navigation and input failures throw (StepTimeoutError for elapsed waits).
 */
export interface LoginPage {
  navigate(url: string): Promise<void>;
  findFirst(selectors: readonly string[], timeoutMs: number): Promise<string | null>;
  isVisible(selector: string, timeoutMs: number): Promise<boolean>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  waitForUrl(fragment: string, timeoutMs: number): Promise<boolean>;
  currentUrl(): string;
  readStorage(): Promise<StorageSnapshot>;
  /** Starts keeping the bodies of responses whose URL contains `urlFragment`. */
  watchResponses(urlFragment: string): void;
  capturedResponses(): Promise<string[]>;
  captureDiagnostics(label: string): Promise<string | null>;
  close(): Promise<void>;
}

export interface BrowserLauncher {
  launch(): Promise<LoginPage>;
}
