import { isPlaceholderToken } from '@otp-relay/domain';
import type { DispatchError, DispatchResult, ExtractedToken } from '@otp-relay/domain';

export interface BackendClientOptions {
  source?: string;
  maxAttempts?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

export interface SendTokenOptions {
  signal?: AbortSignal;
}

interface TokenPayload {
  access_token: string;
  source: string;
  timestamp: string | null;
}

type AttemptOutcome =
  | { ok: true }
  | { ok: false; error: DispatchError; retryAfterMs?: number };

/** Resolves after `ms`, or as soon as the signal aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export class BackendClient {
  private readonly endpoint: string;
  private readonly healthEndpoint: string;
  private readonly source: string;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;

  constructor(baseUrl: string, options: BackendClientOptions = {}) {
    const base = baseUrl.replace(/\/+$/, '');
    this.endpoint = `${base}/api/auth/token`;
    this.healthEndpoint = `${base}/health`;
    this.source = options.source ?? 'otp-relay';
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 4);
    this.backoffMs = options.backoffMs ?? 1_000;
    this.maxBackoffMs = options.maxBackoffMs ?? 15_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? (() => new Date());
  }

  async sendAccessToken(token: ExtractedToken, options: SendTokenOptions = {}): Promise<DispatchResult> {
    if (isPlaceholderToken(token.value)) {
      return {
        status: 'failed',
        attempts: 0,
        lastError: { kind: 'BackendRejected', message: 'token_empty' }
      };
    }

    const payload: TokenPayload = {
      access_token: token.value,
      source: this.source,
      timestamp: this.now().toISOString()
    };

    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.post(payload, options.signal);
      if (outcome.ok) {
        return { status: 'success', attempts: attempt };
      }

      const exhausted = attempt >= this.maxAttempts || options.signal?.aborted === true;
      if (outcome.error.kind === 'BackendRejected' || exhausted) {
        return { status: 'failed', attempts: attempt, lastError: outcome.error };
      }

      await this.sleep(this.delayFor(attempt, outcome.retryAfterMs), options.signal);

      if (options.signal?.aborted) {
        return { status: 'failed', attempts: attempt, lastError: outcome.error };
      }
    }
  }

  async verifyConnection(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.healthEndpoint, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(5_000)
      });
      return res.status === 200;
    } catch {
      return false;
    }
  }

  private delayFor(attempt: number, retryAfterMs?: number): number {
    const exponential = this.backoffMs * 2 ** (attempt - 1);
    return Math.min(Math.max(exponential, retryAfterMs ?? 0), this.maxBackoffMs);
  }

  private async post(payload: TokenPayload, signal?: AbortSignal): Promise<AttemptOutcome> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json'
        },
        body: JSON.stringify(payload),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown_error';
      return {
        ok: false,
        error: { kind: 'BackendTransientFailure', message: `backend_unreachable:${message}` }
      };
    }

    if (res.ok) {
      return { ok: true };
    }

    let body: string;
    try {
      body = (await res.text()).slice(0, 200);
    } catch (error) {
      // Headers arrived but the connection dropped while the body streamed.
      const message = error instanceof Error ? error.message : 'unknown_error';
      return {
        ok: false,
        error: {
          kind: 'BackendTransientFailure',
          status: res.status,
          message: `backend_read_failed:${res.status}:${message}`
        }
      };
    }

    if (res.status === 429 || res.status >= 500) {
      return {
        ok: false,
        error: {
          kind: 'BackendTransientFailure',
          status: res.status,
          message: `backend_send_failed:${res.status}:${body}`
        },
        retryAfterMs: parseRetryAfter(res.headers.get('retry-after'))
      };
    }

    return {
      ok: false,
      error: {
        kind: 'BackendRejected',
        status: res.status,
        message: `backend_rejected:${res.status}:${body}`
      }
    };
  }
}
