import type { OtpEvent } from '@otp-relay/domain';

export type OtpWaitResult =
  | { ok: true; event: OtpEvent }
  | { ok: false; reason: 'timeout' | 'aborted' | 'busy' };

export interface OtpMailboxStatus {
  pending: boolean;
  receivedAt: Date | null;
  expiresAt: Date | null;
}

export interface OtpMailboxOptions {
  expirationMs?: number;
  now?: () => Date;
}

/**
 * Single-slot handoff between the webhook receiver and a blocked login flow.
 * Deposits never wait; a blocked waiter is handed the event directly, otherwise it stays
 * pending (last write wins) until the next awaitValue call takes it.
 */
export class OtpMailbox {
  private pending: OtpEvent | null = null;
  private waiter: ((result: OtpWaitResult) => void) | null = null;
  private readonly expirationMs: number;
  private readonly now: () => Date;

  constructor(options: OtpMailboxOptions = {}) {
    this.expirationMs = options.expirationMs ?? 5 * 60_000;
    this.now = options.now ?? (() => new Date());
  }

  deposit(value: string): OtpEvent {
    const event: OtpEvent = { value, receivedAt: this.now() };
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      this.pending = null;
      waiter({ ok: true, event });
    } else {
      this.pending = event;
    }
    return event;
  }

  awaitValue(timeoutMs: number, signal?: AbortSignal): Promise<OtpWaitResult> {
    if (signal?.aborted) {
      return Promise.resolve({ ok: false, reason: 'aborted' });
    }
    if (this.waiter) {
      return Promise.resolve({ ok: false, reason: 'busy' });
    }

    const ready = this.take();
    if (ready) {
      return Promise.resolve({ ok: true, event: ready });
    }

    return new Promise<OtpWaitResult>((resolve) => {
      const settle = (result: OtpWaitResult) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === settle) {
          this.waiter = null;
        }
        resolve(result);
      };
      const onAbort = () => settle({ ok: false, reason: 'aborted' });
      const timer = setTimeout(() => settle({ ok: false, reason: 'timeout' }), timeoutMs);

      this.waiter = settle;
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  expiresAt(event: OtpEvent): Date {
    return new Date(event.receivedAt.getTime() + this.expirationMs);
  }

  status(): OtpMailboxStatus {
    const pending = this.current();
    return {
      pending: pending !== null,
      receivedAt: pending?.receivedAt ?? null,
      expiresAt: pending ? this.expiresAt(pending) : null
    };
  }

  clear(): boolean {
    const hadValue = this.pending !== null;
    this.pending = null;
    return hadValue;
  }

  private current(): OtpEvent | null {
    if (this.pending && this.now().getTime() > this.expiresAt(this.pending).getTime()) {
      this.pending = null;
    }
    return this.pending;
  }

  private take(): OtpEvent | null {
    const event = this.current();
    this.pending = null;
    return event;
  }
}
