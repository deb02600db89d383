import { OtpMailbox, type OtpMailboxOptions } from './otp-mailbox.js';

export interface MailboxLease {
  runId: string;
  mailbox: OtpMailbox;
  release(): void;
}

interface Waiter {
  runId: string;
  grant: (lease: MailboxLease) => void;
}

/**
 * Hands out the active mailbox to one run at a time, in arrival order. Releasing a lease swaps in
 * a fresh mailbox so nothing deposited for one run is seen by the next.
 */
export class MailboxRegistry {
  private mailbox: OtpMailbox;
  private holder: string | null = null;
  private readonly queue: Waiter[] = [];

  constructor(private readonly options: OtpMailboxOptions = {}) {
    this.mailbox = new OtpMailbox(options);
  }

  active(): OtpMailbox {
    return this.mailbox;
  }

  activeRunId(): string | null {
    return this.holder;
  }

  async acquire(runId: string): Promise<MailboxLease> {
    if (this.holder === null) {
      return this.lease(runId);
    }
    return await new Promise<MailboxLease>((grant) => {
      this.queue.push({ runId, grant });
    });
  }

  private lease(runId: string): MailboxLease {
    this.holder = runId;
    const mailbox = this.mailbox;
    let released = false;

    return {
      runId,
      mailbox,
      release: () => {
        if (released) return;
        released = true;
        this.holder = null;
        this.mailbox = new OtpMailbox(this.options);

        // The next run holds the lease before release returns, so a later acquire queues behind it.
        const next = this.queue.shift();
        if (next) {
          next.grant(this.lease(next.runId));
        }
      }
    };
  }
}
