import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { abortableSleep, type BackendClient } from '@otp-relay/clients';
import { isRetryableLoginFailure } from '@otp-relay/domain';
import type { DispatchResult, LoginOutcome, RunReport } from '@otp-relay/domain';
import type { LoginOrchestrator } from './login-orchestrator.js';
import type { MailboxRegistry } from './mailbox-registry.js';
import type { OtpMailbox } from './otp-mailbox.js';

export interface RunCoordinatorOptions {
  maxLoginAttempts: number;
  loginRetryDelayMs: number;
  runDeadlineMs: number;
  logger: Logger;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export class RunCoordinator {
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(
    private readonly registry: MailboxRegistry,
    private readonly orchestrator: LoginOrchestrator,
    private readonly backend: BackendClient,
    private readonly options: RunCoordinatorOptions
  ) {
    this.sleep = options.sleep ?? abortableSleep;
  }

  async run(runId: string = randomUUID()): Promise<RunReport> {
    const log = this.options.logger.child({ runId });
    const startedAt = new Date();
    const lease = await this.registry.acquire(runId);
    const controller = new AbortController();
    const deadline = setTimeout(() => {
      log.warn({ deadlineMs: this.options.runDeadlineMs }, 'run_deadline_exceeded');
      controller.abort();
    }, this.options.runDeadlineMs);

    log.info('run_started');
    try {
      const { outcome, attempts } = await this.loginWithRetry(lease.mailbox, controller.signal, log);
      lease.release();

      const result: DispatchResult = outcome.ok
        ? await this.backend.sendAccessToken(outcome.token, { signal: controller.signal })
        : { status: 'failed', attempts: 0, lastError: outcome.failure };

      const report: RunReport = { runId, loginAttempts: attempts, startedAt, finishedAt: new Date(), result };
      if (result.status === 'success') {
        log.info({ loginAttempts: attempts, dispatchAttempts: result.attempts }, 'run_succeeded');
      } else {
        log.error({ loginAttempts: attempts, dispatchAttempts: result.attempts, lastError: result.lastError }, 'run_failed');
      }
      return report;
    } finally {
      clearTimeout(deadline);
      lease.release();
    }
  }

  private async loginWithRetry(
    mailbox: OtpMailbox,
    signal: AbortSignal,
    log: Logger
  ): Promise<{ outcome: LoginOutcome; attempts: number }> {
    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.orchestrator.login(mailbox, signal, log.child({ attempt }));
      if (outcome.ok) {
        return { outcome, attempts: attempt };
      }

      const retry =
        isRetryableLoginFailure(outcome.failure) && attempt < this.options.maxLoginAttempts && !signal.aborted;
      if (!retry) {
        return { outcome, attempts: attempt };
      }

      log.warn({ kind: outcome.failure.kind, attempt, delayMs: this.options.loginRetryDelayMs }, 'login_retry_scheduled');
      await this.sleep(this.options.loginRetryDelayMs, signal);
    }
  }
}
