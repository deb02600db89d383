import { BackendClient } from '@otp-relay/clients';
import { normalizeOtp } from '@otp-relay/domain';
import { PlaywrightLauncher } from './adapters/playwright-login-page.js';
import { env } from './config/env.js';
import { loadLoginFlow } from './config/login-flow.js';
import { logger } from './logger.js';
import { buildServer } from './server.js';
import { LoginOrchestrator } from './services/login-orchestrator.js';
import { MailboxRegistry } from './services/mailbox-registry.js';
import { RunCoordinator } from './services/run-coordinator.js';

async function main(): Promise<number> {
  if (!env.LOGIN_URL || !env.LOGIN_IDENTIFIER) {
    logger.error('login_not_configured: set LOGIN_URL and LOGIN_IDENTIFIER');
    return 1;
  }

  let staticOtp: string | undefined;
  if (env.LOGIN_STATIC_OTP) {
    const normalized = normalizeOtp(env.LOGIN_STATIC_OTP, env.OTP_LENGTH);
    if (!normalized.ok) {
      logger.error({ reason: normalized.reason }, 'static_otp_invalid');
      return 1;
    }
    staticOtp = normalized.value;
  }

  const flow = await loadLoginFlow(env.LOGIN_FLOW_FILE);
  const registry = new MailboxRegistry({ expirationMs: env.OTP_EXPIRATION_MS });

  let ready = false;
  const app = await buildServer({
    registry,
    logger,
    otpLength: env.OTP_LENGTH,
    webhookSecret: env.OTP_WEBHOOK_SECRET,
    isReady: () => ready
  });
  await app.listen({ port: env.PORT, host: env.OTP_API_HOST });
  ready = true;
  logger.info({ endpoint: `POST http://${env.OTP_API_HOST}:${env.PORT}/api/otp` }, 'otp_receiver_ready');

  try {
    const backend = new BackendClient(env.BACKEND_API_URL, {
      source: env.TOKEN_SOURCE,
      maxAttempts: env.BACKEND_MAX_ATTEMPTS,
      backoffMs: env.BACKEND_BACKOFF_MS,
      maxBackoffMs: env.BACKEND_MAX_BACKOFF_MS,
      requestTimeoutMs: env.BACKEND_TIMEOUT_MS
    });
    if (!(await backend.verifyConnection())) {
      logger.warn({ backend: env.BACKEND_API_URL }, 'backend_health_check_failed');
    }

    const launcher = new PlaywrightLauncher({
      headless: env.HEADLESS,
      timeoutMs: env.BROWSER_TIMEOUT_MS,
      diagnosticsDir: env.DIAGNOSTICS_DIR,
      channel: env.BROWSER_CHANNEL,
      executablePath: env.BROWSER_EXECUTABLE_PATH,
      logger
    });

    const orchestrator = new LoginOrchestrator(launcher, {
      flow,
      loginUrl: env.LOGIN_URL,
      credentials: { identifier: env.LOGIN_IDENTIFIER, secret: env.LOGIN_SECRET, pin: env.LOGIN_PIN },
      staticOtp,
      fieldTimeoutMs: env.BROWSER_TIMEOUT_MS,
      otpPromptTimeoutMs: env.OTP_PROMPT_TIMEOUT_MS,
      otpWaitTimeoutMs: env.OTP_WAIT_TIMEOUT_MS,
      successTimeoutMs: env.LOGIN_SUCCESS_TIMEOUT_MS,
      logger
    });

    const coordinator = new RunCoordinator(registry, orchestrator, backend, {
      maxLoginAttempts: env.LOGIN_MAX_ATTEMPTS,
      loginRetryDelayMs: env.LOGIN_RETRY_DELAY_MS,
      runDeadlineMs: env.RUN_DEADLINE_MS,
      logger
    });

    const report = await coordinator.run();
    logger.info(
      {
        runId: report.runId,
        status: report.result.status,
        attempts: report.result.attempts,
        loginAttempts: report.loginAttempts
      },
      'run_report'
    );
    return report.result.status === 'success' ? 0 : 1;
  } finally {
    ready = false;
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'relay_fatal');
    process.exitCode = 1;
  });
