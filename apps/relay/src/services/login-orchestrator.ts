import type { Logger } from 'pino';
import {
  describeError,
  extractToken,
  loginFailure,
  maskOtp,
  maskToken
} from '@otp-relay/domain';
import type { Credentials, LoginFailure, LoginFailureKind, LoginOutcome, LoginStage } from '@otp-relay/domain';
import type { CodeInput, LoginFlow } from '../config/login-flow.js';
import { StepTimeoutError, type BrowserLauncher, type LoginPage } from './login-page.js';
import type { OtpMailbox } from './otp-mailbox.js';

export interface LoginOrchestratorOptions {
  flow: LoginFlow;
  loginUrl: string;
  credentials: Credentials;
  staticOtp?: string;
  fieldTimeoutMs: number;
  otpPromptTimeoutMs: number;
  otpWaitTimeoutMs: number;
  successTimeoutMs: number;
  logger: Logger;
  now?: () => Date;
}

type Failed = { ok: false; failure: LoginFailure };
type Transition = { ok: true } | Failed;
type OtpStep = { ok: true; value: string } | Failed;
type PinSettings = NonNullable<LoginFlow['pin']>;

function firstSelector(input: CodeInput): string {
  return input.mode === 'single' ? input.selector : input.selectors[0];
}

class LoginAttempt {
  private stage: LoginStage = 'Idle';

  constructor(
    private readonly page: LoginPage,
    private readonly mailbox: OtpMailbox,
    private readonly options: LoginOrchestratorOptions,
    private readonly log: Logger,
    private readonly signal?: AbortSignal
  ) {}

  async run(): Promise<LoginOutcome> {
    const { flow } = this.options;

    if (flow.callbackUrlIncludes) {
      this.page.watchResponses(flow.callbackUrlIncludes);
    }
    await this.page.navigate(this.options.loginUrl);
    this.enter('NavigatedToLogin');

    const credentials = await this.submitCredentials();
    if (!credentials.ok) return credentials;

    if (flow.pin?.stage === 'before-otp') {
      const pin = await this.submitPin(flow.pin);
      if (!pin.ok) return pin;
    }

    if (!(await this.page.isVisible(flow.otpPromptSelector, this.options.otpPromptTimeoutMs))) {
      return await this.fail('OtpPromptNotFound', 'otp_prompt_not_visible');
    }
    this.enter('AwaitingOtp');

    const otp = await this.receiveOtp();
    if (!otp.ok) return otp;

    const typed = await this.typeCode(flow.otpInput, otp.value, 'otp');
    if (!typed.ok) return typed;
    const confirmed = await this.clickFirst(flow.otpConfirmSelectors, 'otp_confirm_button_missing');
    if (!confirmed.ok) return confirmed;
    this.enter('OtpSubmitted');

    if (flow.pin?.stage === 'after-otp') {
      const pin = await this.submitPin(flow.pin);
      if (!pin.ok) return pin;
    }

    if (!(await this.waitForSuccess())) {
      return await this.fail('OtpRejected', 'login_success_not_observed');
    }
    this.enter('Authenticated');

    const extraction = extractToken(await this.page.readStorage(), flow.tokenMarkers, {
      url: this.page.currentUrl(),
      responseBodies: await this.page.capturedResponses(),
      now: this.options.now
    });
    if (!extraction.ok) {
      return await this.fail('TokenNotFound', `no_credential_in_${extraction.inspectedKeys}_keys`);
    }
    this.enter('TokenExtracted');
    this.log.info(
      { tier: extraction.token.sourceTier, key: extraction.token.sourceKey, tokenHint: maskToken(extraction.token.value) },
      'token_extracted'
    );

    return { ok: true, token: extraction.token };
  }

  async interrupted(error: unknown): Promise<Failed> {
    const kind: LoginFailureKind =
      this.signal?.aborted || error instanceof StepTimeoutError ? 'Timeout' : 'TransportError';
    const message = this.signal?.aborted ? 'run_deadline_exceeded' : describeError(error);
    return await this.fail(kind, message);
  }

  private enter(stage: LoginStage): void {
    this.stage = stage;
    this.log.info({ stage }, 'login_stage');
  }

  private async submitCredentials(): Promise<Transition> {
    const { flow, credentials, fieldTimeoutMs } = this.options;

    const identifier = await this.page.findFirst(flow.identifierSelectors, fieldTimeoutMs);
    if (!identifier) {
      return await this.fail('LoginFormError', 'identifier_field_missing');
    }
    await this.page.fill(identifier, credentials.identifier);

    if (flow.secretSelectors.length > 0) {
      const secret = await this.page.findFirst(flow.secretSelectors, fieldTimeoutMs);
      if (!secret) {
        return await this.fail('LoginFormError', 'secret_field_missing');
      }
      await this.page.fill(secret, credentials.secret);
    }

    // Submitting triggers a new OTP; anything still pending belongs to an earlier attempt.
    this.mailbox.clear();

    const submitted = await this.clickFirst(flow.submitSelectors, 'submit_button_missing');
    if (!submitted.ok) return submitted;

    this.enter('CredentialsSubmitted');
    return { ok: true };
  }

  private async submitPin(pin: PinSettings): Promise<Transition> {
    const value = this.options.credentials.pin;
    if (!value) {
      return await this.fail('LoginFormError', 'pin_not_configured');
    }

    if (!(await this.page.isVisible(firstSelector(pin.input), this.options.fieldTimeoutMs))) {
      if (this.onSuccessUrl()) {
        this.log.info('pin_step_skipped');
        return { ok: true };
      }
      return await this.fail('LoginFormError', 'pin_fields_missing');
    }

    const typed = await this.typeCode(pin.input, value, 'pin');
    if (!typed.ok) return typed;
    return await this.clickFirst(pin.submitSelectors, 'pin_submit_button_missing');
  }

  private async receiveOtp(): Promise<OtpStep> {
    const { staticOtp, otpWaitTimeoutMs } = this.options;
    if (staticOtp) {
      this.log.info('otp_from_configuration');
      return { ok: true, value: staticOtp };
    }

    this.log.info({ timeoutMs: otpWaitTimeoutMs }, 'otp_waiting');
    const result = await this.mailbox.awaitValue(otpWaitTimeoutMs, this.signal);
    if (result.ok) {
      this.log.info({ otpHint: maskOtp(result.event.value) }, 'otp_received');
      return { ok: true, value: result.event.value };
    }

    if (result.reason === 'aborted') {
      return await this.fail('Timeout', 'run_deadline_exceeded');
    }
    if (result.reason === 'busy') {
      throw new Error('otp_mailbox_busy');
    }
    return await this.fail('OtpTimeout', `otp_not_received_within_${otpWaitTimeoutMs}ms`);
  }

  private async typeCode(input: CodeInput, value: string, label: 'otp' | 'pin'): Promise<Transition> {
    if (input.mode === 'single') {
      await this.page.fill(input.selector, value);
      return { ok: true };
    }

    if (value.length !== input.selectors.length) {
      return await this.fail('LoginFormError', `${label}_length_mismatch`);
    }

    for (const [index, selector] of input.selectors.entries()) {
      await this.page.fill(selector, value.charAt(index));
    }
    return { ok: true };
  }

  private async clickFirst(selectors: readonly string[], missing: string): Promise<Transition> {
    const selector = await this.page.findFirst(selectors, this.options.fieldTimeoutMs);
    if (!selector) {
      return await this.fail('LoginFormError', missing);
    }
    await this.page.click(selector);
    return { ok: true };
  }

  private async waitForSuccess(): Promise<boolean> {
    const { success } = this.options.flow;
    const timeoutMs = this.options.successTimeoutMs;
    return 'urlIncludes' in success
      ? await this.page.waitForUrl(success.urlIncludes, timeoutMs)
      : await this.page.isVisible(success.selector, timeoutMs);
  }

  private onSuccessUrl(): boolean {
    const { success } = this.options.flow;
    return 'urlIncludes' in success && this.page.currentUrl().includes(success.urlIncludes);
  }

  private async fail(kind: LoginFailureKind, message: string): Promise<Failed> {
    // A deadline abort has already closed the browser; there is nothing left to capture.
    const diagnosticRef = this.signal?.aborted ? null : await this.page.captureDiagnostics(`${kind}-${this.stage}`);
    const failure = loginFailure(kind, this.stage, message, diagnosticRef ?? undefined);
    this.log.warn({ failure }, 'login_failed');
    return { ok: false, failure };
  }
}

/**
 * Runs one login attempt per call in a fresh browser session and reports a tagged outcome.
 * The browser is closed on every exit path, and immediately when the signal aborts.
 */
export class LoginOrchestrator {
  constructor(
    private readonly launcher: BrowserLauncher,
    private readonly options: LoginOrchestratorOptions
  ) {}

  async login(mailbox: OtpMailbox, signal?: AbortSignal, log: Logger = this.options.logger): Promise<LoginOutcome> {
    if (signal?.aborted) {
      return { ok: false, failure: loginFailure('Timeout', 'Idle', 'run_deadline_exceeded') };
    }

    let page: LoginPage;
    try {
      page = await this.launcher.launch();
    } catch (error) {
      const failure = loginFailure('TransportError', 'Idle', `browser_launch_failed:${describeError(error)}`);
      log.error({ failure }, 'login_failed');
      return { ok: false, failure };
    }

    const attempt = new LoginAttempt(page, mailbox, this.options, log, signal);
    const closeOnAbort = () => {
      page.close().catch((error: unknown) => log.warn({ error }, 'browser_close_failed'));
    };
    signal?.addEventListener('abort', closeOnAbort, { once: true });

    try {
      return await attempt.run();
    } catch (error) {
      return await attempt.interrupted(error);
    } finally {
      signal?.removeEventListener('abort', closeOnAbort);
      try {
        await page.close();
      } catch (error) {
        log.warn({ error }, 'browser_close_failed');
      }
    }
  }
}
