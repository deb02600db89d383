import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type { Logger } from 'pino';
import type { StorageSnapshot } from '@otp-relay/domain';
import { StepTimeoutError, type BrowserLauncher, type LoginPage } from '../services/login-page.js';

export interface PlaywrightLauncherOptions {
  headless: boolean;
  timeoutMs: number;
  diagnosticsDir: string;
  channel?: string;
  executablePath?: string;
  logger: Logger;
}

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

async function translated<T>(action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      throw new StepTimeoutError(error.message);
    }
    throw error;
  }
}

async function missAsFalse(action: () => Promise<unknown>): Promise<boolean> {
  try {
    await action();
    return true;
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      return false;
    }
    throw error;
  }
}

function diagnosticsStamp(now: Date): { day: string; time: string } {
  const pad = (value: number) => String(value).padStart(2, '0');
  return {
    day: `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`,
    time: `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  };
}

/** Folds cookies into a name/value map; the first cookie of a name wins. */
export function cookieJar(entries: ReadonlyArray<{ name: string; value: string }>): Record<string, string> {
  const jar = new Map<string, string>();
  for (const entry of entries) {
    if (!jar.has(entry.name)) {
      jar.set(entry.name, entry.value);
    }
  }
  return Object.fromEntries(jar);
}

class PlaywrightLoginPage implements LoginPage {
  private readonly responseBodies: Array<Promise<string | null>> = [];

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PlaywrightLauncherOptions
  ) {}

  async navigate(url: string): Promise<void> {
    await translated(() => this.page.goto(url, { waitUntil: 'domcontentloaded' }));
  }

  async findFirst(selectors: readonly string[], timeoutMs: number): Promise<string | null> {
    for (const selector of selectors) {
      const found = await missAsFalse(() =>
        this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'visible' })
      );
      if (found) {
        return selector;
      }
    }
    return null;
  }

  async isVisible(selector: string, timeoutMs: number): Promise<boolean> {
    return await missAsFalse(() => this.page.waitForSelector(selector, { timeout: timeoutMs, state: 'visible' }));
  }

  async fill(selector: string, value: string): Promise<void> {
    await translated(() => this.page.fill(selector, value));
  }

  async click(selector: string): Promise<void> {
    await translated(() => this.page.click(selector));
  }

  async waitForUrl(fragment: string, timeoutMs: number): Promise<boolean> {
    return await missAsFalse(() =>
      this.page.waitForURL((url) => url.href.includes(fragment), { timeout: timeoutMs })
    );
  }

  currentUrl(): string {
    return this.page.url();
  }

  async readStorage(): Promise<StorageSnapshot> {
    const { persistent, session } = await translated(() =>
      this.page.evaluate(() => {
        const dump = (storage: Storage): Record<string, string> => {
          const out: Record<string, string> = {};
          for (let i = 0; i < storage.length; i += 1) {
            const key = storage.key(i);
            if (key !== null) {
              out[key] = storage.getItem(key) ?? '';
            }
          }
          return out;
        };
        return { persistent: dump(window.localStorage), session: dump(window.sessionStorage) };
      })
    );

    return { persistent, session, cookie: cookieJar(await this.context.cookies()) };
  }

  watchResponses(urlFragment: string): void {
    this.page.on('response', (response) => {
      if (!response.url().includes(urlFragment)) return;
      this.responseBodies.push(
        response.text().catch((error: unknown) => {
          // Redirects and aborted loads have no body.
          this.options.logger.debug({ error, url: response.url() }, 'callback_body_unavailable');
          return null;
        })
      );
    });
  }

  async capturedResponses(): Promise<string[]> {
    const bodies = await Promise.all(this.responseBodies);
    return bodies.filter((body): body is string => body !== null);
  }

  async captureDiagnostics(label: string): Promise<string | null> {
    const { day, time } = diagnosticsStamp(new Date());
    const safe = label.replace(/[^a-z0-9-_]/gi, '_').slice(0, 64);
    const dir = path.join(this.options.diagnosticsDir, day);
    const base = path.join(dir, `${time}_${safe}`);

    try {
      await mkdir(dir, { recursive: true });
      await this.page.screenshot({ path: `${base}.png`, fullPage: true });
      await writeFile(`${base}.html`, await this.page.content(), 'utf8');
      this.options.logger.info({ diagnostics: base }, 'diagnostics_saved');
      return base;
    } catch (error) {
      this.options.logger.warn({ error, label }, 'diagnostics_capture_failed');
      return null;
    }
  }

  async close(): Promise<void> {
    if (this.browser.isConnected()) {
      await this.browser.close();
    }
  }
}

export class PlaywrightLauncher implements BrowserLauncher {
  constructor(private readonly options: PlaywrightLauncherOptions) {}

  async launch(): Promise<LoginPage> {
    const browser = await chromium.launch({
      headless: this.options.headless,
      channel: this.options.channel,
      executablePath: this.options.executablePath,
      args: ['--no-sandbox', '--disable-dev-shm-usage']
    });

    try {
      const context = await browser.newContext({
        viewport: { width: 1920, height: 1080 },
        userAgent: USER_AGENT
      });
      const page = await context.newPage();
      page.setDefaultTimeout(this.options.timeoutMs);
      return new PlaywrightLoginPage(browser, context, page, this.options);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }
}
