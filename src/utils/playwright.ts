import { chromium, errors, Browser, Page } from 'playwright-core';
import { JobTimeoutError } from '../errors/job-errors';
import { logger as rootLogger, Logger } from './logger';

/** One live automation connection to a remote browser. */
export interface AutomationConnection {
  /** Locates an existing page in the first browser context, or opens one. */
  openPage(): Promise<void>;
  navigate(url: string, timeoutMs: number): Promise<void>;
  title(): Promise<string>;
  contentLength(): Promise<number>;
  close(): Promise<void>;
}

export interface AutomationDriver {
  connect(endpoint: string, timeoutMs: number): Promise<AutomationConnection>;
}

function translateTimeout(operation: string, timeoutMs: number, error: unknown): unknown {
  return error instanceof errors.TimeoutError ? new JobTimeoutError(operation, timeoutMs, error) : error;
}

class PlaywrightConnection implements AutomationConnection {
  private page?: Page;

  constructor(
    private readonly browser: Browser,
    private readonly log: Logger,
  ) {}

  async openPage(): Promise<void> {
    const [context] = this.browser.contexts();
    if (!context) {
      throw new Error('No browser contexts found in the connected session');
    }

    const [existing] = context.pages();
    if (existing) {
      this.log.debug('Using existing page from context', { url: existing.url() });
      this.page = existing;
      return;
    }

    this.log.warn('No pages found in context, creating a new one');
    this.page = await context.newPage();
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const page = this.requirePage();
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    } catch (error) {
      throw translateTimeout(`Navigation to ${url}`, timeoutMs, error);
    }
  }

  async title(): Promise<string> {
    return this.requirePage().title();
  }

  async contentLength(): Promise<number> {
    const html = await this.requirePage().content();
    return html.length;
  }

  async close(): Promise<void> {
    if (this.browser.isConnected()) {
      this.log.info('Closing browser connection');
      await this.browser.close();
    }
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('No page attached to the automation connection');
    }
    return this.page;
  }
}

/** Drives remote sessions over the Chrome DevTools Protocol. */
export class PlaywrightDriver implements AutomationDriver {
  constructor(private readonly log: Logger = rootLogger.child('PlaywrightDriver')) {}

  async connect(endpoint: string, timeoutMs: number): Promise<AutomationConnection> {
    try {
      const browser = await chromium.connectOverCDP(endpoint, { timeout: timeoutMs });
      this.log.info('Connected to remote browser session');
      return new PlaywrightConnection(browser, this.log);
    } catch (error) {
      throw translateTimeout('Browser connection', timeoutMs, error);
    }
  }
}
