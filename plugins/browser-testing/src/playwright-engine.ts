/**
 * Engine port implemented on playwright-core.
 *
 * This is the only module that imports Playwright. It launches Chrome
 * (the configured executable, else a local install), keeps one browser
 * context per session, and translates Playwright faults into `ToolError`s.
 */

import {
  chromium,
  errors,
  type Browser,
  type BrowserContext,
  type Locator,
  type Page,
  type Request,
} from 'playwright-core';
import { findLocalChrome } from './browser-utils.js';
import type { Viewport } from './config.js';
import type {
  BrowserEngine,
  CookieRecord,
  ElementCheck,
  EngineBrowser,
  EngineLaunchOptions,
  EnginePage,
  PageEventListener,
  PerformanceTiming,
  SelectorState,
  WaitUntil,
} from './engine.js';
import {
  EngineError,
  ScriptEvaluationError,
  SelectorNotFoundError,
  TimeoutError,
  errorMessage,
} from './errors.js';
import { createLogger } from './log.js';

const log = createLogger('engine');

const FUNCTION_SOURCE = /^\s*(async\s+)?(function\b|\([^()]*\)\s*=>|[A-Za-z_$][\w$]*\s*=>)/;

/**
 * Function sources are invoked so callers can pass either an expression or
 * `() => ...`.
 */
export function toEvaluationExpression(script: string): string {
  return FUNCTION_SOURCE.test(script) ? `(${script.trim()})()` : script;
}

export function describeLaunchFailure(message: string): string {
  if (message.includes("Executable doesn't exist")) {
    return 'Browser executable not found. Install Google Chrome, set BROWSER_TESTING_CHROME_PATH, or run: npx playwright install chromium';
  }
  if (message.includes('missing dependencies')) {
    return 'System dependencies missing. Run: npx playwright install-deps chromium';
  }
  return `Error launching browser: ${message}`;
}

function translate(err: unknown, context: string): never {
  if (err instanceof errors.TimeoutError) {
    throw new TimeoutError(`${context}: ${err.message}`, { cause: err });
  }
  throw new EngineError(`${context}: ${errorMessage(err)}`, { cause: err });
}

class PlaywrightPage implements EnginePage {
  private readonly requestIds = new WeakMap<Request, string>();
  private nextRequestId = 1;

  constructor(private readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async goto(
    url: string,
    options: { waitUntil: WaitUntil; timeout: number },
  ): Promise<{ status: number | null }> {
    try {
      const response = await this.page.goto(url, options);
      return { status: response ? response.status() : null };
    } catch (err) {
      translate(err, `Navigation to ${url} failed`);
    }
  }

  async click(selector: string, options: { timeout: number }): Promise<void> {
    await this.act(selector, options.timeout, (locator) => locator.click(options));
  }

  async type(
    selector: string,
    text: string,
    options: { delay?: number; timeout: number },
  ): Promise<void> {
    await this.act(selector, options.timeout, (locator) => locator.pressSequentially(text, options));
  }

  async fill(selector: string, value: string, options: { timeout: number }): Promise<void> {
    await this.act(selector, options.timeout, (locator) => locator.fill(value, options));
  }

  async setChecked(selector: string, checked: boolean, options: { timeout: number }): Promise<void> {
    await this.act(selector, options.timeout, (locator) => locator.setChecked(checked, options));
  }

  selectOption(selector: string, value: string, options: { timeout: number }): Promise<string[]> {
    return this.act(selector, options.timeout, (locator) => locator.selectOption(value, options));
  }

  async evaluate(script: string): Promise<unknown> {
    let result: unknown;
    try {
      result = await this.page.evaluate(toEvaluationExpression(script));
    } catch (err) {
      throw new ScriptEvaluationError(errorMessage(err), { cause: err });
    }
    return result ?? null;
  }

  async screenshot(options: { fullPage: boolean }): Promise<Buffer> {
    try {
      return await this.page.screenshot({ type: 'png', fullPage: options.fullPage });
    } catch (err) {
      translate(err, 'Screenshot failed');
    }
  }

  async waitForSelector(
    selector: string,
    options: { state: SelectorState; timeout: number },
  ): Promise<void> {
    try {
      await this.page.waitForSelector(selector, options);
    } catch (err) {
      translate(err, `Waiting for "${selector}" to be ${options.state} failed`);
    }
  }

  async content(selector?: string): Promise<string> {
    if (!selector) {
      return this.page.content();
    }
    const locator = await this.existing(selector);
    return locator.evaluate((el) => el.outerHTML);
  }

  async elementState(
    selector: string,
    checks: readonly ElementCheck[],
  ): Promise<Partial<Record<ElementCheck, boolean>>> {
    const locator = await this.existing(selector);
    const states: Partial<Record<ElementCheck, boolean>> = {};
    for (const check of checks) {
      states[check] = await this.readState(locator, check);
    }
    return states;
  }

  localStorage(): Promise<Record<string, string>> {
    return this.page.evaluate(() => {
      const entries: Record<string, string> = {};
      for (let i = 0; i < window.localStorage.length; i++) {
        const key = window.localStorage.key(i);
        if (key !== null) {
          entries[key] = window.localStorage.getItem(key) ?? '';
        }
      }
      return entries;
    });
  }

  async cookies(): Promise<CookieRecord[]> {
    const cookies = await this.page.context().cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      sameSite: cookie.sameSite,
    }));
  }

  performance(): Promise<PerformanceTiming> {
    return this.page.evaluate(() => {
      const [navigation] = performance.getEntriesByType('navigation');
      const navEntry = navigation instanceof PerformanceNavigationTiming ? navigation : undefined;
      const paints = performance.getEntriesByType('paint');
      const paintAt = (name: string) => paints.find((entry) => entry.name === name)?.startTime ?? null;

      return {
        domContentLoadedMs: navEntry ? navEntry.domContentLoadedEventEnd : null,
        loadMs: navEntry ? navEntry.loadEventEnd : null,
        firstPaintMs: paintAt('first-paint'),
        firstContentfulPaintMs: paintAt('first-contentful-paint'),
        transferSizeBytes: navEntry ? navEntry.transferSize : null,
        resourceCount: performance.getEntriesByType('resource').length,
      };
    });
  }

  subscribe(listener: PageEventListener): () => void {
    const onConsole = (message: { type(): string; text(): string }) =>
      listener({ type: 'console', level: message.type(), text: message.text() });
    const onPageError = (error: Error) => listener({ type: 'pageerror', message: error.message });
    const onRequest = (request: Request) =>
      listener({
        type: 'request',
        requestId: this.idFor(request),
        method: request.method(),
        url: request.url(),
        resourceType: request.resourceType(),
      });
    const onResponse = (response: { request(): Request; status(): number }) =>
      listener({ type: 'response', requestId: this.idFor(response.request()), status: response.status() });
    const onRequestFailed = (request: Request) =>
      listener({
        type: 'requestfailed',
        requestId: this.idFor(request),
        failure: request.failure()?.errorText ?? 'failed',
      });

    this.page.on('console', onConsole);
    this.page.on('pageerror', onPageError);
    this.page.on('request', onRequest);
    this.page.on('response', onResponse);
    this.page.on('requestfailed', onRequestFailed);

    return () => {
      this.page.off('console', onConsole);
      this.page.off('pageerror', onPageError);
      this.page.off('request', onRequest);
      this.page.off('response', onResponse);
      this.page.off('requestfailed', onRequestFailed);
    };
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }

  private idFor(request: Request): string {
    let id = this.requestIds.get(request);
    if (id === undefined) {
      id = `req_${this.nextRequestId++}`;
      this.requestIds.set(request, id);
    }
    return id;
  }

  private async existing(selector: string): Promise<Locator> {
    const locator = this.page.locator(selector);
    let count: number;
    try {
      count = await locator.count();
    } catch (err) {
      translate(err, `Selector "${selector}" could not be evaluated`);
    }
    if (count === 0) {
      throw new SelectorNotFoundError(selector);
    }
    return locator.first();
  }

  /**
   * Runs an action on the first match. A timeout on a selector that matches
   * nothing is reported as a missing element.
   */
  private async act<T>(
    selector: string,
    timeout: number,
    action: (locator: Locator) => Promise<T>,
  ): Promise<T> {
    try {
      return await action(this.page.locator(selector).first());
    } catch (err) {
      if (err instanceof errors.TimeoutError && (await this.page.locator(selector).count()) === 0) {
        throw new SelectorNotFoundError(
          selector,
          `No element matches selector "${selector}" (waited ${timeout}ms)`,
          { cause: err },
        );
      }
      translate(err, `Action on "${selector}" failed`);
    }
  }

  private readState(locator: Locator, check: ElementCheck): Promise<boolean> {
    switch (check) {
      case 'visible':
        return locator.isVisible();
      case 'hidden':
        return locator.isHidden();
      case 'enabled':
        return locator.isEnabled();
      case 'disabled':
        return locator.isDisabled();
      case 'checked':
        return locator.evaluate((el) =>
          el instanceof HTMLInputElement ? el.checked : el.getAttribute('aria-checked') === 'true',
        );
      case 'editable':
        return locator.evaluate((el) => {
          if (el instanceof HTMLElement && el.isContentEditable) return true;
          if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement) {
            return !el.disabled && !el.readOnly;
          }
          return el instanceof HTMLSelectElement && !el.disabled;
        });
      case 'focused':
        return locator.evaluate((el) => el === document.activeElement);
    }
  }
}

class PlaywrightBrowser implements EngineBrowser {
  private readonly contexts: BrowserContext[] = [];

  constructor(private readonly browser: Browser) {}

  async newPage(options: { viewport: Viewport }): Promise<EnginePage> {
    const context = await this.browser.newContext({ viewport: options.viewport });
    this.contexts.push(context);
    return new PlaywrightPage(await context.newPage());
  }

  onDisconnected(listener: () => void): void {
    this.browser.on('disconnected', () => listener());
  }

  async close(): Promise<void> {
    for (const context of this.contexts.splice(0)) {
      await context.close();
    }
    await this.browser.close();
  }
}

export class PlaywrightEngine implements BrowserEngine {
  async launch(options: EngineLaunchOptions): Promise<EngineBrowser> {
    const executablePath = options.executablePath ?? findLocalChrome();
    log.info(`Launching Chrome${executablePath ? ` from ${executablePath}` : ''}`);
    try {
      const browser = await chromium.launch({ headless: options.headless, executablePath });
      return new PlaywrightBrowser(browser);
    } catch (err) {
      throw new EngineError(describeLaunchFailure(errorMessage(err)), { cause: err });
    }
  }
}
