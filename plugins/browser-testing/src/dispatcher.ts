import { prepareScreenshot, saveScreenshot } from './browser-utils.js';
import type { ServerConfig } from './config.js';
import { ELEMENT_CHECKS, type BrowserEngine, type EnginePage } from './engine.js';
import {
  InvalidArgumentError,
  ToolError,
  toToolError,
  type ErrorKind,
} from './errors.js';
import { createLogger } from './log.js';
import { BrowserSession } from './session.js';
import { parseInvocation, type FormField, type ToolArgs, type ToolInvocation } from './tools.js';

const log = createLogger('dispatcher');

export type DispatcherConfig = Pick<
  ServerConfig,
  | 'headless'
  | 'chromePath'
  | 'viewport'
  | 'navigationTimeoutMs'
  | 'actionTimeoutMs'
  | 'consoleLogLimit'
  | 'networkLogLimit'
  | 'screenshotDir'
>;

export interface ScreenshotImage {
  data: string;
  mimeType: 'image/png';
}

export type ToolResult =
  | { status: 'success'; payload: Record<string, unknown>; image?: ScreenshotImage }
  | { status: 'failure'; kind: ErrorKind; message: string; details?: Record<string, unknown> };

interface HandlerOutput {
  payload: Record<string, unknown>;
  image?: ScreenshotImage;
}

/**
 * Executes tool invocations against the single browser session.
 *
 * Invocations run one at a time in arrival order, and every fault comes
 * back as a failure result: `invoke` never rejects.
 */
export class CommandDispatcher {
  readonly session: BrowserSession;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    engine: BrowserEngine,
    private readonly config: DispatcherConfig,
  ) {
    this.session = new BrowserSession(engine, {
      console: config.consoleLogLimit,
      network: config.networkLogLimit,
    });
  }

  invoke(name: string, args: unknown): Promise<ToolResult> {
    const run = this.tail.then(() => this.run(name, args));
    this.tail = run;
    return run;
  }

  /** Closes the session after any in-flight invocation settles. */
  async shutdown(): Promise<void> {
    await this.invoke('close_browser', {});
  }

  private async run(name: string, args: unknown): Promise<ToolResult> {
    const startedAt = Date.now();
    try {
      const output = await this.execute(parseInvocation(name, args));
      log.debug(`${name} succeeded in ${Date.now() - startedAt}ms`);
      return { status: 'success', ...output };
    } catch (err) {
      const fault = toToolError(err);
      log.debug(`${name} failed in ${Date.now() - startedAt}ms: ${fault.kind}: ${fault.message}`);
      return {
        status: 'failure',
        kind: fault.kind,
        message: fault.message,
        ...(fault.details ? { details: fault.details } : {}),
      };
    }
  }

  private execute(invocation: ToolInvocation): Promise<HandlerOutput> {
    switch (invocation.name) {
      case 'launch_browser':
        return this.launchBrowser(invocation.args);
      case 'close_browser':
        return this.closeBrowser();
      case 'get_session_status':
        return this.sessionStatus();
      case 'navigate_to':
        return this.navigateTo(this.session.requirePage(), invocation.args);
      case 'click_element':
        return this.clickElement(this.session.requirePage(), invocation.args);
      case 'type_text':
        return this.typeText(this.session.requirePage(), invocation.args);
      case 'fill_form':
        return this.fillForm(this.session.requirePage(), invocation.args);
      case 'evaluate_javascript':
        return this.evaluateJavascript(this.session.requirePage(), invocation.args);
      case 'get_console_logs':
        return this.consoleLogs(invocation.args);
      case 'get_network_requests':
        return this.networkRequests(invocation.args);
      case 'get_page_metrics':
        return this.pageMetrics(this.session.requirePage());
      case 'take_screenshot':
        return this.takeScreenshot(this.session.requirePage(), invocation.args);
      case 'wait_for_selector':
        return this.waitForSelector(this.session.requirePage(), invocation.args);
      case 'check_element_state':
        return this.checkElementState(this.session.requirePage(), invocation.args);
      case 'get_local_storage':
        return this.localStorage(this.session.requirePage(), invocation.args);
      case 'get_cookies':
        return this.cookies(this.session.requirePage(), invocation.args);
      case 'get_page_content':
        return this.pageContent(this.session.requirePage(), invocation.args);
    }
  }

  private async launchBrowser(args: ToolArgs<'launch_browser'>): Promise<HandlerOutput> {
    const headless = args.headless ?? this.config.headless;
    const viewport = {
      width: args.viewport_width ?? this.config.viewport.width,
      height: args.viewport_height ?? this.config.viewport.height,
    };
    await this.session.launch({ headless, viewport, executablePath: this.config.chromePath });
    return { payload: { launched: true, headless, viewport } };
  }

  private async closeBrowser(): Promise<HandlerOutput> {
    const closed = await this.session.close();
    return { payload: { closed } };
  }

  private async sessionStatus(): Promise<HandlerOutput> {
    return {
      payload: {
        ...this.session.describe(),
        consoleRecords: this.session.recorder.consoleCount,
        networkRecords: this.session.recorder.networkCount,
      },
    };
  }

  private async navigateTo(page: EnginePage, args: ToolArgs<'navigate_to'>): Promise<HandlerOutput> {
    const { status } = await page.goto(args.url, {
      waitUntil: args.wait_until,
      timeout: args.timeout ?? this.config.navigationTimeoutMs,
    });
    const title = await page.title();
    return { payload: { url: page.url(), title, status } };
  }

  private async clickElement(page: EnginePage, args: ToolArgs<'click_element'>): Promise<HandlerOutput> {
    await page.click(args.selector, { timeout: this.actionTimeout(args.timeout) });
    return { payload: { clicked: args.selector } };
  }

  private async typeText(page: EnginePage, args: ToolArgs<'type_text'>): Promise<HandlerOutput> {
    const timeout = this.actionTimeout(args.timeout);
    if (args.clear) {
      await page.fill(args.selector, '', { timeout });
    }
    await page.type(args.selector, args.text, { delay: args.delay, timeout });
    return { payload: { selector: args.selector, typed: args.text } };
  }

  /**
   * Applies fields in order and stops at the first failure. Fields already
   * applied stay applied; later ones are never attempted.
   */
  private async fillForm(page: EnginePage, args: ToolArgs<'fill_form'>): Promise<HandlerOutput> {
    const timeout = this.actionTimeout(args.timeout);
    const applied: Array<{ selector: string; field_type: FormField['field_type'] }> = [];

    for (const [index, field] of args.fields.entries()) {
      try {
        await applyField(page, field, timeout);
      } catch (err) {
        const fault = toToolError(err);
        throw new ToolError(
          fault.kind,
          `Field ${index + 1} of ${args.fields.length} (${field.selector}) failed: ${fault.message}`,
          {
            cause: fault,
            details: {
              failedField: { index, selector: field.selector, field_type: field.field_type },
              appliedFields: applied.length,
            },
          },
        );
      }
      applied.push({ selector: field.selector, field_type: field.field_type });
    }

    return { payload: { filled: applied.length, fields: applied } };
  }

  private async evaluateJavascript(
    page: EnginePage,
    args: ToolArgs<'evaluate_javascript'>,
  ): Promise<HandlerOutput> {
    const result = await page.evaluate(args.script);
    return { payload: { result: result ?? null } };
  }

  private async consoleLogs(args: ToolArgs<'get_console_logs'>): Promise<HandlerOutput> {
    this.session.requireLaunched();
    const recorder = this.session.recorder;
    const total = recorder.consoleCount;
    const logs = recorder.consoleRecords(args.level);
    if (args.clear) recorder.clearConsole();
    return { payload: { count: logs.length, total, logs } };
  }

  private async networkRequests(args: ToolArgs<'get_network_requests'>): Promise<HandlerOutput> {
    this.session.requireLaunched();
    const recorder = this.session.recorder;
    const total = recorder.networkCount;
    const requests = recorder.networkRecords({ method: args.method, urlPattern: args.url_pattern });
    if (args.clear) recorder.clearNetwork();
    return { payload: { count: requests.length, total, requests } };
  }

  private async pageMetrics(page: EnginePage): Promise<HandlerOutput> {
    const timing = await page.performance();
    const title = await page.title();
    return { payload: { url: page.url(), title, ...timing } };
  }

  private async takeScreenshot(
    page: EnginePage,
    args: ToolArgs<'take_screenshot'>,
  ): Promise<HandlerOutput> {
    const raw = await page.screenshot({ fullPage: args.full_page });
    const shot = await prepareScreenshot(raw);
    const payload: Record<string, unknown> = {
      width: shot.width,
      height: shot.height,
      resized: shot.resized,
    };
    if (args.save) {
      payload.path = saveScreenshot(shot.png, this.config.screenshotDir);
    }
    return { payload, image: { data: shot.png.toString('base64'), mimeType: 'image/png' } };
  }

  private async waitForSelector(
    page: EnginePage,
    args: ToolArgs<'wait_for_selector'>,
  ): Promise<HandlerOutput> {
    const startedAt = Date.now();
    await page.waitForSelector(args.selector, {
      state: args.state,
      timeout: this.actionTimeout(args.timeout),
    });
    return { payload: { selector: args.selector, state: args.state, elapsedMs: Date.now() - startedAt } };
  }

  private async checkElementState(
    page: EnginePage,
    args: ToolArgs<'check_element_state'>,
  ): Promise<HandlerOutput> {
    const states = await page.elementState(args.selector, args.checks ?? ELEMENT_CHECKS);
    return { payload: { selector: args.selector, states } };
  }

  private async localStorage(
    page: EnginePage,
    args: ToolArgs<'get_local_storage'>,
  ): Promise<HandlerOutput> {
    const entries = await page.localStorage();
    if (args.key === undefined) {
      return { payload: { entries } };
    }
    const value = entries[args.key];
    return { payload: { entries: value === undefined ? {} : { [args.key]: value } } };
  }

  private async cookies(page: EnginePage, args: ToolArgs<'get_cookies'>): Promise<HandlerOutput> {
    const cookies = await page.cookies();
    return {
      payload: {
        cookies: args.name === undefined ? cookies : cookies.filter((cookie) => cookie.name === args.name),
      },
    };
  }

  private async pageContent(page: EnginePage, args: ToolArgs<'get_page_content'>): Promise<HandlerOutput> {
    const content = await page.content(args.selector);
    return { payload: { content } };
  }

  private actionTimeout(timeout: number | undefined): number {
    return timeout ?? this.config.actionTimeoutMs;
  }
}

async function applyField(page: EnginePage, field: FormField, timeout: number): Promise<void> {
  switch (field.field_type) {
    case 'text':
      if (typeof field.value !== 'string') {
        throw new InvalidArgumentError(`text fields take a string value, got ${typeof field.value}`);
      }
      await page.fill(field.selector, field.value, { timeout });
      return;
    case 'checkbox':
      await page.setChecked(field.selector, toChecked(field.value), { timeout });
      return;
    case 'radio':
      if (!toChecked(field.value)) {
        throw new InvalidArgumentError('radio fields can only be checked');
      }
      await page.setChecked(field.selector, true, { timeout });
      return;
    case 'select':
      if (typeof field.value !== 'string') {
        throw new InvalidArgumentError(`select fields take an option value, got ${typeof field.value}`);
      }
      await page.selectOption(field.selector, field.value, { timeout });
      return;
  }
}

function toChecked(value: string | boolean): boolean {
  if (typeof value === 'boolean') return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new InvalidArgumentError(`checkbox values must be true or false, got "${value}"`);
}
