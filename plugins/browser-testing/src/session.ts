import type { Viewport } from './config.js';
import type { BrowserEngine, EngineBrowser, EnginePage } from './engine.js';
import { AlreadyLaunchedError, NotLaunchedError, errorMessage } from './errors.js';
import { EventRecorder, type RecorderLimits } from './event-recorder.js';
import { createLogger } from './log.js';

const log = createLogger('session');

export type SessionStatus = 'uninitialized' | 'launched' | 'closed';

export interface LaunchConfig {
  headless: boolean;
  viewport: Viewport;
  executablePath?: string;
}

export interface SessionDescription {
  status: SessionStatus;
  headless?: boolean;
  viewport?: Viewport;
  url?: string;
}

interface Handles {
  browser: EngineBrowser;
  page: EnginePage;
  config: LaunchConfig;
}

/**
 * Owns the single browser and page of a testing session.
 *
 * `closed` means the browser went away on its own (crash, killed process);
 * an explicit `close()` returns the session to `uninitialized`.
 */
export class BrowserSession {
  readonly recorder: EventRecorder;
  private handles: Handles | null = null;
  private state: SessionStatus = 'uninitialized';

  constructor(
    private readonly engine: BrowserEngine,
    limits: RecorderLimits,
  ) {
    this.recorder = new EventRecorder(limits);
  }

  get status(): SessionStatus {
    return this.state;
  }

  async launch(config: LaunchConfig): Promise<void> {
    if (this.state === 'launched') {
      throw new AlreadyLaunchedError();
    }

    const browser = await this.engine.launch({
      headless: config.headless,
      executablePath: config.executablePath,
    });

    let page: EnginePage;
    try {
      page = await browser.newPage({ viewport: config.viewport });
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        log.warn(`Failed to close browser after page creation failed: ${errorMessage(closeErr)}`);
      });
      throw err;
    }

    const handles: Handles = { browser, page, config };
    browser.onDisconnected(() => this.handleDisconnect(handles));
    this.recorder.clear();
    this.recorder.attach(page);
    this.handles = handles;
    this.state = 'launched';
    log.info(
      `Browser launched (headless=${config.headless}, viewport=${config.viewport.width}x${config.viewport.height})`,
    );
  }

  /**
   * Tear down the session. Returns false when there was nothing to close.
   * Engine failures while closing are logged, never thrown.
   */
  async close(): Promise<boolean> {
    const handles = this.handles;
    if (this.state !== 'launched' || !handles) {
      this.state = 'uninitialized';
      return false;
    }

    this.handles = null;
    this.recorder.detach();
    try {
      await handles.page.close();
    } catch (err) {
      log.warn(`Page close failed: ${errorMessage(err)}`);
    }
    try {
      await handles.browser.close();
    } catch (err) {
      log.warn(`Browser close failed: ${errorMessage(err)}`);
    }
    this.recorder.clear();
    this.state = 'uninitialized';
    log.info('Browser closed');
    return true;
  }

  requireLaunched(): void {
    this.requirePage();
  }

  requirePage(): EnginePage {
    if (this.state === 'launched' && this.handles) {
      return this.handles.page;
    }
    if (this.state === 'closed') {
      throw new NotLaunchedError(
        'Browser disconnected unexpectedly. Call launch_browser to start a new session.',
      );
    }
    throw new NotLaunchedError();
  }

  describe(): SessionDescription {
    if (!this.handles) {
      return { status: this.state };
    }
    return {
      status: this.state,
      headless: this.handles.config.headless,
      viewport: { ...this.handles.config.viewport },
      url: this.handles.page.url(),
    };
  }

  private handleDisconnect(handles: Handles): void {
    // close() already cleared the handles for an intentional shutdown
    if (this.handles !== handles) return;

    this.handles = null;
    this.recorder.detach();
    this.recorder.clear();
    this.state = 'closed';
    log.warn('Browser disconnected unexpectedly; session closed');
  }
}
