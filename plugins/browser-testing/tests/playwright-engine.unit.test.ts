import { EventEmitter } from 'events';
import { errors } from 'playwright-core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { PageEvent } from '../src/engine.js';
import { ToolError } from '../src/errors.js';
import {
  PlaywrightEngine,
  describeLaunchFailure,
  toEvaluationExpression,
} from '../src/playwright-engine.js';

const launch = vi.hoisted(() => vi.fn());

vi.mock('playwright-core', async () => {
  const actual = await vi.importActual<typeof import('playwright-core')>('playwright-core');
  return { ...actual, chromium: { launch } };
});

function createLocator(count = 1) {
  const locator = {
    click: vi.fn().mockResolvedValue(undefined),
    fill: vi.fn().mockResolvedValue(undefined),
    pressSequentially: vi.fn().mockResolvedValue(undefined),
    setChecked: vi.fn().mockResolvedValue(undefined),
    selectOption: vi.fn().mockResolvedValue(['blue']),
    count: vi.fn().mockResolvedValue(count),
    isVisible: vi.fn().mockResolvedValue(true),
    evaluate: vi.fn(async (fn: (el: { outerHTML: string }) => unknown) =>
      fn({ outerHTML: '<p id="greeting">hi</p>' }),
    ),
    first: vi.fn(),
  };
  locator.first.mockReturnValue(locator);
  return locator;
}

type LocatorStub = ReturnType<typeof createLocator>;

function createPage(locators: Record<string, LocatorStub> = {}) {
  return Object.assign(new EventEmitter(), {
    url: vi.fn(() => 'about:blank'),
    title: vi.fn().mockResolvedValue(''),
    goto: vi.fn(),
    evaluate: vi.fn(),
    waitForSelector: vi.fn().mockResolvedValue(null),
    content: vi.fn().mockResolvedValue('<html></html>'),
    locator: vi.fn((selector: string) => locators[selector] ?? createLocator(0)),
    isClosed: vi.fn(() => false),
    close: vi.fn().mockResolvedValue(undefined),
  });
}

function createRequest(url: string, failure: string | null = null) {
  return {
    method: () => 'GET',
    url: () => url,
    resourceType: () => 'document',
    failure: () => (failure === null ? null : { errorText: failure }),
  };
}

async function openPage(page: ReturnType<typeof createPage>) {
  const calls: string[] = [];
  const context = {
    newPage: vi.fn().mockResolvedValue(page),
    close: vi.fn(async () => {
      calls.push('context.close');
    }),
  };
  const browser = Object.assign(new EventEmitter(), {
    newContext: vi.fn().mockResolvedValue(context),
    close: vi.fn(async () => {
      calls.push('browser.close');
    }),
  });
  launch.mockResolvedValue(browser);

  const engineBrowser = await new PlaywrightEngine().launch({
    headless: true,
    executablePath: '/opt/chrome/chrome',
  });
  const enginePage = await engineBrowser.newPage({ viewport: { width: 800, height: 600 } });
  return { browser, calls, engineBrowser, enginePage };
}

async function failure(promise: Promise<unknown>): Promise<ToolError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ToolError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected the call to fail');
}

beforeEach(() => {
  launch.mockReset();
});

describe('toEvaluationExpression', () => {
  it('leaves plain expressions alone', () => {
    expect(toEvaluationExpression('document.title')).toBe('document.title');
    expect(toEvaluationExpression("localStorage.setItem('k', 'v')")).toBe("localStorage.setItem('k', 'v')");
  });

  it('invokes function sources', () => {
    expect(toEvaluationExpression('() => document.title')).toBe('(() => document.title)()');
    expect(toEvaluationExpression('  async () => fetch("/health")  ')).toBe('(async () => fetch("/health"))()');
    expect(toEvaluationExpression('function () { return 1; }')).toBe('(function () { return 1; })()');
    expect(toEvaluationExpression('el => el.id')).toBe('(el => el.id)()');
    expect(toEvaluationExpression('(a, b) => a + b')).toBe('((a, b) => a + b)()');
  });

  it('leaves scripts that already invoke themselves alone', () => {
    const arrow = '(() => { localStorage.setItem("k", "v"); return 1; })()';
    const asyncArrow = '(async () => { await Promise.resolve(); return 2; })()';
    const classic = '(function () { return document.title; })()';
    expect(toEvaluationExpression(arrow)).toBe(arrow);
    expect(toEvaluationExpression(asyncArrow)).toBe(asyncArrow);
    expect(toEvaluationExpression(classic)).toBe(classic);
  });
});

describe('describeLaunchFailure', () => {
  it('explains a missing browser executable', () => {
    expect(describeLaunchFailure("browserType.launch: Executable doesn't exist at /ms-playwright/chromium")).toBe(
      'Browser executable not found. Install Google Chrome, set BROWSER_TESTING_CHROME_PATH, or run: npx playwright install chromium',
    );
  });

  it('explains missing system libraries', () => {
    expect(describeLaunchFailure('Host system is missing dependencies to run browsers.')).toBe(
      'System dependencies missing. Run: npx playwright install-deps chromium',
    );
  });

  it('passes other messages through', () => {
    expect(describeLaunchFailure('spawn EACCES')).toBe('Error launching browser: spawn EACCES');
  });
});

describe('PlaywrightEngine', () => {
  it('launches chromium and opens a page in a fresh context', async () => {
    const { browser } = await openPage(createPage());
    expect(launch).toHaveBeenCalledWith({ headless: true, executablePath: '/opt/chrome/chrome' });
    expect(browser.newContext).toHaveBeenCalledWith({ viewport: { width: 800, height: 600 } });
  });

  it('reports launch failures as engine errors with a hint', async () => {
    launch.mockRejectedValue(new Error("browserType.launch: Executable doesn't exist at /opt/chrome/chrome"));
    const err = await failure(new PlaywrightEngine().launch({ headless: true, executablePath: '/opt/chrome/chrome' }));
    expect(err.kind).toBe('EngineError');
    expect(err.message).toBe(
      'Browser executable not found. Install Google Chrome, set BROWSER_TESTING_CHROME_PATH, or run: npx playwright install chromium',
    );
  });

  it('closes contexts before the browser', async () => {
    const { calls, engineBrowser } = await openPage(createPage());
    await engineBrowser.close();
    expect(calls).toEqual(['context.close', 'browser.close']);
  });

  it('forwards browser disconnects', async () => {
    const { browser, engineBrowser } = await openPage(createPage());
    const listener = vi.fn();
    engineBrowser.onDisconnected(listener);
    browser.emit('disconnected');
    expect(listener).toHaveBeenCalledTimes(1);
  });
});

describe('PlaywrightPage actions', () => {
  it('acts on the first match with the given options', async () => {
    const field = createLocator();
    const { enginePage } = await openPage(createPage({ '#name': field, '#color': field }));

    await enginePage.fill('#name', 'Ada', { timeout: 250 });
    expect(field.fill).toHaveBeenCalledWith('Ada', { timeout: 250 });
    expect(await enginePage.selectOption('#color', 'blue', { timeout: 250 })).toEqual(['blue']);
  });

  it('reports a timeout on a selector with no match as a missing element', async () => {
    const missing = createLocator(0);
    missing.click.mockRejectedValue(new errors.TimeoutError('Timeout 250ms exceeded.'));
    const { enginePage } = await openPage(createPage({ '#missing': missing }));

    const err = await failure(enginePage.click('#missing', { timeout: 250 }));
    expect(err.kind).toBe('SelectorNotFoundError');
    expect(err.message).toBe('No element matches selector "#missing" (waited 250ms)');
  });

  it('reports a timeout on a matched element as a timeout', async () => {
    const busy = createLocator(1);
    busy.click.mockRejectedValue(new errors.TimeoutError('Timeout 250ms exceeded.'));
    const { enginePage } = await openPage(createPage({ '#busy': busy }));

    const err = await failure(enginePage.click('#busy', { timeout: 250 }));
    expect(err.kind).toBe('TimeoutError');
    expect(err.message).toBe('Action on "#busy" failed: Timeout 250ms exceeded.');
  });

  it('reports other action faults as engine errors', async () => {
    const stale = createLocator(1);
    stale.click.mockRejectedValue(new Error('Element is not attached to the DOM'));
    const { enginePage } = await openPage(createPage({ '#stale': stale }));

    const err = await failure(enginePage.click('#stale', { timeout: 250 }));
    expect(err.kind).toBe('EngineError');
    expect(err.message).toBe('Action on "#stale" failed: Element is not attached to the DOM');
    expect(stale.count).not.toHaveBeenCalled();
  });

  it('returns the navigation status and maps navigation timeouts', async () => {
    const page = createPage();
    const { enginePage } = await openPage(page);
    const options = { waitUntil: 'load' as const, timeout: 30_000 };

    page.goto.mockResolvedValueOnce({ status: () => 201 });
    expect(await enginePage.goto('http://app.test/', options)).toEqual({ status: 201 });

    page.goto.mockResolvedValueOnce(null);
    expect(await enginePage.goto('about:blank', options)).toEqual({ status: null });

    page.goto.mockRejectedValueOnce(new errors.TimeoutError('Timeout 30000ms exceeded.'));
    const err = await failure(enginePage.goto('http://app.test/slow', options));
    expect(err.kind).toBe('TimeoutError');
    expect(err.message).toBe('Navigation to http://app.test/slow failed: Timeout 30000ms exceeded.');
  });

  it('maps selector wait timeouts', async () => {
    const page = createPage();
    page.waitForSelector.mockRejectedValue(new errors.TimeoutError('Timeout 100ms exceeded.'));
    const { enginePage } = await openPage(page);

    const err = await failure(enginePage.waitForSelector('.never-appears', { state: 'visible', timeout: 100 }));
    expect(err.kind).toBe('TimeoutError');
    expect(err.message).toBe('Waiting for ".never-appears" to be visible failed: Timeout 100ms exceeded.');
  });
});

describe('PlaywrightPage reads', () => {
  it('invokes function sources and turns undefined into null', async () => {
    const page = createPage();
    page.evaluate.mockResolvedValue(undefined);
    const { enginePage } = await openPage(page);

    expect(await enginePage.evaluate('() => document.title')).toBeNull();
    expect(page.evaluate).toHaveBeenCalledWith('(() => document.title)()');
  });

  it('wraps script faults as evaluation errors', async () => {
    const page = createPage();
    page.evaluate.mockRejectedValue(new Error('ReferenceError: boom is not defined'));
    const { enginePage } = await openPage(page);

    const err = await failure(enginePage.evaluate('boom()'));
    expect(err.kind).toBe('ScriptEvaluationError');
    expect(err.message).toBe('ReferenceError: boom is not defined');
  });

  it('requires a match before reading element content or state', async () => {
    const { enginePage } = await openPage(createPage({ '#greeting': createLocator(1) }));

    expect(await enginePage.content('#greeting')).toBe('<p id="greeting">hi</p>');
    expect(await enginePage.elementState('#greeting', ['visible'])).toEqual({ visible: true });

    const err = await failure(enginePage.content('#gone'));
    expect(err.kind).toBe('SelectorNotFoundError');
    expect(err.message).toBe('No element matches selector "#gone"');
  });

  it('skips closing a page that is already closed', async () => {
    const page = createPage();
    const { enginePage } = await openPage(page);
    page.isClosed.mockReturnValue(true);
    await enginePage.close();
    expect(page.close).not.toHaveBeenCalled();
  });
});

describe('PlaywrightPage events', () => {
  it('translates page events and correlates requests across redirects', async () => {
    const page = createPage();
    const { enginePage } = await openPage(page);
    const events: PageEvent[] = [];
    const unsubscribe = enginePage.subscribe((event) => events.push(event));

    const original = createRequest('http://app.test/old');
    const redirected = createRequest('http://app.test/new');
    page.emit('console', { type: () => 'warning', text: () => 'careful' });
    page.emit('pageerror', new Error('boom'));
    page.emit('request', original);
    page.emit('request', redirected);
    page.emit('response', { request: () => original, status: () => 302 });
    page.emit('response', { request: () => redirected, status: () => 200 });
    page.emit('requestfailed', createRequest('http://app.test/ads.js', 'net::ERR_ABORTED'));
    page.emit('requestfailed', createRequest('http://app.test/beacon'));

    expect(events).toEqual([
      { type: 'console', level: 'warning', text: 'careful' },
      { type: 'pageerror', message: 'boom' },
      { type: 'request', requestId: 'req_1', method: 'GET', url: 'http://app.test/old', resourceType: 'document' },
      { type: 'request', requestId: 'req_2', method: 'GET', url: 'http://app.test/new', resourceType: 'document' },
      { type: 'response', requestId: 'req_1', status: 302 },
      { type: 'response', requestId: 'req_2', status: 200 },
      { type: 'requestfailed', requestId: 'req_3', failure: 'net::ERR_ABORTED' },
      { type: 'requestfailed', requestId: 'req_4', failure: 'failed' },
    ]);

    unsubscribe();
    expect(page.listenerCount('request')).toBe(0);
    expect(page.listenerCount('console')).toBe(0);
    page.emit('console', { type: () => 'log', text: () => 'after' });
    expect(events).toHaveLength(8);
  });
});
