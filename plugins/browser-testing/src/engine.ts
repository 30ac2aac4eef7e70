/**
 * Port between the session layer and the browser automation engine.
 *
 * The session and dispatcher only see these interfaces; the Playwright
 * implementation lives in `playwright-engine.ts` and tests supply an
 * in-process fake. Implementations report failures with the `ToolError`
 * subclasses from `errors.ts`.
 */

import type { Viewport } from './config.js';

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export type SelectorState = 'visible' | 'hidden' | 'attached' | 'detached';

export const ELEMENT_CHECKS = [
  'visible',
  'hidden',
  'enabled',
  'disabled',
  'checked',
  'editable',
  'focused',
] as const;

export type ElementCheck = (typeof ELEMENT_CHECKS)[number];

export type PageEvent =
  | { type: 'console'; level: string; text: string }
  | { type: 'pageerror'; message: string }
  | { type: 'request'; requestId: string; method: string; url: string; resourceType: string }
  | { type: 'response'; requestId: string; status: number }
  | { type: 'requestfailed'; requestId: string; failure: string };

export type PageEventListener = (event: PageEvent) => void;

export interface CookieRecord {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export interface PerformanceTiming {
  domContentLoadedMs: number | null;
  loadMs: number | null;
  firstPaintMs: number | null;
  firstContentfulPaintMs: number | null;
  transferSizeBytes: number | null;
  resourceCount: number;
}

export interface EngineLaunchOptions {
  headless: boolean;
  executablePath?: string;
}

export interface EnginePage {
  url(): string;
  title(): Promise<string>;
  /** Resolves with the main document's HTTP status, or null for non-HTTP URLs. */
  goto(url: string, options: { waitUntil: WaitUntil; timeout: number }): Promise<{ status: number | null }>;
  click(selector: string, options: { timeout: number }): Promise<void>;
  type(selector: string, text: string, options: { delay?: number; timeout: number }): Promise<void>;
  fill(selector: string, value: string, options: { timeout: number }): Promise<void>;
  setChecked(selector: string, checked: boolean, options: { timeout: number }): Promise<void>;
  selectOption(selector: string, value: string, options: { timeout: number }): Promise<string[]>;
  evaluate(script: string): Promise<unknown>;
  screenshot(options: { fullPage: boolean }): Promise<Buffer>;
  waitForSelector(selector: string, options: { state: SelectorState; timeout: number }): Promise<void>;
  /** Full document HTML, or the outer HTML of the first match when a selector is given. */
  content(selector?: string): Promise<string>;
  elementState(
    selector: string,
    checks: readonly ElementCheck[],
  ): Promise<Partial<Record<ElementCheck, boolean>>>;
  localStorage(): Promise<Record<string, string>>;
  cookies(): Promise<CookieRecord[]>;
  performance(): Promise<PerformanceTiming>;
  subscribe(listener: PageEventListener): () => void;
  close(): Promise<void>;
}

export interface EngineBrowser {
  newPage(options: { viewport: Viewport }): Promise<EnginePage>;
  onDisconnected(listener: () => void): void;
  close(): Promise<void>;
}

export interface BrowserEngine {
  launch(options: EngineLaunchOptions): Promise<EngineBrowser>;
}
