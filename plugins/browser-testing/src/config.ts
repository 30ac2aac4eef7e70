import { join } from 'path';
import { z } from 'zod';

export interface Viewport {
  width: number;
  height: number;
}

export interface ServerConfig {
  headless: boolean;
  chromePath?: string;
  viewport: Viewport;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  consoleLogLimit: number;
  networkLogLimit: number;
  screenshotDir: string;
  debug: boolean;
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['true', 'false', '1', '0', 'yes', 'no', ''].includes(value), {
    message: 'expected true/false, 1/0 or yes/no',
  })
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  BROWSER_TESTING_HEADLESS: booleanFlag.default('false'),
  BROWSER_TESTING_CHROME_PATH: z.string().trim().min(1).optional(),
  BROWSER_TESTING_VIEWPORT_WIDTH: positiveInt.default(1280),
  BROWSER_TESTING_VIEWPORT_HEIGHT: positiveInt.default(720),
  BROWSER_TESTING_NAVIGATION_TIMEOUT_MS: positiveInt.default(30_000),
  BROWSER_TESTING_ACTION_TIMEOUT_MS: positiveInt.default(10_000),
  BROWSER_TESTING_CONSOLE_LOG_LIMIT: positiveInt.default(1000),
  BROWSER_TESTING_NETWORK_LOG_LIMIT: positiveInt.default(1000),
  BROWSER_TESTING_SCREENSHOT_DIR: z.string().trim().min(1).optional(),
  BROWSER_TESTING_DEBUG: booleanFlag.default('false'),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the server configuration from environment variables.
 * Throws a `ConfigError` naming every invalid variable.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  pluginRoot: string,
): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const vars = parsed.data;
  return {
    headless: vars.BROWSER_TESTING_HEADLESS,
    chromePath: vars.BROWSER_TESTING_CHROME_PATH,
    viewport: {
      width: vars.BROWSER_TESTING_VIEWPORT_WIDTH,
      height: vars.BROWSER_TESTING_VIEWPORT_HEIGHT,
    },
    navigationTimeoutMs: vars.BROWSER_TESTING_NAVIGATION_TIMEOUT_MS,
    actionTimeoutMs: vars.BROWSER_TESTING_ACTION_TIMEOUT_MS,
    consoleLogLimit: vars.BROWSER_TESTING_CONSOLE_LOG_LIMIT,
    networkLogLimit: vars.BROWSER_TESTING_NETWORK_LOG_LIMIT,
    screenshotDir:
      vars.BROWSER_TESTING_SCREENSHOT_DIR ?? join(pluginRoot, 'agent', 'browser_screenshots'),
    debug: vars.BROWSER_TESTING_DEBUG,
  };
}
