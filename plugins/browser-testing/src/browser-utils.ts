import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { platform } from 'os';
import { resolve } from 'path';
import sharp from 'sharp';

const MAX_SCREENSHOT_EDGE = 2000;

/**
 * Finds the local Chrome installation path based on the operating system.
 */
export function findLocalChrome(): string | undefined {
  const systemPlatform = platform();
  const chromePaths: string[] = [];

  if (systemPlatform === 'darwin') {
    chromePaths.push(
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${process.env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${process.env.HOME}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    );
  } else if (systemPlatform === 'win32') {
    chromePaths.push(
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${process.env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    );
  } else {
    chromePaths.push(
      '/usr/bin/google-chrome',
      '/usr/bin/google-chrome-stable',
      '/usr/bin/chromium',
      '/usr/bin/chromium-browser',
      '/snap/bin/chromium',
      '/opt/google/chrome/chrome',
    );
  }

  return chromePaths.find((p) => existsSync(p));
}

export interface PreparedScreenshot {
  png: Buffer;
  width: number;
  height: number;
  resized: boolean;
}

/**
 * Scales a PNG down to fit 2000x2000 when either edge is larger, keeping
 * the aspect ratio.
 */
export async function prepareScreenshot(raw: Buffer): Promise<PreparedScreenshot> {
  const { width = 0, height = 0 } = await sharp(raw).metadata();

  if (width <= MAX_SCREENSHOT_EDGE && height <= MAX_SCREENSHOT_EDGE) {
    return { png: raw, width, height, resized: false };
  }

  const { data, info } = await sharp(raw)
    .resize(MAX_SCREENSHOT_EDGE, MAX_SCREENSHOT_EDGE, {
      fit: 'inside',
      withoutEnlargement: true,
    })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { png: data, width: info.width, height: info.height, resized: true };
}

/**
 * Writes a screenshot into `screenshotDir` and returns its absolute path.
 */
export function saveScreenshot(png: Buffer, screenshotDir: string, now = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  const screenshotPath = resolve(screenshotDir, `screenshot-${timestamp}.png`);

  if (!existsSync(screenshotDir)) {
    mkdirSync(screenshotDir, { recursive: true });
  }

  writeFileSync(screenshotPath, png);
  return screenshotPath;
}
