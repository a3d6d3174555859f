// src/core/config/browser-config.ts
import type { BrowserConfig, BrowserEngine } from '../types/index.js';

export const BROWSER_ENGINES = ['chromium', 'firefox', 'webkit'] as const satisfies readonly BrowserEngine[];

export const BROWSER_CONFIGS: Record<BrowserEngine, BrowserConfig> = {
  chromium: {
    name: 'Chromium',
    installName: 'chromium',
  },
  firefox: {
    name: 'Firefox',
    installName: 'firefox',
  },
  webkit: {
    name: 'WebKit',
    installName: 'webkit',
  },
};

export const DEFAULT_BROWSER: BrowserEngine = 'chromium';

export function isBrowserEngine(value: string): value is BrowserEngine {
  return (BROWSER_ENGINES as readonly string[]).includes(value);
}
