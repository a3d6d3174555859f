// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execSync } from 'child_process';
import { BROWSER_CONFIGS, DEFAULT_BROWSER, isBrowserEngine } from '../../core/config/browser-config.js';
import { describeError } from '../../core/errors.js';

export function registerInstallBrowsersCommand(program: Command): void {
  program
    .command('install-browsers')
    .description('Install a Playwright browser engine (chromium|firefox|webkit)')
    .argument('[engine]', 'Browser engine to install', DEFAULT_BROWSER)
    .action((engine: string) => {
      if (!isBrowserEngine(engine)) {
        console.error(`Error: Invalid browser engine: ${engine}. Use chromium, firefox, or webkit`);
        process.exit(1);
        return;
      }

      const config = BROWSER_CONFIGS[engine];
      try {
        execSync(`npx playwright install ${config.installName}`, {
          stdio: 'inherit',
        });
        console.log(`✓ ${config.name} installed successfully`);
      } catch (error) {
        console.error(`✗ Failed to install ${config.name}: ${describeError(error)}`);
        process.exit(1);
      }
    });
}
