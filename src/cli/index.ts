#!/usr/bin/env node

import { Command } from 'commander';
import { registerHarvestCommand } from './commands/harvest.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('trendcap')
    .description('Capture trending short videos with metadata to CSV/JSONL')
    .version('0.1.0');

  registerInstallBrowsersCommand(program);
  registerHarvestCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
