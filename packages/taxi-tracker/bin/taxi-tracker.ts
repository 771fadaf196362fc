#!/usr/bin/env tsx
/**
 * Taxi Tracker CLI Entry Point
 *
 * Reports which Singapore planning areas currently have the most
 * available taxis.
 *
 * Credentials come from the environment (or a .env file):
 *   ONE_MAP_API_TOKEN  OneMap access token (planning-area boundaries)
 *   DATA_SG_API        data.gov.sg API key (taxi availability)
 *
 * @module taxi-tracker-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerTopAreasCommand } from '../src/cli/commands/top-areas.js';
import { EXIT_CODES } from '../src/core/errors.js';
import { setLogLevel } from '../src/core/utils/logger.js';

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    console.error(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('taxi-tracker')
    .description('Taxi availability by Singapore planning area')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--config <path>', 'Path to config file (default: .taxi-trackerrc)')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogLevel('debug');
      }
    });

  registerTopAreasCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
