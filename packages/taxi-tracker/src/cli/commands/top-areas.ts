/**
 * Top Areas Command
 *
 * Rank Singapore planning areas by the number of available taxis.
 *
 * Usage:
 *   taxi-tracker top-areas [options]
 *
 * Options:
 *   -k, --top-k <n>     Number of areas to list (default: 10)
 *   --format <fmt>      Output format: table|json|csv (default: table)
 *   --year <yyyy>       Planning-area boundary vintage (default: 2019)
 *   --no-describe       Skip reverse geocoding of the top areas
 *   --timeout <ms>      Per-request timeout for every upstream call
 *
 * Exit codes:
 *   0 success, 3 config, 4 fetch, 5 lookup, 6 empty result, 2 other
 *
 * @module cli/commands/top-areas
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import {
  ConfigError,
  EXIT_CODES,
  LookupError,
  exitCodeFor,
  type ExitCode,
} from '../../core/errors.js';
import type { TaxiReport } from '../../core/types.js';
import {
  createTaxiTrackerService,
  type TaxiTrackerService,
} from '../../services/taxi-tracker-service.js';
import { loadConfig, OUTPUT_FORMATS, type OutputFormat, type TrackerConfig } from '../lib/config.js';
import { printOutput } from '../lib/output.js';
import { formatReport } from '../lib/report.js';

// ============================================================================
// Types
// ============================================================================

export interface TopAreasOptions {
  readonly config: TrackerConfig;
  /** Defaults to the live service built from config */
  readonly service?: TaxiTrackerService;
  /** Defaults to stdout */
  readonly write?: (output: string) => void;
}

export interface TopAreasResult {
  readonly success: boolean;
  readonly exitCode: ExitCode;
  readonly report?: TaxiReport;
  readonly error?: string;
}

/**
 * Options as commander parses them
 */
interface TopAreasCliOptions {
  readonly topK?: number;
  readonly format?: OutputFormat;
  readonly year?: number;
  readonly describe?: boolean;
  readonly timeout?: number;
}

/**
 * Program-level options
 */
export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly config?: string;
}

// ============================================================================
// Command Implementation
// ============================================================================

/**
 * Run the pipeline and print the report
 */
export async function runTopAreas(options: TopAreasOptions): Promise<TopAreasResult> {
  const { config } = options;
  const write = options.write ?? printOutput;

  try {
    const service = options.service ?? createTaxiTrackerService(config);
    const report = await service.run({
      topK: config.report.topK,
      describe: config.report.describe,
    });

    write(formatReport(report, config.report.format));

    return { success: true, exitCode: EXIT_CODES.SUCCESS, report };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    printError(error, config.report.format === 'json');
    return { success: false, exitCode: exitCodeFor(error), error: errorMessage };
  }
}

function printError(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  const details =
    error instanceof LookupError ? error.details : error instanceof ConfigError ? error.issues : [];

  if (json) {
    console.error(JSON.stringify({ success: false, error: message, details }, null, 2));
    return;
  }

  console.error(`Error: ${message}`);
  for (const detail of details.slice(0, 10)) {
    console.error(`  - ${detail}`);
  }
  if (details.length > 10) {
    console.error(`  ... and ${details.length - 10} more`);
  }
}

// ============================================================================
// Registration
// ============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Register the top-areas command
 */
export function registerTopAreasCommand(program: Command): void {
  program
    .command('top-areas', { isDefault: true })
    .description('Rank planning areas by number of available taxis')
    .option('-k, --top-k <n>', 'Number of areas to list (default: 10)', parsePositiveInt)
    .addOption(
      new Option('--format <fmt>', 'Output format (default: table)').choices(OUTPUT_FORMATS)
    )
    .option('--year <yyyy>', 'Planning-area boundary vintage (default: 2019)', parsePositiveInt)
    .option('--describe', 'Reverse-geocode the top areas (default)')
    .option('--no-describe', 'Skip reverse geocoding of the top areas')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parsePositiveInt)
    .action(async (options: TopAreasCliOptions) => {
      const globals = program.opts<GlobalOptions>();

      let config: TrackerConfig;
      try {
        config = loadConfig({
          configPath: globals.config,
          overrides: {
            topK: options.topK,
            format: options.format,
            year: options.year,
            describe: options.describe,
            timeout: options.timeout,
          },
        });
      } catch (error) {
        printError(error, options.format === 'json');
        process.exitCode = exitCodeFor(error);
        return;
      }

      const result = await runTopAreas({ config });
      process.exitCode = result.exitCode;
    });
}
