import { Command } from 'commander';
import { createScrapeSession } from '../sdk/index.js';
import { BatchError } from '../batch/index.js';
import { CONFIG_DEFAULTS, type FetchOutcome } from '../types.js';
import { createLogger } from '../logger.js';
import { buildSessionOptions, collectUrls } from './options.js';
import type { CLIOptions } from './options.js';
import {
  createProgressCallbacks,
  printSummary,
  summarizeOutcomes,
  type Verbosity,
} from './progress.js';

/**
 * Accumulate repeated option values into an array.
 * Used for --header, --param and --cookie which can be specified multiple times.
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create and configure the commander program with all CLI options.
 *
 * @returns The configured Command instance
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('bulk-fetch')
    .description('Fetch many URLs concurrently under a shared rate limit')
    .version('0.1.0')
    .argument('[urls...]', 'URLs to fetch')
    .option('-i, --input <file>', 'Read URLs from a file, one per line')

    // Throttling
    .option('--preset <name>', 'Rate-limit preset: standard (5 req/s) or bulk (250 req/s)', 'standard')
    .option('--rps <n>', 'Requests per second (overrides --preset)')
    .option('--no-rate-limit', 'Do not throttle requests')

    // Request
    .option('--timeout <ms>', 'Request timeout in ms', String(CONFIG_DEFAULTS.timeoutMs))
    .option('--header <key:value>', 'Custom header (repeatable); replaces the default set', collect, [])
    .option('--param <name=value>', 'Query parameter (repeatable)', collect, [])
    .option('--cookie <name=value>', 'Cookie (repeatable)', collect, [])
    .option('--cookie-file <path>', 'Netscape-format cookie file')
    .option('--expect-type <type>', 'Fail when Content-Type does not contain this')
    .option('--proxy <url>', 'Proxy URL')
    .option('--insecure', 'Skip TLS certificate verification')
    .option('--no-follow-redirects', 'Return 3xx responses instead of following them')

    // Retries
    .option('--max-attempts <n>', 'Attempts per URL, first included', String(CONFIG_DEFAULTS.retry.maxAttempts))
    .option('--max-time <ms>', 'Retry time budget per URL in ms', String(CONFIG_DEFAULTS.retry.maxTimeMs))

    // Batch
    .option('--concurrency <n>', 'Maximum parallel requests (default: all at once)')
    .option('--strict', 'Fail the whole batch if any URL fails')

    // General
    .option('--json', 'Print a JSON report to stdout')
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Validate CLI-only constraints before building the session.
 *
 * @throws Error if validation fails
 */
function validateCLIOptions(urls: string[], options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
  if (urls.length === 0) {
    throw new Error('No URLs given. Pass them as arguments or with --input.');
  }
}

/**
 * Main CLI entry point. Parses command-line arguments, fetches every URL
 * through one scrape session, and reports the outcomes.
 *
 * Exits with 0 when every URL succeeded and 1 otherwise.
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  const program = createProgram();

  program.action(async (args: string[], options: CLIOptions) => {
    try {
      const urls = collectUrls(args, options);
      validateCLIOptions(urls, options);

      const verbosity = getVerbosity(options);
      const callbacks = createProgressCallbacks(verbosity);
      const session = createScrapeSession({
        ...buildSessionOptions(options),
        logger: createLogger({ level: verbosity === 'verbose' ? 'info' : 'error' }),
      });

      const startTime = Date.now();
      let outcomes: FetchOutcome[];
      try {
        outcomes = await session.fetchAll(urls, callbacks);
      } catch (error) {
        if (!(error instanceof BatchError)) {
          throw error;
        }
        outcomes = error.outcomes;
        process.stderr.write(`Strict mode: ${error.message}\n`);
      } finally {
        await session.close();
      }

      if (options.json) {
        process.stdout.write(`${JSON.stringify(summarizeOutcomes(outcomes), null, 2)}\n`);
      }
      printSummary(outcomes, Date.now() - startTime, verbosity);

      process.exit(outcomes.every((outcome) => outcome.success) ? 0 : 1);
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exit(1);
    }
  });

  await program.parseAsync(argv);
}
