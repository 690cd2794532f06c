import type { FailureContext, FetchOutcome, FetchResult } from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Create fetch callbacks that report progress on stderr so they don't
 * interfere with stdout output.
 *
 * - quiet mode: no output
 * - normal mode: count and URL for each page, plus errors
 * - verbose mode: also status code, size, elapsed time and attempts
 *
 * @param verbosity - The desired output verbosity
 */
export function createProgressCallbacks(verbosity: Verbosity): {
  onSuccess: (result: FetchResult) => void;
  onFailure: (context: FailureContext) => void;
} {
  let fetchedCount = 0;

  if (verbosity === 'quiet') {
    return {
      onSuccess: () => { fetchedCount++; },
      onFailure: () => {},
    };
  }

  return {
    onSuccess: (result: FetchResult) => {
      fetchedCount++;
      if (verbosity === 'verbose') {
        process.stderr.write(
          `[${fetchedCount}] Fetched: ${result.url} (${result.statusCode}, ${result.content.byteLength} bytes, ${Math.round(result.elapsedMs)}ms, ${result.attempts} attempt(s))\n`,
        );
      } else {
        process.stderr.write(`[${fetchedCount}] ${result.url}\n`);
      }
    },

    onFailure: ({ url, error, attempts }: FailureContext) => {
      const suffix = verbosity === 'verbose' ? ` after ${attempts} attempt(s)` : '';
      process.stderr.write(`  Error: ${url} - [${error.kind}] ${error.message}${suffix}\n`);
    },
  };
}

/**
 * Print a summary of the batch to stderr.
 *
 * @param outcomes - Outcomes in input order
 * @param durationMs - Wall time of the whole batch
 * @param verbosity - The desired output verbosity
 */
export function printSummary(
  outcomes: FetchOutcome[],
  durationMs: number,
  verbosity: Verbosity,
): void {
  if (verbosity === 'quiet') {
    return;
  }

  const succeeded = outcomes.filter((outcome) => outcome.success).length;
  const failed = outcomes.length - succeeded;
  const durationSec = (durationMs / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(`Done! Fetched ${succeeded} of ${outcomes.length} URLs`);
  if (failed > 0) {
    process.stderr.write(`, ${failed} failed`);
  }
  process.stderr.write(` in ${durationSec}s\n`);
}

/**
 * One JSON-serializable line of the `--json` report.
 */
export type OutcomeSummary =
  | {
      url: string;
      success: true;
      statusCode: number;
      contentType: string;
      bytes: number;
      elapsedMs: number;
      attempts: number;
    }
  | {
      url: string;
      success: false;
      kind: string;
      message: string;
      statusCode?: number;
      attempts: number;
    };

/**
 * Reduce outcomes to their JSON report form (bodies are left out).
 */
export function summarizeOutcomes(outcomes: FetchOutcome[]): OutcomeSummary[] {
  return outcomes.map((outcome) =>
    outcome.success
      ? {
          url: outcome.url,
          success: true,
          statusCode: outcome.statusCode,
          contentType: outcome.contentType,
          bytes: outcome.content.byteLength,
          elapsedMs: Math.round(outcome.elapsedMs),
          attempts: outcome.attempts,
        }
      : {
          url: outcome.url,
          success: false,
          kind: outcome.kind,
          message: outcome.message,
          statusCode: outcome.statusCode,
          attempts: outcome.attempts,
        },
  );
}
