/**
 * Global logger for CLI diagnostics.
 *
 * Everything goes to stderr so stdout only carries the rendered report.
 * --quiet silences all but errors, --debug adds per-commit detail.
 */

interface LoggerState {
  quiet: boolean;
  debug: boolean;
}

const state: LoggerState = {
  quiet: false,
  debug: false,
};

/**
 * Configure logger with global flags.
 */
export function configureLogger(options: { quiet?: boolean; debug?: boolean }): void {
  // --quiet overrides --debug
  if (options.quiet) {
    state.quiet = true;
    state.debug = false;
  } else {
    state.quiet = false;
    state.debug = options.debug ?? false;
  }
}

export function getLoggerState(): Readonly<LoggerState> {
  return { ...state };
}

/**
 * Reset logger to default state (for testing).
 */
export function resetLogger(): void {
  state.quiet = false;
  state.debug = false;
}

/**
 * Log a warning. Suppressed by --quiet.
 */
export function warn(message: string): void {
  if (!state.quiet) {
    console.error(`warning: ${message}`);
  }
}

/**
 * Log an info message. Suppressed by --quiet.
 */
export function info(message: string): void {
  if (!state.quiet) {
    console.error(message);
  }
}

/**
 * Log a debug message. Only shown with --debug.
 */
export function debug(message: string): void {
  if (!state.quiet && state.debug) {
    console.error(`[DEBUG] ${message}`);
  }
}

/**
 * Log an error message. Never suppressed.
 */
export function error(message: string): void {
  console.error(message);
}

/**
 * Report scan progress as "label processed/total".
 * Printed at most once per tenth of the total plus the final count,
 * so large windows don't flood stderr.
 */
export function progress(label: string, processed: number, total: number): void {
  if (state.quiet || total === 0) return;
  const step = Math.max(1, Math.floor(total / 10));
  if (processed === total || processed % step === 0) {
    console.error(`${label} ${processed}/${total}`);
  }
}
