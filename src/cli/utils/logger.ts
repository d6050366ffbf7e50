/* eslint-disable no-console */
/**
 * CLI logging utility with colors and formatting
 */

import type { TDiagnostic } from '../../ast/types.js';

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const BOLD = USE_COLOR ? '\x1b[1m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

let verbose = false;

export const logger = {
  /** Show debug output without setting DEBUG (the `--verbose` flag) */
  setVerbose(enabled: boolean): void {
    verbose = enabled;
  },

  info(message: string): void {
    console.log(`${BLUE}ℹ ${message}${RESET}`);
  },

  success(message: string): void {
    console.log(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.warn(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (verbose || process.env.DEBUG) {
      console.log(`${DIM}🔍 ${message}${RESET}`);
    }
  },

  /** One generator diagnostic, indented under the file it belongs to */
  diagnostic(diagnostic: TDiagnostic): void {
    const text = `  [${diagnostic.code}] ${diagnostic.message}`;
    if (diagnostic.type === 'error') {
      this.error(text);
    } else {
      this.warn(text);
    }
  },

  log(message: string): void {
    console.log(message);
  },

  newline(): void {
    console.log();
  },

  section(title: string): void {
    console.log();
    console.log(`${BOLD}━━━ ${title} ━━━${RESET}`);
  },

  progress(current: number, total: number, item: string): void {
    console.log(`[${current}/${total}] ${item}`);
  },
};
