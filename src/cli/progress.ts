/**
 * Progress display for CLI
 *
 * Displays bulk update progress to stderr for clean stdout output.
 */

import type { BulkProgressEvent } from '../batch/bulk-updater.js';

/**
 * Progress display options
 */
export interface ProgressOptions {
  /** Suppress progress output */
  quiet?: boolean;
  /** Output in JSON format (disables progress display) */
  json?: boolean;
  /** Print one line per document instead of an in-place counter */
  verbose?: boolean;
}

/**
 * Progress display class
 *
 * Handles progress output to stderr with in-place updates.
 */
export class ProgressDisplay {
  private quiet: boolean;
  private verbose: boolean;
  private lastLineLength = 0;
  private isTerminal: boolean;
  private currentSite: string | null = null;

  constructor(options: ProgressOptions = {}) {
    this.quiet = options.quiet === true || options.json === true;
    this.verbose = options.verbose === true;
    this.isTerminal = process.stderr.isTTY;
  }

  /**
   * Clear the current progress line
   */
  private clearLine(): void {
    if (this.isTerminal) {
      process.stderr.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
    }
  }

  /**
   * Write a progress line (in-place update)
   */
  private writeLine(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
      process.stderr.write(text);
      this.lastLineLength = text.length;
    } else {
      process.stderr.write(text + '\n');
    }
  }

  /**
   * Write a permanent message (moves to new line)
   */
  private writeMessage(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
    }
    process.stderr.write(text + '\n');
    this.lastLineLength = 0;
  }

  /**
   * Handle a bulk progress event
   */
  handleProgress(event: BulkProgressEvent): void {
    if (this.quiet) {
      return;
    }

    if (event.site !== this.currentSite) {
      this.currentSite = event.site;
      this.writeMessage(`Updating site ${event.site} (${String(event.total)} documents)`);
    }

    const position = `[${String(event.processed)}/${String(event.total)}]`;
    const doc = `${event.ref.type}:${String(event.ref.id)}`;

    if (event.status === 'error') {
      this.writeMessage(`${position} ${doc} failed: ${event.error ?? 'Unknown error'}`);
    } else if (this.verbose) {
      this.writeMessage(`${position} ${doc}: ${String(event.stored)} suggestion(s)`);
    } else {
      this.writeLine(`${position} ${doc}`);
    }
  }

  /**
   * Create a progress callback function
   */
  createCallback(): (event: BulkProgressEvent) => void {
    return (event: BulkProgressEvent): void => {
      this.handleProgress(event);
    };
  }

  /**
   * Finalize progress display (ensure clean state)
   */
  finish(): void {
    if (this.isTerminal && this.lastLineLength > 0) {
      this.clearLine();
      this.lastLineLength = 0;
    }
  }
}

/**
 * Create a progress display with options
 */
export function createProgressDisplay(options: ProgressOptions = {}): ProgressDisplay {
  return new ProgressDisplay(options);
}
