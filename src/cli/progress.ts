/**
 * Progress display for CLI
 *
 * Displays ingest progress to stderr for clean stdout output.
 */

import type { IngestProgressEvent } from '../ingest/types.js';

/**
 * Progress display options
 */
export interface ProgressOptions {
  /** Suppress progress output */
  quiet?: boolean;
  /** Output in JSON format (disables progress display) */
  json?: boolean;
}

/**
 * Progress display class
 *
 * Handles progress output to stderr with in-place updates.
 */
export class ProgressDisplay {
  private quiet: boolean;
  private json: boolean;
  private lastLineLength = 0;
  private isTerminal: boolean;

  constructor(options: ProgressOptions = {}) {
    this.quiet = options.quiet === true;
    this.json = options.json === true;
    // Check if stderr is a TTY - isTTY is true when connected to a terminal
    this.isTerminal = process.stderr.isTTY === true;
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
      // Non-interactive: write new lines
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
   * Handle an ingest progress event
   */
  handleProgress(event: IngestProgressEvent): void {
    // Skip output in quiet or JSON mode
    if (this.quiet || this.json) {
      return;
    }

    const total = event.total;
    const processed = event.processed ?? 0;

    switch (event.type) {
      case 'started':
        this.writeMessage(`\n🚀 Ingesting ${String(total)} record(s)...`);
        break;

      case 'validated':
        this.writeLine(`📋 ${String(processed)}/${String(total)} records valid`);
        break;

      case 'embedded':
        this.writeLine(`🧠 Embedded ${String(processed)} changed record(s)`);
        break;

      case 'stored':
        this.writeLine(`💾 Stored ${String(processed)} record(s)`);
        break;

      case 'indexed':
        this.writeLine(`📐 Indexed ${String(processed)} record(s)`);
        break;

      case 'completed':
        this.clearLine();
        this.writeMessage(`\n✅ Ingest completed`);
        break;
    }
  }

  /**
   * Create a progress callback function
   */
  createCallback(): (event: IngestProgressEvent) => void {
    return (event: IngestProgressEvent): void => {
      this.handleProgress(event);
    };
  }

  /**
   * Finalize progress display (ensure clean state)
   */
  finish(): void {
    if (this.isTerminal && this.lastLineLength > 0) {
      this.clearLine();
    }
  }
}

/**
 * Create a progress display with options
 */
export function createProgressDisplay(options: ProgressOptions = {}): ProgressDisplay {
  return new ProgressDisplay(options);
}
