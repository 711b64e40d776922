/**
 * Terminal Utility - Handles terminal-specific functions
 *
 * Helpers for refreshing the terminal between rendered frames and for writing
 * lines straight to a stream, bypassing any console patching (tests silence
 * `console.log`).
 */

/** Minimal writable surface (`process.stdout`, test recorders). */
export interface LineSink {
  write(chunk: string): unknown;
}

export class TerminalUtility {
  /**
   * Returns a function that clears the terminal screen using ANSI escape codes.
   *
   * @param sink - Stream to write to (default: `process.stdout`).
   */
  static createTerminalClearer(sink: LineSink = process.stdout): () => void {
    return () => {
      // \x1Bc resets the screen
      sink.write('\x1Bc');
    };
  }

  /**
   * Returns a logger that joins its arguments with spaces and writes them as a
   * single line to `sink`.
   */
  static createForceLog(
    sink: LineSink = process.stdout
  ): (...args: unknown[]) => void {
    return (...args: unknown[]) => {
      sink.write(args.map(String).join(' ') + '\n');
    };
  }
}
