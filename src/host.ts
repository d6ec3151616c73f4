/**
 * Host - the interpreter's I/O boundary.
 *
 * Program output and `input()` go through a Host so the same interpreter can
 * run against the process streams or an in-memory buffer.
 */

import * as fs from "fs";

export interface Host {
  /** Write text to standard output as-is */
  write(text: string): void;
  /**
   * Read one line from standard input, without its line terminator.
   * Blocks until a line is available. Returns null at end of input.
   */
  readLine(): string | null;
}

// ============================================================================
// Process Host
// ============================================================================

/**
 * Host bound to the process's stdout and stdin. Input is read synchronously,
 * one byte at a time, so nothing past the current line is consumed.
 */
export class ProcessHost implements Host {
  write(text: string): void {
    process.stdout.write(text);
  }

  readLine(): string | null {
    const byte = Buffer.alloc(1);
    const bytes: number[] = [];

    while (true) {
      let read: number;
      try {
        read = fs.readSync(0, byte, 0, 1, null);
      } catch (err) {
        // Non-blocking stdin reports EAGAIN until data arrives
        if (isErrnoException(err) && err.code === "EAGAIN") continue;
        if (isErrnoException(err) && err.code === "EOF") break;
        throw err;
      }
      if (read === 0) break;
      if (byte[0] === 0x0a) {
        return stripCarriageReturn(Buffer.from(bytes).toString("utf8"));
      }
      bytes.push(byte[0]);
    }

    return bytes.length === 0 ? null : stripCarriageReturn(Buffer.from(bytes).toString("utf8"));
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

// ============================================================================
// Buffer Host
// ============================================================================

/**
 * In-memory host: collects output and serves input from a fixed list of
 * lines.
 */
export class BufferHost implements Host {
  private chunks: string[] = [];
  private readonly lines: string[];

  constructor(input: string[] = []) {
    this.lines = [...input];
  }

  write(text: string): void {
    this.chunks.push(text);
  }

  readLine(): string | null {
    return this.lines.shift() ?? null;
  }

  /** Everything written so far */
  get output(): string {
    return this.chunks.join("");
  }

  /** Output split into lines, without a trailing empty line */
  outputLines(): string[] {
    const out = this.output;
    if (out === "") return [];
    const lines = out.split("\n");
    if (lines[lines.length - 1] === "") lines.pop();
    return lines;
  }

  clear(): void {
    this.chunks = [];
  }
}
