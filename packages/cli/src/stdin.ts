/**
 * Process I/O ports for `pile run`.
 *
 * Programs read input one line at a time while they execute, so stdin is
 * read synchronously in chunks as lines are requested.
 */
import * as fs from "node:fs";
import { StringDecoder } from "node:string_decoder";
import type { IoPorts } from "@pile/core";

/** Fills the buffer and returns the number of bytes read; 0 at end of input. */
export type ChunkSource = (buffer: Buffer) => number;

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export function fdChunkSource(fd: number): ChunkSource {
  return (buffer) => {
    try {
      return fs.readSync(fd, buffer, 0, buffer.length, null);
    } catch (e) {
      // A closed or absent stdin reads as end of input
      if (errnoCode(e) === "EOF") return 0;
      throw e;
    }
  };
}

export class LineReader {
  private pending = "";
  private done = false;
  private decoder = new StringDecoder("utf8");

  constructor(
    private source: ChunkSource,
    private chunkSize: number = 4096
  ) {}

  /**
   * Next line without its terminator (LF or CRLF), or null once input is
   * exhausted. A final line without a newline is still returned.
   */
  readLine(): string | null {
    for (;;) {
      const nl = this.pending.indexOf("\n");
      if (nl >= 0) {
        const line = this.pending.slice(0, nl);
        this.pending = this.pending.slice(nl + 1);
        return line.endsWith("\r") ? line.slice(0, -1) : line;
      }
      if (this.done) {
        if (this.pending === "") return null;
        const last = this.pending;
        this.pending = "";
        return last;
      }
      this.fill();
    }
  }

  private fill(): void {
    const buffer = Buffer.alloc(this.chunkSize);
    const n = this.source(buffer);
    if (n === 0) {
      this.done = true;
      this.pending += this.decoder.end();
    } else {
      this.pending += this.decoder.write(buffer.subarray(0, n));
    }
  }
}

/**
 * Ports backed by the process streams and the local filesystem.
 */
export function createProcessIo(stdin: LineReader = new LineReader(fdChunkSource(0))): IoPorts {
  return {
    write(text) {
      process.stdout.write(text);
    },
    writeError(text) {
      process.stderr.write(text);
    },
    readLine() {
      return stdin.readLine();
    },
    readFile(filePath) {
      try {
        return fs.readFileSync(filePath, "utf-8");
      } catch {
        return undefined;
      }
    },
    writeFile(filePath, text) {
      try {
        fs.writeFileSync(filePath, text, "utf-8");
        return true;
      } catch {
        return false;
      }
    },
  };
}
