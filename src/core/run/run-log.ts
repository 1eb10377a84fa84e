/**
 * Append-only log of one backup run
 */

import { once } from "node:events";
import { createWriteStream, type WriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { finished } from "node:stream/promises";
import { BackupEngineError, errorMessage } from "../../errors";
import type { OutputTee } from "../../system/process";

export class RunLog {
  private closed = false;
  private failure: Error | null = null;

  private constructor(
    readonly filePath: string,
    private readonly stream: WriteStream,
  ) {
    // A write error must not take the process down while borg is running
    stream.on("error", (error) => {
      this.failure ??= error;
    });
  }

  /**
   * Resolves once the file is open; rejects with the open error
   */
  static async open(filePath: string): Promise<RunLog> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const stream = createWriteStream(filePath, { flags: "a", encoding: "utf8" });
    await once(stream, "open");
    return new RunLog(filePath, stream);
  }

  write(text: string): void {
    if (this.closed || this.failure) return;
    this.stream.write(text);
  }

  line(text: string): void {
    this.write(text.endsWith("\n") ? text : `${text}\n`);
  }

  /**
   * Duplicate child output into the log and onto the given console tee
   */
  tee(console?: OutputTee): OutputTee {
    return {
      stdout: (chunk) => {
        this.write(chunk);
        console?.stdout(chunk);
      },
      stderr: (chunk) => {
        this.write(chunk);
        console?.stderr(chunk);
      },
    };
  }

  /**
   * Flush and close. A write failure seen at any point is returned, not thrown.
   */
  async close(): Promise<BackupEngineError | null> {
    if (!this.closed) {
      this.closed = true;
      this.stream.end();
      try {
        await finished(this.stream);
      } catch (error) {
        this.failure ??= error instanceof Error ? error : new Error(errorMessage(error));
      }
    }

    return this.failure
      ? new BackupEngineError(`Writing run log ${this.filePath} failed: ${this.failure.message}`)
      : null;
  }
}
