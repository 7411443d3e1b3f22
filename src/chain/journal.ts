/**
 * @module journal
 * @description Append-only JSON-Lines journal of signed audit entries.
 *
 * One entry per line, appended in chain order, file mode 0600. The journal is
 * what makes the chain survive a restart: the logger reopens it and resumes
 * from the `log_hash` of its last line.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { JournalError, errnoCode, errorMessage } from "../errors";
import type { AuditEntry } from "../schema/audit-entry";
import { log } from "../utils/logger";

export class AuditJournal {
  readonly filePath: string;
  private dirReady = false;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async append(entry: AuditEntry): Promise<void> {
    const line = JSON.stringify(entry) + "\n";
    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await fs.appendFile(this.filePath, line, { encoding: "utf8", mode: 0o600 });
    } catch (error) {
      log.error("Failed to append audit entry to journal", {
        error: errorMessage(error),
        journalPath: this.filePath,
      });
      throw new JournalError(
        `Cannot append to audit journal ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Replay every entry in write order. A journal that does not exist yet is
   * empty; a line that is not JSON is a {@link JournalError}.
   */
  async readAll(): Promise<unknown[]> {
    const entries: unknown[] = [];
    await this.scan((entry) => {
      entries.push(entry);
    });
    return entries;
  }

  /** The most recent entry, or `undefined` for an empty journal. */
  async last(): Promise<unknown> {
    let tail: unknown = undefined;
    await this.scan((entry) => {
      tail = entry;
    });
    return tail;
  }

  private async scan(visit: (entry: unknown) => void): Promise<void> {
    try {
      await fs.access(this.filePath);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return;
      throw new JournalError(
        `Cannot open audit journal ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const rl = createInterface({
      input: createReadStream(this.filePath, { encoding: "utf8" }),
      crlfDelay: Infinity,
    });

    let lineNo = 0;
    try {
      for await (const line of rl) {
        lineNo++;
        if (!line.trim()) continue;
        try {
          visit(JSON.parse(line));
        } catch (error) {
          throw new JournalError(
            `Corrupt audit journal ${this.filePath} at line ${lineNo}: ${errorMessage(error)}`,
            { cause: error }
          );
        }
      }
    } catch (error) {
      if (error instanceof JournalError) throw error;
      throw new JournalError(
        `Cannot read audit journal ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      rl.close();
    }
  }
}
