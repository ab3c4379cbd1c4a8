/**
 * Dialogue log
 *
 * Append-only record of every inbound message, segmented by the calendar day
 * of the message timestamp. Segments are never rewritten; a reader sees the
 * complete lines present when it opened the segment.
 */

import { z } from "zod";
import type { DialogueEntry, ReportWindow } from "../types";
import { dateKey, dateKeysInRange } from "../scheduling";
import type { Storage } from "./storage";
import { createLogger } from "./logger";

const log = createLogger("DIALOGUE");

const SEGMENT_PREFIX = "dialogs_";

const dialogueEntrySchema = z.object({
  timestamp: z.number().int().nonnegative(),
  userId: z.string(),
  userName: z.string(),
  message: z.string(),
});

export function segmentKey(day: string): string {
  return `${SEGMENT_PREFIX}${day}`;
}

export interface DialogueStats {
  messageCount: number;
  uniqueUsers: number;
}

export class DialogueLog {
  constructor(
    private readonly storage: Storage,
    private readonly timeZone: string,
  ) {}

  /**
   * Record one entry under the segment for its calendar day.
   * Throws StorageWriteError when the write fails.
   */
  async append(entry: DialogueEntry): Promise<void> {
    const key = segmentKey(dateKey(entry.timestamp, this.timeZone));
    await this.storage.append(key, JSON.stringify(entry));
  }

  // Every entry of one day's segment, in append order
  async readDay(day: string): Promise<DialogueEntry[]> {
    const key = segmentKey(day);
    const lines = await this.storage.readLines(key);
    const entries: DialogueEntry[] = [];

    for (const line of lines) {
      const entry = parseEntry(line);
      if (entry) {
        entries.push(entry);
      } else {
        log.warn(`Skipping malformed line in ${key}`, line.slice(0, 80));
      }
    }

    return entries;
  }

  /**
   * Entries with timestamps in [window.start, window.end), oldest first.
   * Only segments overlapping the window are read.
   */
  async readWindow(window: ReportWindow): Promise<DialogueEntry[]> {
    const days = dateKeysInRange(window.start, window.end, this.timeZone);
    const entries: DialogueEntry[] = [];

    for (const day of days) {
      for (const entry of await this.readDay(day)) {
        if (entry.timestamp >= window.start && entry.timestamp < window.end) {
          entries.push(entry);
        }
      }
    }

    // Stable: equal timestamps keep append order
    return entries.sort((a, b) => a.timestamp - b.timestamp);
  }

  async statsForDay(day: string): Promise<DialogueStats> {
    const entries = await this.readDay(day);
    return {
      messageCount: entries.length,
      uniqueUsers: new Set(entries.map((e) => e.userId)).size,
    };
  }
}

function parseEntry(line: string): DialogueEntry | null {
  try {
    const result = dialogueEntrySchema.safeParse(JSON.parse(line));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
