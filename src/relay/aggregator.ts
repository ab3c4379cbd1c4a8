/**
 * Report aggregation
 *
 * Summarizes one window of the dialogue log with frequency and length
 * heuristics and persists the formatted artifact. Output depends only on the
 * log contents for the window, so re-running a closed window rewrites the
 * same bytes.
 */

import type { DialogueEntry, Report, ReportKind, ReportWindow } from "../types";
import { dateKey, formatClock } from "../scheduling";
import type { DialogueLog } from "./dialogue-log";
import type { Storage } from "./storage";
import { createLogger } from "./logger";
import {
  DAILY_HIGHLIGHTS,
  HIGHLIGHT_MAX_CHARS,
  HOURLY_HIGHLIGHTS,
  MIN_TERM_LENGTH,
  TOP_TERMS,
} from "./config";

const log = createLogger("REPORT");

const HIGHLIGHT_LIMITS: Record<ReportKind, number> = {
  hourly: HOURLY_HIGHLIGHTS,
  daily: DAILY_HIGHLIGHTS,
};

export function artifactKey(window: ReportWindow): string {
  return `report_${window.kind}_${window.label}.txt`;
}

/**
 * Most frequent whitespace-separated tokens longer than the stop-word cutoff.
 * Ties keep first-occurrence order.
 */
export function extractTopTerms(messages: string[], limit = TOP_TERMS): string[] {
  const counts = new Map<string, number>();
  for (const message of messages) {
    for (const token of message.toLowerCase().split(/\s+/)) {
      if (token.length < MIN_TERM_LENGTH) continue;
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([term]) => term);
}

export function truncateHighlight(text: string, maxChars = HIGHLIGHT_MAX_CHARS): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= maxChars) return flat;
  return `${flat.slice(0, maxChars - 1)}…`;
}

// Longest messages first, earliest first among equal lengths
export function selectHighlights(entries: DialogueEntry[], limit: number): string[] {
  return entries
    .map((entry, index) => ({ entry, index }))
    .sort(
      (a, b) =>
        b.entry.message.length - a.entry.message.length ||
        a.entry.timestamp - b.entry.timestamp ||
        a.index - b.index,
    )
    .slice(0, limit)
    .map(({ entry }) => truncateHighlight(entry.message));
}

export function buildReport(window: ReportWindow, entries: DialogueEntry[]): Report {
  return {
    window,
    messageCount: entries.length,
    uniqueUsers: new Set(entries.map((e) => e.userId)).size,
    topTerms: extractTopTerms(entries.map((e) => e.message)),
    highlightedMessages: selectHighlights(entries, HIGHLIGHT_LIMITS[window.kind]),
  };
}

function formatHeading(window: ReportWindow, timeZone: string): string {
  if (window.kind === "hourly") {
    const range = `${formatClock(window.start, timeZone)}–${formatClock(window.end, timeZone)}`;
    return `📊 Hourly report ${dateKey(window.start, timeZone)} ${range} (${timeZone})`;
  }
  return `📊 Daily report ${window.label} (${timeZone})`;
}

export function formatReport(report: Report, timeZone: string): string {
  const lines = [
    formatHeading(report.window, timeZone),
    "",
    `Messages: ${report.messageCount}`,
    `Unique users: ${report.uniqueUsers}`,
    `Top terms: ${report.topTerms.length > 0 ? report.topTerms.join(", ") : "-"}`,
  ];

  if (report.highlightedMessages.length > 0) {
    lines.push("", "Highlights:");
    report.highlightedMessages.forEach((text, i) => {
      lines.push(`${i + 1}. ${text}`);
    });
  }

  return `${lines.join("\n")}\n`;
}

export interface AggregationResult {
  report: Report;
  text: string;
  key: string;
}

export class ReportAggregator {
  constructor(
    private readonly dialogueLog: DialogueLog,
    private readonly storage: Storage,
    private readonly timeZone: string,
  ) {}

  /**
   * Compute a report without persisting it.
   * Returns null when the window holds no messages.
   */
  async preview(window: ReportWindow): Promise<AggregationResult | null> {
    if (window.start >= window.end) {
      throw new Error(`Empty report window: ${window.start} >= ${window.end}`);
    }

    const entries = await this.dialogueLog.readWindow(window);
    if (entries.length === 0) return null;

    const report = buildReport(window, entries);
    return {
      report,
      text: formatReport(report, this.timeZone),
      key: artifactKey(window),
    };
  }

  /**
   * Compute and persist the report for a window, replacing any artifact with
   * the same key. Empty windows leave existing artifacts untouched.
   */
  async aggregate(window: ReportWindow): Promise<AggregationResult | null> {
    const result = await this.preview(window);
    if (!result) {
      log.info(`No messages for ${window.kind} window ${window.label}, skipping`);
      return null;
    }

    await this.storage.write(result.key, result.text);
    log.info(`Wrote ${result.key}`, {
      messages: result.report.messageCount,
      users: result.report.uniqueUsers,
    });
    return result;
  }
}
