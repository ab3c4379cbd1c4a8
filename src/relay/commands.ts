/**
 * Chat commands (/start, /clear, /stats, /report)
 */

import { dailyWindow, dateKey } from "../scheduling";
import type { ContextStore } from "./context-store";
import type { DialogueLog } from "./dialogue-log";
import type { AggregationResult, ReportAggregator } from "./aggregator";
import { createLogger } from "./logger";
import { describeError } from "./errors";

const log = createLogger("COMMANDS");

export const COMMAND_NAMES = ["start", "clear", "stats", "report"] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export interface ParsedCommand {
  name: CommandName | null; // null for commands we don't know
  raw: string;
}

export const START_REPLY = "Hi! I'm a Gemini-powered assistant 🤖 Just send me a message.";
export const CLEAR_REPLY = "🧹 Conversation cleared.";
export const REPORT_SENT_REPLY = "✅ Report sent!";
export const NO_MESSAGES_TODAY_REPLY = "No messages logged today yet.";
export const NO_ADMIN_CHAT_REPLY = "⚠️ No admin chat is configured, so reports cannot be sent.";

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

/**
 * Parse "/name" or "/name@BotName" at the start of a message.
 * Returns null for ordinary text.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s|$)/.exec(text.trim());
  if (!match) return null;
  const raw = match[1].toLowerCase();
  return { name: isCommandName(raw) ? raw : null, raw };
}

export interface CommandContext {
  contextStore: ContextStore;
  dialogueLog: DialogueLog;
  aggregator: ReportAggregator;
  timeZone: string;
  now: () => number;
  // Deliver a report to the admin chat; absent when none is configured
  deliverReport?: (text: string) => Promise<boolean>;
}

export class CommandHandler {
  constructor(private readonly ctx: CommandContext) {}

  async run(command: ParsedCommand, userId: string): Promise<string> {
    switch (command.name) {
      case "start":
        return START_REPLY;
      case "clear":
        await this.ctx.contextStore.clear(userId);
        return CLEAR_REPLY;
      case "stats":
        return this.stats(userId);
      case "report":
        return this.report();
      case null:
        return `Unknown command /${command.raw}. Available: ${COMMAND_NAMES.map((n) => `/${n}`).join(", ")}`;
    }
  }

  private async stats(userId: string): Promise<string> {
    const { contextStore, dialogueLog, timeZone } = this.ctx;
    const turns = contextStore.get(userId).length;
    const lines = [`🧠 Context: ${turns}/${contextStore.capacity} turns`];

    try {
      const today = dateKey(this.ctx.now(), timeZone);
      const stats = await dialogueLog.statsForDay(today);
      lines.push(`📨 Messages today: ${stats.messageCount}`, `👥 Users today: ${stats.uniqueUsers}`);
    } catch (error) {
      log.error("Failed to read dialogue stats", describeError(error));
      lines.push("📨 Today's statistics are unavailable right now.");
    }

    return lines.join("\n");
  }

  // Today's report so far, sent to the admin chat only; not persisted, so the
  // scheduled artifact is unaffected
  private async report(): Promise<string> {
    const { aggregator, timeZone, deliverReport } = this.ctx;
    if (!deliverReport) return NO_ADMIN_CHAT_REPLY;

    const window = dailyWindow(dateKey(this.ctx.now(), timeZone), timeZone);

    let result: AggregationResult | null;
    try {
      result = await aggregator.preview(window);
    } catch (error) {
      log.error("Failed to build on-demand report", describeError(error));
      return "⚠️ Could not build the report right now.";
    }
    if (!result) return NO_MESSAGES_TODAY_REPLY;

    const sent = await deliverReport(result.text);
    return sent ? REPORT_SENT_REPLY : "⚠️ Failed to deliver the report.";
  }
}
