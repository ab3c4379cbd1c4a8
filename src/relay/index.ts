/**
 * Relay - composition root for the conversation and analytics core
 *
 * Owns the storage backend, dialogue log, context store, report aggregator,
 * scheduler, message pipeline and command handler, and hands the same
 * instances to every caller. There is no module-level state.
 */

import * as path from "node:path";
import type { RelayConfig } from "./config";
import { createLogger, setLogLevel } from "./logger";
import { FileStorage, MemoryStorage, type Storage } from "./storage";
import { DialogueLog } from "./dialogue-log";
import { ContextStore } from "./context-store";
import { ReportAggregator, type AggregationResult } from "./aggregator";
import { ReportScheduler } from "./scheduler";
import { MessagePipeline, type PipelineResult } from "./pipeline";
import { CommandHandler, type ParsedCommand } from "./commands";
import { AiSdkReplyModel, type ReplyModel } from "./chat";
import { createModelProvider } from "../models";
import { notifyAdmin } from "../telegram";
import { describeError } from "./errors";

const log = createLogger("RELAY");

export interface RelayOverrides {
  storage?: Storage;
  model?: ReplyModel;
  now?: () => number;
  // Delivers text to the admin chat; defaults to Telegram when ADMIN_CHAT_ID is set
  notify?: (text: string) => Promise<boolean>;
}

export function createStorage(config: RelayConfig): Storage {
  if (config.storage === "memory") {
    log.warn("Using in-memory storage; dialogue logs and reports will not survive a restart");
    return new MemoryStorage();
  }
  return new FileStorage(path.resolve(config.dataDir));
}

export class Relay {
  readonly storage: Storage;
  readonly dialogueLog: DialogueLog;
  readonly contextStore: ContextStore;
  readonly aggregator: ReportAggregator;
  readonly scheduler: ReportScheduler;
  readonly pipeline: MessagePipeline;
  readonly commands: CommandHandler;
  private readonly notify?: (text: string) => Promise<boolean>;
  private initialized = false;

  constructor(
    readonly config: RelayConfig,
    overrides: RelayOverrides = {},
  ) {
    setLogLevel(config.logLevel);
    const now = overrides.now ?? Date.now;
    const { timeZone } = config;

    this.storage = overrides.storage ?? createStorage(config);
    this.notify =
      overrides.notify ??
      (config.telegram.adminChatId
        ? (text: string) => notifyAdmin(config.telegram, text)
        : undefined);

    this.dialogueLog = new DialogueLog(this.storage, timeZone);
    this.contextStore = new ContextStore({
      maxHistory: config.maxHistory,
      storage: config.persistContext ? this.storage : undefined,
    });
    this.aggregator = new ReportAggregator(this.dialogueLog, this.storage, timeZone);
    this.scheduler = new ReportScheduler({
      aggregator: this.aggregator,
      storage: this.storage,
      timeZone,
      dailyCutoffHour: config.dailyCutoffHour,
      intervalMs: config.schedulerIntervalMs,
      now,
      onReport: (result) => this.deliverScheduledReport(result),
    });

    const model =
      overrides.model ??
      new AiSdkReplyModel(
        createModelProvider({ apiKey: config.model.apiKey, name: config.model.name }),
      );
    this.pipeline = new MessagePipeline({
      dialogueLog: this.dialogueLog,
      contextStore: this.contextStore,
      model,
      systemPrompt: config.model.systemPrompt,
      maxOutputTokens: config.model.maxOutputTokens,
      now,
    });

    this.commands = new CommandHandler({
      contextStore: this.contextStore,
      dialogueLog: this.dialogueLog,
      aggregator: this.aggregator,
      timeZone,
      now,
      deliverReport: this.notify,
    });
  }

  // Restore persisted state; an unreadable store starts with empty contexts
  async init(): Promise<void> {
    if (this.initialized) return;
    try {
      await this.contextStore.load();
    } catch (error) {
      log.error("Failed to restore contexts, starting empty", describeError(error));
    }
    this.initialized = true;
  }

  async start(): Promise<void> {
    await this.init();
    await this.scheduler.start();
    log.info("Relay started", {
      timeZone: this.config.timeZone,
      maxHistory: this.config.maxHistory,
      dailyCutoffHour: this.config.dailyCutoffHour,
    });
  }

  stop(): void {
    this.scheduler.stop();
  }

  runCommand(command: ParsedCommand, userId: string): Promise<string> {
    log.info(`/${command.raw} from ${userId}`);
    return this.commands.run(command, userId);
  }

  chat(userId: string, userName: string, text: string): Promise<PipelineResult> {
    return this.pipeline.handle(userId, userName, text);
  }

  private async deliverScheduledReport(result: AggregationResult): Promise<void> {
    if (result.report.window.kind !== "daily" || !this.notify) return;
    const sent = await this.notify(result.text);
    if (!sent) {
      log.warn(`Daily report ${result.key} was not delivered`);
    }
  }
}
