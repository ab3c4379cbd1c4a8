/**
 * Inbound message pipeline
 *
 * log → read context → model call → update context → reply.
 * The model call holds no lock: context is snapshotted before it and
 * updated after it.
 */

import type { DialogueLog } from "./dialogue-log";
import type { ContextStore } from "./context-store";
import { buildModelRequest, type ReplyModel } from "./chat";
import { createLogger } from "./logger";
import {
  classifyModelError,
  describeError,
  type RateLimitedError,
  type TransientModelError,
} from "./errors";
import { EMPTY_REPLY_PLACEHOLDER, MAX_REPLY_LENGTH, TRUNCATION_MARKER } from "./config";

const log = createLogger("PIPELINE");

export const RATE_LIMITED_REPLY =
  "⏳ I'm getting too many requests right now. Please try again in a minute.";
export const FAILURE_REPLY =
  "⚠️ Something went wrong while generating a reply. Please try again.";

export type PipelineResult =
  | { status: "ok"; reply: string }
  | { status: "rate_limited"; reply: string; error: RateLimitedError }
  | { status: "failed"; reply: string; error: TransientModelError };

// Fit a reply into one transport message, marking the cut
export function truncateReply(text: string, maxLength = MAX_REPLY_LENGTH): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}

export interface MessagePipelineOptions {
  dialogueLog: DialogueLog;
  contextStore: ContextStore;
  model: ReplyModel;
  systemPrompt: string;
  maxOutputTokens: number;
  now?: () => number;
}

export class MessagePipeline {
  private readonly now: () => number;

  constructor(private readonly options: MessagePipelineOptions) {
    this.now = options.now ?? Date.now;
  }

  async handle(userId: string, userName: string, text: string): Promise<PipelineResult> {
    const { dialogueLog, contextStore, model } = this.options;

    // Logging is best-effort and independent of the reply
    try {
      await dialogueLog.append({ timestamp: this.now(), userId, userName, message: text });
    } catch (error) {
      log.error(`Failed to log message from ${userId}`, describeError(error));
    }

    const request = buildModelRequest(
      this.options.systemPrompt,
      contextStore.get(userId),
      text,
      this.options.maxOutputTokens,
    );

    let modelText: string;
    try {
      modelText = await model.generateReply(request);
    } catch (error) {
      const classified = classifyModelError(error);
      if (classified.kind === "rate_limited") {
        log.warn(`Rate limited while answering ${userId}`, classified.message);
        return { status: "rate_limited", reply: RATE_LIMITED_REPLY, error: classified };
      }
      log.error(`Model call failed for ${userId}`, classified.message);
      return { status: "failed", reply: FAILURE_REPLY, error: classified };
    }

    // Model may refuse or return nothing
    const reply = modelText.trim() || EMPTY_REPLY_PLACEHOLDER;
    await contextStore.appendExchange(userId, text, reply);

    return { status: "ok", reply: truncateReply(reply) };
  }
}
