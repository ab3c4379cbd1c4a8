/**
 * Chat model collaborator and prompt building
 */

import { generateText, type LanguageModel, type ModelMessage } from "ai";
import type { ContextEntry } from "../types";
import { createLogger } from "./logger";
import { classifyModelError } from "./errors";

const log = createLogger("CHAT");

// Everything the model needs for one reply
export interface ModelRequest {
  system: string;
  messages: ModelMessage[];
  maxOutputTokens: number;
}

export interface ReplyModel {
  /**
   * Generate a reply. Rejects with RateLimitedError or TransientModelError.
   */
  generateReply(request: ModelRequest): Promise<string>;
}

/**
 * Build the model request: instruction preamble, prior turns in order, then
 * the new message
 */
export function buildModelRequest(
  systemPrompt: string,
  context: ContextEntry[],
  message: string,
  maxOutputTokens: number,
): ModelRequest {
  const messages: ModelMessage[] = context.map((entry): ModelMessage =>
    entry.role === "user"
      ? { role: "user", content: entry.text }
      : { role: "assistant", content: entry.text },
  );
  messages.push({ role: "user", content: message });

  return { system: systemPrompt, messages, maxOutputTokens };
}

/**
 * ReplyModel backed by the AI SDK
 */
export class AiSdkReplyModel implements ReplyModel {
  constructor(private readonly model: LanguageModel) {}

  async generateReply(request: ModelRequest): Promise<string> {
    log.info(`Starting generateText with ${request.messages.length} messages`);

    try {
      const { text } = await generateText({
        model: this.model,
        system: request.system,
        messages: request.messages,
        maxOutputTokens: request.maxOutputTokens,
        // Failures surface to the user; the next message is the retry
        maxRetries: 0,
      });
      return text;
    } catch (error) {
      const classified = classifyModelError(error);
      log.error(`Chat failed (${classified.kind})`, classified.message);
      throw classified;
    }
  }
}
