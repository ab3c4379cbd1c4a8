/**
 * Per-user rolling conversation context
 *
 * Each user owns a bounded sequence of turns. Every push is followed by a
 * trim to the newest `maxHistory * 2` entries. Mutations for one user are
 * serialized; different users never wait on each other.
 */

import { z } from "zod";
import type { ContextEntry, ContextRole } from "../types";
import type { Storage } from "./storage";
import { KeyedSerializer } from "./serializer";
import { DEFAULT_MAX_HISTORY } from "./config";
import { createLogger } from "./logger";
import { describeError } from "./errors";

const log = createLogger("CONTEXT");

const MIRROR_PREFIX = "context_";

const mirrorSchema = z.object({
  userId: z.string(),
  entries: z.array(
    z.object({
      role: z.enum(["user", "assistant"]),
      text: z.string(),
    }),
  ),
});

export interface ContextStoreOptions {
  maxHistory?: number;
  // Mirror every change to storage so contexts survive a restart
  storage?: Storage;
}

function mirrorKey(userId: string): string {
  const safe = userId.replace(/[^A-Za-z0-9-]/g, (c) => `_${c.charCodeAt(0).toString(16)}`);
  return `${MIRROR_PREFIX}${safe}.json`;
}

export class ContextStore {
  private readonly contexts = new Map<string, ContextEntry[]>();
  private readonly locks = new KeyedSerializer();
  private readonly storage?: Storage;
  readonly maxHistory: number;

  constructor(options: ContextStoreOptions = {}) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.storage = options.storage;
  }

  get capacity(): number {
    return this.maxHistory * 2;
  }

  // Snapshot of a user's turns; empty for unseen users
  get(userId: string): ContextEntry[] {
    return [...(this.contexts.get(userId) ?? [])];
  }

  async appendTurn(userId: string, role: ContextRole, text: string): Promise<void> {
    await this.locks.run(userId, async () => {
      this.push(userId, { role, text });
      await this.mirror(userId);
    });
  }

  // Append a user turn and the assistant's reply as one unit
  async appendExchange(userId: string, userText: string, replyText: string): Promise<void> {
    await this.locks.run(userId, async () => {
      this.push(userId, { role: "user", text: userText });
      this.push(userId, { role: "assistant", text: replyText });
      await this.mirror(userId);
    });
  }

  async clear(userId: string): Promise<void> {
    await this.locks.run(userId, async () => {
      this.contexts.delete(userId);
      await this.mirror(userId);
    });
  }

  // Number of users with a non-empty context
  get size(): number {
    return this.contexts.size;
  }

  /**
   * Restore mirrored contexts. No-op without storage.
   */
  async load(): Promise<number> {
    if (!this.storage) return 0;

    const keys = await this.storage.list(MIRROR_PREFIX);
    let loaded = 0;
    for (const key of keys) {
      const text = await this.storage.read(key);
      if (!text) continue;

      const parsed = parseMirror(text);
      if (!parsed) {
        log.warn(`Ignoring unreadable context mirror ${key}`);
        continue;
      }
      if (parsed.entries.length > 0) {
        this.contexts.set(parsed.userId, parsed.entries.slice(-this.capacity));
        loaded++;
      }
    }

    log.info(`Restored ${loaded} user contexts`);
    return loaded;
  }

  private push(userId: string, entry: ContextEntry): void {
    const entries = this.contexts.get(userId) ?? [];
    entries.push(entry);
    if (entries.length > this.capacity) {
      entries.splice(0, entries.length - this.capacity);
    }
    this.contexts.set(userId, entries);
  }

  private async mirror(userId: string): Promise<void> {
    if (!this.storage) return;

    const entries = this.contexts.get(userId) ?? [];
    try {
      await this.storage.write(mirrorKey(userId), JSON.stringify({ userId, entries }));
    } catch (error) {
      // In-memory state stays authoritative; the mirror catches up on the next change
      log.error(`Failed to mirror context for ${userId}`, describeError(error));
    }
  }
}

function parseMirror(text: string): z.infer<typeof mirrorSchema> | null {
  try {
    const result = mirrorSchema.safeParse(JSON.parse(text));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}
