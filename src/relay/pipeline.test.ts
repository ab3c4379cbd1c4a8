import { describe, it, expect, beforeEach } from "vitest";
import { FAILURE_REPLY, MessagePipeline, RATE_LIMITED_REPLY, truncateReply } from "./pipeline";
import type { ModelRequest, ReplyModel } from "./chat";
import { ContextStore } from "./context-store";
import { DialogueLog } from "./dialogue-log";
import { MemoryStorage, type Storage } from "./storage";
import { RateLimitedError, StorageWriteError } from "./errors";
import { EMPTY_REPLY_PLACEHOLDER, MAX_REPLY_LENGTH, TRUNCATION_MARKER } from "./config";

class ScriptedModel implements ReplyModel {
  readonly requests: ModelRequest[] = [];

  constructor(private readonly respond: (request: ModelRequest) => Promise<string>) {}

  generateReply(request: ModelRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

class BrokenRecordStorage extends MemoryStorage {
  override async append(key: string): Promise<void> {
    throw new StorageWriteError(key, new Error("read-only file system"));
  }
}

const NOW = Date.UTC(2026, 9, 19, 14, 30);

describe("truncateReply", () => {
  it("leaves short replies alone", () => {
    expect(truncateReply("hello")).toBe("hello");
  });

  it("cuts long replies to the limit and marks the cut", () => {
    const result = truncateReply("x".repeat(5000));
    expect(result).toHaveLength(MAX_REPLY_LENGTH);
    expect(result.endsWith(TRUNCATION_MARKER)).toBe(true);
  });
});

describe("MessagePipeline", () => {
  let storage: Storage;
  let dialogueLog: DialogueLog;
  let contextStore: ContextStore;

  function createPipeline(model: ReplyModel) {
    return new MessagePipeline({
      dialogueLog,
      contextStore,
      model,
      systemPrompt: "Be brief.",
      maxOutputTokens: 1000,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    storage = new MemoryStorage();
    dialogueLog = new DialogueLog(storage, "UTC");
    contextStore = new ContextStore();
  });

  it("logs the message, replies, and remembers the exchange", async () => {
    const model = new ScriptedModel(async () => "Hi there!");
    const pipeline = createPipeline(model);

    const result = await pipeline.handle("42", "Ann", "hello");

    expect(result).toEqual({ status: "ok", reply: "Hi there!" });
    expect(await dialogueLog.readDay("2026-10-19")).toEqual([
      { timestamp: NOW, userId: "42", userName: "Ann", message: "hello" },
    ]);
    expect(contextStore.get("42")).toEqual([
      { role: "user", text: "hello" },
      { role: "assistant", text: "Hi there!" },
    ]);
  });

  it("sends prior turns before the new message", async () => {
    const model = new ScriptedModel(async () => "Hi there!");
    const pipeline = createPipeline(model);

    await pipeline.handle("42", "Ann", "hello");
    await pipeline.handle("42", "Ann", "and then?");

    expect(model.requests[1]).toEqual({
      system: "Be brief.",
      maxOutputTokens: 1000,
      messages: [
        { role: "user", content: "hello" },
        { role: "assistant", content: "Hi there!" },
        { role: "user", content: "and then?" },
      ],
    });
  });

  it("answers rate limits with a fixed reply and keeps the log entry", async () => {
    const model = new ScriptedModel(async () => {
      throw new RateLimitedError("quota exceeded");
    });

    const result = await createPipeline(model).handle("42", "Ann", "hello");

    expect(result.status).toBe("rate_limited");
    expect(result.reply).toBe(RATE_LIMITED_REPLY);
    expect(await dialogueLog.readDay("2026-10-19")).toHaveLength(1);
    expect(contextStore.get("42")).toEqual([]);
  });

  it("answers other model failures with the generic reply", async () => {
    const model = new ScriptedModel(async () => {
      throw new Error("socket hang up");
    });

    const result = await createPipeline(model).handle("42", "Ann", "hello");

    expect(result.status).toBe("failed");
    expect(result.reply).toBe(FAILURE_REPLY);
    expect(contextStore.get("42")).toEqual([]);
  });

  it("substitutes a placeholder for blank replies", async () => {
    const model = new ScriptedModel(async () => "   ");

    const result = await createPipeline(model).handle("42", "Ann", "hello");

    expect(result.reply).toBe(EMPTY_REPLY_PLACEHOLDER);
    expect(contextStore.get("42")[1]).toEqual({
      role: "assistant",
      text: EMPTY_REPLY_PLACEHOLDER,
    });
  });

  it("truncates the delivered reply but keeps it whole in context", async () => {
    const long = "x".repeat(5000);
    const model = new ScriptedModel(async () => long);

    const result = await createPipeline(model).handle("42", "Ann", "essay please");

    expect(result.reply).toHaveLength(MAX_REPLY_LENGTH);
    expect(contextStore.get("42")[1].text).toBe(long);
  });

  it("still replies when the dialogue log cannot be written", async () => {
    dialogueLog = new DialogueLog(new BrokenRecordStorage(), "UTC");
    const model = new ScriptedModel(async () => "still here");

    const result = await createPipeline(model).handle("42", "Ann", "hello");

    expect(result).toEqual({ status: "ok", reply: "still here" });
  });

  it("lets other users' messages through while a model call is in flight", async () => {
    let release: (text: string) => void = () => {};
    const model = new ScriptedModel((request) => {
      const last = request.messages[request.messages.length - 1];
      if (last.content === "slow") {
        return new Promise<string>((resolve) => {
          release = resolve;
        });
      }
      return Promise.resolve("fast reply");
    });
    const pipeline = createPipeline(model);

    const slow = pipeline.handle("alice", "Alice", "slow");
    const fast = await pipeline.handle("bob", "Bob", "quick");
    expect(fast.reply).toBe("fast reply");

    await new Promise((resolve) => setTimeout(resolve, 0));
    release("slow reply");
    expect((await slow).reply).toBe("slow reply");
  });
});
