import { describe, it, expect } from "vitest";
import { ContextStore } from "./context-store";
import { MemoryStorage } from "./storage";
import type { ContextEntry } from "../types";

describe("ContextStore", () => {
  it("returns an empty context for unseen users", () => {
    const store = new ContextStore();
    expect(store.get("nobody")).toEqual([]);
  });

  it("defaults to five turn pairs", () => {
    expect(new ContextStore().capacity).toBe(10);
  });

  it("keeps only the last five pairs after six exchanges", async () => {
    const store = new ContextStore({ maxHistory: 5 });
    for (let i = 1; i <= 6; i++) {
      await store.appendExchange("42", `q${i}`, `a${i}`);
    }

    const entries = store.get("42");
    expect(entries).toHaveLength(10);
    expect(entries[0]).toEqual({ role: "user", text: "q2" });
    expect(entries[9]).toEqual({ role: "assistant", text: "a6" });
  });

  it("never exceeds capacity and keeps the newest entries in order", async () => {
    const store = new ContextStore({ maxHistory: 3 });
    const all: ContextEntry[] = [];

    for (let i = 0; i < 23; i++) {
      const turn: ContextEntry = { role: i % 2 === 0 ? "user" : "assistant", text: `t${i}` };
      all.push(turn);
      await store.appendTurn("42", turn.role, turn.text);

      const stored = store.get("42");
      expect(stored.length).toBeLessThanOrEqual(6);
      expect(stored).toEqual(all.slice(-6));
    }
  });

  it("returns snapshots that callers cannot mutate", async () => {
    const store = new ContextStore();
    await store.appendTurn("42", "user", "hi");
    store.get("42").push({ role: "assistant", text: "injected" });
    expect(store.get("42")).toHaveLength(1);
  });

  it("clears one user without touching others", async () => {
    const store = new ContextStore();
    await store.appendExchange("alice", "hi", "hello");
    await store.appendExchange("bob", "yo", "hey");

    await Promise.all([store.clear("alice"), store.appendTurn("bob", "user", "again")]);

    expect(store.get("alice")).toEqual([]);
    expect(store.get("bob").map((e) => e.text)).toEqual(["yo", "hey", "again"]);
  });

  it("applies rapid appends for one user in order", async () => {
    const store = new ContextStore({ maxHistory: 10 });
    await Promise.all(
      Array.from({ length: 8 }, (_, i) => store.appendTurn("42", "user", `m${i}`)),
    );
    expect(store.get("42").map((e) => e.text)).toEqual([
      "m0", "m1", "m2", "m3", "m4", "m5", "m6", "m7",
    ]);
  });

  describe("with persistence", () => {
    it("mirrors changes and restores them", async () => {
      const storage = new MemoryStorage();
      const store = new ContextStore({ storage });
      await store.appendExchange("42", "hello", "hi there");

      expect(JSON.parse((await storage.read("context_42.json")) ?? "null")).toEqual({
        userId: "42",
        entries: [
          { role: "user", text: "hello" },
          { role: "assistant", text: "hi there" },
        ],
      });

      const restored = new ContextStore({ storage });
      expect(await restored.load()).toBe(1);
      expect(restored.get("42")).toEqual(store.get("42"));
    });

    it("does not restore cleared contexts", async () => {
      const storage = new MemoryStorage();
      const store = new ContextStore({ storage });
      await store.appendExchange("42", "hello", "hi there");
      await store.clear("42");

      const restored = new ContextStore({ storage });
      expect(await restored.load()).toBe(0);
      expect(restored.get("42")).toEqual([]);
    });

    it("trims restored contexts to capacity", async () => {
      const storage = new MemoryStorage();
      const big = new ContextStore({ storage, maxHistory: 5 });
      for (let i = 0; i < 5; i++) {
        await big.appendExchange("42", `q${i}`, `a${i}`);
      }

      const small = new ContextStore({ storage, maxHistory: 2 });
      await small.load();
      expect(small.get("42").map((e) => e.text)).toEqual(["q3", "a3", "q4", "a4"]);
    });

    it("ignores unreadable mirrors", async () => {
      const storage = new MemoryStorage();
      await storage.write("context_7.json", "{broken");

      const store = new ContextStore({ storage });
      expect(await store.load()).toBe(0);
    });

    it("loads nothing without storage", async () => {
      expect(await new ContextStore().load()).toBe(0);
    });
  });
});
