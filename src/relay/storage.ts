/**
 * Key-addressable durable storage
 *
 * Two kinds of value live behind one interface:
 * - record collections: append-only, one JSON line per record
 * - documents: whole-text values replaced atomically on write
 */

import { promises as fs } from "node:fs";
import * as path from "node:path";
import { StorageReadError, StorageWriteError } from "./errors";
import { KeyedSerializer } from "./serializer";

export interface Storage {
  // Append one line to a record collection
  append(key: string, line: string): Promise<void>;
  // All complete lines of a record collection, in append order
  readLines(key: string): Promise<string[]>;
  // Document text, or null if it was never written
  read(key: string): Promise<string | null>;
  // Replace a document
  write(key: string, content: string): Promise<void>;
  // Document keys starting with a prefix
  list(prefix: string): Promise<string[]>;
}

const KEY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function assertValidKey(key: string): void {
  if (!KEY_PATTERN.test(key) || key.includes("..")) {
    throw new Error(`Invalid storage key: "${key}"`);
  }
}

// Split text into complete lines; a trailing fragment without "\n" is still being written
export function completeLines(text: string): string[] {
  const lines = text.split("\n");
  lines.pop();
  return lines.filter((line) => line.trim().length > 0);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// =============================================================================
// Flat files under a data directory
// =============================================================================

export class FileStorage implements Storage {
  private readonly writes = new KeyedSerializer();
  private ensured = false;

  constructor(private readonly root: string) {}

  private recordPath(key: string): string {
    assertValidKey(key);
    return path.join(this.root, `${key}.jsonl`);
  }

  private documentPath(key: string): string {
    assertValidKey(key);
    return path.join(this.root, key);
  }

  private async ensureRoot(): Promise<void> {
    if (this.ensured) return;
    await fs.mkdir(this.root, { recursive: true });
    this.ensured = true;
  }

  async append(key: string, line: string): Promise<void> {
    const file = this.recordPath(key);
    if (line.includes("\n")) {
      throw new StorageWriteError(key, new Error("record line contains a newline"));
    }
    await this.writes.run(file, async () => {
      try {
        await this.ensureRoot();
        await fs.appendFile(file, `${line}\n`, "utf8");
      } catch (error) {
        throw new StorageWriteError(key, error);
      }
    });
  }

  async readLines(key: string): Promise<string[]> {
    const file = this.recordPath(key);
    try {
      return completeLines(await fs.readFile(file, "utf8"));
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StorageReadError(key, error);
    }
  }

  async read(key: string): Promise<string | null> {
    const file = this.documentPath(key);
    try {
      return await fs.readFile(file, "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new StorageReadError(key, error);
    }
  }

  async write(key: string, content: string): Promise<void> {
    const file = this.documentPath(key);
    await this.writes.run(file, async () => {
      const temp = `${file}.${process.pid}.tmp`;
      try {
        await this.ensureRoot();
        await fs.writeFile(temp, content, "utf8");
        await fs.rename(temp, file);
      } catch (error) {
        throw new StorageWriteError(key, error);
      }
    });
  }

  async list(prefix: string): Promise<string[]> {
    try {
      const names = await fs.readdir(this.root);
      return names
        .filter((name) => name.startsWith(prefix) && !name.endsWith(".tmp") && !name.endsWith(".jsonl"))
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StorageReadError(prefix, error);
    }
  }
}

// =============================================================================
// In-process storage
// =============================================================================

export class MemoryStorage implements Storage {
  private readonly records = new Map<string, string[]>();
  private readonly documents = new Map<string, string>();

  async append(key: string, line: string): Promise<void> {
    assertValidKey(key);
    if (line.includes("\n")) {
      throw new StorageWriteError(key, new Error("record line contains a newline"));
    }
    const lines = this.records.get(key) ?? [];
    lines.push(line);
    this.records.set(key, lines);
  }

  async readLines(key: string): Promise<string[]> {
    assertValidKey(key);
    return [...(this.records.get(key) ?? [])];
  }

  async read(key: string): Promise<string | null> {
    assertValidKey(key);
    return this.documents.get(key) ?? null;
  }

  async write(key: string, content: string): Promise<void> {
    assertValidKey(key);
    this.documents.set(key, content);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.documents.keys()].filter((key) => key.startsWith(prefix)).sort();
  }
}
