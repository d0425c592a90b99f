import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import type { HistoryMessage, UsageSnapshot } from "../agent/types.js";
import { OrchestrationError } from "../agent/errors.js";

export interface SessionSnapshot {
  name: string;
  savedAt: number;
  history: HistoryMessage[];
  usage: UsageSnapshot;
}

export type SessionData = Omit<SessionSnapshot, "name" | "savedAt">;

/**
 * Durable blob store keyed by session name
 */
export interface SessionStore {
  load(name: string): Promise<SessionSnapshot>;
  save(name: string, data: SessionData): Promise<void>;
  list(): Promise<string[]>;
  delete(name: string): Promise<void>;
}

const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

const HistoryMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  toolCallId: z.string().optional(),
  toolCalls: z.array(ToolCallSchema).optional(),
  name: z.string().optional(),
  seq: z.number().int().positive(),
  pinned: z.boolean().default(false),
  summary: z.boolean().optional(),
  timestamp: z.number().default(0),
});

const UsageSchema = z.object({
  inputTokens: z.number().min(0).default(0),
  outputTokens: z.number().min(0).default(0),
  estimatedCost: z.number().min(0).default(0),
  requests: z.number().int().min(0).default(0),
  budgetCeiling: z.number().min(0).optional(),
});

const SessionFileSchema = z.object({
  name: z.string(),
  savedAt: z.number(),
  history: z.array(HistoryMessageSchema),
  usage: UsageSchema.default({}),
});

export class FileSessionStore implements SessionStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  getSessionFile(name: string): string {
    const trimmed = name.trim();
    if (!trimmed) throw new Error("Session name cannot be empty");
    return path.join(this.dir, `${encodeURIComponent(trimmed)}.json`);
  }

  async load(name: string): Promise<SessionSnapshot> {
    const filePath = this.getSessionFile(name);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        throw new OrchestrationError("NotFound", `Session '${name}' not found`, { details: { name } });
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new Error(`Session file '${name}' is corrupted or invalid`, { cause: err });
    }
    const result = SessionFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Session file '${name}' is corrupted or invalid: ${result.error.message}`);
    }
    return result.data;
  }

  async save(name: string, data: SessionData): Promise<void> {
    const filePath = this.getSessionFile(name);
    await fs.mkdir(this.dir, { recursive: true });
    const snapshot: SessionSnapshot = { name, savedAt: Date.now(), ...data };
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(snapshot, null, 2), "utf-8");
    await fs.rename(tmpPath, filePath);
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return entries
      .filter((file) => file.endsWith(".json"))
      .map((file) => decodeURIComponent(file.replace(/\.json$/, "")))
      .sort();
  }

  async delete(name: string): Promise<void> {
    try {
      await fs.unlink(this.getSessionFile(name));
    } catch (err) {
      if (isMissingFile(err)) {
        throw new OrchestrationError("NotFound", `Session '${name}' not found`, { details: { name } });
      }
      throw err;
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return Boolean(err && typeof err === "object" && "code" in err && err.code === "ENOENT");
}
