/**
 * Sessions List Command - List saved sessions
 */

import type { SwitchyardConfig } from "../../../config.js";
import { FileSessionStore } from "../../../runtime/session-store.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface SessionsListOptions {
  json?: boolean;
  quiet?: boolean;
}

interface SessionInfo {
  name: string;
  messageCount: number;
  savedAt: number;
  cost: number;
  error?: string;
}

export async function sessionsList(cfg: SwitchyardConfig, options: SessionsListOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  const store = new FileSessionStore(cfg.resolved.sessionsDir);
  const names = await store.list();

  const details: SessionInfo[] = [];
  for (const name of names) {
    try {
      const snapshot = await store.load(name);
      details.push({
        name,
        messageCount: snapshot.history.length,
        savedAt: snapshot.savedAt,
        cost: snapshot.usage.estimatedCost,
      });
    } catch (err) {
      details.push({
        name,
        messageCount: 0,
        savedAt: 0,
        cost: 0,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
  details.sort((a, b) => b.savedAt - a.savedAt);

  if (options.json) {
    out.json(details);
    return;
  }

  if (details.length === 0) {
    out.info("No saved sessions.");
    return;
  }

  out.header("Sessions");
  out.table(
    details.map((s) => ({
      name: s.name.length > 30 ? s.name.slice(0, 27) + "..." : s.name,
      messages: s.error ? "corrupt" : s.messageCount,
      savedAt: s.savedAt > 0 ? out.formatTime(s.savedAt) : "unknown",
      cost: `$${s.cost.toFixed(4)}`,
    })),
    [
      { key: "name", header: "Session", width: 32 },
      { key: "messages", header: "Messages", width: 10, align: "right" },
      { key: "savedAt", header: "Saved", width: 20 },
      { key: "cost", header: "Cost", width: 10, align: "right" },
    ]
  );

  out.newline();
  out.info(`Total: ${details.length} session(s)`);
}
