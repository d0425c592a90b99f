/**
 * Sessions Delete Command - Remove a saved session
 */

import type { SwitchyardConfig } from "../../../config.js";
import { FileSessionStore } from "../../../runtime/session-store.js";
import { OutputFormatter } from "../../output-formatter.js";
import { ValidationError } from "../../error-handler.js";

export interface SessionsDeleteOptions {
  quiet?: boolean;
}

export async function sessionsDelete(
  cfg: SwitchyardConfig,
  name: string,
  options: SessionsDeleteOptions = {}
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });
  if (!name?.trim()) {
    throw new ValidationError("Session name cannot be empty", "Run 'switchyard sessions list' to see saved sessions");
  }

  const store = new FileSessionStore(cfg.resolved.sessionsDir);
  await store.delete(name.trim());
  out.success(`Session '${name.trim()}' deleted.`);
}
