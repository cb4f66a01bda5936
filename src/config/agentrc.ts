import { existsSync, readFileSync } from "fs";
import { parse } from "dotenv";
import { z } from "zod";

/**
 * Values read from a project's `.agentrc`. The file is shell-sourceable
 * (`export KEY=value` lines), which dotenv's parser accepts as-is.
 */
export interface AgentrcConfig {
  sessionId?: string;
  backend?: string;
  model?: string;
  noCC: boolean;
  noSession: boolean;
  /** Spend ceiling in USD; undefined when unset or not a positive number */
  budgetUsd?: number;
}

export const EMPTY_AGENTRC: AgentrcConfig = { noCC: false, noSession: false };

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

/** Only a case-insensitive "true" enables a flag. */
export const flagSchema = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() === "true");

export const budgetSchema = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    if (!trimmed) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
  });

const agentrcSchema = z.object({
  CLAUDE_SESSION_ID: optionalText,
  GIT_AI_BACKEND: optionalText,
  GIT_AI_MODEL: optionalText,
  GIT_AI_NO_CC: flagSchema,
  GIT_AI_NO_SESSION: flagSchema,
  GIT_AI_BUDGET: budgetSchema,
});

export function parseAgentrc(content: string): AgentrcConfig {
  const values = agentrcSchema.parse(parse(content));
  return {
    sessionId: values.CLAUDE_SESSION_ID,
    backend: values.GIT_AI_BACKEND,
    model: values.GIT_AI_MODEL,
    noCC: values.GIT_AI_NO_CC,
    noSession: values.GIT_AI_NO_SESSION,
    budgetUsd: values.GIT_AI_BUDGET,
  };
}

/**
 * Load `.agentrc` (relative to the current directory by default).
 * A missing or unreadable file yields the empty config.
 */
export function loadAgentrc(path: string = ".agentrc"): AgentrcConfig {
  if (!existsSync(path)) {
    return EMPTY_AGENTRC;
  }
  try {
    return parseAgentrc(readFileSync(path, "utf-8"));
  } catch (err) {
    console.error(`[agentrc] Ignoring ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return EMPTY_AGENTRC;
  }
}
