/**
 * Run logging.
 *
 * - `debugLog` writes tagged lines to stderr when GIT_AI_DEBUG is set.
 *   stdout is reserved for the commit message itself.
 * - `logRun` posts a short summary of each generation to an optional
 *   webhook (GIT_AI_LOG_WEBHOOK). Failures are reported, never thrown.
 */

export interface RunLog {
  backend: string;
  level: "info" | "error";
  /** Working directory the message was drafted for */
  problem: string;
  /** Message or error text, truncated */
  answer: string;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return TRUTHY.has((env.GIT_AI_DEBUG || "").trim().toLowerCase());
}

export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) return;
  console.error(`[${scope}] ${message}`);
}

export async function logRun(log: RunLog): Promise<void> {
  const url = (process.env.GIT_AI_LOG_WEBHOOK || "").trim();
  if (!url) {
    debugLog("run logs", "GIT_AI_LOG_WEBHOOK not set - run logging disabled");
    return;
  }

  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ ...log, answer: log.answer.slice(0, 500) }),
    });
    if (!res.ok) {
      console.error(`[run logs] Failed: ${res.status} ${res.statusText}`);
    }
  } catch (err) {
    console.error(`[run logs] Failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
