/**
 * Usage trailer appended to the drafted message as `#` comment lines.
 *
 * git strips `#` lines when committing, so the trailer is visible in the
 * editor only. Two layouts, depending on what the backend reports:
 *
 * ```
 * # cost=$0.0123 elapsed=4.2s            (backends reporting cost)
 * # session=5f0c...
 * # model=claude-haiku-4-5 input=12 output=80 cache_read=0 cache_create=0
 *
 * # tokens: input=1200 cached=0 output=80 elapsed=4.2s model=gpt-5.2-codex
 * # session=019a...
 * ```
 */

export interface ModelUsage {
  model: string;
  inputTokens: number;
  outputTokens: number;
  cacheReadInputTokens: number;
  cacheCreationInputTokens: number;
  webSearchRequests: number;
}

export interface UsageStats {
  inputTokens: number;
  cachedInputTokens: number;
  outputTokens: number;
  /** Present only for backends that report spend */
  costUsd?: number;
  /** Per-model breakdown, when the backend gives one */
  models?: ModelUsage[];
  /** Backend-reported error subtype (e.g. "error_max_turns") */
  errorSubtype?: string;
}

export interface UsageTrailer {
  usage?: UsageStats;
  elapsedMs: number;
  model?: string;
  sessionId?: string;
  /** Spend ceiling the run was started with */
  budgetUsd?: number;
}

/**
 * Render a duration rounded to 100ms: "900ms", "1.2s", "1m5.3s", "1h0m2s".
 */
export function formatElapsed(ms: number): string {
  const rounded = Math.round(ms / 100) * 100;
  if (rounded <= 0) return "0s";
  if (rounded < 1000) return `${rounded}ms`;

  const tenths = Math.round(rounded / 100);
  const hours = Math.floor(tenths / 36000);
  const minutes = Math.floor((tenths % 36000) / 600);
  const secondTenths = tenths % 600;
  const seconds =
    secondTenths % 10 === 0 ? String(secondTenths / 10) : (secondTenths / 10).toFixed(1);

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

function costLines(usage: UsageStats, trailer: UsageTrailer): string[] {
  const lines = [
    `# cost=$${(usage.costUsd ?? 0).toFixed(4)} elapsed=${formatElapsed(trailer.elapsedMs)}`,
    `# session=${trailer.sessionId ?? ""}`,
  ];

  for (const m of usage.models ?? []) {
    let line =
      `# model=${m.model} input=${m.inputTokens} output=${m.outputTokens}` +
      ` cache_read=${m.cacheReadInputTokens} cache_create=${m.cacheCreationInputTokens}`;
    if (m.webSearchRequests > 0) {
      line += ` web_searches=${m.webSearchRequests}`;
    }
    lines.push(line);
  }

  const budget = trailer.budgetUsd ?? 0;
  if (budget > 0 && (usage.costUsd ?? 0) > budget) {
    lines.push("# error: max_budget_exceeded");
  } else if (usage.errorSubtype) {
    lines.push(`# error: ${usage.errorSubtype}`);
  }
  return lines;
}

function tokenLines(usage: UsageStats, trailer: UsageTrailer): string[] {
  let line =
    `# tokens: input=${usage.inputTokens} cached=${usage.cachedInputTokens}` +
    ` output=${usage.outputTokens} elapsed=${formatElapsed(trailer.elapsedMs)}`;
  if (trailer.model?.trim()) {
    line += ` model=${trailer.model.trim()}`;
  }

  const lines = [line];
  if (trailer.sessionId) {
    lines.push(`# session=${trailer.sessionId}`);
  }
  return lines;
}

/**
 * Append the usage trailer, separated from the message by a blank line.
 * Without usage data the message is returned unchanged.
 */
export function appendUsageComment(message: string, trailer: UsageTrailer): string {
  const { usage } = trailer;
  if (!usage) return message;

  const lines = usage.costUsd !== undefined ? costLines(usage, trailer) : tokenLines(usage, trailer);
  return `${message}\n\n${lines.join("\n")}`;
}
