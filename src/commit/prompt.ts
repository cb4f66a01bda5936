/**
 * Prompt Builder
 *
 * Pure functions that turn rules text, a staged diff and an optional note
 * into backend-agnostic prompt text. Two layouts:
 *
 * - a single prompt (rules + diff + note) for backends fed one stdin blob
 * - a stable system prompt (rules) plus user message(s) (diff + note) for
 *   backends that cache the system portion across turns
 *
 * @module prompt
 */

export const WRAP_INSTRUCTION =
  "Limit each line in the commit body to 72 characters; wrap at sentence boundaries (e.g. after a period and space) when possible so lines do not break mid-sentence.";

export interface PromptOptions {
  /** Rules text, sent verbatim under "Instructions:" */
  skillText: string;
  diff: string;
  extraNote?: string;
  noCC?: boolean;
}

function headline(noCC: boolean | undefined): string {
  return noCC
    ? "Generate a commit message from the staged git diff."
    : "Generate a Conventional Commit message from the staged git diff.";
}

function extraContextSection(extraNote: string | undefined): string {
  const note = (extraNote ?? "").trim();
  return note ? `\nExtra context:\n${note}\n` : "";
}

/**
 * Build a single prompt containing instructions, diff and extra note.
 *
 * @example
 * ```typescript
 * buildConventionalPrompt({ skillText: "rules", diff: "diff --git a b" });
 * // "...Instructions:\nrules\n\nStaged diff:\ndiff --git a b\n"
 * ```
 */
export function buildConventionalPrompt(options: PromptOptions): string {
  return (
    `${headline(options.noCC)}\n` +
    "Use the instructions below and output only the commit message.\n" +
    `${WRAP_INSTRUCTION}\n\n` +
    `Instructions:\n${options.skillText}\n\n` +
    `Staged diff:\n${options.diff}\n` +
    extraContextSection(options.extraNote)
  );
}

/**
 * Build the system portion: preamble and rules, no diff.
 * Identical across runs with the same rules, so it can be cached.
 */
export function buildSystemPrompt(options: Pick<PromptOptions, "skillText" | "noCC">): string {
  return (
    `${headline(options.noCC)}\n` +
    "The staged diff arrives in the following user messages. Output only the commit message.\n" +
    `${WRAP_INSTRUCTION}\n\n` +
    `Instructions:\n${options.skillText}\n`
  );
}

/** Build the user portion for a single diff. */
export function buildUserMessage(options: Pick<PromptOptions, "diff" | "extraNote">): string {
  return `Staged diff:\n${options.diff}\n${extraContextSection(options.extraNote)}`;
}

/** User turn carrying one directory's diff. */
export function buildChunkMessage(dir: string, diff: string): string {
  return `Staged diff for ${dir}:\n${diff}`;
}

/** Final user turn that asks for the message after all chunk turns. */
export function buildFinalTurnMessage(extraNote?: string): string {
  const note = (extraNote ?? "").trim();
  const request = "Generate the commit message based on all the staged diffs above.";
  return note ? `${request}\n\nExtra context:\n${note}` : request;
}
