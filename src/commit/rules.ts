import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";

// src/commit/ and dist/commit/ are both two levels below the package root
const RULES_DIR = new URL("../../rules/", import.meta.url);

function readRulesFile(name: string): string {
  return readFileSync(fileURLToPath(new URL(name, RULES_DIR)), "utf-8").trim();
}

/** The Conventional Commits 1.0.0 summary and specification. */
export function conventionalRules(): string {
  return readRulesFile("conventional-commits.md");
}

/** Plain commit message rules used when Conventional Commits are off. */
export function standardRules(): string {
  return readRulesFile("standard-commit.md");
}

export interface SkillTextOptions {
  /** Use plain commit rules instead of Conventional Commits */
  noCC?: boolean;

  /** Optional SKILL.md-style file with extra instructions */
  skillPath?: string;

  /** Backend-specific rules appended after the base rules */
  extraRules?: string;
}

/**
 * Build the rules text sent as "Instructions:".
 *
 * A skill file that is missing, unreadable or blank is ignored.
 */
export function loadSkillText(options: SkillTextOptions = {}): string {
  let text = options.noCC ? standardRules() : conventionalRules();

  if (options.extraRules) {
    text = `${text}\n\n${options.extraRules}`;
  }

  if (options.skillPath && existsSync(options.skillPath)) {
    try {
      const trimmed = readFileSync(options.skillPath, "utf-8").trim();
      if (trimmed) {
        text = `${text}\nAdditional instructions:\n${trimmed}`;
      }
    } catch (err) {
      console.error(`[skill] Ignoring ${options.skillPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return text;
}
