import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import chalk from "chalk";
import { ConfigError } from "../errors.js";

export interface MenuIO {
  input?: Readable;
  /** The menu is drawn on stderr; stdout carries the commit message */
  output?: Writable;
}

/**
 * Map an answer to a model: a 1-based number or the model name itself.
 * Returns undefined for anything else.
 */
export function pickChoice(choices: readonly string[], answer: string): string | undefined {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    return choices[Number(trimmed) - 1];
  }
  return choices.find((choice) => choice === trimmed);
}

/**
 * Interactive model picker for bare `-m`. Empty input, `q` or closing the
 * input cancels.
 *
 * @throws ConfigError when cancelled or the answer matches no model
 */
export async function selectModel(choices: readonly string[], io: MenuIO = {}): Promise<string> {
  if (choices.length === 0) {
    throw new ConfigError("no models available for selection");
  }

  const output = io.output ?? process.stderr;
  const rl = createInterface({ input: io.input ?? process.stdin, output, terminal: false });

  output.write("\nSelect a model:\n\n");
  choices.forEach((choice, i) => output.write(` ${chalk.cyan(String(i + 1))}) ${choice}\n`));
  output.write("\n");

  const answer = await new Promise<string>((resolve) => {
    rl.once("close", () => resolve(""));
    rl.question("Number or name (empty or q to cancel): ", resolve);
  });
  rl.close();

  const trimmed = answer.trim();
  if (!trimmed || trimmed === "q") {
    throw new ConfigError("no model selected");
  }
  const selected = pickChoice(choices, trimmed);
  if (!selected) {
    throw new ConfigError(`invalid selection "${trimmed}" (one of: ${choices.join(", ")})`);
  }
  return selected;
}
