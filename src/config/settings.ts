/**
 * Settings resolution for one CLI run.
 *
 * Every setting is taken from the first source that has it:
 *
 *   command-line flag > environment variable > .agentrc > default
 *
 * A model named on the command line is explicit intent and must be one the
 * backend lists. A model from the environment or .agentrc is a preference:
 * when the backend does not list it, the backend default is used instead.
 */

import { ConfigError } from "../errors.js";
import { detectBackend, getBackend } from "../providers/index.js";
import type { BackendDescriptor } from "../providers/runner.js";
import type { AgentrcConfig } from "./agentrc.js";
import { budgetSchema, flagSchema } from "./agentrc.js";

export interface ModelFlags {
  /** `--model <name>` */
  model?: string;
  /** `-m [name]`; `true` when given without a value */
  m?: string | boolean;
  /** `--backend <name>` */
  backend?: string;
}

/** Either a concrete model (undefined = backend default) or "ask the user". */
export type ModelSelection =
  | { kind: "model"; model: string | undefined }
  | { kind: "menu"; models: readonly string[] };

export interface Settings {
  backend: BackendDescriptor;
  model: ModelSelection;
  noCC: boolean;
  /** Session to resume, unless disabled with GIT_AI_NO_SESSION */
  sessionId?: string;
  budgetUsd?: number;
}

export interface SettingsSources {
  flags: ModelFlags;
  env: NodeJS.ProcessEnv;
  rc: AgentrcConfig;
  /** PATH lookup used for backend auto-detection */
  isAvailable?: (executable: string) => boolean;
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function invalidModel(model: string, backend: BackendDescriptor): ConfigError {
  return new ConfigError(
    `invalid model "${model}" (use -m for interactive pick, or one of: ${backend.models.join(", ")})`
  );
}

export function resolveBackend(sources: SettingsSources): BackendDescriptor {
  const name =
    nonBlank(sources.flags.backend) ?? nonBlank(sources.env.GIT_AI_BACKEND) ?? nonBlank(sources.rc.backend);
  return getBackend(name ?? detectBackend(sources.isAvailable));
}

export function resolveModelSelection(backend: BackendDescriptor, sources: SettingsSources): ModelSelection {
  const { flags } = sources;
  const explicit = nonBlank(flags.model);
  const short = typeof flags.m === "string" ? nonBlank(flags.m) : undefined;
  const fromFlag = explicit !== undefined || short !== undefined || flags.m === true;

  if (explicit) {
    if (!backend.models.includes(explicit)) throw invalidModel(explicit, backend);
    return { kind: "model", model: explicit };
  }

  if (!fromFlag) {
    const preferred = nonBlank(sources.env.GIT_AI_MODEL) ?? nonBlank(sources.rc.model);
    return {
      kind: "model",
      model: preferred && backend.models.includes(preferred) ? preferred : undefined,
    };
  }

  if (short) {
    if (!backend.models.includes(short)) throw invalidModel(short, backend);
    return { kind: "model", model: short };
  }

  return { kind: "menu", models: backend.models };
}

/**
 * @throws ConfigError for an unknown backend, an invalid flag model, or
 *         when no backend is configured and none is on PATH
 */
export function resolveSettings(sources: SettingsSources): Settings {
  const { env, rc } = sources;
  const backend = resolveBackend(sources);
  const model = resolveModelSelection(backend, sources);

  const noCC = flagSchema.parse(env.GIT_AI_NO_CC) || rc.noCC;
  const noSession = flagSchema.parse(env.GIT_AI_NO_SESSION) || rc.noSession;
  const budgetUsd = budgetSchema.parse(env.GIT_AI_BUDGET) ?? rc.budgetUsd;

  return {
    backend,
    model,
    noCC,
    sessionId: noSession ? undefined : rc.sessionId,
    budgetUsd,
  };
}
