/**
 * Process Registry - coordination point between a backend run and signals
 *
 * A backend run owns its subprocess; the CLI's SIGINT/SIGTERM handlers do
 * not. This object is the one place both can reach: the runner registers
 * the process (and the progress indicator's stop callback) after launch,
 * and the signal handlers forward signals through it.
 *
 * ## LIFETIME
 *
 * Constructed by the caller for one command invocation and passed by
 * reference to both the signal handlers and the runner. It tracks at most
 * one process: a second concurrent run would replace the first's
 * registration, so callers run one backend at a time per registry.
 *
 * ## SIGNALS
 *
 * SIGINT/SIGTERM latch the interrupted flag and go to the whole process
 * group of the backend (backends spawn their own children), falling back
 * to the single process where groups are unavailable. The runner checks
 * the flag after the process exits.
 *
 * Handlers and run continuations are serialized on the event loop, so the
 * state needs no lock. The stop callback is detached from state before it
 * is invoked so it can only fire once.
 *
 * @module registry
 */

import { debugLog } from "../utils/logger.js";

/** The parts of a child process the registry needs. */
export interface SignalTarget {
  readonly pid: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
}

export type GroupKill = (pid: number, signal: NodeJS.Signals) => void;

export interface ProcessRegistryOptions {
  /** Signals a process group; defaults to `process.kill(-pid, signal)` */
  killGroup?: GroupKill;
  /** Defaults to `process.platform` */
  platform?: NodeJS.Platform;
}

const TERMINATION_SIGNALS: ReadonlySet<NodeJS.Signals> = new Set(["SIGINT", "SIGTERM"]);

function defaultKillGroup(pid: number, signal: NodeJS.Signals): void {
  process.kill(-pid, signal);
}

export class ProcessRegistry {
  private current: SignalTarget | null = null;
  private stopProgress: (() => void) | null = null;
  private interrupted = false;
  private readonly killGroup: GroupKill;
  private readonly platform: NodeJS.Platform;

  constructor(options: ProcessRegistryOptions = {}) {
    this.killGroup = options.killGroup ?? defaultKillGroup;
    this.platform = options.platform ?? process.platform;
  }

  /**
   * Track a started process. Clears the interrupted flag of any earlier run.
   */
  register(target: SignalTarget, stopProgress?: () => void): void {
    this.current = target;
    this.stopProgress = stopProgress ?? null;
    this.interrupted = false;
  }

  /** Forget the process and the stop callback. */
  unregister(): void {
    this.current = null;
    this.stopProgress = null;
  }

  isRegistered(): boolean {
    return this.current !== null;
  }

  wasInterrupted(): boolean {
    return this.interrupted;
  }

  /**
   * Forward an OS signal to the registered process.
   * A no-op (apart from latching the flag) when nothing is registered.
   */
  forwardSignal(signal: NodeJS.Signals): void {
    const isTermination = TERMINATION_SIGNALS.has(signal);
    if (isTermination) {
      this.interrupted = true;
    }

    const target = this.current;
    if (!target) return;

    this.signalTarget(target, signal, isTermination);
  }

  /**
   * Terminate a process that outlived its run, group first like
   * forwardSignal. Does not touch the interrupted flag.
   */
  terminate(target: SignalTarget, signal: NodeJS.Signals = "SIGTERM"): void {
    this.signalTarget(target, signal, true);
  }

  private signalTarget(target: SignalTarget, signal: NodeJS.Signals, toGroup: boolean): void {
    if (toGroup && this.platform !== "win32" && target.pid !== undefined) {
      try {
        this.killGroup(target.pid, signal);
        return;
      } catch (err) {
        debugLog("registry", `group ${signal} to ${target.pid} failed, signalling process: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    target.kill(signal);
  }

  /** Invoke the progress stop callback at most once. */
  stopProgressIfSet(): void {
    const stop = this.stopProgress;
    this.stopProgress = null;
    if (stop) {
      stop();
    }
  }
}
