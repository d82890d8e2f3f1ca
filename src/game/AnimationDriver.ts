import {
  CHAIN_DELAY,
  DESTROY_DURATION,
  FALL_DELAY_PER_ROW,
  FALL_DURATION,
  SPAWN_DURATION,
  SWAP_DURATION,
} from "../constants";
import type { SpawnOperation } from "../types";
import type { FallOperation } from "../utils/gravity";
import { createLogger } from "../utils/log";
import type { Logger } from "../utils/log";
import type { Animator } from "./Animator";
import type { BlastWave } from "./BlastResolver";
import type { CascadeStateMachine } from "./CascadeStateMachine";
import type { AnimationBatch, EngineListener } from "./events";
import type { Tile } from "./Tile";

/** Seconds. */
export interface AnimationTimings {
  swap: number;
  destroy: number;
  /** Per cell fallen. */
  fall: number;
  fallDelayPerRow: number;
  spawn: number;
  /** Added per chain generation before a blast wave finishes. */
  chainDelay: number;
}

export const DEFAULT_TIMINGS: AnimationTimings = {
  swap: SWAP_DURATION,
  destroy: DESTROY_DURATION,
  fall: FALL_DURATION,
  fallDelayPerRow: FALL_DELAY_PER_ROW,
  spawn: SPAWN_DURATION,
  chainDelay: CHAIN_DELAY,
};

export interface AnimationDriverOptions {
  timings?: Partial<AnimationTimings>;
  /** Receives errors thrown while a finished batch is completed, listener errors included. */
  onError?: (error: unknown, batch: AnimationBatch) => void;
}

/**
 * Reference host for the batch protocol: tweens a `progress` value from 0 to
 * 1 for every announced batch and completes the batch when it arrives.
 * Renderers can read `progressOf(batch.id)` to interpolate their sprites.
 */
export class AnimationDriver implements EngineListener {
  private readonly engine: CascadeStateMachine;
  private readonly animator: Animator;
  private readonly timings: AnimationTimings;
  private readonly log: Logger;
  private readonly errorHandler?: (error: unknown, batch: AnimationBatch) => void;
  private readonly progress = new Map<number, { progress: number }>();

  constructor(engine: CascadeStateMachine, animator: Animator, options: AnimationDriverOptions = {}) {
    this.engine = engine;
    this.animator = animator;
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.errorHandler = options.onError;
    this.log = createLogger("AnimationDriver", engine.config.logLevel);
  }

  /** 0..1 for a running batch, `undefined` once it has completed. */
  progressOf(batchId: number): number | undefined {
    return this.progress.get(batchId)?.progress;
  }

  onSwapStarted(_a: Tile, _b: Tile, batch: AnimationBatch): void {
    this.track(batch, this.timings.swap);
  }

  onSwapReverted(_a: Tile, _b: Tile, batch: AnimationBatch): void {
    this.track(batch, this.timings.swap);
  }

  onItemsBlasted(_tiles: readonly Tile[], wave: BlastWave, batch: AnimationBatch): void {
    this.track(batch, this.timings.destroy + wave.depth * this.timings.chainDelay);
  }

  /** Higher rows start later; the batch ends when the slowest row lands. */
  onGravityStarted(rows: readonly (readonly FallOperation[])[], batch: AnimationBatch | null): void {
    if (!batch) return;
    let duration = 0;
    rows.forEach((row, i) => {
      const longest = Math.max(...row.map((f) => f.distance));
      duration = Math.max(duration, i * this.timings.fallDelayPerRow + longest * this.timings.fall);
    });
    this.track(batch, duration);
  }

  /** New tiles drop in from above the top row, stacked by spawn rank. */
  onRefillStarted(spawns: readonly SpawnOperation[], batch: AnimationBatch | null): void {
    if (!batch) return;
    const height = this.engine.grid.height;
    let duration = 0;
    for (const spawn of spawns) {
      const distance = height - spawn.y + spawn.spawnRank;
      duration = Math.max(duration, this.timings.spawn + distance * this.timings.fall);
    }
    this.track(batch, duration);
  }

  private track(batch: AnimationBatch, duration: number): void {
    const state = { progress: 0 };
    this.progress.set(batch.id, state);
    this.finish(batch, state, duration).catch((err: unknown) => {
      this.log.error(`Completing ${batch.phase} batch ${batch.id} failed:`, err);
      this.errorHandler?.(err, batch);
    });
  }

  private async finish(batch: AnimationBatch, state: { progress: number }, duration: number): Promise<void> {
    await this.animator.animate(state, { progress: 1 }, duration);
    this.progress.delete(batch.id);
    this.engine.complete(batch.id);
  }
}
