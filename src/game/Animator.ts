import type { Ticker } from "pixi.js";

export type Easing = (t: number) => number;

export const easeOutQuad: Easing = (t) => 1 - (1 - t) * (1 - t);

interface Tween {
  target: Record<string, number>;
  props: Record<string, { from: number; to: number }>;
  elapsed: number;
  duration: number;
  ease: Easing;
  resolve: () => void;
}

/**
 * Lightweight tween system that runs off a PixiJS Ticker.
 * Each tween interpolates numeric properties on a target object and resolves
 * its Promise when the animation completes.
 */
export class Animator {
  private tweens: Tween[] = [];

  constructor(ticker: Ticker) {
    ticker.add(() => this.update(ticker.deltaMS / 1000));
  }

  /** Tweens still running. */
  get active(): number {
    return this.tweens.length;
  }

  /** Animate numeric properties on `target` over `duration` seconds. */
  animate(
    target: Record<string, number>,
    to: Record<string, number>,
    duration: number,
    ease: Easing = easeOutQuad,
  ): Promise<void> {
    if (duration <= 0) {
      Object.assign(target, to);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const props: Record<string, { from: number; to: number }> = {};
      for (const key of Object.keys(to)) {
        props[key] = { from: target[key] ?? 0, to: to[key] };
      }
      this.tweens.push({ target, props, elapsed: 0, duration, ease, resolve });
    });
  }

  private update(dt: number): void {
    for (let i = this.tweens.length - 1; i >= 0; i--) {
      const tw = this.tweens[i];
      tw.elapsed += dt;
      const t = Math.min(tw.elapsed / tw.duration, 1);
      const eased = tw.ease(t);
      for (const key of Object.keys(tw.props)) {
        const p = tw.props[key];
        tw.target[key] = p.from + (p.to - p.from) * eased;
      }
      if (t >= 1) {
        this.tweens.splice(i, 1);
        tw.resolve();
      }
    }
  }
}
