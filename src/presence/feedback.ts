/**
 * FeedbackController - fades the logo LED toward max while anyone is near
 * and back to min otherwise, one bounded step per publish tick.
 */

import type { BrightnessActuator } from './types.js';

export interface FeedbackLimits {
  minLevel: number;
  maxLevel: number;
  levelStepUp: number;
  levelStepDown: number;
}

export class FeedbackController {
  private current: number;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly limits: FeedbackLimits,
    private readonly actuator: BrightnessActuator,
  ) {
    this.current = limits.minLevel;
  }

  get level(): number {
    return this.current;
  }

  /**
   * Move one step and queue the actuator write if the level changed.
   * The level is updated before this returns; the promise settles once the
   * write has finished. It never rejects.
   */
  step(anyoneNear: boolean): Promise<void> {
    const { minLevel, maxLevel, levelStepUp, levelStepDown } = this.limits;
    let next = this.current;
    if (anyoneNear && this.current < maxLevel) {
      next = Math.min(this.current + levelStepUp, maxLevel);
    } else if (!anyoneNear && this.current > minLevel) {
      next = Math.max(this.current - levelStepDown, minLevel);
    }

    if (next === this.current) return this.writes;

    const direction = next > this.current ? 'UP' : 'DOWN';
    this.current = next;
    console.log(`[Brightness] Logo brightness ${direction}: ${next}`);

    // Chain so writes land in order even if one is slow
    this.writes = this.writes.then(() => this.write(next));
    return this.writes;
  }

  private async write(level: number): Promise<void> {
    try {
      await this.actuator.write(level);
    } catch (err) {
      console.error(`[Brightness] Failed to write level ${level}:`, err instanceof Error ? err.message : err);
    }
  }
}
