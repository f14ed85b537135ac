/**
 * Unit tests for the LED feedback controller.
 * Uses a recording actuator instead of sysfs.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FeedbackController } from '../presence/feedback.js';
import { FakeActuator, TEST_TUNING } from './fakes.js';

describe('FeedbackController', () => {
  let actuator: FakeActuator;
  let feedback: FeedbackController;

  beforeEach(() => {
    actuator = new FakeActuator();
    feedback = new FeedbackController(TEST_TUNING, actuator);
  });

  it('starts at the minimum level without writing', () => {
    expect(feedback.level).toBe(10);
    expect(actuator.writes).toEqual([]);
  });

  it('ramps up by the up-step and clamps at max', async () => {
    for (let i = 0; i < 10; i++) {
      await feedback.step(true);
    }
    expect(actuator.writes).toEqual([40, 70, 100, 130, 160, 190, 220, 250, 255]);
    expect(feedback.level).toBe(255);
  });

  it('fades down by the larger down-step and clamps at min', async () => {
    for (let i = 0; i < 9; i++) await feedback.step(true);
    actuator.writes = [];

    for (let i = 0; i < 6; i++) {
      await feedback.step(false);
    }
    expect(actuator.writes).toEqual([195, 135, 75, 15, 10]);
    expect(feedback.level).toBe(10);
  });

  it('does not write when the level is already at its bound', async () => {
    await feedback.step(false);
    await feedback.step(false);
    expect(actuator.writes).toEqual([]);
  });

  it('keeps writes in step order', async () => {
    void feedback.step(true);
    void feedback.step(true);
    await feedback.step(true);
    expect(actuator.writes).toEqual([40, 70, 100]);
  });

  it('logs a failed write and carries on with the next step', async () => {
    actuator.failNext = true;

    await expect(feedback.step(true)).resolves.toBeUndefined();
    expect(feedback.level).toBe(40);
    expect(actuator.writes).toEqual([]);

    await feedback.step(true);
    expect(actuator.writes).toEqual([70]);
  });
});
