/**
 * Logo LED brightness via the Linux LED class (sysfs).
 */

import { writeFile } from 'node:fs/promises';
import type { BrightnessActuator } from '../presence/types.js';

export class SysfsBrightness implements BrightnessActuator {
  constructor(private readonly path: string) {}

  async write(level: number): Promise<void> {
    await writeFile(this.path, `${Math.round(level)}\n`);
  }
}

/** Stand-in for hosts without the LED (development machines). */
export class LoggingBrightness implements BrightnessActuator {
  async write(level: number): Promise<void> {
    console.log(`[Brightness] (dry run) level ${level}`);
  }
}
