/**
 * Timing utilities
 */

import type { Logger } from './debug.js';

export class Timer {
  private label: string;
  private start: number;

  constructor(label: string) {
    this.label = label;
    this.start = performance.now();
  }

  elapsed(): number {
    return performance.now() - this.start;
  }

  end(log?: Logger): number {
    const duration = this.elapsed();
    log?.debug(`${this.label}: ${duration.toFixed(2)}ms`);
    return duration;
  }
}
