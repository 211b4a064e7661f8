import { Logger } from "../logging/logger";
import { DelayWindow } from "../types/delayWindow";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface Throttle {
  /** Waits a uniformly random duration inside the window; resolves with the waited milliseconds. */
  delay(window: DelayWindow): Promise<number>;
}

export interface RandomThrottleOptions {
  logger: Logger;
  random?: () => number;
  sleep?: Sleep;
}

export class RandomThrottle implements Throttle {
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly sleep: Sleep;

  constructor(options: RandomThrottleOptions) {
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
  }

  async delay(window: DelayWindow): Promise<number> {
    const low = Math.max(0, Math.min(window.minSeconds, window.maxSeconds));
    const high = Math.max(0, window.minSeconds, window.maxSeconds);
    const seconds = low + this.random() * (high - low);
    const ms = Math.round(seconds * 1000);
    if (ms <= 0) return 0;

    this.logger.debug(`Waiting ${seconds.toFixed(2)} seconds...`);
    await this.sleep(ms);
    return ms;
  }
}
