/**
 * Clock port interface.
 * All timeouts go through it so tests can drive time by hand.
 */
export interface ClockPort {
  /**
   * Get current time in milliseconds.
   */
  nowMs(): number;

  /**
   * Run `fn` once after `ms`. Returns a function that cancels the timer.
   */
  setTimer(ms: number, fn: () => void): () => void;
}

export const systemClock: ClockPort = {
  nowMs: () => Date.now(),
  setTimer(ms, fn) {
    const t = setTimeout(fn, ms);
    return () => clearTimeout(t);
  },
};
