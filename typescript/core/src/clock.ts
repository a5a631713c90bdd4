import type { MicrosecondClock } from "./types";

/** Wall clock with microsecond resolution, based on the high resolution timer. */
export const systemClock: MicrosecondClock = () =>
  BigInt(Math.round((performance.timeOrigin + performance.now()) * 1000));
