/** Источник времени. В тестах подменяется ручными часами. */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>((res) => setTimeout(res, Math.max(0, ms))),
};
