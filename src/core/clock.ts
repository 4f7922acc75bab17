export interface Clock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export function isoAt(clock: Clock, offsetMs: number = 0): string {
    return new Date(clock.now() + offsetMs).toISOString();
}
