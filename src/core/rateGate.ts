import { Clock, systemClock } from './clock';

/**
 * Spaziatura minima tra chiamate al provider esterno.
 * Un'unica istanza condivisa = un unico budget di richieste per tutto il processo.
 */
export class RateGate {
    private readonly minIntervalMs: number;
    private readonly clock: Clock;
    private lastCallAt: number | null = null;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(minIntervalMs: number, clock: Clock = systemClock) {
        this.minIntervalMs = Math.max(0, minIntervalMs);
        this.clock = clock;
    }

    /**
     * Attende finché la spaziatura dall'ultima chiamata è rispettata, poi registra la nuova chiamata.
     * Restituisce i millisecondi di attesa effettiva.
     */
    acquire(): Promise<number> {
        const turn = this.queue.then(() => this.waitForSlot());
        this.queue = turn.catch(() => undefined);
        return turn;
    }

    private async waitForSlot(): Promise<number> {
        let waitedMs = 0;
        if (this.lastCallAt !== null) {
            const elapsed = this.clock.now() - this.lastCallAt;
            if (elapsed < this.minIntervalMs) {
                waitedMs = this.minIntervalMs - elapsed;
                await this.clock.sleep(waitedMs);
            }
        }
        this.lastCallAt = this.clock.now();
        return waitedMs;
    }
}
