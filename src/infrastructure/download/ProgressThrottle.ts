import { Clock, systemClock } from '../../shared/utils/clock';

/**
 * Lets at most one event through per interval of wall-clock time. The window
 * opens at construction, so the first call only passes once a full interval
 * has elapsed.
 */
export class ProgressThrottle {
    private lastEmit: number;

    constructor(
        private readonly intervalMs: number = 250,
        private readonly clock: Clock = systemClock
    ) {
        this.lastEmit = clock.now();
    }

    shouldEmit(): boolean {
        const now = this.clock.now();
        if (now - this.lastEmit < this.intervalMs) {
            return false;
        }
        this.lastEmit = now;
        return true;
    }
}
