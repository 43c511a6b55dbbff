import { describe, it, expect } from '@jest/globals';
import { ProgressThrottle } from './ProgressThrottle';

function manualClock(start: number = 1000) {
    let time = start;
    return {
        now: () => time,
        advance: (ms: number) => {
            time += ms;
        }
    };
}

describe('ProgressThrottle', () => {
    it('should not emit before the first interval has elapsed', () => {
        const clock = manualClock();
        const throttle = new ProgressThrottle(250, clock);

        expect(throttle.shouldEmit()).toBe(false);
        clock.advance(249);
        expect(throttle.shouldEmit()).toBe(false);
        clock.advance(1);
        expect(throttle.shouldEmit()).toBe(true);
    });

    it('should restart the window after each emission', () => {
        const clock = manualClock();
        const throttle = new ProgressThrottle(250, clock);

        clock.advance(300);
        expect(throttle.shouldEmit()).toBe(true);
        clock.advance(200);
        expect(throttle.shouldEmit()).toBe(false);
        clock.advance(50);
        expect(throttle.shouldEmit()).toBe(true);
    });

    it('should emit once per long pause', () => {
        const clock = manualClock();
        const throttle = new ProgressThrottle(250, clock);

        clock.advance(5000);
        expect(throttle.shouldEmit()).toBe(true);
        expect(throttle.shouldEmit()).toBe(false);
    });
});
