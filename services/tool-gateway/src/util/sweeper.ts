import { logger } from '@retailops/service-template';

export interface Sweepable {
    sweep(): number;
}

/**
 * Runs `target.sweep()` on an interval that does not keep the process alive.
 * Returns a stop function.
 */
export const startSweeper = (name: string, target: Sweepable, intervalMs: number): (() => void) => {
    const timer = setInterval(() => {
        const removed = target.sweep();
        if (removed > 0) {
            logger.debug(`Swept ${removed} expired ${name} entries`);
        }
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
};
