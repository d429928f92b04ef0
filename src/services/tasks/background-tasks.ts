import { logger as rootLogger, type Logger } from '../../utils/logger';

export type BackgroundWork = (signal: AbortSignal) => Promise<unknown>;

const DEFAULT_MAX_IN_FLIGHT = 100;

/**
 * Fire-and-forget work queue for outbound side effects (alerts, email,
 * error tracking). Each task gets its own abort timeout; failures are logged
 * as warnings and never reach the request that scheduled them.
 *
 * At most `maxInFlight` tasks run at once. Work scheduled beyond that is
 * dropped and counted; one warning is logged per saturated stretch.
 *
 * `drain()` awaits everything in flight, so tests and graceful shutdown can
 * observe completion deterministically.
 */
export class BackgroundTasks {
    private inFlight = new Set<Promise<void>>();
    private controllers = new Set<AbortController>();
    private droppedTotal = 0;
    private saturated = false;

    constructor(
        private defaultTimeoutMs: number,
        private logger: Logger = rootLogger,
        private maxInFlight: number = DEFAULT_MAX_IN_FLIGHT
    ) {}

    get pending(): number {
        return this.inFlight.size;
    }

    get dropped(): number {
        return this.droppedTotal;
    }

    /** Schedule `work`; returns false when the queue is full and the work was dropped. */
    run(name: string, work: BackgroundWork, timeoutMs: number = this.defaultTimeoutMs): boolean {
        if (this.inFlight.size >= this.maxInFlight) {
            this.droppedTotal++;
            if (!this.saturated) {
                this.saturated = true;
                this.logger.warn('Background task dropped', {
                    task: name,
                    maxInFlight: this.maxInFlight,
                });
            }
            return false;
        }
        this.saturated = false;

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
        timer.unref();
        this.controllers.add(controller);

        const task = Promise.resolve()
            .then(() => work(controller.signal))
            .then(
                () => undefined,
                (error: unknown) => {
                    this.logger.warn('Background task failed', {
                        task: name,
                        error: error instanceof Error ? error.message : String(error),
                    });
                }
            )
            .finally(() => {
                clearTimeout(timer);
                this.controllers.delete(controller);
                this.inFlight.delete(task);
            });

        this.inFlight.add(task);
        return true;
    }

    /**
     * Await all in-flight tasks, including tasks scheduled while draining.
     * Resolves after `timeoutMs` even if some are still running.
     */
    async drain(timeoutMs = 30_000): Promise<void> {
        const deadline = Date.now() + timeoutMs;

        while (this.inFlight.size > 0) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                this.logger.warn('Background drain timed out', { pending: this.inFlight.size });
                return;
            }

            let timer: NodeJS.Timeout | undefined;
            const timeout = new Promise<void>((resolve) => {
                timer = setTimeout(resolve, remaining);
                timer.unref();
            });

            await Promise.race([Promise.allSettled([...this.inFlight]), timeout]);
            clearTimeout(timer);
        }
    }

    /** Abort everything in flight and wait for the tasks to settle. */
    async shutdown(timeoutMs = 5_000): Promise<void> {
        for (const controller of this.controllers) {
            controller.abort(new Error('Background tasks shutting down'));
        }
        await this.drain(timeoutMs);
    }
}
