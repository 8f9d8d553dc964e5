import { createChildLogger } from '../../utils/logger.js';
import { sleep as defaultSleep, isAbortError } from '../../utils/sleep.js';
import { HOUR_MS } from '../../utils/dateUtils.js';
import { SchedulerTransientError } from '../../types/errors.js';
import type { RunSummary } from '../../types/scene.js';

const log = createChildLogger({ component: 'PipelineScheduleJob' });

/** Fixed wait after a failed run, independent of the interval */
export const ERROR_COOLDOWN_MS = HOUR_MS;

export interface PipelineRunner {
    runOnce(daysBack?: number, signal?: AbortSignal): Promise<RunSummary>;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Background job that runs the pipeline repeatedly
 * Sleeps `intervalHours` after a successful run and one hour after a failed one
 */
export class PipelineScheduleJob {
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;
    private iteration = 0;

    constructor(
        private readonly pipeline: PipelineRunner,
        private readonly sleep: SleepFn = defaultSleep
    ) {}

    get isRunning(): boolean {
        return this.controller !== null;
    }

    get completedIterations(): number {
        return this.iteration;
    }

    /**
     * Run until the signal aborts. Never rejects because of a failed run.
     */
    async runForever(intervalHours: number, signal?: AbortSignal): Promise<void> {
        const intervalMs = intervalHours * HOUR_MS;
        log.info({ intervalHours }, `Starting scheduled pipeline (every ${intervalHours} hours)`);

        while (!signal?.aborted) {
            this.iteration++;
            let waitMs = intervalMs;
            try {
                const summary = await this.pipeline.runOnce(undefined, signal);
                log.info(
                    { iteration: this.iteration, totalFiles: summary.totalFiles },
                    `Pipeline run ${this.iteration} completed, next run in ${intervalHours} hours`
                );
            } catch (error) {
                if (signal?.aborted && isAbortError(error)) {
                    break;
                }
                const transient = new SchedulerTransientError(this.iteration, error);
                log.error({ err: transient }, 'Scheduled run failed, retrying in 1 hour');
                waitMs = ERROR_COOLDOWN_MS;
            }

            try {
                await this.sleep(waitMs, signal);
            } catch (error) {
                if (signal?.aborted) {
                    break;
                }
                throw error;
            }
        }

        log.info({ iterations: this.iteration }, 'Pipeline stopped');
    }

    /**
     * Start the loop in the background
     */
    start(intervalHours: number): void {
        if (this.controller) {
            log.warn('PipelineScheduleJob already running');
            return;
        }
        const controller = new AbortController();
        this.controller = controller;
        this.loop = this.runForever(intervalHours, controller.signal)
            .catch((error: unknown) => {
                log.error({ err: error }, 'Pipeline schedule loop stopped unexpectedly');
            })
            .finally(() => {
                if (this.controller === controller) {
                    this.controller = null;
                }
            });
    }

    /**
     * Stop the loop and wait for the current step to unwind
     */
    async stop(): Promise<void> {
        if (!this.controller) {
            return;
        }
        this.controller.abort();
        await this.loop;
        this.loop = null;
    }
}
