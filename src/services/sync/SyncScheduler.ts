import cron from 'node-cron';
import { SyncEngine } from './SyncEngine';
import { ConfigurationError, SyncCancelledError } from '../../types/errors';
import { logger } from '../../utils/logger';

export interface SyncSchedulerOptions {
    cron: string;
    failureBackoffMs: number;
    maxFailureBackoffMs: number;
}

export interface ScheduledJob {
    stop(): void;
}

export type ScheduleFn = (expression: string, task: () => void) => ScheduledJob;

const cronSchedule: ScheduleFn = (expression, task) => cron.schedule(expression, task);

/**
 * Drives sync passes on a cron schedule. Passes never overlap, and after a
 * failed pass the next ones are skipped until a doubling backoff elapses.
 */
export class SyncScheduler {
    private readonly engine: Pick<SyncEngine, 'runPass'>;
    private readonly options: SyncSchedulerOptions;
    private readonly schedule: ScheduleFn;
    private readonly now: () => number;

    private job: ScheduledJob | null = null;
    private current: Promise<void> | null = null;
    private abortController: AbortController | null = null;
    private failures = 0;
    private backoffUntil = 0;
    private stopped = false;

    constructor(
        engine: Pick<SyncEngine, 'runPass'>,
        options: SyncSchedulerOptions,
        schedule: ScheduleFn = cronSchedule,
        now: () => number = Date.now
    ) {
        this.engine = engine;
        this.options = options;
        this.schedule = schedule;
        this.now = now;
    }

    get consecutiveFailures(): number {
        return this.failures;
    }

    get isRunning(): boolean {
        return this.current !== null;
    }

    /**
     * Schedules passes and starts the first one right away.
     */
    start(): void {
        if (this.job) {
            logger.warn('[SyncScheduler] Scheduler is already running');
            return;
        }
        if (!cron.validate(this.options.cron)) {
            throw new ConfigurationError(`SYNC_CRON is not a valid cron expression: ${this.options.cron}`);
        }

        this.stopped = false;
        logger.info(`[SyncScheduler] Starting sync scheduler with schedule: ${this.options.cron}`);
        this.job = this.schedule(this.options.cron, () => this.trigger());
        this.trigger();
    }

    /**
     * Runs one pass unless a pass is in flight, the scheduler is stopped or a
     * failure backoff is pending. Never rejects.
     */
    tick(): Promise<void> {
        if (this.stopped) {
            return Promise.resolve();
        }
        if (this.current) {
            logger.debug('[SyncScheduler] Previous pass still running, skipping tick');
            return this.current;
        }
        if (this.now() < this.backoffUntil) {
            logger.debug(`[SyncScheduler] Backing off for another ${this.backoffUntil - this.now()}ms`);
            return Promise.resolve();
        }

        this.current = this.runPass().finally(() => {
            this.current = null;
            this.abortController = null;
        });
        return this.current;
    }

    /**
     * Stops scheduling and aborts the pass in flight, waiting for it to unwind.
     */
    async stop(): Promise<void> {
        this.stopped = true;
        if (this.job) {
            this.job.stop();
            this.job = null;
        }
        this.abortController?.abort();
        if (this.current) {
            await this.current;
        }
        logger.info('[SyncScheduler] Sync scheduler stopped');
    }

    private trigger(): void {
        this.tick().catch(error => {
            logger.logError(error, 'SyncScheduler');
        });
    }

    private async runPass(): Promise<void> {
        const controller = new AbortController();
        this.abortController = controller;

        try {
            const outcome = await this.engine.runPass(controller.signal);
            if (outcome.status === 'incomplete') {
                // Retried on the next tick without backoff; the gateway already spent its retries
                logger.warn(`[SyncScheduler] Pass ${outcome.runId} left [${outcome.range.startBlock}, ${outcome.range.endBlock}] pending`);
            }
            this.failures = 0;
            this.backoffUntil = 0;
        } catch (error) {
            if (error instanceof SyncCancelledError) {
                logger.info('[SyncScheduler] Pass cancelled');
                return;
            }
            this.failures++;
            const delay = Math.min(
                this.options.maxFailureBackoffMs,
                this.options.failureBackoffMs * Math.pow(2, this.failures - 1)
            );
            this.backoffUntil = this.now() + delay;
            logger.logError(error, 'SyncScheduler', { consecutiveFailures: this.failures, backoffMs: delay });
        }
    }
}
