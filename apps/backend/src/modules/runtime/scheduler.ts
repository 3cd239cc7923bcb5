import type { SourceId } from '@marketfeed/shared';
import { ConfigurationError, describeError } from '../../errors';
import { logger } from '../../utils/logger';

export type PollTargetState = 'idle' | 'fetching' | 'normalizing' | 'persisting' | 'failed' | 'stopped';

export type PollStage = 'fetching' | 'normalizing' | 'persisting';

export interface PollTarget {
    source: SourceId;
    symbol: string;
    intervalMs: number;
}

/**
 * One tick: fetch (suspends on the network), normalize (sync), persist.
 * `fetch` receives the tick's abort signal; the scheduler also stops waiting
 * on it as soon as the signal fires.
 */
export interface PollPipeline<Raw, Rec> {
    fetch(target: PollTarget, signal: AbortSignal): Promise<Raw>;
    normalize(raw: Raw, target: PollTarget): Rec;
    persist(record: Rec, target: PollTarget): Promise<void>;
}

export type PollErrorHandler = (target: PollTarget, stage: PollStage, error: unknown) => void;

export interface PollingSchedulerOptions {
    onError?: PollErrorHandler;
    now?: () => number;
}

export interface PollTargetSnapshot {
    source: SourceId;
    symbol: string;
    intervalMs: number;
    state: PollTargetState;
    ticks: number;
    failures: number;
    lastTickAt: string | null;
    lastError: string | null;
}

class TickCancelledError extends Error {
    constructor() {
        super('tick cancelled');
        this.name = 'TickCancelledError';
    }
}

function raceAbort<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        return Promise.reject(new TickCancelledError());
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new TickCancelledError());
        signal.addEventListener('abort', onAbort, { once: true });
        task.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
}

export function pollTargetKey(target: Pick<PollTarget, 'source' | 'symbol'>): string {
    return `${target.source}::${target.symbol}`;
}

class PollTargetRunner<Raw, Rec> {
    public state: PollTargetState = 'idle';
    private ticks = 0;
    private failures = 0;
    private lastTickAt: number | null = null;
    private lastError: string | null = null;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private controller: AbortController | null = null;
    private inFlight: Promise<void> | null = null;
    private stopped = false;

    constructor(
        public readonly target: PollTarget,
        private readonly pipeline: PollPipeline<Raw, Rec>,
        private readonly onError: PollErrorHandler,
        private readonly now: () => number,
    ) {}

    public arm(delayMs: number): void {
        if (this.stopped) {
            return;
        }
        this.timer = setTimeout(() => {
            this.timer = null;
            this.inFlight = this.runTick().finally(() => {
                this.inFlight = null;
            });
        }, delayMs);
    }

    public async stop(): Promise<void> {
        this.stopped = true;
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        this.controller?.abort();
        if (this.inFlight) {
            await this.inFlight;
        }
        this.state = 'stopped';
    }

    public snapshot(): PollTargetSnapshot {
        return {
            source: this.target.source,
            symbol: this.target.symbol,
            intervalMs: this.target.intervalMs,
            state: this.state,
            ticks: this.ticks,
            failures: this.failures,
            lastTickAt: this.lastTickAt === null ? null : new Date(this.lastTickAt).toISOString(),
            lastError: this.lastError,
        };
    }

    private async runTick(): Promise<void> {
        const startedAt = this.now();
        const controller = new AbortController();
        this.controller = controller;
        this.lastTickAt = startedAt;
        this.ticks += 1;

        let stage: PollStage = 'fetching';
        try {
            this.state = 'fetching';
            const fetching = Promise.resolve().then(() => this.pipeline.fetch(this.target, controller.signal));
            const raw = await raceAbort(fetching, controller.signal);

            stage = 'normalizing';
            this.state = 'normalizing';
            const record = this.pipeline.normalize(raw, this.target);

            // Persist is not raced against the signal: a write that started finishes.
            stage = 'persisting';
            this.state = 'persisting';
            await this.pipeline.persist(record, this.target);
            this.state = 'idle';
        } catch (error) {
            if (!(error instanceof TickCancelledError)) {
                this.state = 'failed';
                this.failures += 1;
                this.lastError = describeError(error);
                this.report(stage, error);
            }
        } finally {
            this.controller = null;
        }

        if (this.stopped) {
            this.state = 'stopped';
            return;
        }
        const elapsed = this.now() - startedAt;
        this.arm(Math.max(0, this.target.intervalMs - elapsed));
    }

    private report(stage: PollStage, error: unknown): void {
        try {
            this.onError(this.target, stage, error);
        } catch (hookError) {
            logger.error(`[Scheduler] error hook failed for ${pollTargetKey(this.target)}: ${String(hookError)}`);
        }
    }
}

function defaultErrorHandler(target: PollTarget, stage: PollStage, error: unknown): void {
    logger.warn(`[Scheduler] ${pollTargetKey(target)} failed while ${stage}: ${describeError(error)}`);
}

/**
 * Drives one timer chain per (source, symbol) poll target.
 *
 * - Every target fires its first tick immediately on `start()`.
 * - Intervals run tick-start to tick-start; a tick longer than its interval is
 *   followed by the next tick right after it completes, never concurrently.
 * - A failed tick is reported and the target waits for its next interval.
 * - `stop()` clears timers, aborts in-flight fetches and resolves once every
 *   target has settled.
 */
export class PollingScheduler<Raw, Rec> {
    private readonly runners = new Map<string, PollTargetRunner<Raw, Rec>>();
    private readonly onError: PollErrorHandler;
    private readonly now: () => number;
    private started = false;
    private stopping: Promise<void> | null = null;

    constructor(
        private readonly pipeline: PollPipeline<Raw, Rec>,
        options: PollingSchedulerOptions = {},
    ) {
        this.onError = options.onError ?? defaultErrorHandler;
        this.now = options.now ?? (() => Date.now());
    }

    public register(target: PollTarget): void {
        if (this.started || this.stopping) {
            throw new ConfigurationError(`Cannot register ${pollTargetKey(target)} after the scheduler started`);
        }
        if (!Number.isFinite(target.intervalMs) || target.intervalMs <= 0) {
            throw new ConfigurationError(`Invalid interval "${target.intervalMs}" for ${pollTargetKey(target)}`);
        }
        const key = pollTargetKey(target);
        if (this.runners.has(key)) {
            throw new ConfigurationError(`Duplicate poll target ${key}`);
        }
        const frozen = Object.freeze({ ...target, intervalMs: Math.max(1, Math.floor(target.intervalMs)) });
        this.runners.set(key, new PollTargetRunner(frozen, this.pipeline, this.onError, this.now));
    }

    public start(): void {
        if (this.stopping) {
            throw new ConfigurationError('Cannot start a scheduler that has been stopped');
        }
        if (this.started) {
            return;
        }
        this.started = true;
        for (const runner of this.runners.values()) {
            runner.arm(0);
        }
        logger.info(`[Scheduler] started ${this.runners.size} poll target(s)`);
    }

    public stop(): Promise<void> {
        if (!this.stopping) {
            this.stopping = Promise.all(Array.from(this.runners.values()).map((runner) => runner.stop()))
                .then(() => {
                    logger.info(`[Scheduler] stopped ${this.runners.size} poll target(s)`);
                });
        }
        return this.stopping;
    }

    public snapshot(): PollTargetSnapshot[] {
        return Array.from(this.runners.values()).map((runner) => runner.snapshot());
    }
}
