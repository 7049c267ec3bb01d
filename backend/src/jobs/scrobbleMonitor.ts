import type { NowPlayingSnapshot } from "@nowscrobble/now-playing-contract";
import PQueue from "p-queue";
import { logErrorWithContext, logger } from "../utils/logger";
import type { AppDecision } from "../services/appFilter";
import type { NowPlayingSource } from "../services/nowPlayingSource";
import type { DeliveryEvent, PollResult } from "../services/playSessionEngine";
import type { DispatchOutcome } from "../services/scrobbleDispatcher";
import type { StatusSink } from "../services/scrobbleStatus";
import type { UserPrompt } from "../services/userPrompt";

export interface ScrobbleMonitorDeps {
    source: NowPlayingSource;
    engine: { poll(snapshot: NowPlayingSnapshot | null, now: Date): PollResult };
    dispatcher: {
        dispatch(event: DeliveryEvent): Promise<DispatchOutcome[]>;
        drain(): Promise<void>;
    };
    status: StatusSink;
    prompt: UserPrompt;
    appFilter: { recordDecision(appId: string, decision: AppDecision): Promise<boolean> };
}

export interface ScrobbleMonitorOptions {
    intervalMs: number;
    now?: () => Date;
}

const log = logger.child("monitor");

/**
 * Polls the now-playing source on a fixed schedule and routes the engine's
 * decisions to the status sink, the dispatcher and the user prompt.
 */
export class ScrobbleMonitor {
    private isRunning = false;
    private timeoutId?: NodeJS.Timeout;
    private activeTick?: Promise<void>;
    private readonly deliveries = new Set<Promise<void>>();
    private readonly openPrompts = new Set<string>();
    // One question on the terminal at a time; each answer is recorded before the next is asked.
    private readonly promptQueue = new PQueue({ concurrency: 1 });
    private readonly now: () => Date;

    constructor(
        private readonly deps: ScrobbleMonitorDeps,
        private readonly options: ScrobbleMonitorOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    get running(): boolean {
        return this.isRunning;
    }

    /**
     * Start polling. Safe to call multiple times.
     */
    async start(): Promise<void> {
        if (this.isRunning) {
            log.debug("Scrobble monitor already running");
            return;
        }

        this.isRunning = true;
        log.info(`Scrobble monitor started (polling every ${this.options.intervalMs}ms)`);
        await this.runTick();
    }

    stop(): void {
        if (this.timeoutId) {
            clearTimeout(this.timeoutId);
            this.timeoutId = undefined;
        }
        if (this.isRunning) {
            this.isRunning = false;
            log.info("Scrobble monitor stopped");
        }
    }

    /** One poll: read, decide, route. Deliveries are left running. */
    async tick(): Promise<PollResult> {
        const snapshot = await this.deps.source.read();
        const result = this.deps.engine.poll(snapshot, this.now());

        if (snapshot === null) {
            this.deps.status.nowPlaying(null);
        }
        this.deps.status.setPaused(snapshot !== null && snapshot.isPlaying !== true);
        if (result.nowPlaying) {
            this.deps.status.nowPlaying(result.nowPlaying.track);
            this.deliver(result.nowPlaying);
        }
        if (result.scrobble) {
            this.deps.status.scrobbled(result.scrobble.track);
            this.deliver(result.scrobble);
        }
        if (result.askUser) {
            this.askAbout(result.askUser.appId);
        }
        return result;
    }

    /** Wait for the running tick and every delivery it started. */
    async drain(): Promise<void> {
        if (this.activeTick) {
            await this.activeTick;
        }
        while (this.deliveries.size > 0) {
            await Promise.all(Array.from(this.deliveries));
        }
        await this.deps.dispatcher.drain();
    }

    get pendingDeliveries(): number {
        return this.deliveries.size;
    }

    private deliver(event: DeliveryEvent): void {
        const delivery: Promise<void> = this.deps.dispatcher.dispatch(event).then(
            () => {
                this.deliveries.delete(delivery);
            },
            (error: unknown) => {
                this.deliveries.delete(delivery);
                logErrorWithContext(log, "Delivery failed", error, { eventKind: event.kind });
            }
        );
        this.deliveries.add(delivery);
    }

    // At most one outstanding question per app.
    private askAbout(appId: string): void {
        if (this.openPrompts.has(appId)) {
            return;
        }
        this.openPrompts.add(appId);

        this.promptQueue.add(() => this.resolvePrompt(appId)).catch((error: unknown) => {
            logErrorWithContext(log, `App prompt failed for ${appId}`, error);
        });
    }

    private async resolvePrompt(appId: string): Promise<void> {
        try {
            const decision = await this.deps.prompt.ask(appId);
            await this.deps.appFilter.recordDecision(appId, decision);
        } finally {
            this.openPrompts.delete(appId);
        }
    }

    private async runTick(): Promise<void> {
        if (!this.isRunning) return;

        const tick = this.tick().then(
            () => undefined,
            (error: unknown) => {
                logErrorWithContext(log, "Scrobble monitor tick failed", error);
            }
        );
        this.activeTick = tick;
        await tick;
        this.activeTick = undefined;

        if (this.isRunning) {
            this.timeoutId = setTimeout(() => this.runTick(), this.options.intervalMs);
        }
    }
}
