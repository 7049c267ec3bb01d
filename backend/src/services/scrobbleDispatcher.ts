import PQueue from "p-queue";
import { logErrorWithContext, logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { formatTrack } from "../utils/track";
import type { DeliveryEvent } from "./playSessionEngine";
import {
    NOW_PLAYING_RETRY_POLICY,
    SCROBBLE_RETRY_POLICY,
    retryWithBackoff,
    type RetryHooks,
    type RetryPolicy,
} from "./retryPolicy";
import type { ScrobbleService } from "./scrobblers";

export type DispatchOutcome =
    | { serviceId: string; ok: true }
    | { serviceId: string; ok: false; error: unknown };

export interface ScrobbleDispatcherOptions {
    /** Clock, sleep and jitter overrides passed to every retry loop. */
    retryHooks?: Omit<RetryHooks, "onRetry">;
    nowPlayingPolicy?: RetryPolicy;
    scrobblePolicy?: RetryPolicy;
}

const log = logger.child("dispatcher");

function describeEvent(event: DeliveryEvent): string {
    return event.kind === "scrobble" ? "Scrobble" : "Now playing";
}

function send(service: ScrobbleService, event: DeliveryEvent): Promise<void> {
    if (event.kind === "scrobble") {
        return service.submitListen(event.track, event.listenedAt);
    }
    return service.updateNowPlaying(event.track);
}

/**
 * Fans delivery events out to every configured service. Services never wait
 * for one another; calls to the same service run one at a time.
 */
export class ScrobbleDispatcher {
    private readonly queues = new Map<string, PQueue>();

    constructor(
        private readonly services: readonly ScrobbleService[],
        private readonly options: ScrobbleDispatcherOptions = {}
    ) {
        for (const service of services) {
            this.queues.set(service.id, new PQueue({ concurrency: 1 }));
        }
    }

    get serviceIds(): string[] {
        return this.services.map((service) => service.id);
    }

    dispatch(event: DeliveryEvent): Promise<DispatchOutcome[]> {
        return Promise.all(
            this.services.map((service) => this.deliver(service, event))
        );
    }

    /** Resolves once every queued delivery has finished or been dropped. */
    async drain(): Promise<void> {
        await Promise.all(
            Array.from(this.queues.values(), (queue) => queue.onIdle())
        );
    }

    private queueFor(service: ScrobbleService): PQueue {
        let queue = this.queues.get(service.id);
        if (!queue) {
            queue = new PQueue({ concurrency: 1 });
            this.queues.set(service.id, queue);
        }
        return queue;
    }

    private policyFor(event: DeliveryEvent): RetryPolicy {
        if (event.kind === "scrobble") {
            return this.options.scrobblePolicy ?? SCROBBLE_RETRY_POLICY;
        }
        return this.options.nowPlayingPolicy ?? NOW_PLAYING_RETRY_POLICY;
    }

    private async deliver(
        service: ScrobbleService,
        event: DeliveryEvent
    ): Promise<DispatchOutcome> {
        const serviceLog = log.child(service.id);
        const label = describeEvent(event);
        const trackText = formatTrack(event.track);

        try {
            await this.queueFor(service).add(() =>
                retryWithBackoff(this.policyFor(event), () => send(service, event), {
                    ...this.options.retryHooks,
                    onRetry: ({ attempt, delayMs, error }) =>
                        serviceLog.warn(
                            `${label} failed for ${trackText}, retry ${attempt} in ${delayMs}ms: ${errorMessage(error)}`
                        ),
                })
            );
        } catch (error) {
            logErrorWithContext(serviceLog, `${label} dropped for ${trackText}`, error, {
                serviceId: service.id,
                eventKind: event.kind,
            });
            return { serviceId: service.id, ok: false, error };
        }

        serviceLog.info(`${label} sent: ${trackText}`);
        return { serviceId: service.id, ok: true };
    }
}
