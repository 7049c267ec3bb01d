import type { ScrobblerConfig } from "../config/schema";
import { logger } from "../utils/logger";
import { LastFmScrobbler } from "./lastfm";
import { ListenBrainzScrobbler } from "./listenbrainz";
import type { ScrobbleService } from "./scrobblers";

const log = logger.child("services");

/** Builds one adapter per enabled account, Last.fm first. */
export function createScrobbleServices(
    config: Pick<ScrobblerConfig, "lastfm" | "listenbrainz">
): ScrobbleService[] {
    const services: ScrobbleService[] = [];

    if (config.lastfm?.enabled) {
        services.push(
            new LastFmScrobbler({
                apiKey: config.lastfm.apiKey,
                apiSecret: config.lastfm.apiSecret,
                sessionKey: config.lastfm.sessionKey,
            })
        );
    }

    for (const instance of config.listenbrainz) {
        if (!instance.enabled) {
            continue;
        }
        services.push(
            new ListenBrainzScrobbler({
                name: instance.name,
                token: instance.token,
                apiUrl: instance.apiUrl,
            })
        );
    }

    log.info(
        services.length > 0
            ? `Scrobbling to ${services.map((service) => service.id).join(", ")}`
            : "No scrobbling services enabled"
    );
    return services;
}
