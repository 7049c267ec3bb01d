import { logger } from "./logger";
import { AppError, ErrorCategory, ErrorCode } from "./errors";
import type { ScrobblerConfig } from "../config/schema";

function invalid(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(
        ErrorCode.INVALID_CONFIG,
        ErrorCategory.FATAL,
        message,
        details
    );
}

/**
 * Validate a parsed configuration. Throws on the first problem found.
 */
export function validateConfig(config: ScrobblerConfig): void {
    if (config.refreshInterval <= 0) {
        throw invalid("refreshInterval must be greater than 0");
    }

    if (config.scrobbleThreshold < 1 || config.scrobbleThreshold > 100) {
        throw invalid("scrobbleThreshold must be between 1 and 100", {
            scrobbleThreshold: config.scrobbleThreshold,
        });
    }

    const lastfmEnabled = config.lastfm?.enabled ?? false;
    const listenbrainzEnabled = config.listenbrainz.some((lb) => lb.enabled);

    if (!lastfmEnabled && !listenbrainzEnabled) {
        logger.warn("No scrobbling services are enabled");
    }

    if (config.lastfm?.enabled) {
        if (!config.lastfm.apiKey) {
            throw invalid("Last.fm apiKey is required when Last.fm is enabled");
        }
        if (!config.lastfm.apiSecret) {
            throw invalid("Last.fm apiSecret is required when Last.fm is enabled");
        }
    }

    const seenNames = new Set<string>();
    for (const lb of config.listenbrainz) {
        if (seenNames.has(lb.name)) {
            throw invalid(`ListenBrainz instance name '${lb.name}' is used more than once`);
        }
        seenNames.add(lb.name);

        if (!lb.enabled) {
            continue;
        }
        if (!lb.token) {
            throw invalid(
                `ListenBrainz token is required when enabled (instance: ${lb.name})`
            );
        }
        if (!lb.apiUrl) {
            throw invalid(`ListenBrainz apiUrl is required (instance: ${lb.name})`);
        }
    }

    const ignored = new Set(config.appFiltering.ignoredApps);
    for (const appId of config.appFiltering.allowedApps) {
        if (ignored.has(appId)) {
            throw invalid(
                `App '${appId}' appears in both allowedApps and ignoredApps`,
                { appId }
            );
        }
    }
}
