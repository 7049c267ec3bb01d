import { logger } from "../utils/logger";
import type { AppFilteringConfig } from "../config/schema";

export type AppFilterAction = "allow" | "ignore" | "ask_user";
export type AppDecision = Exclude<AppFilterAction, "ask_user">;

const log = logger.child("appFilter");

/**
 * Decide whether playback from `appId` may be scrobbled.
 *
 * Unknown apps fall back to `scrobbleUnknown`; apps on neither list prompt the
 * user when `promptForNewApps` is set and are allowed otherwise.
 */
export function classifyApp(
    appId: string | undefined,
    config: Readonly<AppFilteringConfig>
): AppFilterAction {
    if (!appId) {
        return config.scrobbleUnknown ? "allow" : "ignore";
    }
    if (config.allowedApps.includes(appId)) {
        return "allow";
    }
    if (config.ignoredApps.includes(appId)) {
        return "ignore";
    }
    return config.promptForNewApps ? "ask_user" : "allow";
}

export type AppFilterChangeListener = (
    config: Readonly<AppFilteringConfig>
) => Promise<void> | void;

/**
 * Owns the live app filter lists shared by the poll loop and the prompt
 * handler. Mutations are synchronous appends, so a poll never observes a
 * half-applied decision.
 */
export class AppFilterStore {
    private readonly config: AppFilteringConfig;

    constructor(
        initial: AppFilteringConfig,
        private readonly onChange?: AppFilterChangeListener
    ) {
        this.config = {
            ...initial,
            allowedApps: [...initial.allowedApps],
            ignoredApps: [...initial.ignoredApps],
        };
    }

    current(): Readonly<AppFilteringConfig> {
        return this.config;
    }

    classify(appId: string | undefined): AppFilterAction {
        return classifyApp(appId, this.config);
    }

    /**
     * Record the user's answer for `appId` and persist it. Returns false when
     * the decision was already on record.
     */
    async recordDecision(appId: string, decision: AppDecision): Promise<boolean> {
        const target =
            decision === "allow" ? this.config.allowedApps : this.config.ignoredApps;
        const other =
            decision === "allow" ? this.config.ignoredApps : this.config.allowedApps;

        if (target.includes(appId)) {
            return false;
        }

        const otherIndex = other.indexOf(appId);
        if (otherIndex !== -1) {
            other.splice(otherIndex, 1);
        }
        target.push(appId);
        log.info(`Recorded '${decision}' for ${appId}`);

        if (this.onChange) {
            try {
                await this.onChange(this.config);
            } catch (error) {
                log.error(`Failed to persist app decision for ${appId}`, { error });
            }
        }
        return true;
    }
}
