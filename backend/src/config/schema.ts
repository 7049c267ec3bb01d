import { z } from "zod";
import { DEFAULT_CLEANUP_PATTERNS } from "../utils/textCleanup";

export const DEFAULT_LISTENBRAINZ_API_URL = "https://api.listenbrainz.org";

const cleanupSchema = z.object({
    enabled: z.boolean().default(true),
    patterns: z.array(z.string()).default([...DEFAULT_CLEANUP_PATTERNS]),
});

const appFilteringSchema = z.object({
    promptForNewApps: z.boolean().default(true),
    scrobbleUnknown: z.boolean().default(true),
    allowedApps: z.array(z.string()).default([]),
    ignoredApps: z.array(z.string()).default([]),
});

const sourceSchema = z.object({
    /** Helper that prints the current now-playing info as JSON. */
    command: z.string().min(1).default("media-control"),
    args: z.array(z.string()).default(["get"]),
    timeoutMs: z.number().int().positive().default(5000),
});

const lastfmSchema = z.object({
    enabled: z.boolean().default(false),
    apiKey: z.string().default(""),
    apiSecret: z.string().default(""),
    sessionKey: z.string().default(""),
});

const listenbrainzSchema = z.object({
    enabled: z.boolean().default(false),
    name: z.string().min(1),
    token: z.string().default(""),
    apiUrl: z.string().default(DEFAULT_LISTENBRAINZ_API_URL),
});

export const configSchema = z.object({
    /** Seconds between now-playing polls. */
    refreshInterval: z.number().int().nonnegative().default(5),
    /** Percentage of a track that must play before it is scrobbled. */
    scrobbleThreshold: z.number().int().default(50),
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
    cleanup: cleanupSchema.default({}),
    appFiltering: appFilteringSchema.default({}),
    source: sourceSchema.default({}),
    lastfm: lastfmSchema.nullable().default({}),
    listenbrainz: z.array(listenbrainzSchema).default([
        { enabled: false, name: "Primary" },
    ]),
});

export type ScrobblerConfig = z.infer<typeof configSchema>;
export type AppFilteringConfig = ScrobblerConfig["appFiltering"];
export type SourceConfig = ScrobblerConfig["source"];
export type LastFmConfig = z.infer<typeof lastfmSchema>;
export type ListenBrainzConfig = z.infer<typeof listenbrainzSchema>;

export function defaultConfig(): ScrobblerConfig {
    return configSchema.parse({});
}
