import dotenv from "dotenv";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import {
    configSchema,
    defaultConfig,
    type ScrobblerConfig,
} from "./config/schema";
import { validateConfig } from "./utils/configValidator";
import { AppError, ErrorCategory, ErrorCode, wrapNodeError } from "./utils/errors";
import { parseOptionalEnvInt } from "./utils/envParsers";
import { logger } from "./utils/logger";
import { BRAND_SLUG } from "./config/brand";

dotenv.config();

export type {
    AppFilteringConfig,
    LastFmConfig,
    ListenBrainzConfig,
    ScrobblerConfig,
    SourceConfig,
} from "./config/schema";
export { defaultConfig } from "./config/schema";

type Env = Record<string, string | undefined>;

/** Config file location: NOWSCROBBLE_CONFIG_PATH, else ~/.config/nowscrobble/config.json. */
export function resolveConfigPath(env: Env = process.env): string {
    const configured = env.NOWSCROBBLE_CONFIG_PATH?.trim();
    if (configured) {
        return configured;
    }
    return path.join(os.homedir(), ".config", BRAND_SLUG, "config.json");
}

function hasErrorCode(error: unknown, code: string): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === code
    );
}

function formatZodIssues(error: z.ZodError): string[] {
    return error.errors.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${where}: ${issue.message}`;
    });
}

/** Parse and validate a raw config document, applying env overrides. */
export function parseConfig(raw: unknown, env: Env = process.env): ScrobblerConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
        const issues = formatZodIssues(result.error);
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Invalid configuration: ${issues.join("; ")}`,
            { issues }
        );
    }

    const config = result.data;
    const refreshInterval = parseOptionalEnvInt(env.NOWSCROBBLE_REFRESH_INTERVAL);
    if (refreshInterval !== undefined) {
        config.refreshInterval = refreshInterval;
    }
    const scrobbleThreshold = parseOptionalEnvInt(
        env.NOWSCROBBLE_SCROBBLE_THRESHOLD
    );
    if (scrobbleThreshold !== undefined) {
        config.scrobbleThreshold = scrobbleThreshold;
    }

    validateConfig(config);
    return config;
}

export async function saveConfig(
    config: ScrobblerConfig,
    configPath: string = resolveConfigPath()
): Promise<void> {
    try {
        await fs.mkdir(path.dirname(configPath), { recursive: true });
        await fs.writeFile(
            configPath,
            `${JSON.stringify(config, null, 2)}\n`,
            "utf8"
        );
    } catch (error) {
        throw wrapNodeError(error, configPath);
    }
    logger.debug(`Config saved to ${configPath}`);
}

/**
 * Load the config file, creating it with defaults when it does not exist.
 */
export async function loadConfig(
    configPath: string = resolveConfigPath(),
    env: Env = process.env
): Promise<ScrobblerConfig> {
    let content: string;
    try {
        content = await fs.readFile(configPath, "utf8");
    } catch (error) {
        if (!hasErrorCode(error, "ENOENT")) {
            throw wrapNodeError(error, configPath);
        }
        logger.info(`Config file not found, creating default at ${configPath}`);
        const created = defaultConfig();
        await saveConfig(created, configPath);
        return parseConfig(created, env);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            `Failed to parse config file ${configPath}`,
            { originalError: error instanceof Error ? error.message : String(error) }
        );
    }

    const config = parseConfig(raw, env);
    logger.debug(`Configuration loaded from ${configPath}`);
    return config;
}
