import { loadConfig, resolveConfigPath, saveConfig } from "./config";
import { BRAND_NAME, BRAND_VERSION } from "./config/brand";
import { ScrobbleMonitor } from "./jobs/scrobbleMonitor";
import { AppFilterStore } from "./services/appFilter";
import { CommandNowPlayingSource } from "./services/nowPlayingSource";
import { PlaySessionEngine } from "./services/playSessionEngine";
import { ScrobbleDispatcher } from "./services/scrobbleDispatcher";
import { createScrobbleServices } from "./services/scrobbleServices";
import { ScrobbleStatusStore } from "./services/scrobbleStatus";
import { ReadlineUserPrompt } from "./services/userPrompt";
import { AppError } from "./utils/errors";
import { logger, setLogLevel, withLogTiming } from "./utils/logger";
import { TextCleaner } from "./utils/textCleanup";

let monitor: ScrobbleMonitor | null = null;
let isShuttingDown = false;

async function bootstrap() {
    const configPath = resolveConfigPath();
    const config = await loadConfig(configPath);
    if (config.logLevel) {
        setLogLevel(config.logLevel);
    }
    logger.info(`${BRAND_NAME} ${BRAND_VERSION} starting (config: ${configPath})`);

    // Prompt answers are written back so the user is asked only once per app.
    const appFilter = new AppFilterStore(config.appFiltering, async (appFiltering) => {
        config.appFiltering = {
            ...appFiltering,
            allowedApps: [...appFiltering.allowedApps],
            ignoredApps: [...appFiltering.ignoredApps],
        };
        await saveConfig(config, configPath);
    });

    const engine = new PlaySessionEngine({
        scrobbleThreshold: config.scrobbleThreshold,
        cleaner: new TextCleaner(config.cleanup),
        appFilter,
    });

    monitor = new ScrobbleMonitor(
        {
            source: new CommandNowPlayingSource(config.source),
            engine,
            dispatcher: new ScrobbleDispatcher(createScrobbleServices(config)),
            status: new ScrobbleStatusStore(),
            prompt: new ReadlineUserPrompt(),
            appFilter,
        },
        { intervalMs: config.refreshInterval * 1000 }
    );

    await monitor.start();
}

async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
        if (monitor) {
            const active = monitor;
            active.stop();
            await withLogTiming(logger, "Draining pending deliveries", () => active.drain());
        }

        logger.debug("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

bootstrap().catch((error: unknown) => {
    if (error instanceof AppError) {
        logger.error(`Startup failed: ${error.message}`, error.toJSON());
    } else {
        logger.error("Startup failed:", error);
    }
    process.exit(1);
});
