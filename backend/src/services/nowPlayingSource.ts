import { spawn } from "child_process";
import {
    parseNowPlayingSnapshot,
    type NowPlayingSnapshot,
} from "@nowscrobble/now-playing-contract";
import type { SourceConfig } from "../config/schema";
import { AppError, ErrorCategory, ErrorCode, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

export interface NowPlayingSource {
    /** `null` means nothing is playing, or the source could not be read. */
    read(): Promise<NowPlayingSnapshot | null>;
}

const log = logger.child("source");

/**
 * Runs a helper command that prints the system's now-playing info as JSON.
 * Empty output or the literal `null` means no media.
 */
export class CommandNowPlayingSource implements NowPlayingSource {
    private failing = false;

    constructor(private readonly config: SourceConfig) {}

    async read(): Promise<NowPlayingSnapshot | null> {
        let snapshot: NowPlayingSnapshot | null;
        try {
            snapshot = this.parse(await this.runCommand());
        } catch (error) {
            this.reportFailure(error);
            return null;
        }

        if (this.failing) {
            this.failing = false;
            log.info("Now-playing source recovered");
        }
        return snapshot;
    }

    private parse(output: string): NowPlayingSnapshot | null {
        const trimmed = output.trim();
        if (!trimmed) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(trimmed);
        } catch (error) {
            throw new AppError(
                ErrorCode.SOURCE_MALFORMED,
                ErrorCategory.RECOVERABLE,
                "Now-playing output is not valid JSON",
                { originalError: errorMessage(error) }
            );
        }

        const snapshot = parseNowPlayingSnapshot(raw);
        if (snapshot === undefined) {
            throw new AppError(
                ErrorCode.SOURCE_MALFORMED,
                ErrorCategory.RECOVERABLE,
                "Now-playing output is not an object"
            );
        }
        return snapshot;
    }

    // Repeated failures are logged once at warn level, then at debug.
    private reportFailure(error: unknown): void {
        if (this.failing) {
            log.debug(`Now-playing source still failing: ${errorMessage(error)}`);
            return;
        }
        this.failing = true;
        log.warn(`Now-playing source failed: ${errorMessage(error)}`, { error });
    }

    private runCommand(): Promise<string> {
        const { command, args, timeoutMs } = this.config;

        return new Promise<string>((resolve, reject) => {
            const proc = spawn(command, args, {
                stdio: ["ignore", "pipe", "pipe"],
            });

            let stdout = "";
            let stderr = "";
            const timeoutId = setTimeout(() => {
                proc.kill("SIGKILL");
                reject(
                    new AppError(
                        ErrorCode.SOURCE_UNAVAILABLE,
                        ErrorCategory.TRANSIENT,
                        `${command} timed out after ${timeoutMs}ms`
                    )
                );
            }, timeoutMs);

            proc.stdout.on("data", (chunk: Buffer) => {
                stdout += chunk.toString("utf8");
            });
            proc.stderr.on("data", (chunk: Buffer) => {
                stderr += chunk.toString("utf8");
            });

            proc.on("error", (error) => {
                clearTimeout(timeoutId);
                reject(
                    new AppError(
                        ErrorCode.SOURCE_UNAVAILABLE,
                        ErrorCategory.TRANSIENT,
                        `${command} could not be started: ${error.message}`
                    )
                );
            });

            proc.on("close", (code) => {
                clearTimeout(timeoutId);
                if (code === 0) {
                    resolve(stdout);
                    return;
                }
                reject(
                    new AppError(
                        ErrorCode.SOURCE_UNAVAILABLE,
                        ErrorCategory.TRANSIENT,
                        `${command} exited with code ${code}: ${stderr.trim() || "no output"}`
                    )
                );
            });
        });
    }
}
