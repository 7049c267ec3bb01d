import PQueue from "p-queue";
import { createInterface } from "readline/promises";
import type { AppDecision } from "./appFilter";

export interface UserPrompt {
    ask(appId: string): Promise<AppDecision>;
}

type PromptStreams = {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
};

export function parseAppDecision(answer: string): AppDecision {
    const normalized = answer.trim().toLowerCase();
    return normalized === "y" || normalized === "yes" ? "allow" : "ignore";
}

/** Asks on the terminal whether a newly seen app should be scrobbled. */
export class ReadlineUserPrompt implements UserPrompt {
    // A second interface on the same input would receive the same answer line.
    private readonly queue = new PQueue({ concurrency: 1 });

    constructor(
        private readonly streams: PromptStreams = {
            input: process.stdin,
            output: process.stdout,
        }
    ) {}

    ask(appId: string): Promise<AppDecision> {
        return this.queue.add(() => this.askNow(appId));
    }

    private async askNow(appId: string): Promise<AppDecision> {
        const rl = createInterface({
            input: this.streams.input,
            output: this.streams.output,
        });
        try {
            const answer = await rl.question(`Scrobble music played by ${appId}? [y/N] `);
            return parseAppDecision(answer);
        } finally {
            rl.close();
        }
    }
}
