import { logger } from "./logger";

export interface CleanupSettings {
    enabled: boolean;
    /** Regex sources; every match is removed, in declaration order. */
    patterns: string[];
}

export const DEFAULT_CLEANUP_PATTERNS: readonly string[] = [
    "\\s*\\[Explicit\\]",
    "\\s*\\[Clean\\]",
    "\\s*\\(Explicit\\)",
    "\\s*\\(Clean\\)",
    "\\s*- Explicit",
    "\\s*- Clean",
];

const log = logger.child("textCleanup");

/**
 * Compile cleanup patterns. Invalid sources are logged and skipped.
 */
export function compileCleanupPatterns(sources: readonly string[]): RegExp[] {
    const compiled: RegExp[] = [];
    for (const source of sources) {
        try {
            compiled.push(new RegExp(source, "g"));
        } catch (error) {
            log.warn(`Invalid cleanup pattern '${source}'`, { error });
        }
    }
    return compiled;
}

function cleanOnce(text: string, patterns: readonly RegExp[]): string {
    let result = text;
    for (const pattern of patterns) {
        result = result.replace(pattern, "");
    }
    return result.trim();
}

/**
 * Remove every match of `patterns` from `text` and trim it. Passes repeat
 * until the text stops changing, so cleaning an already-clean value is a no-op.
 */
export function cleanText(text: string, patterns: readonly RegExp[]): string {
    let current = text;
    for (;;) {
        const next = cleanOnce(current, patterns);
        if (next === current) {
            return next;
        }
        current = next;
    }
}

/**
 * Strips noise such as "[Explicit]" from track, artist and album names.
 */
export class TextCleaner {
    private readonly patterns: RegExp[];

    constructor(private readonly settings: CleanupSettings) {
        this.patterns = settings.enabled
            ? compileCleanupPatterns(settings.patterns)
            : [];
    }

    get patternCount(): number {
        return this.patterns.length;
    }

    clean(text: string): string {
        if (!this.settings.enabled) {
            return text;
        }
        return cleanText(text, this.patterns);
    }

    cleanOptional(text: string | undefined): string | undefined {
        return text === undefined ? undefined : this.clean(text);
    }
}
