/**
 * Parses a base-10 integer from an env var. Returns undefined when the
 * variable is unset or not numeric, so the caller keeps its configured value.
 */
export function parseOptionalEnvInt(value: string | undefined): number | undefined {
    if (typeof value !== "string" || value.trim().length === 0) {
        return undefined;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
}
