/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value.trim()
            : String(fallback);
    return Number.parseInt(source, 10);
}

/**
 * Like `parseEnvInt`, but non-numeric and non-positive values also yield `fallback`.
 */
export function parsePositiveEnvInt(
    value: string | undefined,
    fallback: number
): number {
    const parsed = parseEnvInt(value, fallback);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function isEnvFlagEnabled(
    value: string | undefined,
    fallback = false
): boolean {
    if (value === undefined || value.trim() === "") {
        return fallback;
    }
    return value.trim().toLowerCase() === "true";
}

export function parseEnvString(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
