export function isEnvFlagEnabled(value: string | undefined): boolean {
    return value === "true" || value === "1";
}

/**
 * Splits a comma separated env value, dropping blank items.
 * Returns `undefined` when the variable is unset or holds nothing usable.
 */
export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    const entries = value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
    return entries.length > 0 ? entries : undefined;
}
