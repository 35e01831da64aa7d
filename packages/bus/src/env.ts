/** Integer env var, falling back when unset or blank. Throws on junk so misconfiguration fails at startup. */
export function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 0): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

export function readFlag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    switch (raw.trim().toLowerCase()) {
        case 'true': case '1': case 'yes': return true;
        case 'false': case '0': case 'no': return false;
        default:
            throw new Error(`${name} must be true or false, got "${raw}"`);
    }
}

/** Comma-separated list; blanks are dropped. */
export function readList(env: NodeJS.ProcessEnv, name: string, fallback: string[]): string[] {
    const raw = env[name];
    if (raw === undefined) return fallback;

    const items = raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
    return items.length > 0 ? items : fallback;
}
