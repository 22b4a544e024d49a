export function isTestEnv() {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(process.env.JEST_WORKER_ID || process.env.NODE_ENV === "test");
}

export function envInt(name: string): number | undefined {
    const v = process.env[name];
    if (v === undefined || v.trim() === "") return undefined;
    const n = Number(v);
    return Number.isFinite(n) ? Math.trunc(n) : undefined;
}

export function envBool(name: string): boolean | undefined {
    const v = process.env[name];
    if (v === undefined) return undefined;
    const s = v.trim().toLowerCase();
    if (["1", "true", "yes", "y", "on"].includes(s)) return true;
    if (["0", "false", "no", "n", "off"].includes(s)) return false;
    return undefined;
}

export function envString(name: string): string | undefined {
    const v = process.env[name]?.trim();
    return v ? v : undefined;
}
