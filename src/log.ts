import pino, { type Logger } from "pino";
import { isTestEnv } from "./util/env.js";

let root: Logger | null = null;

function createRoot(): Logger {
    // Jest runs stay quiet and spawn no transport worker
    if (isTestEnv()) return pino({ level: "silent" });
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: !process.env.NO_COLOR,
            ignore: "pid,hostname",
            destination: 2,
        },
    });
    return pino({
        base: undefined,
        level: process.env.LOG_LEVEL || "info",
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    }, transport);
}

export function createLogger(scope?: string): Logger {
    if (!root) root = createRoot();
    return scope ? root.child({ scope }) : root;
}
