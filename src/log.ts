import pino, { type Logger } from "pino";
import { getConfig } from "./config/index.js";
import { isTestEnv } from "./util/env.js";

export type { Logger };

export function createLogger(scope?: string): Logger {
    const { level, pretty } = getConfig().log;
    const base = scope ? { scope } : undefined;

    // Never spawn the pretty transport worker under Jest
    if (isTestEnv()) {
        return pino({ base, level: "silent" });
    }

    const transport = pretty ? pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
            destination: 2,
        },
    }) : pino.destination(2);

    return pino({
        base,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    }, transport);
}
