import pino from "pino";
import type { Logger } from "pino";
import { isInteractive, isTestEnv } from "./util/env.js";

export type { Logger };

function wantsPretty() {
    if (process.env.LOG_PRETTY === "0") return false;
    return process.env.LOG_PRETTY === "1" || isInteractive();
}

export function createLogger(scope?: string): Logger {
    const level = isTestEnv() ? "silent" : process.env.LOG_LEVEL || "info";
    const options: pino.LoggerOptions = {
        base: scope ? { scope } : undefined,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    // The pretty transport runs on a worker thread; keep it out of tests.
    if (!isTestEnv() && wantsPretty()) {
        const transport = pino.transport({
            target: "pino-pretty",
            options: {
                translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
                colorize: !process.env.NO_COLOR,
                ignore: "pid,hostname",
                destination: 2,
            },
        });
        return pino(options, transport);
    }
    if (isTestEnv()) return pino(options);
    return pino(options, pino.destination({ dest: 2, sync: true }));
}
