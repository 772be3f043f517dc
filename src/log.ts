import pino, { type Logger } from "pino";
import type { Runtime } from "./config/runtime.js";

export function createLogger(runtime: Pick<Runtime, "logLevel" | "pretty">): Logger {
    const options = {
        base: undefined,
        level: runtime.logLevel,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (!runtime.pretty) return pino(options);

    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
            destination: 2,
        },
    });
    return pino(options, transport);
}
