import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

export function configureLogger(config: LoggingConfig): Logger {
    loggerInstance = pino({
        level: config.level,
        base: undefined,
        transport: config.pretty
            ?   {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                        ignore: "module",
                    }
                }
            : undefined,
    });
    return loggerInstance;
}

export function getLogger(): Logger {
    if(!loggerInstance) {
        loggerInstance = pino({
            level: "info",
            base: undefined
        });
    }
    return loggerInstance;
}

export function scopedLogger(logger: Logger | undefined, bindings: Record<string, string>): Logger {
    const base = logger ?? getLogger();
    return typeof base.child === "function" ? base.child(bindings) : base;
}
