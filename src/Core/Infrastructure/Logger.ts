import pino from "pino";
import { type Config, loadConfig } from "./Config";

let globalLogger: pino.Logger | null = null;

export function createLogger(config: Config): pino.Logger
{
    return pino({ name: "neuroforward", level: config.logLevel });
}

/** Created from the environment on first use. */
export function getLogger(): pino.Logger
{
    if (globalLogger === null) {
        globalLogger = createLogger(loadConfig());
    }

    return globalLogger;
}

/** Replace the library logger; `null` makes the next `getLogger` reload it. */
export function setLogger(logger: pino.Logger | null): void
{
    globalLogger = logger;
}
