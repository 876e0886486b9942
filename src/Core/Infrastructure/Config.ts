import { z } from "zod";
import InvalidConfigurationError from "../Domain/Error/InvalidConfigurationError";

export const LOG_LEVEL_VARIABLE = "NEUROFORWARD_LOG_LEVEL";

const configSchema = z.object({
    [LOG_LEVEL_VARIABLE]: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default("info"),
});

export type LogLevel = z.infer<typeof configSchema>[typeof LOG_LEVEL_VARIABLE];

export interface Config {
    logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config
{
    const result = configSchema.safeParse(env);

    if (!result.success) {
        const issue = result.error.issues[0];
        throw new InvalidConfigurationError(`${LOG_LEVEL_VARIABLE}: ${issue.message}`);
    }

    return { logLevel: result.data[LOG_LEVEL_VARIABLE] };
}
