import winston from "winston";

const LEVELS = Object.keys(winston.config.npm.levels);
const CREDENTIAL_KEY = /token|password|secret|authorization|crumb/i;

export function readLogLevel(raw: string | undefined): string {
    const level = raw?.trim().toLowerCase();
    return level && LEVELS.includes(level) ? level : "info";
}

/** Replaces metadata values whose key names a credential. */
export const maskCredentials = winston.format((info) => {
    for (const key of Object.keys(info)) {
        if (CREDENTIAL_KEY.test(key)) {
            info[key] = "***";
        }
    }
    return info;
});

function renderMeta(meta: Record<string, unknown>): string {
    return Object.entries(meta)
        .map(([key, value]) => ` ${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
        .join("");
}

export const logLine = winston.format.printf(({ timestamp, level, message, component, stack, ...meta }) => {
    const scope = typeof component === "string" ? ` [${component}]` : "";
    const trace = typeof stack === "string" ? `\n${stack}` : "";
    return `${String(timestamp)} ${level}${scope}: ${String(message)}${renderMeta(meta)}${trace}`;
});

// stdout carries the stdio transport.
export const logger = winston.createLogger({
    level: readLogLevel(process.env.LOG_LEVEL),
    format: winston.format.combine(
        maskCredentials(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true })
    ),
    transports: [
        new winston.transports.Console({
            stderrLevels: LEVELS,
            format: winston.format.combine(winston.format.colorize(), logLine)
        })
    ]
});

/** A logger whose lines carry `[component]`. */
export function loggerFor(component: string): winston.Logger {
    return logger.child({ component });
}
