import dotenv from "dotenv";

import { logger } from "./logger.js";

dotenv.config();

export interface JenkinsSettings {
    url: string;
    username: string;
    token: string;
    timeoutMs: number;
}

export type TransportMode = "stdio" | "http";

/**
 * Normalizes a Jenkins base URL. Returns undefined for anything that is not
 * an http(s) URL.
 */
export function normalizeJenkinsUrl(raw: string | undefined): string | undefined {
    const trimmed = raw?.trim();
    if (!trimmed || !/^https?:\/\//i.test(trimmed)) {
        return undefined;
    }
    return trimmed.replace(/\/+$/, "");
}

function readBoolean(raw: string | undefined, fallback: boolean): boolean {
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    return ["1", "true", "yes", "on"].includes(raw.trim().toLowerCase());
}

function readPositiveInt(raw: string | undefined, fallback: number): number {
    const parsed = Number(raw);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readTransport(raw: string | undefined): TransportMode {
    return raw?.trim().toLowerCase() === "http" ? "http" : "stdio";
}

/** JENKINS_TIMEOUT is in seconds; thirty when unset or invalid. */
export function jenkinsTimeoutMsFromEnv(env: NodeJS.ProcessEnv = process.env): number {
    return readPositiveInt(env.JENKINS_TIMEOUT, 30) * 1000;
}

export function jenkinsSettingsFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    timeoutMs: number = jenkinsTimeoutMsFromEnv(env)
): JenkinsSettings | undefined {
    const { JENKINS_URL, JENKINS_USERNAME, JENKINS_TOKEN } = env;
    if (!JENKINS_URL || !JENKINS_USERNAME || !JENKINS_TOKEN) {
        return undefined;
    }

    const url = normalizeJenkinsUrl(JENKINS_URL);
    if (!url) {
        logger.warn(`Ignoring JENKINS_URL '${JENKINS_URL}': it must start with http:// or https://`);
        return undefined;
    }

    return {
        url,
        username: JENKINS_USERNAME,
        token: JENKINS_TOKEN,
        timeoutMs
    };
}

const jenkinsTimeoutMs = jenkinsTimeoutMsFromEnv();

export const config = {
    appName: "Pipeline Awareness",
    version: "1.0.0",
    jenkins: jenkinsSettingsFromEnv(process.env, jenkinsTimeoutMs),
    jenkinsTimeoutMs,
    server: {
        transport: readTransport(process.env.MCP_TRANSPORT),
        port: readPositiveInt(process.env.PORT, 3000),
        path: process.env.MCP_PATH || "/mcp"
    },
    redactSensitiveData: readBoolean(process.env.REDACT_SENSITIVE_DATA, false),
    startupRetries: readPositiveInt(process.env.STARTUP_RETRIES, 5)
};
