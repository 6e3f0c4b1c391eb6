import { JenkinsConnection } from "../services/jenkins.service.js";
import { JenkinsSettings } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Connects to the Jenkins server named in the environment, retrying while it
 * comes up. Returns false when it never answered; the server then starts
 * unconfigured and `configure_jenkins` can connect later.
 */
export async function connectOnStartup(
    connection: JenkinsConnection,
    settings: JenkinsSettings | undefined,
    retries: number,
    delayMs = 2000
): Promise<boolean> {
    if (!settings) {
        logger.info("[startup] No Jenkins settings in environment; waiting for configure_jenkins");
        return false;
    }

    for (let attempt = 1; attempt <= retries; attempt++) {
        try {
            await connection.configure(settings);
            logger.info(`[startup] Jenkins available (attempt ${attempt})`);
            return true;
        } catch (error) {
            logger.warn(`[startup] Waiting for Jenkins (attempt ${attempt}/${retries}): ${errorMessage(error)}`);
            if (attempt < retries) {
                await wait(delayMs);
            }
        }
    }

    logger.warn(`[startup] Jenkins did not answer after ${retries} attempts; starting unconfigured`);
    return false;
}
