#!/usr/bin/env node
import { PipelineAwarenessServer } from "./server.js";
import { JenkinsConnection } from "./services/jenkins.service.js";
import { config } from "./utils/config.js";
import { logger } from "./utils/logger.js";
import { connectOnStartup } from "./utils/startup.js";

async function bootstrap() {
    try {
        const connection = new JenkinsConnection();
        await connectOnStartup(connection, config.jenkins, config.startupRetries);

        const server = new PipelineAwarenessServer(connection);
        await server.start();
    } catch (error) {
        logger.error("Failed to start Pipeline Awareness MCP Server", { error });
        process.exit(1);
    }
}

bootstrap();
