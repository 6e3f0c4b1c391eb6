import { CallOptions, JenkinsConnection } from "../services/jenkins.service.js";
import { config, normalizeJenkinsUrl } from "../utils/config.js";
import { ToolArgumentError, errorMessage } from "../utils/errors.js";

export interface ConnectionStatus {
    connected: boolean;
    url?: string;
    user?: string;
    message?: string;
    error?: string;
}

export class ConnectionTool {
    constructor(
        private connection: JenkinsConnection,
        private defaultTimeoutMs: number = 30_000
    ) {}

    async configureJenkins(
        args: { url: string; username: string; token: string },
        options?: CallOptions
    ): Promise<{ success: true; message: string; user: string }> {
        const url = normalizeJenkinsUrl(args.url);
        if (!url) {
            throw new ToolArgumentError("url must start with http:// or https://");
        }

        const identity = await this.connection.configure(
            { url, username: args.username, token: args.token, timeoutMs: this.defaultTimeoutMs },
            options
        );
        return { success: true, message: `Connected to Jenkins at ${url}`, user: identity.id ?? args.username };
    }

    async testConnection(options?: CallOptions): Promise<ConnectionStatus> {
        const settings = this.connection.describe();
        if (!settings || !this.connection.isConfigured()) {
            return { connected: false, message: "Jenkins not configured" };
        }

        try {
            const identity = await this.connection.require().whoAmI(options);
            return { connected: true, url: settings.url, user: identity.id ?? settings.username };
        } catch (error) {
            return { connected: false, url: settings.url, error: errorMessage(error) };
        }
    }

    async getServerInfo(options?: CallOptions) {
        const base = {
            name: config.appName,
            version: config.version,
            transport: config.server.transport,
            redaction_enabled: config.redactSensitiveData,
            environment: {
                node: process.version,
                platform: process.platform
            }
        };

        if (!this.connection.isConfigured()) {
            return { ...base, jenkins: { configured: false } };
        }

        const client = this.connection.require();
        const [identity, jobs, queue] = await Promise.all([
            client.whoAmI(options),
            client.listJobs(options),
            client.getQueue(options)
        ]);
        return {
            ...base,
            jenkins: {
                configured: true,
                ...this.connection.describe(),
                user: identity.id ?? null,
                job_count: jobs.length,
                queue_length: queue.length
            }
        };
    }
}
