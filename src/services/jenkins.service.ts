import axios, { AxiosInstance } from "axios";

import {
    BuildRecord,
    BuildSummary,
    JobInfo,
    JobSummary,
    QueueItem,
    WhoAmI,
    WorkflowRun
} from "../types/index.js";
import { JenkinsSettings } from "../utils/config.js";
import { JenkinsNotConfiguredError, JenkinsRequestError } from "../utils/errors.js";
import { loggerFor } from "../utils/logger.js";

const logger = loggerFor("jenkins");

export interface CallOptions {
    /** Abandons the in-flight request when the caller's deadline expires. */
    signal?: AbortSignal;
}

export interface QueuedBuild {
    queueId?: number;
    queueUrl?: string;
}

export type BuildParameters = Record<string, string | number | boolean>;

interface PostOptions extends CallOptions {
    params?: BuildParameters;
    contentType?: string;
    responseType?: "text" | "json";
}

/**
 * Everything the server needs from a CI server. JenkinsClient is the HTTP
 * implementation; tests supply in-memory fakes.
 */
export interface CiServerClient {
    readonly serverUrl: string;
    whoAmI(options?: CallOptions): Promise<WhoAmI>;
    listJobs(options?: CallOptions): Promise<JobSummary[]>;
    getJobInfo(jobName: string, options?: CallOptions): Promise<JobInfo>;
    getBuilds(jobName: string, limit: number, options?: CallOptions): Promise<BuildSummary[]>;
    getBuildInfo(jobName: string, buildNumber: number, options?: CallOptions): Promise<BuildRecord>;
    getWorkflowRun(jobName: string, buildNumber: number, options?: CallOptions): Promise<WorkflowRun>;
    getConsoleOutput(jobName: string, buildNumber: number, options?: CallOptions): Promise<string>;
    getJobConfig(jobName: string, options?: CallOptions): Promise<string>;
    buildJob(jobName: string, parameters?: BuildParameters, options?: CallOptions): Promise<QueuedBuild>;
    stopBuild(jobName: string, buildNumber: number, options?: CallOptions): Promise<void>;
    enableJob(jobName: string, options?: CallOptions): Promise<void>;
    disableJob(jobName: string, options?: CallOptions): Promise<void>;
    getQueue(options?: CallOptions): Promise<QueueItem[]>;
    executeScript(script: string, options?: CallOptions): Promise<string>;
}

const JOB_TREE =
    "jobs[_class,name,url,color,description,displayName,buildable,disabled,lastBuild[number,result,timestamp],healthReport[score,description]]";

/** `folder/job` becomes `/job/folder/job/job`. */
export function jobPath(jobName: string): string {
    return jobName
        .split("/")
        .filter((segment) => segment.length > 0)
        .map((segment) => `/job/${encodeURIComponent(segment)}`)
        .join("");
}

export function createJenkinsHttp(settings: JenkinsSettings): AxiosInstance {
    return axios.create({
        baseURL: settings.url,
        timeout: settings.timeoutMs,
        auth: {
            username: settings.username,
            password: settings.token
        }
    });
}

function describeFailure(error: unknown): { message: string; status?: number } {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const data: unknown = error.response?.data;
        const detail = typeof data === "string" ? data.trim().slice(0, 200) : data ? JSON.stringify(data) : "";
        const statusText = status ? `${status} ${error.response?.statusText ?? ""}`.trim() : error.message;
        return { message: detail ? `${statusText}: ${detail}` : statusText, status };
    }
    return { message: error instanceof Error ? error.message : String(error) };
}

function queueIdFrom(location: unknown): QueuedBuild {
    if (typeof location !== "string") {
        return {};
    }
    const match = /\/queue\/item\/(\d+)/.exec(location);
    return match ? { queueId: Number(match[1]), queueUrl: location } : { queueUrl: location };
}

export class JenkinsClient implements CiServerClient {
    readonly serverUrl: string;
    private http: AxiosInstance;

    constructor(settings: JenkinsSettings, http: AxiosInstance = createJenkinsHttp(settings)) {
        this.serverUrl = settings.url;
        this.http = http;
    }

    async whoAmI(options?: CallOptions): Promise<WhoAmI> {
        return this.getJson<WhoAmI>("/me/api/json", options);
    }

    async listJobs(options?: CallOptions): Promise<JobSummary[]> {
        const data = await this.getJson<{ jobs?: JobSummary[] }>(`/api/json?tree=${JOB_TREE}`, options);
        return data.jobs ?? [];
    }

    async getJobInfo(jobName: string, options?: CallOptions): Promise<JobInfo> {
        return this.getJson<JobInfo>(`${jobPath(jobName)}/api/json`, options);
    }

    async getBuilds(jobName: string, limit: number, options?: CallOptions): Promise<BuildSummary[]> {
        const info = await this.getJobInfo(jobName, options);
        return (info.builds ?? []).slice(0, limit);
    }

    async getBuildInfo(jobName: string, buildNumber: number, options?: CallOptions): Promise<BuildRecord> {
        return this.getJson<BuildRecord>(`${jobPath(jobName)}/${buildNumber}/api/json`, options);
    }

    async getWorkflowRun(jobName: string, buildNumber: number, options?: CallOptions): Promise<WorkflowRun> {
        return this.getJson<WorkflowRun>(`${jobPath(jobName)}/${buildNumber}/wfapi/describe`, options);
    }

    async getConsoleOutput(jobName: string, buildNumber: number, options?: CallOptions): Promise<string> {
        return this.getText(`${jobPath(jobName)}/${buildNumber}/consoleText`, options);
    }

    async getJobConfig(jobName: string, options?: CallOptions): Promise<string> {
        return this.getText(`${jobPath(jobName)}/config.xml`, options);
    }

    async buildJob(jobName: string, parameters?: BuildParameters, options?: CallOptions): Promise<QueuedBuild> {
        const hasParameters = parameters !== undefined && Object.keys(parameters).length > 0;
        const path = `${jobPath(jobName)}/${hasParameters ? "buildWithParameters" : "build"}`;
        const response = await this.post(path, undefined, { ...options, params: hasParameters ? parameters : undefined });
        return queueIdFrom(response.headers["location"]);
    }

    async stopBuild(jobName: string, buildNumber: number, options?: CallOptions): Promise<void> {
        await this.post(`${jobPath(jobName)}/${buildNumber}/stop`, undefined, options);
    }

    async enableJob(jobName: string, options?: CallOptions): Promise<void> {
        await this.post(`${jobPath(jobName)}/enable`, undefined, options);
    }

    async disableJob(jobName: string, options?: CallOptions): Promise<void> {
        await this.post(`${jobPath(jobName)}/disable`, undefined, options);
    }

    async getQueue(options?: CallOptions): Promise<QueueItem[]> {
        const data = await this.getJson<{ items?: QueueItem[] }>("/queue/api/json", options);
        return data.items ?? [];
    }

    async executeScript(script: string, options?: CallOptions): Promise<string> {
        const response = await this.post("/scriptText", new URLSearchParams({ script }).toString(), {
            ...options,
            contentType: "application/x-www-form-urlencoded",
            responseType: "text"
        });
        return typeof response.data === "string" ? response.data : String(response.data);
    }

    private async getJson<T>(path: string, options?: CallOptions): Promise<T> {
        try {
            const response = await this.http.get<T>(path, { signal: options?.signal });
            return response.data;
        } catch (error) {
            throw this.wrap("GET", path, error);
        }
    }

    private async getText(path: string, options?: CallOptions): Promise<string> {
        try {
            const response = await this.http.get<string>(path, { signal: options?.signal, responseType: "text" });
            return response.data;
        } catch (error) {
            throw this.wrap("GET", path, error);
        }
    }

    private async post(path: string, body: string | undefined, options: PostOptions = {}) {
        const crumb = await this.fetchCrumb(options.signal);
        const headers: Record<string, string> = { ...crumb };
        if (options.contentType) {
            headers["Content-Type"] = options.contentType;
        }
        try {
            return await this.http.post<unknown>(path, body, {
                signal: options.signal,
                params: options.params,
                responseType: options.responseType,
                headers
            });
        } catch (error) {
            throw this.wrap("POST", path, error);
        }
    }

    /**
     * CSRF crumb header for POST requests. Servers without a crumb issuer
     * answer 404, in which case no header is sent.
     */
    private async fetchCrumb(signal?: AbortSignal): Promise<Record<string, string>> {
        try {
            const response = await this.http.get<{ crumbRequestField?: string; crumb?: string }>(
                "/crumbIssuer/api/json",
                { signal }
            );
            const { crumbRequestField, crumb } = response.data;
            return crumbRequestField && crumb ? { [crumbRequestField]: crumb } : {};
        } catch (error) {
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                return {};
            }
            throw this.wrap("GET", "/crumbIssuer/api/json", error);
        }
    }

    private wrap(method: string, path: string, error: unknown): JenkinsRequestError {
        const { message, status } = describeFailure(error);
        logger.debug("Jenkins request failed", { method, path, status, message });
        return new JenkinsRequestError(`Jenkins ${method} ${path} failed: ${message}`, path, status);
    }
}

export type CiServerClientFactory = (settings: JenkinsSettings) => CiServerClient;

/**
 * Holds the configure-once client shared by every tool, resource and prompt.
 * A client is only kept after it answered `whoAmI`.
 */
export class JenkinsConnection {
    private client?: CiServerClient;
    private settings?: JenkinsSettings;

    constructor(private readonly createClient: CiServerClientFactory = (settings) => new JenkinsClient(settings)) {}

    async configure(settings: JenkinsSettings, options?: CallOptions): Promise<WhoAmI> {
        const candidate = this.createClient(settings);
        const identity = await candidate.whoAmI(options);
        this.client = candidate;
        this.settings = settings;
        logger.info(`Connected to Jenkins at ${settings.url}`, { user: identity.id ?? settings.username });
        return identity;
    }

    isConfigured(): boolean {
        return this.client !== undefined;
    }

    /** Settings of the active connection, token excluded. */
    describe(): { url: string; username: string; timeoutMs: number } | undefined {
        if (!this.settings) {
            return undefined;
        }
        const { url, username, timeoutMs } = this.settings;
        return { url, username, timeoutMs };
    }

    require(): CiServerClient {
        if (!this.client) {
            throw new JenkinsNotConfiguredError();
        }
        return this.client;
    }
}
