import { JenkinsConnection } from "../services/jenkins.service.js";
import { PipelineTool, toPipelineInfo } from "../tools/pipeline.tool.js";
import { JobSummary } from "../types/index.js";
import { errorMessage } from "../utils/errors.js";

export const NOT_CONFIGURED_TEXT = "Jenkins not configured. Please configure Jenkins connection first.";

const FREESTYLE = "hudson.model.FreeStyleProject";
const WORKFLOW = "org.jenkinsci.plugins.workflow.job.WorkflowJob";

const SUMMARY_URI = /^pipeline:\/\/(.+)\/summary$/;
const LOGS_URI = /^pipeline:\/\/(.+)\/logs\/(\d+)$/;

export interface ResourceDescriptor {
    uri: string;
    name: string;
    description: string;
    mimeType: string;
}

export interface ResourceTemplateDescriptor {
    uriTemplate: string;
    name: string;
    description: string;
    mimeType: string;
}

export interface ResourceContent {
    mimeType: string;
    text: string;
}

export const STATIC_RESOURCES: ResourceDescriptor[] = [
    {
        uri: "pipeline://status",
        name: "Pipeline status",
        description: "Job counts by type and state for the connected Jenkins",
        mimeType: "application/json"
    },
    {
        uri: "pipeline://dashboard",
        name: "Pipeline dashboard",
        description: "Every job with its last build status and health score",
        mimeType: "application/json"
    },
    {
        uri: "pipeline://health",
        name: "Pipeline health",
        description: "Overall health rating and alerts",
        mimeType: "application/json"
    }
];

export const RESOURCE_TEMPLATES: ResourceTemplateDescriptor[] = [
    {
        uriTemplate: "pipeline://{pipeline_name}/summary",
        name: "Pipeline summary",
        description: "Details and the ten most recent builds of one pipeline",
        mimeType: "application/json"
    },
    {
        uriTemplate: "pipeline://{pipeline_name}/logs/{build_number}",
        name: "Build log",
        description: "Console output of one build",
        mimeType: "text/plain"
    }
];

const countOf = (jobs: JobSummary[], predicate: (job: JobSummary) => boolean) => jobs.filter(predicate).length;

export function healthRating(failed: number, total: number): "GOOD" | "WARNING" | "CRITICAL" {
    if (failed === 0 || failed < total * 0.1) {
        return "GOOD";
    }
    return failed < total * 0.3 ? "WARNING" : "CRITICAL";
}

export class PipelineResources {
    constructor(
        private connection: JenkinsConnection,
        private pipelines: PipelineTool,
        private now: () => Date = () => new Date()
    ) {}

    /** Unknown URIs throw; Jenkins failures come back as readable text. */
    async read(uri: string): Promise<ResourceContent> {
        const json = (value: unknown): ResourceContent => ({
            mimeType: "application/json",
            text: JSON.stringify(value, null, 2)
        });

        if (uri === "pipeline://status") {
            return this.guarded("Error getting status", async () => json(await this.status()));
        }
        if (uri === "pipeline://dashboard") {
            return this.guarded("Error generating dashboard", async () => json(await this.dashboard()));
        }
        if (uri === "pipeline://health") {
            return this.guarded("Error getting health status", async () => json(await this.health()));
        }

        const logs = LOGS_URI.exec(uri);
        if (logs) {
            const [, rawName, rawBuild] = logs;
            const build = Number(rawBuild);
            return this.guarded(`Error getting logs for ${rawName} build #${build}`, async () => ({
                mimeType: "text/plain",
                text: await this.connection.require().getConsoleOutput(decodeURIComponent(rawName), build)
            }));
        }

        const summary = SUMMARY_URI.exec(uri);
        if (summary) {
            // Names stay percent-encoded in messages; a malformed escape is reported like any other failure.
            const [, rawName] = summary;
            return this.guarded(`Error getting summary for ${rawName}`, async () =>
                json(await this.summary(decodeURIComponent(rawName)))
            );
        }

        throw new Error(`Unknown resource: ${uri}`);
    }

    private async guarded(prefix: string, produce: () => Promise<ResourceContent>): Promise<ResourceContent> {
        if (!this.connection.isConfigured()) {
            return { mimeType: "text/plain", text: NOT_CONFIGURED_TEXT };
        }
        try {
            return await produce();
        } catch (error) {
            return { mimeType: "text/plain", text: `${prefix}: ${errorMessage(error)}` };
        }
    }

    private async status() {
        const client = this.connection.require();
        const identity = await client.whoAmI();
        const jobs = await client.listJobs();
        const enabled = countOf(jobs, (job) => !job.disabled);
        return {
            jenkins_user: identity.id ?? "unknown",
            total_pipelines: jobs.length,
            freestyle_pipelines: countOf(jobs, (job) => job._class === FREESTYLE),
            workflow_pipelines: countOf(jobs, (job) => job._class === WORKFLOW),
            enabled_pipelines: enabled,
            disabled_pipelines: jobs.length - enabled,
            last_updated: this.now().toISOString()
        };
    }

    private async dashboard() {
        const jobs = await this.connection.require().listJobs();
        return {
            total_pipelines: jobs.length,
            enabled_pipelines: countOf(jobs, (job) => !job.disabled),
            disabled_pipelines: countOf(jobs, (job) => job.disabled === true),
            freestyle_pipelines: countOf(jobs, (job) => job._class === FREESTYLE),
            workflow_pipelines: countOf(jobs, (job) => job._class === WORKFLOW),
            pipelines: jobs
                .map(toPipelineInfo)
                .map((info) => ({
                    name: info.name,
                    display_name: info.display_name,
                    url: info.url,
                    enabled: info.is_enabled,
                    last_build_status: info.last_build_status,
                    health_score: info.health_score
                })),
            dashboard_generated: this.now().toISOString()
        };
    }

    private async health() {
        const jobs = await this.connection.require().listJobs();
        const total = jobs.length;
        const enabled = countOf(jobs, (job) => !job.disabled);
        const failed = countOf(jobs, (job) => job.lastBuild?.result === "FAILURE");

        const alerts: string[] = [];
        if (failed > 0) {
            alerts.push(`${failed} pipelines have failed builds`);
        }
        if (enabled < total) {
            alerts.push(`${total - enabled} pipelines are disabled`);
        }

        return {
            overall_health: healthRating(failed, total),
            total_pipelines: total,
            enabled_pipelines: enabled,
            failed_pipelines: failed,
            health_percentage: enabled > 0 ? Math.round(((enabled - failed) / enabled) * 10000) / 100 : 0,
            alerts,
            health_check_date: this.now().toISOString()
        };
    }

    private async summary(name: string) {
        const pipeline = await this.pipelines.getPipelineDetails({ pipeline_name: name });
        const builds = await this.pipelines.getPipelineBuilds({ pipeline_name: name, limit: 10 });
        return {
            pipeline: {
                name: pipeline.name,
                display_name: pipeline.display_name,
                url: pipeline.url,
                description: pipeline.description,
                is_enabled: pipeline.is_enabled,
                health_score: pipeline.health_score
            },
            recent_builds: builds.map((build) => ({
                number: build.number,
                status: build.status,
                duration_ms: build.duration_ms,
                timestamp: build.timestamp
            })),
            summary_generated: this.now().toISOString()
        };
    }
}
