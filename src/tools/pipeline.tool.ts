import { parseConfig } from "../parsers/config.parser.js";
import { CallOptions, JenkinsConnection } from "../services/jenkins.service.js";
import { BuildRecord, BuildSummary, ConfigRecord, JobSummary } from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export const PIPELINE_CLASSES = new Set([
    "hudson.model.FreeStyleProject",
    "org.jenkinsci.plugins.workflow.job.WorkflowJob"
]);

export interface PipelineInfo {
    name: string;
    display_name: string;
    url: string;
    description: string;
    is_enabled: boolean;
    last_build_number: number | null;
    last_build_status: string | null;
    last_build_time: string | null;
    health_score: number | null;
}

export interface PipelineBuild {
    number: number;
    status: string;
    url: string | null;
    duration_ms: number | null;
    timestamp: string | null;
    description: string | null;
}

export interface BuildLog {
    pipeline_name: string;
    build_number: number;
    total_lines: number;
    returned_lines: number;
    log: string;
}

export interface PipelineConfig {
    pipeline_name: string;
    config_xml: string;
    parsed: ConfigRecord;
}

function isoTime(epochMs: number | undefined): string | null {
    return typeof epochMs === "number" && epochMs > 0 ? new Date(epochMs).toISOString() : null;
}

export function toPipelineInfo(job: JobSummary): PipelineInfo {
    const lastBuild = job.lastBuild ?? undefined;
    return {
        name: job.name,
        display_name: job.displayName ?? job.name,
        url: job.url,
        description: job.description ?? "",
        is_enabled: !job.disabled,
        last_build_number: lastBuild?.number ?? null,
        last_build_status: lastBuild?.result ?? null,
        last_build_time: isoTime(lastBuild?.timestamp),
        health_score: job.healthReport?.[0]?.score ?? null
    };
}

function toPipelineBuild(summary: BuildSummary, detail: BuildRecord | undefined): PipelineBuild {
    const source = detail ?? summary;
    const status = detail?.building ? "RUNNING" : source.result || "UNKNOWN";
    return {
        number: source.number,
        status,
        url: source.url ?? null,
        duration_ms: typeof source.duration === "number" ? source.duration : null,
        timestamp: isoTime(source.timestamp),
        description: detail?.description ?? null
    };
}

/**
 * Read-only views of jobs, builds, logs and job configuration.
 */
export class PipelineTool {
    constructor(private connection: JenkinsConnection) {}

    async listPipelines(args: { search?: string; limit: number }, options?: CallOptions): Promise<PipelineInfo[]> {
        const jobs = await this.connection.require().listJobs(options);
        const needle = args.search?.trim().toLowerCase();

        return jobs
            .filter((job) => job._class !== undefined && PIPELINE_CLASSES.has(job._class))
            .filter(
                (job) =>
                    !needle ||
                    job.name.toLowerCase().includes(needle) ||
                    (job.description ?? "").toLowerCase().includes(needle)
            )
            .map(toPipelineInfo)
            .slice(0, args.limit);
    }

    async getPipelineDetails(args: { pipeline_name: string }, options?: CallOptions): Promise<PipelineInfo> {
        const job = await this.connection.require().getJobInfo(args.pipeline_name, options);
        return toPipelineInfo(job);
    }

    async getPipelineBuilds(
        args: { pipeline_name: string; limit: number; status?: string },
        options?: CallOptions
    ): Promise<PipelineBuild[]> {
        const client = this.connection.require();
        const summaries = await client.getBuilds(args.pipeline_name, args.limit, options);

        const builds: PipelineBuild[] = [];
        for (const summary of summaries) {
            let detail: BuildRecord | undefined;
            try {
                detail = await client.getBuildInfo(args.pipeline_name, summary.number, options);
            } catch (error) {
                logger.warn(`Using summary for ${args.pipeline_name} #${summary.number}`, { error: errorMessage(error) });
            }
            builds.push(toPipelineBuild(summary, detail));
        }

        const wanted = args.status?.trim().toUpperCase();
        return wanted ? builds.filter((build) => build.status === wanted) : builds;
    }

    async getBuildLog(
        args: { pipeline_name: string; build_number: number; tail_lines?: number },
        options?: CallOptions
    ): Promise<BuildLog> {
        const output = await this.connection.require().getConsoleOutput(args.pipeline_name, args.build_number, options);
        const lines = output.split("\n");
        const kept = args.tail_lines === undefined ? lines : lines.slice(-args.tail_lines);
        return {
            pipeline_name: args.pipeline_name,
            build_number: args.build_number,
            total_lines: lines.length,
            returned_lines: kept.length,
            log: kept.join("\n")
        };
    }

    async getPipelineConfig(args: { pipeline_name: string }, options?: CallOptions): Promise<PipelineConfig> {
        const xml = await this.connection.require().getJobConfig(args.pipeline_name, options);
        return { pipeline_name: args.pipeline_name, config_xml: xml, parsed: parseConfig(xml) };
    }
}
