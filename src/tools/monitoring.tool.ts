import {
    FailurePriority,
    analyzeRootCause,
    determinePriority,
    extractErrorMessage,
    suggestFixes
} from "../analyzers/failure.analyzer.js";
import { CallOptions, JenkinsConnection } from "../services/jenkins.service.js";
import { ProjectRef, QueueItem } from "../types/index.js";

export interface FailureAnalysis {
    pipeline_name: string;
    build_number: number;
    failure_time: string;
    status: string;
    error_message: string;
    root_cause: string;
    suggested_fixes: string[];
    priority: FailurePriority;
}

export interface PipelineDependency {
    name: string;
    type: "upstream" | "downstream";
    url: string | null;
    relationship: string;
}

export interface PipelineDependencies {
    pipeline_name: string;
    upstream_count: number;
    downstream_count: number;
    dependencies: PipelineDependency[];
}

export interface QueueEntry {
    id: number;
    task_name: string;
    task_url: string | null;
    why: string | null;
    in_queue_since: string | null;
    blocked: boolean;
    stuck: boolean;
}

export interface QueueStatus {
    total_items: number;
    blocked_items: number;
    stuck_items: number;
    items: QueueEntry[];
    timestamp: string;
}

function toDependency(type: PipelineDependency["type"], relationship: string) {
    return (project: ProjectRef): PipelineDependency => ({
        name: project.name,
        type,
        url: project.url ?? null,
        relationship
    });
}

export function toQueueEntry(item: QueueItem): QueueEntry {
    return {
        id: item.id,
        task_name: item.task?.name ?? "Unknown",
        task_url: item.task?.url ?? null,
        why: item.why ?? null,
        in_queue_since:
            typeof item.inQueueSince === "number" && item.inQueueSince > 0
                ? new Date(item.inQueueSince).toISOString()
                : null,
        blocked: item.blocked ?? false,
        stuck: item.stuck ?? false
    };
}

/**
 * Troubleshooting views: why a build failed, what a pipeline is wired to,
 * and what is waiting in the build queue.
 */
export class MonitoringTool {
    constructor(
        private connection: JenkinsConnection,
        private now: () => Date = () => new Date()
    ) {}

    async analyzePipelineFailure(
        args: { pipeline_name: string; build_number: number },
        options?: CallOptions
    ): Promise<FailureAnalysis> {
        const client = this.connection.require();
        const build = await client.getBuildInfo(args.pipeline_name, args.build_number, options);
        const output = await client.getConsoleOutput(args.pipeline_name, args.build_number, options);
        const status = build.result || "UNKNOWN";
        const failureTime = typeof build.timestamp === "number" && build.timestamp > 0 ? new Date(build.timestamp) : this.now();

        return {
            pipeline_name: args.pipeline_name,
            build_number: args.build_number,
            failure_time: failureTime.toISOString(),
            status,
            error_message: extractErrorMessage(output),
            root_cause: analyzeRootCause(output),
            suggested_fixes: suggestFixes(output),
            priority: determinePriority(status, output)
        };
    }

    async getPipelineDependencies(args: { pipeline_name: string }, options?: CallOptions): Promise<PipelineDependencies> {
        const job = await this.connection.require().getJobInfo(args.pipeline_name, options);
        const upstream = (job.upstreamProjects ?? []).map(toDependency("upstream", "triggers this pipeline"));
        const downstream = (job.downstreamProjects ?? []).map(toDependency("downstream", "triggered by this pipeline"));

        return {
            pipeline_name: args.pipeline_name,
            upstream_count: upstream.length,
            downstream_count: downstream.length,
            dependencies: [...upstream, ...downstream]
        };
    }

    async monitorPipelineQueue(options?: CallOptions): Promise<QueueStatus> {
        const items = (await this.connection.require().getQueue(options)).map(toQueueEntry);
        return {
            total_items: items.length,
            blocked_items: items.filter((item) => item.blocked).length,
            stuck_items: items.filter((item) => item.stuck).length,
            items,
            timestamp: this.now().toISOString()
        };
    }
}
