import { toFixedHalfEven } from "../analyzers/trace.analyzer.js";
import { ExecutionAnalysisService } from "../services/execution-analysis.service.js";
import { JenkinsConnection } from "../services/jenkins.service.js";
import { PipelineBuild, PipelineTool } from "../tools/pipeline.tool.js";
import { isErrorPayload } from "../types/index.js";
import { ToolArgumentError, errorMessage } from "../utils/errors.js";

export interface PromptArgument {
    name: string;
    description: string;
    required: boolean;
}

export interface PromptDescriptor {
    name: string;
    description: string;
    arguments: PromptArgument[];
}

const PIPELINE_ARG: PromptArgument = { name: "pipeline_name", description: "Jenkins job name", required: true };
const BUILD_ARG: PromptArgument = { name: "build_number", description: "Build number to inspect", required: true };

export const PROMPTS: PromptDescriptor[] = [
    {
        name: "analyze_pipeline",
        description: "Comprehensive review of a pipeline and its recent builds",
        arguments: [PIPELINE_ARG]
    },
    {
        name: "failure_analysis",
        description: "Root-cause analysis of one failed build",
        arguments: [PIPELINE_ARG, BUILD_ARG]
    },
    {
        name: "optimize_pipeline",
        description: "Optimization review using build history and stage timings",
        arguments: [PIPELINE_ARG]
    },
    {
        name: "security_audit",
        description: "Security audit of a pipeline's job configuration",
        arguments: [PIPELINE_ARG]
    }
];

const CONFIG_EXCERPT_CHARS = 1000;
const FAILURE_LOG_LINES = 50;

function shortTime(iso: string | null): string {
    return iso ? iso.slice(0, 16).replace("T", " ") : "Unknown time";
}

function buildLine(build: PipelineBuild): string {
    return `- Build #${build.number}: ${build.status} (${shortTime(build.timestamp)})`;
}

function requireArgument(args: Record<string, string>, name: string): string {
    const value = args[name]?.trim();
    if (!value) {
        throw new ToolArgumentError(`${name} is required`);
    }
    return value;
}

function requireBuildNumber(args: Record<string, string>): number {
    const value = Number(requireArgument(args, "build_number"));
    if (!Number.isInteger(value) || value <= 0) {
        throw new ToolArgumentError("build_number must be a positive integer");
    }
    return value;
}

/**
 * Prompt templates filled with live Jenkins data. Jenkins failures are
 * reported inside the prompt text; bad arguments throw.
 */
export class PipelinePrompts {
    constructor(
        private connection: JenkinsConnection,
        private pipelines: PipelineTool,
        private analysis: ExecutionAnalysisService
    ) {}

    async render(name: string, args: Record<string, string>): Promise<string> {
        switch (name) {
            case "analyze_pipeline": {
                const pipeline = requireArgument(args, "pipeline_name");
                return this.guarded("analysis", () => this.analyzePipeline(pipeline));
            }
            case "failure_analysis": {
                const pipeline = requireArgument(args, "pipeline_name");
                const build = requireBuildNumber(args);
                return this.guarded("failure analysis", () => this.failureAnalysis(pipeline, build));
            }
            case "optimize_pipeline": {
                const pipeline = requireArgument(args, "pipeline_name");
                return this.guarded("optimization", () => this.optimizePipeline(pipeline));
            }
            case "security_audit": {
                const pipeline = requireArgument(args, "pipeline_name");
                return this.guarded("security audit", () => this.securityAudit(pipeline));
            }
            default:
                throw new Error(`Unknown prompt: ${name}`);
        }
    }

    private async guarded(kind: string, produce: () => Promise<string>): Promise<string> {
        try {
            return await produce();
        } catch (error) {
            return `Error generating ${kind} prompt: ${errorMessage(error)}`;
        }
    }

    private async analyzePipeline(name: string): Promise<string> {
        const pipeline = await this.pipelines.getPipelineDetails({ pipeline_name: name });
        const builds = await this.pipelines.getPipelineBuilds({ pipeline_name: name, limit: 20 });

        return [
            `Analyze the Jenkins pipeline '${name}' comprehensively:`,
            "",
            "Pipeline Details:",
            `- Name: ${pipeline.name}`,
            `- Display Name: ${pipeline.display_name}`,
            `- URL: ${pipeline.url}`,
            `- Description: ${pipeline.description}`,
            `- Enabled: ${pipeline.is_enabled}`,
            `- Health Score: ${pipeline.health_score ?? "unknown"}`,
            "",
            `Recent Builds (${builds.length} builds):`,
            ...builds.slice(0, 10).map(buildLine),
            "",
            "Please provide:",
            "1. Overall health assessment",
            "2. Performance analysis",
            "3. Failure patterns",
            "4. Recommendations for improvement",
            "5. Security considerations",
            "6. Best practices compliance"
        ].join("\n");
    }

    private async failureAnalysis(name: string, buildNumber: number): Promise<string> {
        const client = this.connection.require();
        const info = await client.getBuildInfo(name, buildNumber);
        const output = await client.getConsoleOutput(name, buildNumber);
        const tail = output ? output.split("\n").slice(-FAILURE_LOG_LINES).join("\n") : "No console output available";

        return [
            `Analyze the failure of Jenkins pipeline '${name}' build #${buildNumber}:`,
            "",
            "Build Information:",
            `- Status: ${info.result ?? "UNKNOWN"}`,
            `- Duration: ${info.duration ?? "Unknown"}ms`,
            `- Timestamp: ${info.timestamp ? new Date(info.timestamp).toISOString() : "Unknown"}`,
            `- URL: ${info.url ?? "Unknown"}`,
            "",
            `Console Output (last ${FAILURE_LOG_LINES} lines):`,
            tail,
            "",
            "Please provide:",
            "1. Root cause analysis",
            "2. Error classification",
            "3. Immediate fixes",
            "4. Long-term improvements",
            "5. Prevention strategies"
        ].join("\n");
    }

    private async optimizePipeline(name: string): Promise<string> {
        const pipeline = await this.pipelines.getPipelineDetails({ pipeline_name: name });
        const builds = await this.pipelines.getPipelineBuilds({ pipeline_name: name, limit: 20 });
        const finished = builds.filter((build) => build.status !== "RUNNING");
        const succeeded = finished.filter((build) => build.status === "SUCCESS").length;
        const durations = finished.flatMap((build) => (build.duration_ms === null ? [] : [build.duration_ms]));
        const successRate = finished.length > 0 ? ((succeeded / finished.length) * 100).toFixed(1) : "0.0";
        const avgSeconds =
            durations.length > 0 ? (durations.reduce((sum, ms) => sum + ms, 0) / durations.length / 1000).toFixed(1) : "0.0";

        const reconstruction = await this.analysis.reconstruct(name);
        const stageLines = isErrorPayload(reconstruction)
            ? [`- Stage timings unavailable: ${reconstruction.error}`]
            : reconstruction.analysis.stage_breakdown.map(
                  (stage) => `- ${stage.name}: ${stage.duration_formatted} (${toFixedHalfEven(stage.percentage, 1)}%)`
              );
        const technologies = isErrorPayload(reconstruction) ? [] : reconstruction.analysis.technology_flags;

        return [
            `Analyze the Jenkins pipeline '${name}' for optimization opportunities:`,
            "",
            "Pipeline Information:",
            `- Name: ${pipeline.name}`,
            `- Health Score: ${pipeline.health_score ?? "unknown"}`,
            `- Enabled: ${pipeline.is_enabled}`,
            "",
            `Recent Performance (last ${builds.length} builds):`,
            `- Success Rate: ${successRate}%`,
            `- Average Duration: ${avgSeconds} seconds`,
            "",
            "Stage Breakdown (latest successful build):",
            ...stageLines,
            `- Technologies: ${technologies.length > 0 ? technologies.join(", ") : "none detected"}`,
            "",
            "Please provide:",
            "1. Performance bottlenecks identification",
            "2. Resource utilization analysis",
            "3. Build frequency optimization",
            "4. Error handling improvements",
            "5. Security enhancements",
            "6. Best practices recommendations",
            "7. Specific actionable steps"
        ].join("\n");
    }

    private async securityAudit(name: string): Promise<string> {
        const configXml = await this.connection.require().getJobConfig(name);

        return [
            `Perform a comprehensive security audit of Jenkins pipeline '${name}':`,
            "",
            "Pipeline Configuration (excerpt):",
            `${configXml.slice(0, CONFIG_EXCERPT_CHARS)}...`,
            "",
            "Security Analysis Areas:",
            "1. Credential Management",
            "   - Hardcoded secrets detection",
            "   - Credential storage practices",
            "   - Access control mechanisms",
            "",
            "2. Network Security",
            "   - HTTPS/TLS usage",
            "   - Insecure connections",
            "   - External service communications",
            "",
            "3. Code Security",
            "   - Script injection vulnerabilities",
            "   - Input validation",
            "   - Error handling security",
            "",
            "4. Access Control",
            "   - User permissions",
            "   - Role-based access",
            "   - Authentication mechanisms",
            "",
            "5. Compliance",
            "   - Security standards adherence",
            "   - Audit logging",
            "   - Data protection",
            "",
            "Please provide:",
            "- Security vulnerabilities found",
            "- Risk assessment (High/Medium/Low)",
            "- Specific remediation steps",
            "- Compliance recommendations",
            "- Security best practices"
        ].join("\n");
    }
}
