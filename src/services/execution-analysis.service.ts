import { analyzeTrace, toExecutionTrace } from "../analyzers/trace.analyzer.js";
import { parseConfig } from "../parsers/config.parser.js";
import { reconstructPipeline } from "../reconstruction/pipeline.reconstructor.js";
import { buildImprovementReport } from "../suggestions/improvement.suggester.js";
import {
    BuildRecord,
    ErrorPayload,
    ImprovementReport,
    ReconstructionResult,
    StructuralAnalysis,
    WorkflowRun,
    isErrorPayload
} from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import { loggerFor } from "../utils/logger.js";
import { CallOptions, CiServerClient, JenkinsConnection } from "./jenkins.service.js";

const logger = loggerFor("reconstruction");

const CANDIDATE_BUILDS = 10;

export class ExecutionAnalysisService {
    constructor(
        private readonly connection: JenkinsConnection,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Rebuilds a declarative definition from the most recent successful run.
     * Throws when Jenkins is not configured; every other failure comes back as
     * an error payload.
     */
    async reconstruct(pipelineName: string, options?: CallOptions): Promise<ReconstructionResult | ErrorPayload> {
        const client = this.connection.require();
        logger.info(`Reconstructing Jenkinsfile for ${pipelineName}`);

        try {
            const successful = await this.successfulBuilds(client, pipelineName, options);
            const [latest] = successful;
            if (latest === undefined) {
                return { error: "No successful builds found for analysis" };
            }

            const run = await this.fetchWorkflowRun(client, pipelineName, latest.number, options);
            if (run === undefined) {
                return { error: "Could not retrieve execution data" };
            }

            const config = parseConfig(await client.getJobConfig(pipelineName, options));
            const trace = toExecutionTrace(run);

            return {
                pipeline_name: pipelineName,
                build_analyzed: latest.number,
                reconstructed_definition: reconstructPipeline(config, trace),
                analysis: analyzeTrace(trace),
                reconstruction_method: "execution_flow_analysis",
                timestamp: this.now().toISOString()
            };
        } catch (error) {
            logger.error(`Error reconstructing Jenkinsfile for ${pipelineName}`, { error: errorMessage(error) });
            return { error: `Failed to reconstruct Jenkinsfile: ${errorMessage(error)}` };
        }
    }

    async suggestImprovements(
        pipelineName: string,
        definitionText?: string,
        analysis?: StructuralAnalysis,
        options?: CallOptions
    ): Promise<ImprovementReport | ErrorPayload> {
        if (definitionText !== undefined && analysis !== undefined) {
            return buildImprovementReport(pipelineName, definitionText, analysis);
        }

        const reconstruction = await this.reconstruct(pipelineName, options);
        if (isErrorPayload(reconstruction)) {
            return reconstruction;
        }
        return buildImprovementReport(
            pipelineName,
            definitionText ?? reconstruction.reconstructed_definition,
            analysis ?? reconstruction.analysis
        );
    }

    // Most recent first. Builds whose details cannot be fetched are skipped.
    private async successfulBuilds(
        client: CiServerClient,
        pipelineName: string,
        options?: CallOptions
    ): Promise<BuildRecord[]> {
        const builds = await client.getBuilds(pipelineName, CANDIDATE_BUILDS, options);
        const successful: BuildRecord[] = [];
        for (const build of builds) {
            options?.signal?.throwIfAborted();
            try {
                const info = await client.getBuildInfo(pipelineName, build.number, options);
                if (info.result === "SUCCESS") {
                    successful.push(info);
                }
            } catch (error) {
                logger.warn(`Skipping ${pipelineName} #${build.number}: build info unavailable`, {
                    error: errorMessage(error)
                });
            }
        }
        return successful;
    }

    private async fetchWorkflowRun(
        client: CiServerClient,
        pipelineName: string,
        buildNumber: number,
        options?: CallOptions
    ): Promise<WorkflowRun | undefined> {
        try {
            return await client.getWorkflowRun(pipelineName, buildNumber, options);
        } catch (error) {
            logger.warn(`Workflow data unavailable for ${pipelineName} #${buildNumber}`, { error: errorMessage(error) });
            return undefined;
        }
    }
}
