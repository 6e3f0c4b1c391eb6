import { analyzeTrace } from "../analyzers/trace.analyzer.js";
import { ExecutionAnalysisService } from "../services/execution-analysis.service.js";
import { CallOptions } from "../services/jenkins.service.js";
import { JenkinsfileService } from "../services/jenkinsfile.service.js";
import { StructuralAnalysis } from "../types/index.js";
import { AnalysisArgument } from "./schemas.js";

/**
 * Rebuilds a StructuralAnalysis from a caller-supplied object. A supplied
 * total is used as given, zero included; without one the stage durations
 * are summed.
 */
export function analysisFromArgument(value: AnalysisArgument): StructuralAnalysis {
    const stages = value.stage_breakdown.map((stage) => ({ name: stage.name, duration_ms: stage.duration_ms }));
    const total = value.total_duration_ms ?? stages.reduce((sum, stage) => sum + stage.duration_ms, 0);
    return analyzeTrace({ stages, total_duration_ms: total });
}

export class JenkinsfileTool {
    constructor(
        private analysis: ExecutionAnalysisService,
        private jenkinsfiles: JenkinsfileService
    ) {}

    async reconstructJenkinsfile(args: { pipeline_name: string }, options?: CallOptions) {
        return this.analysis.reconstruct(args.pipeline_name, options);
    }

    async suggestImprovements(
        args: { pipeline_name: string; jenkinsfile?: string; analysis?: AnalysisArgument },
        options?: CallOptions
    ) {
        const analysis = args.analysis ? analysisFromArgument(args.analysis) : undefined;
        return this.analysis.suggestImprovements(args.pipeline_name, args.jenkinsfile, analysis, options);
    }

    async getJenkinsfile(args: { pipeline_name: string }, options?: CallOptions) {
        return this.jenkinsfiles.getJenkinsfile(args.pipeline_name, options);
    }

    async getJenkinsfileForBuild(args: { pipeline_name: string; build_number: number }, options?: CallOptions) {
        return this.jenkinsfiles.getJenkinsfileForBuild(args.pipeline_name, args.build_number, options);
    }
}
