import { toFixedHalfEven } from "../analyzers/trace.analyzer.js";
import { ImprovementReport, StageBreakdown, StructuralAnalysis, Suggestion } from "../types/index.js";

const SLOW_STAGE_THRESHOLD_MS = 60_000;

interface TextRule {
    applies: (lines: string[], text: string) => boolean;
    suggestion: Suggestion;
}

const noLineMentions = (keyword: string) => (lines: string[]) =>
    !lines.some((line) => line.toLowerCase().includes(keyword));

const TEXT_RULES: TextRule[] = [
    {
        applies: noLineMentions("timeout"),
        suggestion: {
            type: "reliability",
            priority: "high",
            title: "Add timeout controls",
            description: "Add timeouts to prevent hanging builds",
            example: "timeout(time: 30, unit: 'MINUTES') { /* stage content */ }"
        }
    },
    {
        applies: noLineMentions("retry"),
        suggestion: {
            type: "reliability",
            priority: "medium",
            title: "Add retry logic",
            description: "Add retry mechanisms for transient failures",
            example: "retry(3) { /* critical operations */ }"
        }
    },
    {
        applies: noLineMentions("when"),
        suggestion: {
            type: "efficiency",
            priority: "low",
            title: "Add conditional execution",
            description: "Use 'when' conditions to skip unnecessary stages",
            example: "when { not { params.dry_run } }"
        }
    },
    {
        applies: (_lines, text) => !text.includes("withCredentials"),
        suggestion: {
            type: "security",
            priority: "high",
            title: "Secure credential handling",
            description: "Use withCredentials for sensitive data",
            example: "withCredentials([string(credentialsId: 'my-secret', variable: 'SECRET')]) { /* use $SECRET */ }"
        }
    }
];

// Ties go to the earliest stage.
function longestStage(breakdown: StageBreakdown[]): StageBreakdown | undefined {
    return breakdown.reduce<StageBreakdown | undefined>(
        (longest, stage) => (longest === undefined || stage.duration_ms > longest.duration_ms ? stage : longest),
        undefined
    );
}

export function suggestImprovements(definitionText: string, analysis: StructuralAnalysis): Suggestion[] {
    const lines = definitionText.split("\n");
    const suggestions = TEXT_RULES.filter((rule) => rule.applies(lines, definitionText)).map((rule) => ({
        ...rule.suggestion
    }));

    const slowest = longestStage(analysis.stage_breakdown);
    if (slowest !== undefined && slowest.duration_ms > SLOW_STAGE_THRESHOLD_MS) {
        suggestions.push({
            type: "performance",
            priority: "medium",
            title: `Optimize ${slowest.name} stage`,
            description: `This stage takes ${slowest.duration_formatted} (${toFixedHalfEven(slowest.percentage, 1)}% of total time)`,
            example: "Consider breaking into smaller steps or using parallel execution"
        });
    }

    return suggestions;
}

export function buildImprovementReport(
    pipelineName: string,
    definitionText: string,
    analysis: StructuralAnalysis
): ImprovementReport {
    const suggestions = suggestImprovements(definitionText, analysis);
    return {
        pipeline_name: pipelineName,
        total_suggestions: suggestions.length,
        suggestions,
        analysis_summary: {
            technologies: analysis.technology_flags,
            total_duration: analysis.total_duration_formatted,
            stage_count: analysis.total_stages
        }
    };
}
