import {
    ExecutionTrace,
    StageBreakdown,
    StructuralAnalysis,
    TechnologyFlag,
    WorkflowRun
} from "../types/index.js";

// Fixed emission order; a flag is set when any stage name contains one of its keywords.
const TECHNOLOGY_KEYWORDS: Array<{ flag: TechnologyFlag; keywords: string[] }> = [
    { flag: "AWS", keywords: ["aws", "ec2"] },
    { flag: "Kubernetes", keywords: ["k8s", "kubernetes"] },
    { flag: "Docker", keywords: ["docker"] },
    { flag: "Helm", keywords: ["helm"] },
    { flag: "SharedLibrary", keywords: ["library"] }
];

/**
 * Like `toFixed`, but a value lying exactly halfway between two results
 * rounds to the even digit (1.25 gives "1.2", 1.75 gives "1.8").
 */
export function toFixedHalfEven(value: number, digits: number): string {
    const rounded = value.toFixed(digits);
    if (!Number.isFinite(value) || digits < 1) {
        return rounded;
    }

    const exact = value.toFixed(Math.min(100, digits + 50));
    const point = exact.indexOf(".");
    const kept = exact.slice(0, point + digits + 1);
    const rest = exact.slice(point + digits + 1);
    const lastDigit = Number(kept[kept.length - 1]);
    return /^50*$/.test(rest) && lastDigit % 2 === 0 ? kept : rounded;
}

export function formatDuration(durationMs: number): string {
    return `${toFixedHalfEven(durationMs / 1000, 1)} seconds`;
}

function nonNegative(value: number | undefined): number {
    return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Normalizes a workflow API `describe` response into an ExecutionTrace.
 */
export function toExecutionTrace(run: WorkflowRun): ExecutionTrace {
    return {
        stages: (run.stages ?? []).map((stage) => ({
            name: stage.name ?? "Unknown",
            duration_ms: nonNegative(stage.durationMillis)
        })),
        total_duration_ms: nonNegative(run.durationMillis)
    };
}

export function detectTechnologies(stageNames: string[]): TechnologyFlag[] {
    const lowered = stageNames.map((name) => name.toLowerCase());
    return TECHNOLOGY_KEYWORDS.filter(({ keywords }) =>
        lowered.some((name) => keywords.some((keyword) => name.includes(keyword)))
    ).map(({ flag }) => flag);
}

export function analyzeTrace(trace: ExecutionTrace): StructuralAnalysis {
    const total = trace.total_duration_ms;

    const stageBreakdown: StageBreakdown[] = trace.stages.map((stage) => ({
        name: stage.name,
        duration_ms: stage.duration_ms,
        duration_formatted: formatDuration(stage.duration_ms),
        percentage: total > 0 ? (stage.duration_ms / total) * 100 : 0
    }));

    return {
        total_stages: trace.stages.length,
        total_duration_ms: total,
        total_duration_formatted: formatDuration(total),
        stage_breakdown: stageBreakdown,
        technology_flags: detectTechnologies(trace.stages.map((stage) => stage.name))
    };
}
