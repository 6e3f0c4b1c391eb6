export type AgentDescriptor =
    | { kind: "any" }
    | { kind: "none" }
    | { kind: "label"; name: string }
    | { kind: "docker"; image: string }
    | { kind: "dockerfile"; options: DockerfileOptions }
    | { kind: "node"; options: NodeAgentOptions }
    | { kind: "kubernetes" };

export interface DockerfileOptions {
    dir?: string;
    filename?: string;
    additionalBuildArgs?: string;
    args?: string;
    label?: string;
}

export interface NodeAgentOptions {
    label?: string;
    customWorkspace?: string;
}

export type ParameterDef =
    | { kind: "string"; name: string; defaultValue: string; description: string }
    | { kind: "choice"; name: string; choices: string[]; description: string }
    | { kind: "boolean"; name: string; defaultValue: boolean; description: string }
    | { kind: "password"; name: string; description: string }
    | { kind: "text"; name: string; defaultValue: string; description: string };

export type TriggerDef =
    | { kind: "githubPush" }
    | { kind: "pollScm"; spec: string }
    | { kind: "cron"; spec: string }
    | { kind: "upstream"; projects: string };

export type OptionDef =
    | { kind: "timeout"; minutes: number }
    | { kind: "retry"; count: number }
    | { kind: "timestamps" }
    | { kind: "ansiColor"; palette: string }
    | { kind: "skipDefaultCheckout" }
    | { kind: "buildDiscarder"; keepCount: number }
    | { kind: "disableConcurrentBuilds" };

export type ToolKind = "maven" | "jdk" | "gradle" | "nodejs";

export interface ToolRef {
    kind: ToolKind;
    name: string;
}

export type EnvValue =
    | { kind: "literal"; text: string }
    | { kind: "credential"; id: string };

export interface EnvBinding {
    name: string;
    value: EnvValue;
}

/**
 * Normalized view of a job's config.xml. Every list keeps the order in which
 * its entries were extracted; duplicates are kept.
 */
export interface ConfigRecord {
    agent: AgentDescriptor;
    parameters: ParameterDef[];
    triggers: TriggerDef[];
    options: OptionDef[];
    tools: ToolRef[];
    environment: EnvBinding[];
}

export interface StageRecord {
    name: string;
    duration_ms: number;
}

export interface ExecutionTrace {
    stages: StageRecord[];
    /** Wall time of the run; may exceed the sum of stage durations. */
    total_duration_ms: number;
}

export type TechnologyFlag = "AWS" | "Kubernetes" | "Docker" | "Helm" | "SharedLibrary";

export interface StageBreakdown {
    name: string;
    duration_ms: number;
    duration_formatted: string;
    percentage: number;
}

export interface StructuralAnalysis {
    total_stages: number;
    total_duration_ms: number;
    total_duration_formatted: string;
    stage_breakdown: StageBreakdown[];
    technology_flags: TechnologyFlag[];
}

export type SuggestionPriority = "low" | "medium" | "high";

export interface Suggestion {
    type: "reliability" | "efficiency" | "security" | "performance";
    priority: SuggestionPriority;
    title: string;
    description: string;
    example: string;
}

export interface ErrorPayload {
    error: string;
}

export interface ReconstructionResult {
    pipeline_name: string;
    build_analyzed: number;
    reconstructed_definition: string;
    analysis: StructuralAnalysis;
    reconstruction_method: "execution_flow_analysis";
    timestamp: string;
}

export interface ImprovementReport {
    pipeline_name: string;
    total_suggestions: number;
    suggestions: Suggestion[];
    analysis_summary: {
        technologies: TechnologyFlag[];
        total_duration: string;
        stage_count: number;
    };
}

export function isErrorPayload(value: object): value is ErrorPayload {
    return "error" in value && typeof value.error === "string";
}

// Jenkins REST shapes. Only the fields this server reads are declared.

export interface JobSummary {
    _class?: string;
    name: string;
    url: string;
    color?: string;
    description?: string | null;
    displayName?: string;
    disabled?: boolean;
    buildable?: boolean;
    lastBuild?: { number: number; result?: string | null; timestamp?: number } | null;
    healthReport?: Array<{ score?: number; description?: string }>;
}

export interface BuildSummary {
    number: number;
    url?: string;
    result?: string | null;
    duration?: number;
    timestamp?: number;
}

export interface BuildRecord extends BuildSummary {
    building?: boolean;
    displayName?: string;
    description?: string | null;
    estimatedDuration?: number;
}

export interface ProjectRef {
    name: string;
    url?: string;
}

export interface JobInfo extends JobSummary {
    builds?: BuildSummary[];
    nextBuildNumber?: number;
    upstreamProjects?: ProjectRef[];
    downstreamProjects?: ProjectRef[];
}

export interface WorkflowStage {
    id?: string;
    name?: string;
    status?: string;
    durationMillis?: number;
}

export interface WorkflowRun {
    id?: string;
    name?: string;
    status?: string;
    durationMillis?: number;
    stages?: WorkflowStage[];
}

export interface QueueItem {
    id: number;
    why?: string | null;
    stuck?: boolean;
    blocked?: boolean;
    inQueueSince?: number;
    task?: { name?: string; url?: string };
}

export interface WhoAmI {
    id?: string;
    name?: string;
    authenticated?: boolean;
}
