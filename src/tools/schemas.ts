import { z } from "zod";

const nonEmpty = z.string().trim().min(1, "must be a non-empty string");
const pipelineName = nonEmpty;
const buildNumber = z.number().int().positive();
const confirm = z.boolean().default(false);

export const NoArgsSchema = z.object({});

export const ListPipelinesArgsSchema = z.object({
    search: z.string().optional(),
    limit: z.number().int().positive().default(50)
});

export const PipelineArgsSchema = z.object({
    pipeline_name: pipelineName
});

export const BuildArgsSchema = z.object({
    pipeline_name: pipelineName,
    build_number: buildNumber
});

export const PipelineBuildsArgsSchema = z.object({
    pipeline_name: pipelineName,
    limit: z.number().int().positive().default(20),
    status: z.string().optional()
});

export const BuildLogArgsSchema = BuildArgsSchema.extend({
    tail_lines: z.number().int().positive().optional()
});

export const TriggerBuildArgsSchema = z.object({
    pipeline_name: pipelineName,
    parameters: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
    confirm
});

export const StopBuildArgsSchema = BuildArgsSchema.extend({ confirm });

export const EnableDisableArgsSchema = z.object({
    pipeline_name: pipelineName,
    enabled: z.boolean(),
    confirm
});

export const ConfigureJenkinsArgsSchema = z.object({
    url: nonEmpty,
    username: nonEmpty,
    token: nonEmpty
});

/**
 * The `analysis` object of suggest_pipeline_improvements. Only stage names,
 * durations and the total are kept; percentages and flags are derived again.
 */
export const AnalysisArgumentSchema = z.object({
    total_duration_ms: z.number().finite().nonnegative().optional(),
    stage_breakdown: z.array(
        z.object({
            name: z.string(),
            duration_ms: z.number().finite().nonnegative()
        })
    )
});

export type AnalysisArgument = z.infer<typeof AnalysisArgumentSchema>;

export const SuggestImprovementsArgsSchema = z.object({
    pipeline_name: pipelineName,
    jenkinsfile: z.string().optional(),
    analysis: AnalysisArgumentSchema.optional()
});

/** `path: message` for every issue, the way tool errors report bad input. */
export function describeArgumentIssues(error: z.ZodError): string {
    return `Invalid arguments: ${error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ")}`;
}
