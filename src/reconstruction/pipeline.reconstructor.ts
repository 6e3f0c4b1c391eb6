import { ConfigRecord, ExecutionTrace } from "../types/index.js";
import {
    renderAgent,
    renderEnvBinding,
    renderOption,
    renderParameter,
    renderTool,
    renderTrigger,
    stageEnvironmentBindings
} from "./config.renderers.js";
import { block, indent, separated } from "./groovy.js";
import { renderStage } from "./stage.rules.js";

const optionalBlock = (name: string, entries: string[]) => (entries.length === 0 ? [] : block(name, entries));

function renderPost(trace: ExecutionTrace): string[] {
    const cleanup = trace.stages.find(({ name }) => {
        const lowered = name.toLowerCase();
        return lowered.includes("cleanup") || lowered.includes("notify");
    });
    if (cleanup === undefined) {
        return [];
    }
    return block("post", block("always", block("script", ["echo 'Cleaning up build artifacts'"])));
}

/**
 * Synthesizes a declarative pipeline from a job's configuration and the stage
 * trace of one of its runs. The output is a plausible skeleton: step bodies are
 * inferred from stage names because the trace carries no step commands.
 */
export function reconstructPipeline(config: ConfigRecord, trace: ExecutionTrace): string {
    const environment = [...config.environment, ...stageEnvironmentBindings(trace.stages)];

    const sections = separated([
        renderAgent(config.agent),
        optionalBlock("parameters", config.parameters.map(renderParameter)),
        optionalBlock("triggers", config.triggers.map(renderTrigger)),
        optionalBlock("options", config.options.map(renderOption)),
        optionalBlock("tools", config.tools.map(renderTool)),
        optionalBlock("environment", environment.map(renderEnvBinding)),
        block("stages", separated(trace.stages.map(renderStage))),
        renderPost(trace)
    ]);

    return ["pipeline {", ...indent(sections), "}"].join("\n");
}
