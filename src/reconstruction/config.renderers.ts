import {
    AgentDescriptor,
    EnvBinding,
    OptionDef,
    ParameterDef,
    StageRecord,
    ToolRef,
    TriggerDef
} from "../types/index.js";
import { block, quote, tripleQuote } from "./groovy.js";

/** Lines of the top-level agent directive; the first line starts with `agent`. */
export function renderAgent(agent: AgentDescriptor): string[] {
    switch (agent.kind) {
        case "any":
        case "none":
            return [`agent ${agent.kind}`];
        case "label":
            return [`agent label(${quote(agent.name)})`];
        case "docker":
            return [`agent docker(${quote(agent.image)})`];
        case "kubernetes":
            return ["agent kubernetes { /* Kubernetes agent config */ }"];
        case "node": {
            const settings: string[] = [];
            if (agent.options.label !== undefined) {
                settings.push(`label ${quote(agent.options.label)}`);
            }
            if (agent.options.customWorkspace !== undefined) {
                settings.push(`customWorkspace ${quote(agent.options.customWorkspace)}`);
            }
            return settings.length === 0 ? ["agent node { /* Node agent config */ }"] : block("agent node", settings);
        }
        case "dockerfile": {
            const { dir, filename, additionalBuildArgs, args, label } = agent.options;
            const settings = [
                dir !== undefined ? `dir ${quote(dir)}` : undefined,
                filename !== undefined ? `filename ${quote(filename)}` : undefined,
                additionalBuildArgs !== undefined ? `additionalBuildArgs ${quote(additionalBuildArgs)}` : undefined,
                args !== undefined ? `args ${quote(args)}` : undefined,
                label !== undefined ? `label ${quote(label)}` : undefined
            ].filter((setting): setting is string => setting !== undefined);
            return settings.length === 0
                ? ["agent dockerfile true"]
                : block("agent dockerfile", ["dockerfile true", ...settings]);
        }
    }
}

export function renderParameter(parameter: ParameterDef): string {
    const name = quote(parameter.name);
    const description = quote(parameter.description);
    switch (parameter.kind) {
        case "string":
            return `string(name: ${name}, defaultValue: ${quote(parameter.defaultValue)}, description: ${description})`;
        case "choice":
            return `choice(name: ${name}, choices: [${parameter.choices.map(quote).join(", ")}], description: ${description})`;
        case "boolean":
            return `booleanParam(name: ${name}, defaultValue: ${parameter.defaultValue}, description: ${description})`;
        case "password":
            return `password(name: ${name}, description: ${description})`;
        case "text":
            return `text(name: ${name}, defaultValue: ${tripleQuote(parameter.defaultValue)}, description: ${description})`;
    }
}

export function renderTrigger(trigger: TriggerDef): string {
    switch (trigger.kind) {
        case "githubPush":
            return "githubPush()";
        case "pollScm":
            return `pollSCM(${quote(trigger.spec)})`;
        case "cron":
            return `cron(${quote(trigger.spec)})`;
        case "upstream":
            return `upstream(upstreamProjects: ${quote(trigger.projects)})`;
    }
}

export function renderOption(option: OptionDef): string {
    switch (option.kind) {
        case "timeout":
            return `timeout(time: ${option.minutes}, unit: 'MINUTES')`;
        case "retry":
            return `retry(${option.count})`;
        case "timestamps":
            return "timestamps()";
        case "ansiColor":
            return `ansiColor(${quote(option.palette)})`;
        case "skipDefaultCheckout":
            return "skipDefaultCheckout()";
        case "buildDiscarder":
            return `buildDiscarder(logRotator(numToKeepStr: ${quote(String(option.keepCount))}))`;
        case "disableConcurrentBuilds":
            return "disableConcurrentBuilds()";
    }
}

export function renderTool(tool: ToolRef): string {
    return `${tool.kind} ${quote(tool.name)}`;
}

export function renderEnvBinding(binding: EnvBinding): string {
    const value = binding.value.kind === "literal" ? quote(binding.value.text) : `credentials(${quote(binding.value.id)})`;
    return `${binding.name} = ${value}`;
}

const STAGE_ENV_TOKEN = /env\.(\w+)\s*=\s*(\S+)/g;

/**
 * Bindings written into stage names as `env.NAME=VALUE`. Only stages whose
 * name mentions `env.` or `environment` are scanned.
 */
export function stageEnvironmentBindings(stages: StageRecord[]): EnvBinding[] {
    return stages
        .filter(({ name }) => name.includes("env.") || name.toLowerCase().includes("environment"))
        .flatMap(({ name }) =>
            Array.from(name.matchAll(STAGE_ENV_TOKEN), (match): EnvBinding => ({
                name: match[1],
                value: { kind: "literal", text: match[2] }
            }))
        );
}
