import {
    AgentDescriptor,
    ConfigRecord,
    DockerfileOptions,
    EnvBinding,
    NodeAgentOptions,
    OptionDef,
    ParameterDef,
    ToolKind,
    ToolRef,
    TriggerDef
} from "../types/index.js";
import { logger } from "../utils/logger.js";
import {
    XmlElement,
    XmlValue,
    childText,
    children,
    findByMarker,
    findFirst,
    findFirstText,
    hasChild,
    parseXmlDocument,
    textOf
} from "./xml.js";

type Section = Exclude<keyof ConfigRecord, "agent">;

const PARAMETER_CLASSES = {
    string: "hudson.model.StringParameterDefinition",
    choice: "hudson.model.ChoiceParameterDefinition",
    boolean: "hudson.model.BooleanParameterDefinition",
    password: "hudson.model.PasswordParameterDefinition",
    text: "hudson.model.TextParameterDefinition"
} as const;

const TOOL_MARKERS: Array<{ kind: ToolKind; marker: string }> = [
    { kind: "maven", marker: "MavenInstallation" },
    { kind: "jdk", marker: "hudson.model.JDK" },
    { kind: "gradle", marker: "GradleInstallation" },
    { kind: "nodejs", marker: "NodeJSInstallation" }
];

const NON_NEGATIVE_INT = /^\d+$/;

/** Whole numbers only; anything else means the option is left out. */
function nonNegativeInt(raw: string | undefined): number | undefined {
    const trimmed = raw?.trim();
    return trimmed !== undefined && NON_NEGATIVE_INT.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

export function emptyConfigRecord(): ConfigRecord {
    return {
        agent: { kind: "any" },
        parameters: [],
        triggers: [],
        options: [],
        tools: [],
        environment: []
    };
}

/**
 * Reads a job's config.xml into a ConfigRecord. The outer document is parsed
 * as a tree; each section is then extracted independently and falls back to
 * its empty value when extraction fails, so a partial record always comes back.
 */
export class ConfigParser {
    parse(configXml: string): ConfigRecord {
        const record = emptyConfigRecord();

        let root: XmlElement;
        try {
            root = parseXmlDocument(configXml);
        } catch (error) {
            logger.warn("Config document could not be parsed; using defaults", {
                error: error instanceof Error ? error.message : String(error)
            });
            return record;
        }

        try {
            record.agent = this.parseAgent(findFirst(root, "agent"));
        } catch (error) {
            this.reportSectionFailure("agent", error);
        }

        this.extractSection(record, "parameters", () =>
            this.extractParameters(findFirst(root, "parameters") ?? findFirst(root, "parameterDefinitions"))
        );
        this.extractSection(record, "triggers", () => this.extractTriggers(findFirst(root, "triggers")));
        this.extractSection(record, "options", () => this.extractOptions(findFirst(root, "options")));
        this.extractSection(record, "tools", () => this.extractTools(findFirst(root, "tools")));
        this.extractSection(record, "environment", () => this.extractEnvironment(findFirst(root, "envVars")));

        return record;
    }

    private extractSection<K extends Section>(record: ConfigRecord, section: K, extract: () => ConfigRecord[K]) {
        try {
            record[section] = extract();
        } catch (error) {
            this.reportSectionFailure(section, error);
        }
    }

    private reportSectionFailure(section: keyof ConfigRecord, error: unknown) {
        logger.warn(`Could not extract ${section} from config document`, {
            error: error instanceof Error ? error.message : String(error)
        });
    }

    private parseAgent(region: XmlValue | undefined): AgentDescriptor {
        if (region === undefined) {
            return { kind: "any" };
        }

        const label = childText(region, "label");
        if (label) {
            return { kind: "label", name: label };
        }

        const [docker] = children(region, "docker");
        if (docker !== undefined) {
            const image = childText(docker, "image") ?? findFirstText(docker, "image");
            if (image) {
                return { kind: "docker", image };
            }
        }

        const [dockerfile] = children(region, "dockerfile");
        if (dockerfile !== undefined) {
            return { kind: "dockerfile", options: this.readDockerfileOptions(dockerfile) };
        }

        if (hasChild(region, "kubernetes")) {
            return { kind: "kubernetes" };
        }

        const [node] = children(region, "node");
        if (node !== undefined) {
            return { kind: "node", options: this.readNodeOptions(node) };
        }

        if (hasChild(region, "none") || textOf(region).trim().toLowerCase() === "none") {
            return { kind: "none" };
        }

        return { kind: "any" };
    }

    private readDockerfileOptions(node: XmlValue): DockerfileOptions {
        const options: DockerfileOptions = {};
        const keys: Array<keyof DockerfileOptions> = ["dir", "filename", "additionalBuildArgs", "args", "label"];
        for (const key of keys) {
            const value = childText(node, key);
            if (value) {
                options[key] = value;
            }
        }
        return options;
    }

    private readNodeOptions(node: XmlValue): NodeAgentOptions {
        const options: NodeAgentOptions = {};
        const label = childText(node, "label");
        if (label) {
            options.label = label;
        }
        const customWorkspace = childText(node, "customWorkspace");
        if (customWorkspace) {
            options.customWorkspace = customWorkspace;
        }
        return options;
    }

    private extractParameters(region: XmlValue | undefined): ParameterDef[] {
        if (region === undefined) {
            return [];
        }

        const parameters: ParameterDef[] = [];
        const named = (marker: string) =>
            findByMarker(region, marker)
                .map((element) => ({
                    element,
                    name: childText(element, "name") ?? "",
                    description: (childText(element, "description") ?? "").trim()
                }))
                .filter((entry) => entry.name.length > 0);

        for (const { element, name, description } of named(PARAMETER_CLASSES.string)) {
            parameters.push({ kind: "string", name, defaultValue: childText(element, "defaultValue") ?? "", description });
        }

        for (const { element, name, description } of named(PARAMETER_CLASSES.choice)) {
            parameters.push({ kind: "choice", name, choices: this.readChoices(element), description });
        }

        for (const { element, name, description } of named(PARAMETER_CLASSES.boolean)) {
            const defaultValue = (childText(element, "defaultValue") ?? "").trim().toLowerCase() === "true";
            parameters.push({ kind: "boolean", name, defaultValue, description });
        }

        for (const { name, description } of named(PARAMETER_CLASSES.password)) {
            parameters.push({ kind: "password", name, description });
        }

        for (const { element, name, description } of named(PARAMETER_CLASSES.text)) {
            parameters.push({ kind: "text", name, defaultValue: childText(element, "defaultValue") ?? "", description });
        }

        return parameters;
    }

    private readChoices(element: XmlValue): string[] {
        const [choices] = children(element, "choices");
        if (choices === undefined) {
            return [];
        }

        const array = findFirst(choices, "a") ?? choices;
        const values = children(array, "string").map(textOf);
        if (values.length > 0) {
            return values;
        }

        // Older configs store choices as newline separated text.
        return textOf(choices)
            .split(/\r?\n/)
            .map((value) => value.trim())
            .filter((value) => value.length > 0);
    }

    private extractTriggers(region: XmlValue | undefined): TriggerDef[] {
        if (region === undefined) {
            return [];
        }

        const triggers: TriggerDef[] = [];

        if (findByMarker(region, "GitHubPushTrigger").length > 0) {
            triggers.push({ kind: "githubPush" });
        }

        const pollSpec = this.markerValue(region, "hudson.triggers.SCMTrigger", "spec");
        if (pollSpec !== undefined) {
            triggers.push({ kind: "pollScm", spec: pollSpec });
        }

        const cronSpec = this.markerValue(region, "hudson.triggers.TimerTrigger", "spec");
        if (cronSpec !== undefined) {
            triggers.push({ kind: "cron", spec: cronSpec });
        }

        const upstream = this.markerValue(region, "hudson.triggers.UpstreamTrigger", "upstreamProjects");
        if (upstream !== undefined) {
            triggers.push({ kind: "upstream", projects: upstream.trim() });
        }

        return triggers;
    }

    private extractOptions(region: XmlValue | undefined): OptionDef[] {
        if (region === undefined) {
            return [];
        }

        const options: OptionDef[] = [];
        const present = (marker: string) => findByMarker(region, marker).length > 0;

        const minutes = nonNegativeInt(this.markerValue(region, "BuildTimeoutWrapper", "timeoutMinutes"));
        if (minutes !== undefined) {
            options.push({ kind: "timeout", minutes });
        }

        const count = nonNegativeInt(this.markerValue(region, "RetryBuildStep", "retryCount"));
        if (count !== undefined) {
            options.push({ kind: "retry", count });
        }

        if (present("TimestamperBuildWrapper")) {
            options.push({ kind: "timestamps" });
        }

        if (present("AnsiColorBuildWrapper")) {
            const palette = this.markerValue(region, "AnsiColorBuildWrapper", "colorMapName");
            options.push({ kind: "ansiColor", palette: palette || "xterm" });
        }

        if (present("WorkspaceCleaner")) {
            options.push({ kind: "skipDefaultCheckout" });
        }

        const keepCount = nonNegativeInt(this.markerValue(region, "hudson.tasks.LogRotator", "numToKeep"));
        if (keepCount !== undefined) {
            options.push({ kind: "buildDiscarder", keepCount });
        }

        if (present("DisableConcurrentBuildsJobProperty")) {
            options.push({ kind: "disableConcurrentBuilds" });
        }

        return options;
    }

    private extractTools(region: XmlValue | undefined): ToolRef[] {
        if (region === undefined) {
            return [];
        }

        const tools: ToolRef[] = [];
        for (const { kind, marker } of TOOL_MARKERS) {
            const [installation] = findByMarker(region, marker);
            if (installation === undefined) {
                continue;
            }
            const name = childText(installation, "name") ?? findFirstText(installation, "name");
            if (name) {
                tools.push({ kind, name });
            }
        }
        return tools;
    }

    private extractEnvironment(region: XmlValue | undefined): EnvBinding[] {
        if (region === undefined) {
            return [];
        }

        const bindings: EnvBinding[] = [];

        for (const element of findByMarker(region, "hudson.model.StringParameterValue")) {
            const name = childText(element, "name");
            if (name) {
                bindings.push({ name, value: { kind: "literal", text: childText(element, "value") ?? "" } });
            }
        }

        for (const element of findByMarker(region, "credentialsbinding.impl.StringBinding")) {
            const name = childText(element, "variable");
            const id = childText(element, "credentialId");
            if (name && id) {
                bindings.push({ name, value: { kind: "credential", id } });
            }
        }

        return bindings;
    }

    /**
     * Value of `tag` for the first element carrying `marker`: looked up under
     * that element first, then anywhere in the region. Undefined when the
     * marker is absent or no value exists.
     */
    private markerValue(region: XmlValue, marker: string, tag: string): string | undefined {
        const [element] = findByMarker(region, marker);
        if (element === undefined) {
            return undefined;
        }
        return findFirstText(element, tag) ?? findFirstText(region, tag);
    }
}

const defaultParser = new ConfigParser();

export function parseConfig(configXml: string): ConfigRecord {
    return defaultParser.parse(configXml);
}
