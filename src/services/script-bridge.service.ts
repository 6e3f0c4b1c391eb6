import { escapeSingleQuoted } from "../reconstruction/groovy.js";
import { ScriptBridgeError } from "../utils/errors.js";
import { CallOptions, CiServerClient } from "./jenkins.service.js";

export const CONTENT_START = "=== CONTENT_START ===";
export const CONTENT_END = "=== CONTENT_END ===";
export const BRANCHES_START = "=== BRANCHES_START ===";
export const BRANCHES_END = "=== BRANCHES_END ===";
export const BRANCH_START = "=== BRANCH_START ===";
export const BRANCH_END = "=== BRANCH_END ===";

export interface PipelineScript {
    content: string;
    scriptPath?: string;
    revision?: string;
}

/**
 * Trimmed text between the first `start` marker and the first `end` marker
 * after it. Undefined when either marker is missing.
 */
export function extractBetweenMarkers(output: string, start: string, end: string): string | undefined {
    const startIndex = output.indexOf(start);
    if (startIndex === -1) {
        return undefined;
    }
    const bodyStart = startIndex + start.length;
    const endIndex = output.indexOf(end, bodyStart);
    if (endIndex === -1) {
        return undefined;
    }
    return output.slice(bodyStart, endIndex).trim();
}

/** One branch job of a multibranch project; `content` is absent when `error` is set. */
export interface BranchScript {
    branch: string;
    fullName: string;
    scriptPath?: string;
    content?: string;
    error?: string;
}

function headerValue(header: string, key: string): string | undefined {
    const match = new RegExp(`^${key}:[ \\t]*(.*)$`, "m").exec(header);
    const value = match?.[1].trim();
    return value ? value : undefined;
}

export function parseScriptOutput(output: string): PipelineScript {
    const content = extractBetweenMarkers(output, CONTENT_START, CONTENT_END);
    if (content === undefined) {
        throw new ScriptBridgeError(output.trim());
    }
    const header = output.slice(0, output.indexOf(CONTENT_START));
    return {
        content,
        scriptPath: headerValue(header, "SCRIPT_PATH"),
        revision: headerValue(header, "REVISION")
    };
}

function parseBranch(section: string): BranchScript {
    const contentIndex = section.indexOf(CONTENT_START);
    const header = contentIndex === -1 ? section : section.slice(0, contentIndex);
    const branch = headerValue(header, "BRANCH") ?? "unknown";
    const content = extractBetweenMarkers(section, CONTENT_START, CONTENT_END);
    const error = headerValue(header, "ERROR");
    return {
        branch,
        fullName: headerValue(header, "FULL_NAME") ?? branch,
        scriptPath: headerValue(header, "SCRIPT_PATH"),
        content: error === undefined ? content : undefined,
        error: error ?? (content === undefined ? "No Jenkinsfile content returned" : undefined)
    };
}

/** Splits a multibranch listing into per-branch records, in the order printed. */
export function parseBranchOutput(output: string): BranchScript[] {
    const body = extractBetweenMarkers(output, BRANCHES_START, BRANCHES_END);
    if (body === undefined) {
        throw new ScriptBridgeError(output.trim());
    }
    return body
        .split(BRANCH_START)
        .slice(1)
        .map((section) => {
            const end = section.lastIndexOf(BRANCH_END);
            return parseBranch(end === -1 ? section : section.slice(0, end));
        });
}

const SCRIPT_PRELUDE = `import jenkins.model.Jenkins
import jenkins.scm.api.SCMFileSystem
import jenkins.scm.api.SCMRevisionAction
import org.jenkinsci.plugins.workflow.job.WorkflowJob
`;

function lookupJob(jobName: string): string {
    return `def job = Jenkins.instance.getItemByFullName('${escapeSingleQuoted(jobName)}', WorkflowJob)
if (job == null) {
    println "ERROR: Pipeline job not found"
    return
}
def scriptPath = job.definition.hasProperty('scriptPath') ? (job.definition.scriptPath ?: 'Jenkinsfile') : null
if (scriptPath == null) {
    println "ERROR: Pipeline definition is not bound to SCM"
    return
}
println "SCRIPT_PATH: \${scriptPath}"
def scms = job.definition.SCMs
if (!scms) {
    println "ERROR: No SCM configured"
    return
}
`;
}

const PRINT_FROM_FILESYSTEM = `if (fs == null || !fs.root.child(scriptPath).exists()) {
    println "ERROR: \${scriptPath} not found in SCM"
    return
}
println "${CONTENT_START}"
println fs.root.child(scriptPath).contentAsString()
println "${CONTENT_END}"
`;

export function headScript(jobName: string): string {
    return `${SCRIPT_PRELUDE}
${lookupJob(jobName)}def fs = SCMFileSystem.of(job, scms[0])
${PRINT_FROM_FILESYSTEM}`;
}

export function buildRevisionScript(jobName: string, buildNumber: number): string {
    return `${SCRIPT_PRELUDE}
${lookupJob(jobName)}def run = job.getBuildByNumber(${Math.trunc(buildNumber)})
if (run == null) {
    println "ERROR: Build not found"
    return
}
def rev = run.getAction(SCMRevisionAction)?.revision
if (rev == null) {
    println "ERROR: No SCM revision recorded on build"
    return
}
println "REVISION: \${rev}"
def fs = SCMFileSystem.of(job, scms[0], rev)
${PRINT_FROM_FILESYSTEM}`;
}

export function multibranchScript(jobName: string): string {
    return `import jenkins.model.Jenkins
import jenkins.scm.api.SCMFileSystem
import org.jenkinsci.plugins.workflow.multibranch.WorkflowMultiBranchProject

def project = Jenkins.instance.getItemByFullName('${escapeSingleQuoted(jobName)}', WorkflowMultiBranchProject)
if (project == null) {
    println "ERROR: Multibranch project not found"
    return
}
println "${BRANCHES_START}"
project.items.each { branch ->
    println "${BRANCH_START}"
    println "BRANCH: \${branch.name}"
    println "FULL_NAME: \${branch.fullName}"
    def scriptPath = branch.definition.hasProperty('scriptPath') ? (branch.definition.scriptPath ?: 'Jenkinsfile') : 'Jenkinsfile'
    println "SCRIPT_PATH: \${scriptPath}"
    try {
        def scms = branch.definition.SCMs
        def fs = scms ? SCMFileSystem.of(branch, scms[0]) : null
        if (fs == null || !fs.root.child(scriptPath).exists()) {
            println "ERROR: \${scriptPath} not found in SCM"
        } else {
            println "${CONTENT_START}"
            println fs.root.child(scriptPath).contentAsString()
            println "${CONTENT_END}"
        }
    } catch (e) {
        println "ERROR: \${e.message}"
    }
    println "${BRANCH_END}"
}
println "${BRANCHES_END}"
`;
}

/**
 * Reads SCM-bound pipeline scripts through the script console. The console is
 * a plain text channel, so the payload is delimited with markers and
 * everything outside them is treated as noise.
 */
export class ScriptBridge {
    constructor(private readonly client: CiServerClient) {}

    async readPipelineScript(jobName: string, options?: CallOptions): Promise<PipelineScript> {
        return parseScriptOutput(await this.client.executeScript(headScript(jobName), options));
    }

    async readPipelineScriptForBuild(jobName: string, buildNumber: number, options?: CallOptions): Promise<PipelineScript> {
        return parseScriptOutput(await this.client.executeScript(buildRevisionScript(jobName, buildNumber), options));
    }

    async readBranchScripts(jobName: string, options?: CallOptions): Promise<BranchScript[]> {
        return parseBranchOutput(await this.client.executeScript(multibranchScript(jobName), options));
    }
}
