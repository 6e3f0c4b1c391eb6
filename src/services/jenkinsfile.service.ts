import { childText, findByMarker, findFirstText, parseXmlDocument } from "../parsers/xml.js";
import { ErrorPayload, JobSummary, isErrorPayload } from "../types/index.js";
import { ScriptBridgeError, errorMessage } from "../utils/errors.js";
import { loggerFor } from "../utils/logger.js";
import { ExecutionAnalysisService } from "./execution-analysis.service.js";
import { CallOptions, CiServerClient, JenkinsConnection } from "./jenkins.service.js";
import { ScriptBridge } from "./script-bridge.service.js";

const logger = loggerFor("jenkinsfile");

export type JenkinsfileMethod = "scm" | "inline" | "reconstruction";

export interface JenkinsfileResult {
    job_name: string;
    method: JenkinsfileMethod;
    content: string;
    script_path?: string;
    revision?: string;
    build_analyzed?: number;
    /** Failures of the methods tried before the one that succeeded. */
    attempts: string[];
    timestamp: string;
}

export interface JenkinsfileFailure extends ErrorPayload {
    job_name: string;
    attempts: string[];
}

export interface BuildJenkinsfileResult {
    job_name: string;
    build_number: number;
    method: "scm";
    content: string;
    script_path?: string;
    revision?: string;
    timestamp: string;
}

export type JobType = "Pipeline" | "Multibranch Pipeline" | "Freestyle" | "Other";

export type JenkinsfileSource = "Git Repository" | "Inline Script" | "Freestyle Shell Scripts" | "Job Configuration";

export interface JenkinsfileEntry {
    job_name: string;
    job_type: JobType;
    source: JenkinsfileSource;
    content: string;
    branch?: string;
    script_path?: string;
}

export interface JenkinsfileInventory {
    total_jobs: number;
    pipeline_jobs: number;
    multibranch_jobs: number;
    freestyle_jobs: number;
    other_jobs: number;
    jenkinsfiles: JenkinsfileEntry[];
    errors: string[];
    timestamp: string;
}

export interface PipelineTypesSummary {
    total_jobs: number;
    pipeline_types: Record<JobType, { count: number; with_jenkinsfile: number }>;
    jenkinsfile_sources: { "Git Repository": number; "Inline Script": number; "Not Available": number };
    errors: string[];
    timestamp: string;
}

interface JobScan {
    type: JobType;
    entries: JenkinsfileEntry[];
    errors: string[];
}

const CONFIG_HINTS = ["pipeline", "workflow", "jenkinsfile"];
const SHELL_BUILDERS = ["hudson.tasks.Shell", "hudson.tasks.BatchFile"];

export function classifyJob(jobClass: string | undefined): JobType {
    const name = jobClass ?? "";
    if (name.includes("WorkflowMultiBranchProject")) {
        return "Multibranch Pipeline";
    }
    if (name.includes("WorkflowJob")) {
        return "Pipeline";
    }
    return name.includes("FreeStyleProject") ? "Freestyle" : "Other";
}

/** Shell and batch build steps of a freestyle config, in document order. */
export function freestyleCommands(configXml: string): string[] {
    const document = parseXmlDocument(configXml);
    return SHELL_BUILDERS.flatMap((marker) => findByMarker(document, marker))
        .map((step) => childText(step, "command")?.trim() ?? "")
        .filter((command) => command.length > 0);
}

function bridgeFailure(error: unknown): string {
    const raw = error instanceof ScriptBridgeError ? error.rawOutput : errorMessage(error);
    return `Failed to retrieve Jenkinsfile - ${raw}`;
}

/**
 * Finds the pipeline script actually in use: the SCM copy first, then an
 * inline script in the job config, then a reconstruction from execution data.
 */
export class JenkinsfileService {
    constructor(
        private readonly connection: JenkinsConnection,
        private readonly analysis: ExecutionAnalysisService,
        private readonly now: () => Date = () => new Date()
    ) {}

    async getJenkinsfile(jobName: string, options?: CallOptions): Promise<JenkinsfileResult | JenkinsfileFailure> {
        const client = this.connection.require();
        const attempts: string[] = [];
        const timestamp = () => this.now().toISOString();

        try {
            const script = await new ScriptBridge(client).readPipelineScript(jobName, options);
            return {
                job_name: jobName,
                method: "scm",
                content: script.content,
                script_path: script.scriptPath,
                revision: script.revision,
                attempts,
                timestamp: timestamp()
            };
        } catch (error) {
            attempts.push(bridgeFailure(error));
            logger.info(`SCM script unavailable for ${jobName}; trying inline definition`);
        }

        try {
            const inline = findFirstText(parseXmlDocument(await client.getJobConfig(jobName, options)), "script");
            if (inline && inline.trim().length > 0) {
                return { job_name: jobName, method: "inline", content: inline.trim(), attempts, timestamp: timestamp() };
            }
            attempts.push("No inline pipeline script in job configuration");
        } catch (error) {
            attempts.push(`Could not read job configuration - ${errorMessage(error)}`);
        }

        logger.info(`Falling back to reconstruction for ${jobName}`);
        const reconstruction = await this.analysis.reconstruct(jobName, options);
        if (isErrorPayload(reconstruction)) {
            attempts.push(reconstruction.error);
            return { job_name: jobName, error: `Could not retrieve Jenkinsfile for ${jobName}`, attempts };
        }

        return {
            job_name: jobName,
            method: "reconstruction",
            content: reconstruction.reconstructed_definition,
            build_analyzed: reconstruction.build_analyzed,
            attempts,
            timestamp: timestamp()
        };
    }

    async getJenkinsfileForBuild(
        jobName: string,
        buildNumber: number,
        options?: CallOptions
    ): Promise<BuildJenkinsfileResult | ErrorPayload> {
        const client = this.connection.require();
        try {
            const script = await new ScriptBridge(client).readPipelineScriptForBuild(jobName, buildNumber, options);
            return {
                job_name: jobName,
                build_number: buildNumber,
                method: "scm",
                content: script.content,
                script_path: script.scriptPath,
                revision: script.revision,
                timestamp: this.now().toISOString()
            };
        } catch (error) {
            logger.warn(`Could not read Jenkinsfile for ${jobName} #${buildNumber}`, { error: errorMessage(error) });
            return { error: bridgeFailure(error) };
        }
    }

    /**
     * Every pipeline definition the server can find: SCM or inline scripts of
     * pipeline jobs, one per branch of multibranch projects, shell steps of
     * freestyle jobs and pipeline-looking configs of anything else.
     */
    async getAllJenkinsfiles(options?: CallOptions): Promise<JenkinsfileInventory> {
        const client = this.connection.require();
        const jobs = await client.listJobs(options);
        const scans = await this.scanJobs(client, jobs, options);
        const countOf = (type: JobType) => scans.filter((scan) => scan.type === type).length;

        return {
            total_jobs: jobs.length,
            pipeline_jobs: countOf("Pipeline"),
            multibranch_jobs: countOf("Multibranch Pipeline"),
            freestyle_jobs: countOf("Freestyle"),
            other_jobs: countOf("Other"),
            jenkinsfiles: scans.flatMap((scan) => scan.entries),
            errors: scans.flatMap((scan) => scan.errors),
            timestamp: this.now().toISOString()
        };
    }

    /** Per-type job counts and where each job's definition comes from. */
    async getPipelineTypesSummary(options?: CallOptions): Promise<PipelineTypesSummary> {
        const client = this.connection.require();
        const jobs = await client.listJobs(options);
        const scans = await this.scanJobs(client, jobs, options);

        const pipelineTypes: PipelineTypesSummary["pipeline_types"] = {
            Pipeline: { count: 0, with_jenkinsfile: 0 },
            "Multibranch Pipeline": { count: 0, with_jenkinsfile: 0 },
            Freestyle: { count: 0, with_jenkinsfile: 0 },
            Other: { count: 0, with_jenkinsfile: 0 }
        };
        const sources: PipelineTypesSummary["jenkinsfile_sources"] = {
            "Git Repository": 0,
            "Inline Script": 0,
            "Not Available": 0
        };

        for (const scan of scans) {
            pipelineTypes[scan.type].count += 1;
            const [first] = scan.entries;
            if (first === undefined) {
                sources["Not Available"] += 1;
                continue;
            }
            pipelineTypes[scan.type].with_jenkinsfile += 1;
            sources[first.source === "Git Repository" ? "Git Repository" : "Inline Script"] += 1;
        }

        return {
            total_jobs: jobs.length,
            pipeline_types: pipelineTypes,
            jenkinsfile_sources: sources,
            errors: scans.flatMap((scan) => scan.errors),
            timestamp: this.now().toISOString()
        };
    }

    private async scanJobs(client: CiServerClient, jobs: JobSummary[], options?: CallOptions): Promise<JobScan[]> {
        const scans: JobScan[] = [];
        for (const job of jobs) {
            const type = classifyJob(job._class);
            try {
                scans.push({ type, ...(await this.scanJob(client, job.name, type, options)) });
            } catch (error) {
                logger.warn(`Could not scan ${job.name}`, { error: errorMessage(error) });
                scans.push({ type, entries: [], errors: [`Error processing job ${job.name}: ${errorMessage(error)}`] });
            }
        }
        return scans;
    }

    private async scanJob(
        client: CiServerClient,
        jobName: string,
        type: JobType,
        options?: CallOptions
    ): Promise<Omit<JobScan, "type">> {
        const entry = (source: JenkinsfileSource, content: string): JenkinsfileEntry => ({
            job_name: jobName,
            job_type: type,
            source,
            content
        });

        switch (type) {
            case "Pipeline": {
                try {
                    const script = await new ScriptBridge(client).readPipelineScript(jobName, options);
                    return {
                        entries: [{ ...entry("Git Repository", script.content), script_path: script.scriptPath }],
                        errors: []
                    };
                } catch (error) {
                    logger.debug(`SCM script unavailable for ${jobName}`, { error: errorMessage(error) });
                }
                const inline = findFirstText(parseXmlDocument(await client.getJobConfig(jobName, options)), "script");
                return { entries: inline?.trim() ? [entry("Inline Script", inline.trim())] : [], errors: [] };
            }
            case "Multibranch Pipeline": {
                const branches = await new ScriptBridge(client).readBranchScripts(jobName, options);
                return {
                    entries: branches.flatMap((branch) =>
                        branch.content === undefined
                            ? []
                            : [
                                  {
                                      ...entry("Git Repository", branch.content),
                                      job_name: `${jobName}/${branch.branch}`,
                                      branch: branch.branch,
                                      script_path: branch.scriptPath
                                  }
                              ]
                    ),
                    errors: branches.flatMap((branch) =>
                        branch.error === undefined ? [] : [`${jobName}/${branch.branch}: ${branch.error}`]
                    )
                };
            }
            case "Freestyle": {
                const commands = freestyleCommands(await client.getJobConfig(jobName, options));
                return {
                    entries: commands.length > 0 ? [entry("Freestyle Shell Scripts", commands.join("\n\n"))] : [],
                    errors: []
                };
            }
            case "Other": {
                const xml = await client.getJobConfig(jobName, options);
                const lowered = xml.toLowerCase();
                const looksLikePipeline = CONFIG_HINTS.some((hint) => lowered.includes(hint));
                return { entries: looksLikePipeline ? [entry("Job Configuration", xml)] : [], errors: [] };
            }
        }
    }
}
