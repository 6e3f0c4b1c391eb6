import { ExecutionAnalysisService } from "../src/services/execution-analysis.service.js";
import { JenkinsfileService, classifyJob, freestyleCommands } from "../src/services/jenkinsfile.service.js";
import {
    BRANCHES_END,
    BRANCHES_START,
    BRANCH_END,
    BRANCH_START,
    CONTENT_END,
    CONTENT_START
} from "../src/services/script-bridge.service.js";
import { JenkinsConnection } from "../src/services/jenkins.service.js";
import { FIXED_NOW, FakeJenkinsClient, connectedTo } from "./support/fake-client.js";

const NOT_SCM_BOUND = "ERROR: Pipeline definition is not bound to SCM";
const BRIDGE_FAILURE = `Failed to retrieve Jenkinsfile - ${NOT_SCM_BOUND}`;

async function serviceFor(client: FakeJenkinsClient): Promise<JenkinsfileService> {
    const connection = await connectedTo(client);
    return new JenkinsfileService(connection, new ExecutionAnalysisService(connection, FIXED_NOW), FIXED_NOW);
}

describe("JenkinsfileService.getJenkinsfile", () => {
    it("prefers the SCM copy", async () => {
        const client = new FakeJenkinsClient();
        client.scriptOutput = `SCRIPT_PATH: Jenkinsfile\n${CONTENT_START}\npipeline {}\n${CONTENT_END}\n`;

        await expect((await serviceFor(client)).getJenkinsfile("app")).resolves.toEqual({
            job_name: "app",
            method: "scm",
            content: "pipeline {}",
            script_path: "Jenkinsfile",
            revision: undefined,
            attempts: [],
            timestamp: "2026-01-02T03:04:05.000Z"
        });
        expect(client.calls).toEqual(["executeScript"]);
    });

    it("falls back to the inline script", async () => {
        const client = new FakeJenkinsClient();
        client.scriptOutput = `${NOT_SCM_BOUND}\n`;
        client.configXml = `<flow-definition>
            <definition class="org.jenkinsci.plugins.workflow.cps.CpsFlowDefinition">
                <script>pipeline { agent any }</script>
                <sandbox>true</sandbox>
            </definition>
        </flow-definition>`;

        await expect((await serviceFor(client)).getJenkinsfile("app")).resolves.toEqual({
            job_name: "app",
            method: "inline",
            content: "pipeline { agent any }",
            attempts: [BRIDGE_FAILURE],
            timestamp: "2026-01-02T03:04:05.000Z"
        });
    });

    it("falls back to a reconstruction", async () => {
        const client = new FakeJenkinsClient();
        client.scriptOutput = NOT_SCM_BOUND;
        client.configXml = "<project><description>freestyle</description></project>";
        client.builds = [{ number: 1 }];
        client.buildInfo.set(1, { number: 1, result: "SUCCESS" });

        await expect((await serviceFor(client)).getJenkinsfile("app")).resolves.toEqual({
            job_name: "app",
            method: "reconstruction",
            content: "pipeline {\n    agent any\n\n    stages {\n    }\n}",
            build_analyzed: 1,
            attempts: [BRIDGE_FAILURE, "No inline pipeline script in job configuration"],
            timestamp: "2026-01-02T03:04:05.000Z"
        });
    });

    it("lists every attempt when nothing works", async () => {
        const client = new FakeJenkinsClient();
        client.scriptOutput = NOT_SCM_BOUND;
        client.configXml = new Error("403 Forbidden");

        await expect((await serviceFor(client)).getJenkinsfile("app")).resolves.toEqual({
            job_name: "app",
            error: "Could not retrieve Jenkinsfile for app",
            attempts: [
                BRIDGE_FAILURE,
                "Could not read job configuration - 403 Forbidden",
                "No successful builds found for analysis"
            ]
        });
    });
});

describe("JenkinsfileService.getJenkinsfileForBuild", () => {
    it("returns the script at the build's revision", async () => {
        const client = new FakeJenkinsClient();
        client.scriptOutput = `SCRIPT_PATH: Jenkinsfile\nREVISION: 9f8e7d\n${CONTENT_START}\npipeline {}\n${CONTENT_END}`;

        await expect((await serviceFor(client)).getJenkinsfileForBuild("app", 12)).resolves.toEqual({
            job_name: "app",
            build_number: 12,
            method: "scm",
            content: "pipeline {}",
            script_path: "Jenkinsfile",
            revision: "9f8e7d",
            timestamp: "2026-01-02T03:04:05.000Z"
        });
    });

    it("reports the bridge failure", async () => {
        const client = new FakeJenkinsClient();
        client.scriptOutput = new Error("Jenkins POST /scriptText failed: 403 Forbidden");

        await expect((await serviceFor(client)).getJenkinsfileForBuild("app", 12)).resolves.toEqual({
            error: "Failed to retrieve Jenkinsfile - Jenkins POST /scriptText failed: 403 Forbidden"
        });
    });
});

const WORKFLOW = "org.jenkinsci.plugins.workflow.job.WorkflowJob";
const MULTIBRANCH = "org.jenkinsci.plugins.workflow.multibranch.WorkflowMultiBranchProject";
const FREESTYLE = "hudson.model.FreeStyleProject";
const FOLDER = "com.cloudbees.hudson.plugins.folder.Folder";

const FREESTYLE_CONFIG = `<project>
    <builders>
        <hudson.tasks.Shell><command>npm ci</command></hudson.tasks.Shell>
        <hudson.tasks.Shell><command>npm test</command></hudson.tasks.Shell>
    </builders>
</project>`;

describe("classifyJob", () => {
    it("maps job classes to pipeline types", () => {
        expect(classifyJob(WORKFLOW)).toBe("Pipeline");
        expect(classifyJob(MULTIBRANCH)).toBe("Multibranch Pipeline");
        expect(classifyJob(FREESTYLE)).toBe("Freestyle");
        expect(classifyJob(FOLDER)).toBe("Other");
        expect(classifyJob(undefined)).toBe("Other");
    });
});

describe("freestyleCommands", () => {
    it("returns shell steps in order", () => {
        expect(freestyleCommands(FREESTYLE_CONFIG)).toEqual(["npm ci", "npm test"]);
    });

    it("skips empty commands", () => {
        expect(freestyleCommands("<project><builders><hudson.tasks.Shell><command> </command></hudson.tasks.Shell></builders></project>")).toEqual([]);
    });
});

function serverWithEveryJobType(): FakeJenkinsClient {
    const client = new FakeJenkinsClient();
    const job = (name: string, jobClass: string) => ({ name, _class: jobClass, url: `http://jenkins.test/job/${name}/` });
    client.jobs = [
        job("api", WORKFLOW),
        job("inline", WORKFLOW),
        job("shop", MULTIBRANCH),
        job("web", FREESTYLE),
        job("tools", FOLDER),
        job("notes", FOLDER)
    ];
    client.scriptOutput = NOT_SCM_BOUND;
    client.scriptOutputByJob.set("api", `SCRIPT_PATH: Jenkinsfile\n${CONTENT_START}\npipeline {}\n${CONTENT_END}`);
    client.scriptOutputByJob.set(
        "shop",
        [
            BRANCHES_START,
            BRANCH_START,
            "BRANCH: main",
            "FULL_NAME: shop/main",
            "SCRIPT_PATH: Jenkinsfile",
            CONTENT_START,
            "pipeline { agent any }",
            CONTENT_END,
            BRANCH_END,
            BRANCH_START,
            "BRANCH: feature-x",
            "FULL_NAME: shop/feature-x",
            "SCRIPT_PATH: ci/Jenkinsfile",
            "ERROR: ci/Jenkinsfile not found in SCM",
            BRANCH_END,
            BRANCHES_END
        ].join("\n")
    );
    client.configByJob.set(
        "inline",
        "<flow-definition><definition><script>pipeline { agent none }</script></definition></flow-definition>"
    );
    client.configByJob.set("web", FREESTYLE_CONFIG);
    client.configByJob.set("tools", new Error("404 Not Found"));
    client.configByJob.set("notes", "<folder><description>docs</description></folder>");
    return client;
}

describe("JenkinsfileService.getAllJenkinsfiles", () => {
    it("collects definitions from every job type", async () => {
        const client = serverWithEveryJobType();

        await expect((await serviceFor(client)).getAllJenkinsfiles()).resolves.toEqual({
            total_jobs: 6,
            pipeline_jobs: 2,
            multibranch_jobs: 1,
            freestyle_jobs: 1,
            other_jobs: 2,
            jenkinsfiles: [
                {
                    job_name: "api",
                    job_type: "Pipeline",
                    source: "Git Repository",
                    content: "pipeline {}",
                    script_path: "Jenkinsfile"
                },
                { job_name: "inline", job_type: "Pipeline", source: "Inline Script", content: "pipeline { agent none }" },
                {
                    job_name: "shop/main",
                    job_type: "Multibranch Pipeline",
                    source: "Git Repository",
                    content: "pipeline { agent any }",
                    branch: "main",
                    script_path: "Jenkinsfile"
                },
                { job_name: "web", job_type: "Freestyle", source: "Freestyle Shell Scripts", content: "npm ci\n\nnpm test" }
            ],
            errors: ["shop/feature-x: ci/Jenkinsfile not found in SCM", "Error processing job tools: 404 Not Found"],
            timestamp: "2026-01-02T03:04:05.000Z"
        });
    });

    it("keeps a job's config when it mentions a pipeline", async () => {
        const client = new FakeJenkinsClient();
        client.jobs = [{ name: "legacy", _class: "hudson.matrix.MatrixProject", url: "http://jenkins.test/job/legacy/" }];
        client.configXml = "<matrix-project><description>Runs the Jenkinsfile checks</description></matrix-project>";

        const inventory = await (await serviceFor(client)).getAllJenkinsfiles();

        expect(inventory.jenkinsfiles).toEqual([
            {
                job_name: "legacy",
                job_type: "Other",
                source: "Job Configuration",
                content: "<matrix-project><description>Runs the Jenkinsfile checks</description></matrix-project>"
            }
        ]);
    });

    it("needs a configured connection", async () => {
        const connection = new JenkinsConnection();
        const service = new JenkinsfileService(connection, new ExecutionAnalysisService(connection, FIXED_NOW), FIXED_NOW);

        await expect(service.getAllJenkinsfiles()).rejects.toThrow(
            "Jenkins not initialized. Please configure Jenkins connection first."
        );
    });
});

describe("JenkinsfileService.getPipelineTypesSummary", () => {
    it("counts job types and definition sources", async () => {
        const client = serverWithEveryJobType();

        await expect((await serviceFor(client)).getPipelineTypesSummary()).resolves.toEqual({
            total_jobs: 6,
            pipeline_types: {
                Pipeline: { count: 2, with_jenkinsfile: 2 },
                "Multibranch Pipeline": { count: 1, with_jenkinsfile: 1 },
                Freestyle: { count: 1, with_jenkinsfile: 1 },
                Other: { count: 2, with_jenkinsfile: 0 }
            },
            jenkinsfile_sources: { "Git Repository": 2, "Inline Script": 2, "Not Available": 2 },
            errors: ["shop/feature-x: ci/Jenkinsfile not found in SCM", "Error processing job tools: 404 Not Found"],
            timestamp: "2026-01-02T03:04:05.000Z"
        });
    });
});
