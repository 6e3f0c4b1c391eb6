import { NOT_CONFIGURED_TEXT, PipelineResources, healthRating } from "../src/resources/pipeline.resources.js";
import { JenkinsConnection } from "../src/services/jenkins.service.js";
import { PipelineTool } from "../src/tools/pipeline.tool.js";
import { FIXED_NOW, FakeJenkinsClient, connectedTo } from "./support/fake-client.js";

const WORKFLOW = "org.jenkinsci.plugins.workflow.job.WorkflowJob";
const FREESTYLE = "hudson.model.FreeStyleProject";

function clientWithJobs(): FakeJenkinsClient {
    const client = new FakeJenkinsClient();
    client.jobs = [
        { _class: WORKFLOW, name: "api", url: "u1", lastBuild: { number: 3, result: "FAILURE" } },
        { _class: WORKFLOW, name: "web", url: "u2", lastBuild: { number: 8, result: "SUCCESS" } },
        { _class: FREESTYLE, name: "docs", url: "u3", disabled: true },
        { _class: WORKFLOW, name: "ops", url: "u4", healthReport: [{ score: 100 }] }
    ];
    return client;
}

async function resourcesFor(client: FakeJenkinsClient): Promise<PipelineResources> {
    const connection = await connectedTo(client);
    return new PipelineResources(connection, new PipelineTool(connection), FIXED_NOW);
}

describe("healthRating", () => {
    it("grades by the share of failing pipelines", () => {
        expect(healthRating(0, 0)).toBe("GOOD");
        expect(healthRating(1, 20)).toBe("GOOD");
        expect(healthRating(1, 4)).toBe("WARNING");
        expect(healthRating(2, 4)).toBe("CRITICAL");
    });
});

describe("PipelineResources", () => {
    it("explains that Jenkins is not configured", async () => {
        const connection = new JenkinsConnection();
        const resources = new PipelineResources(connection, new PipelineTool(connection));

        await expect(resources.read("pipeline://status")).resolves.toEqual({
            mimeType: "text/plain",
            text: NOT_CONFIGURED_TEXT
        });
        await expect(resources.read("pipeline://api/logs/3")).resolves.toEqual({
            mimeType: "text/plain",
            text: "Jenkins not configured. Please configure Jenkins connection first."
        });
    });

    it("counts pipelines by type and state", async () => {
        const content = await (await resourcesFor(clientWithJobs())).read("pipeline://status");

        expect(content.mimeType).toBe("application/json");
        expect(JSON.parse(content.text)).toEqual({
            jenkins_user: "ci-bot",
            total_pipelines: 4,
            freestyle_pipelines: 1,
            workflow_pipelines: 3,
            enabled_pipelines: 3,
            disabled_pipelines: 1,
            last_updated: "2026-01-02T03:04:05.000Z"
        });
    });

    it("rates overall health and raises alerts", async () => {
        const content = await (await resourcesFor(clientWithJobs())).read("pipeline://health");

        expect(JSON.parse(content.text)).toEqual({
            overall_health: "WARNING",
            total_pipelines: 4,
            enabled_pipelines: 3,
            failed_pipelines: 1,
            health_percentage: 66.67,
            alerts: ["1 pipelines have failed builds", "1 pipelines are disabled"],
            health_check_date: "2026-01-02T03:04:05.000Z"
        });
    });

    it("lists every job on the dashboard", async () => {
        const content = await (await resourcesFor(clientWithJobs())).read("pipeline://dashboard");
        const dashboard = JSON.parse(content.text);

        expect(dashboard.pipelines).toHaveLength(4);
        expect(dashboard.pipelines[3]).toEqual({
            name: "ops",
            display_name: "ops",
            url: "u4",
            enabled: true,
            last_build_status: null,
            health_score: 100
        });
    });

    it("returns build logs for folder jobs", async () => {
        const client = clientWithJobs();
        client.consoleOutput = "Started by user ci-bot\nFinished: SUCCESS";

        await expect((await resourcesFor(client)).read("pipeline://team%2Fapi/logs/3")).resolves.toEqual({
            mimeType: "text/plain",
            text: "Started by user ci-bot\nFinished: SUCCESS"
        });
        expect(client.calls).toEqual(["getConsoleOutput:3"]);
    });

    it("summarizes one pipeline", async () => {
        const client = clientWithJobs();
        client.jobInfo = { _class: WORKFLOW, name: "api", url: "u1", description: "Service" };
        client.builds = [{ number: 3 }];
        client.buildInfo.set(3, { number: 3, result: "FAILURE", duration: 4000 });

        const content = await (await resourcesFor(client)).read("pipeline://api/summary");

        expect(JSON.parse(content.text)).toEqual({
            pipeline: {
                name: "api",
                display_name: "api",
                url: "u1",
                description: "Service",
                is_enabled: true,
                health_score: null
            },
            recent_builds: [{ number: 3, status: "FAILURE", duration_ms: 4000, timestamp: null }],
            summary_generated: "2026-01-02T03:04:05.000Z"
        });
    });

    it("reports Jenkins failures as text", async () => {
        const client = clientWithJobs();
        client.jobInfo = new Error("404 Not Found");

        await expect((await resourcesFor(client)).read("pipeline://gone/summary")).resolves.toEqual({
            mimeType: "text/plain",
            text: "Error getting summary for gone: 404 Not Found"
        });
    });

    it("reports a malformed escape in the pipeline name as text", async () => {
        const client = clientWithJobs();
        const resources = await resourcesFor(client);

        await expect(resources.read("pipeline://a%zz/summary")).resolves.toEqual({
            mimeType: "text/plain",
            text: "Error getting summary for a%zz: URI malformed"
        });
        await expect(resources.read("pipeline://a%zz/logs/2")).resolves.toEqual({
            mimeType: "text/plain",
            text: "Error getting logs for a%zz build #2: URI malformed"
        });
        expect(client.calls).toEqual([]);
    });

    it("rejects unknown URIs", async () => {
        await expect((await resourcesFor(clientWithJobs())).read("pipeline://nowhere")).rejects.toThrow(
            "Unknown resource: pipeline://nowhere"
        );
    });
});
