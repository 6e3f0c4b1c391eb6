import { ExecutionAnalysisService } from "../src/services/execution-analysis.service.js";
import { JenkinsConnection } from "../src/services/jenkins.service.js";
import { isErrorPayload } from "../src/types/index.js";
import { JenkinsNotConfiguredError } from "../src/utils/errors.js";
import { FIXED_NOW, FakeJenkinsClient, connectedTo } from "./support/fake-client.js";

function clientWithHistory(): FakeJenkinsClient {
    const client = new FakeJenkinsClient();
    client.builds = [{ number: 3 }, { number: 2 }, { number: 1 }];
    client.buildInfo.set(3, new Error("build record unavailable"));
    client.buildInfo.set(2, { number: 2, result: "SUCCESS" });
    client.buildInfo.set(1, { number: 1, result: "SUCCESS" });
    client.workflowRun = {
        durationMillis: 50000,
        stages: [
            { name: "Checkout", durationMillis: 5000 },
            { name: "Build", durationMillis: 30000 },
            { name: "Test", durationMillis: 15000 }
        ]
    };
    return client;
}

describe("ExecutionAnalysisService.reconstruct", () => {
    it("reconstructs from the most recent successful build", async () => {
        const client = clientWithHistory();
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);

        const result = await service.reconstruct("app");

        if (isErrorPayload(result)) {
            throw new Error(result.error);
        }
        expect(result.pipeline_name).toBe("app");
        expect(result.build_analyzed).toBe(2);
        expect(result.reconstruction_method).toBe("execution_flow_analysis");
        expect(result.timestamp).toBe("2026-01-02T03:04:05.000Z");
        expect(result.analysis.stage_breakdown[1].percentage).toBeCloseTo(60);
        expect(result.reconstructed_definition).toContain("checkout scm");
        expect(client.calls).toEqual([
            "getBuilds:app",
            "getBuildInfo:3",
            "getBuildInfo:2",
            "getBuildInfo:1",
            "getWorkflowRun:2",
            "getJobConfig:app"
        ]);
    });

    it("reports when no build succeeded without touching config or scripts", async () => {
        const client = new FakeJenkinsClient();
        client.builds = [{ number: 2 }, { number: 1 }];
        client.buildInfo.set(2, { number: 2, result: "FAILURE" });
        client.buildInfo.set(1, { number: 1, result: "ABORTED" });
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);

        await expect(service.reconstruct("app")).resolves.toEqual({ error: "No successful builds found for analysis" });
        expect(client.calls).not.toContain("getJobConfig:app");
        expect(client.calls).not.toContain("executeScript");
        expect(client.calls).not.toContain("getWorkflowRun:2");
    });

    it("reports missing execution data", async () => {
        const client = clientWithHistory();
        client.workflowRun = new Error("wfapi missing");
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);

        await expect(service.reconstruct("app")).resolves.toEqual({ error: "Could not retrieve execution data" });
    });

    it("wraps other failures in an error payload", async () => {
        const client = clientWithHistory();
        client.configXml = new Error("config gone");
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);

        await expect(service.reconstruct("app")).resolves.toEqual({
            error: "Failed to reconstruct Jenkinsfile: config gone"
        });
    });

    it("stops fetching build records once the caller aborts", async () => {
        const client = clientWithHistory();
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);
        const controller = new AbortController();
        controller.abort();

        const result = await service.reconstruct("app", { signal: controller.signal });

        expect(isErrorPayload(result) && result.error.startsWith("Failed to reconstruct Jenkinsfile: ")).toBe(true);
        expect(client.calls).toEqual(["getBuilds:app"]);
    });

    it("throws when Jenkins is not configured", async () => {
        const service = new ExecutionAnalysisService(new JenkinsConnection());
        await expect(service.reconstruct("app")).rejects.toThrow(JenkinsNotConfiguredError);
    });
});

describe("ExecutionAnalysisService.suggestImprovements", () => {
    it("uses the supplied text and analysis without calling Jenkins", async () => {
        const client = new FakeJenkinsClient();
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);
        const analysis = {
            total_stages: 0,
            total_duration_ms: 0,
            total_duration_formatted: "0.0 seconds",
            stage_breakdown: [],
            technology_flags: []
        };

        const report = await service.suggestImprovements("app", "timeout retry when withCredentials", analysis);

        expect(report).toEqual({
            pipeline_name: "app",
            total_suggestions: 0,
            suggestions: [],
            analysis_summary: { technologies: [], total_duration: "0.0 seconds", stage_count: 0 }
        });
        expect(client.calls).toEqual([]);
    });

    it("reconstructs first when the definition is omitted", async () => {
        const client = clientWithHistory();
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);

        const report = await service.suggestImprovements("app");

        if (isErrorPayload(report)) {
            throw new Error(report.error);
        }
        expect(report.analysis_summary).toEqual({ technologies: [], total_duration: "50.0 seconds", stage_count: 3 });
        expect(report.suggestions.map((suggestion) => suggestion.title)).toEqual([
            "Add timeout controls",
            "Add retry logic",
            "Add conditional execution",
            "Secure credential handling"
        ]);
    });

    it("passes reconstruction errors through", async () => {
        const client = new FakeJenkinsClient();
        const service = new ExecutionAnalysisService(await connectedTo(client), FIXED_NOW);
        await expect(service.suggestImprovements("app")).resolves.toEqual({
            error: "No successful builds found for analysis"
        });
    });
});
