import { PipelinePrompts } from "../src/prompts/pipeline.prompts.js";
import { ExecutionAnalysisService } from "../src/services/execution-analysis.service.js";
import { JenkinsConnection } from "../src/services/jenkins.service.js";
import { PipelineTool } from "../src/tools/pipeline.tool.js";
import { ToolArgumentError } from "../src/utils/errors.js";
import { FIXED_NOW, FakeJenkinsClient, connectedTo } from "./support/fake-client.js";

function promptsFor(connection: JenkinsConnection): PipelinePrompts {
    return new PipelinePrompts(connection, new PipelineTool(connection), new ExecutionAnalysisService(connection, FIXED_NOW));
}

describe("PipelinePrompts", () => {
    it("quotes the start of the job configuration for a security audit", async () => {
        const client = new FakeJenkinsClient();
        client.configXml = "<project><disabled>false</disabled></project>";

        const text = await promptsFor(await connectedTo(client)).render("security_audit", { pipeline_name: "app" });
        const lines = text.split("\n");

        expect(lines[0]).toBe("Perform a comprehensive security audit of Jenkins pipeline 'app':");
        expect(lines[3]).toBe("<project><disabled>false</disabled></project>...");
        expect(client.calls).toEqual(["getJobConfig:app"]);
    });

    it("includes only the last fifty log lines in a failure analysis", async () => {
        const client = new FakeJenkinsClient();
        client.buildInfo.set(7, {
            number: 7,
            result: "FAILURE",
            duration: 1500,
            timestamp: 1700000000000,
            url: "http://jenkins.test/job/app/7/"
        });
        client.consoleOutput = Array.from({ length: 60 }, (_, index) => `line ${index + 1}`).join("\n");

        const text = await promptsFor(await connectedTo(client)).render("failure_analysis", {
            pipeline_name: "app",
            build_number: "7"
        });

        expect(text).toContain("- Status: FAILURE\n- Duration: 1500ms\n- Timestamp: 2023-11-14T22:13:20.000Z");
        expect(text).toContain("Console Output (last 50 lines):\nline 11\n");
        expect(text).not.toContain("line 10\n");
        expect(text).toContain("line 60\n\nPlease provide:");
    });

    it("summarizes recent builds when analyzing a pipeline", async () => {
        const client = new FakeJenkinsClient();
        client.jobInfo = { name: "app", url: "http://jenkins.test/job/app/", healthReport: [{ score: 80 }] };
        client.builds = [{ number: 2 }, { number: 1 }];
        client.buildInfo.set(2, { number: 2, result: "SUCCESS", timestamp: 1700000000000 });
        client.buildInfo.set(1, { number: 1, result: "FAILURE" });

        const text = await promptsFor(await connectedTo(client)).render("analyze_pipeline", { pipeline_name: "app" });

        expect(text).toContain("- Health Score: 80");
        expect(text).toContain(
            "Recent Builds (2 builds):\n- Build #2: SUCCESS (2023-11-14 22:13)\n- Build #1: FAILURE (Unknown time)"
        );
    });

    it("rejects missing or malformed arguments", async () => {
        const prompts = promptsFor(await connectedTo(new FakeJenkinsClient()));

        await expect(prompts.render("analyze_pipeline", {})).rejects.toThrow(ToolArgumentError);
        await expect(prompts.render("failure_analysis", { pipeline_name: "app", build_number: "x" })).rejects.toThrow(
            "build_number must be a positive integer"
        );
        await expect(prompts.render("deploy_everything", {})).rejects.toThrow("Unknown prompt: deploy_everything");
    });

    it("reports an unconfigured connection inside the prompt", async () => {
        const text = await promptsFor(new JenkinsConnection()).render("security_audit", { pipeline_name: "app" });

        expect(text).toBe(
            "Error generating security audit prompt: Jenkins not initialized. Please configure Jenkins connection first."
        );
    });
});
