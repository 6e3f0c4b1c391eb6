import { JenkinsConnection } from "../src/services/jenkins.service.js";
import { ConnectionTool } from "../src/tools/connection.tool.js";
import { ToolArgumentError } from "../src/utils/errors.js";
import { FakeJenkinsClient, connectedTo } from "./support/fake-client.js";

describe("ConnectionTool", () => {
    it("configures a connection with a normalized URL", async () => {
        const client = new FakeJenkinsClient();
        const connection = new JenkinsConnection(() => client);
        const tool = new ConnectionTool(connection, 5000);

        await expect(
            tool.configureJenkins({ url: "https://ci.example.com/", username: "ci-bot", token: "test-secret" })
        ).resolves.toEqual({ success: true, message: "Connected to Jenkins at https://ci.example.com", user: "ci-bot" });
        expect(connection.describe()).toEqual({ url: "https://ci.example.com", username: "ci-bot", timeoutMs: 5000 });
    });

    it("rejects URLs that are not http(s)", async () => {
        const tool = new ConnectionTool(new JenkinsConnection(() => new FakeJenkinsClient()));
        await expect(
            tool.configureJenkins({ url: "ci.example.com", username: "ci-bot", token: "test-secret" })
        ).rejects.toThrow(ToolArgumentError);
    });

    it("reports an unconfigured connection", async () => {
        const tool = new ConnectionTool(new JenkinsConnection());
        await expect(tool.testConnection()).resolves.toEqual({ connected: false, message: "Jenkins not configured" });
    });

    it("reports a server that stopped answering", async () => {
        const client = new FakeJenkinsClient();
        const tool = new ConnectionTool(await connectedTo(client));

        await expect(tool.testConnection()).resolves.toEqual({
            connected: true,
            url: "http://jenkins.test",
            user: "ci-bot"
        });

        client.identity = new Error("connect ECONNREFUSED");
        await expect(tool.testConnection()).resolves.toEqual({
            connected: false,
            url: "http://jenkins.test",
            error: "connect ECONNREFUSED"
        });
    });

    it("summarizes the server and its Jenkins", async () => {
        const client = new FakeJenkinsClient();
        client.jobs = [{ name: "api", url: "u" }];
        client.queue = [{ id: 1 }, { id: 2 }];
        const tool = new ConnectionTool(await connectedTo(client));

        const info = await tool.getServerInfo();

        expect(info.name).toBe("Pipeline Awareness");
        expect(info.jenkins).toEqual({
            configured: true,
            url: "http://jenkins.test",
            username: "ci-bot",
            timeoutMs: 1000,
            user: "ci-bot",
            job_count: 1,
            queue_length: 2
        });
    });
});
