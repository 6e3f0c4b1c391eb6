import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
    CallToolRequestSchema,
    GetPromptRequestSchema,
    ListPromptsRequestSchema,
    ListResourceTemplatesRequestSchema,
    ListResourcesRequestSchema,
    ListToolsRequestSchema,
    ReadResourceRequestSchema,
    Tool
} from "@modelcontextprotocol/sdk/types.js";
import express, { NextFunction, Request, Response } from "express";
import { Server as HttpServer } from "http";
import { z } from "zod";

import { PROMPTS, PipelinePrompts } from "./prompts/pipeline.prompts.js";
import { PipelineResources, RESOURCE_TEMPLATES, STATIC_RESOURCES } from "./resources/pipeline.resources.js";
import { ExecutionAnalysisService } from "./services/execution-analysis.service.js";
import { CallOptions, JenkinsConnection } from "./services/jenkins.service.js";
import { JenkinsfileService } from "./services/jenkinsfile.service.js";
import { ConnectionTool } from "./tools/connection.tool.js";
import { ControlTool } from "./tools/control.tool.js";
import { JenkinsfileTool } from "./tools/jenkinsfile.tool.js";
import { MonitoringTool } from "./tools/monitoring.tool.js";
import { PipelineTool } from "./tools/pipeline.tool.js";
import {
    BuildArgsSchema,
    BuildLogArgsSchema,
    ConfigureJenkinsArgsSchema,
    EnableDisableArgsSchema,
    ListPipelinesArgsSchema,
    NoArgsSchema,
    PipelineArgsSchema,
    PipelineBuildsArgsSchema,
    StopBuildArgsSchema,
    SuggestImprovementsArgsSchema,
    TriggerBuildArgsSchema,
    describeArgumentIssues
} from "./tools/schemas.js";
import { config } from "./utils/config.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";
import { redactDeep, redactSensitiveText } from "./utils/redact.js";

type ToolHandler = (args: unknown, options: CallOptions) => Promise<unknown>;

/** Parses the raw arguments with `schema` before `run` sees them. */
function defineTool<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    run: (args: T, options: CallOptions) => Promise<unknown>
): ToolHandler {
    return async (args, options) => run(schema.parse(args), options);
}

function describeToolError(error: unknown): string {
    return error instanceof z.ZodError ? describeArgumentIssues(error) : errorMessage(error);
}

export type ToolResponse = {
    content: Array<{ type: "text"; text: string }>;
    isError?: boolean;
};

const pipelineName = { type: "string", description: "Jenkins job name; folders are separated by '/'" };
const buildNumber = { type: "integer", minimum: 1, description: "Build number" };
const confirm = { type: "boolean", description: "Must be true to perform the action" };

const TOOL_DEFINITIONS: Tool[] = [
    {
        name: "list_pipelines",
        description: "List pipeline and freestyle jobs, optionally filtered by name or description.",
        inputSchema: {
            type: "object",
            properties: {
                search: { type: "string", description: "Case-insensitive text to match" },
                limit: { type: "integer", minimum: 1, description: "Maximum number of pipelines (default 50)" }
            }
        }
    },
    {
        name: "get_pipeline_details",
        description: "Details of one pipeline: status, last build and health score.",
        inputSchema: { type: "object", properties: { pipeline_name: pipelineName }, required: ["pipeline_name"] }
    },
    {
        name: "get_pipeline_builds",
        description: "Recent builds of a pipeline, newest first.",
        inputSchema: {
            type: "object",
            properties: {
                pipeline_name: pipelineName,
                limit: { type: "integer", minimum: 1, description: "Maximum number of builds (default 20)" },
                status: { type: "string", description: "Only builds with this status (SUCCESS, FAILURE, RUNNING, ...)" }
            },
            required: ["pipeline_name"]
        }
    },
    {
        name: "get_build_log",
        description: "Console output of a build, optionally only its last lines.",
        inputSchema: {
            type: "object",
            properties: {
                pipeline_name: pipelineName,
                build_number: buildNumber,
                tail_lines: { type: "integer", minimum: 1, description: "Return only this many trailing lines" }
            },
            required: ["pipeline_name", "build_number"]
        }
    },
    {
        name: "get_pipeline_config",
        description: "Raw config.xml of a job together with its parsed form.",
        inputSchema: { type: "object", properties: { pipeline_name: pipelineName }, required: ["pipeline_name"] }
    },
    {
        name: "trigger_pipeline_build",
        description: "Start a build. Returns a safety check unless confirm is true.",
        inputSchema: {
            type: "object",
            properties: {
                pipeline_name: pipelineName,
                parameters: { type: "object", description: "Build parameters as name/value pairs" },
                confirm
            },
            required: ["pipeline_name"]
        }
    },
    {
        name: "stop_pipeline_build",
        description: "Abort a running build. Returns a safety check unless confirm is true.",
        inputSchema: {
            type: "object",
            properties: { pipeline_name: pipelineName, build_number: buildNumber, confirm },
            required: ["pipeline_name", "build_number"]
        }
    },
    {
        name: "enable_disable_pipeline",
        description: "Enable or disable a pipeline. Returns a safety check unless confirm is true.",
        inputSchema: {
            type: "object",
            properties: {
                pipeline_name: pipelineName,
                enabled: { type: "boolean", description: "true to enable, false to disable" },
                confirm
            },
            required: ["pipeline_name", "enabled"]
        }
    },
    {
        name: "configure_jenkins",
        description: "Connect to a Jenkins server. The connection is kept only if the credentials work.",
        inputSchema: {
            type: "object",
            properties: {
                url: { type: "string", description: "Base URL, http:// or https://" },
                username: { type: "string" },
                token: { type: "string", description: "API token" }
            },
            required: ["url", "username", "token"]
        }
    },
    {
        name: "test_connection",
        description: "Check that the configured Jenkins still answers.",
        inputSchema: { type: "object", properties: {} }
    },
    {
        name: "get_server_info",
        description: "Server version, transport and the active Jenkins connection.",
        inputSchema: { type: "object", properties: {} }
    },
    {
        name: "reconstruct_jenkinsfile",
        description: "Rebuild a declarative Jenkinsfile from the job config and its latest successful run.",
        inputSchema: { type: "object", properties: { pipeline_name: pipelineName }, required: ["pipeline_name"] }
    },
    {
        name: "suggest_pipeline_improvements",
        description: "Suggest reliability, security and performance improvements for a pipeline.",
        inputSchema: {
            type: "object",
            properties: {
                pipeline_name: pipelineName,
                jenkinsfile: { type: "string", description: "Pipeline text to review; reconstructed when omitted" },
                analysis: { type: "object", description: "Stage analysis as returned by reconstruct_jenkinsfile" }
            },
            required: ["pipeline_name"]
        }
    },
    {
        name: "get_jenkinsfile",
        description: "The Jenkinsfile in use: from SCM, the inline job script, or a reconstruction.",
        inputSchema: { type: "object", properties: { pipeline_name: pipelineName }, required: ["pipeline_name"] }
    },
    {
        name: "get_jenkinsfile_for_build",
        description: "The Jenkinsfile at the SCM revision a given build ran.",
        inputSchema: {
            type: "object",
            properties: { pipeline_name: pipelineName, build_number: buildNumber },
            required: ["pipeline_name", "build_number"]
        }
    },
    {
        name: "analyze_pipeline_failure",
        description: "Error lines, likely root cause, suggested fixes and priority of a failed build.",
        inputSchema: {
            type: "object",
            properties: { pipeline_name: pipelineName, build_number: buildNumber },
            required: ["pipeline_name", "build_number"]
        }
    },
    {
        name: "get_pipeline_dependencies",
        description: "Upstream projects that trigger a pipeline and downstream projects it triggers.",
        inputSchema: { type: "object", properties: { pipeline_name: pipelineName }, required: ["pipeline_name"] }
    },
    {
        name: "monitor_pipeline_queue",
        description: "Items waiting in the build queue, with blocked and stuck counts.",
        inputSchema: { type: "object", properties: {} }
    },
    {
        name: "get_all_jenkinsfiles",
        description: "Every pipeline definition found on the server, one per branch for multibranch projects.",
        inputSchema: { type: "object", properties: {} }
    },
    {
        name: "get_pipeline_types_summary",
        description: "Job counts per type and where their pipeline definitions come from.",
        inputSchema: { type: "object", properties: {} }
    }
];

export class PipelineAwarenessServer {
    private tools: Map<string, ToolHandler>;
    private resources: PipelineResources;
    private prompts: PipelinePrompts;
    private httpServer?: HttpServer;

    constructor(private connection: JenkinsConnection = new JenkinsConnection()) {
        const analysis = new ExecutionAnalysisService(connection);
        const jenkinsfiles = new JenkinsfileService(connection, analysis);

        const pipelineTool = new PipelineTool(connection);
        const controlTool = new ControlTool(connection);
        const connectionTool = new ConnectionTool(connection, config.jenkinsTimeoutMs);
        const jenkinsfileTool = new JenkinsfileTool(analysis, jenkinsfiles);
        const monitoringTool = new MonitoringTool(connection);

        this.resources = new PipelineResources(connection, pipelineTool);
        this.prompts = new PipelinePrompts(connection, pipelineTool, analysis);
        this.tools = new Map();

        this.tools.set(
            "list_pipelines",
            defineTool(ListPipelinesArgsSchema, (args, options) => pipelineTool.listPipelines(args, options))
        );
        this.tools.set(
            "get_pipeline_details",
            defineTool(PipelineArgsSchema, (args, options) => pipelineTool.getPipelineDetails(args, options))
        );
        this.tools.set(
            "get_pipeline_builds",
            defineTool(PipelineBuildsArgsSchema, (args, options) => pipelineTool.getPipelineBuilds(args, options))
        );
        this.tools.set(
            "get_build_log",
            defineTool(BuildLogArgsSchema, (args, options) => pipelineTool.getBuildLog(args, options))
        );
        this.tools.set(
            "get_pipeline_config",
            defineTool(PipelineArgsSchema, (args, options) => pipelineTool.getPipelineConfig(args, options))
        );

        this.tools.set(
            "trigger_pipeline_build",
            defineTool(TriggerBuildArgsSchema, (args, options) => controlTool.triggerBuild(args, options))
        );
        this.tools.set(
            "stop_pipeline_build",
            defineTool(StopBuildArgsSchema, (args, options) => controlTool.stopBuild(args, options))
        );
        this.tools.set(
            "enable_disable_pipeline",
            defineTool(EnableDisableArgsSchema, (args, options) => controlTool.setPipelineEnabled(args, options))
        );

        this.tools.set(
            "configure_jenkins",
            defineTool(ConfigureJenkinsArgsSchema, (args, options) => connectionTool.configureJenkins(args, options))
        );
        this.tools.set(
            "test_connection",
            defineTool(NoArgsSchema, (_args, options) => connectionTool.testConnection(options))
        );
        this.tools.set(
            "get_server_info",
            defineTool(NoArgsSchema, (_args, options) => connectionTool.getServerInfo(options))
        );

        this.tools.set(
            "reconstruct_jenkinsfile",
            defineTool(PipelineArgsSchema, (args, options) => jenkinsfileTool.reconstructJenkinsfile(args, options))
        );
        this.tools.set(
            "suggest_pipeline_improvements",
            defineTool(SuggestImprovementsArgsSchema, (args, options) => jenkinsfileTool.suggestImprovements(args, options))
        );
        this.tools.set(
            "get_jenkinsfile",
            defineTool(PipelineArgsSchema, (args, options) => jenkinsfileTool.getJenkinsfile(args, options))
        );
        this.tools.set(
            "get_jenkinsfile_for_build",
            defineTool(BuildArgsSchema, (args, options) => jenkinsfileTool.getJenkinsfileForBuild(args, options))
        );
        this.tools.set(
            "get_all_jenkinsfiles",
            defineTool(NoArgsSchema, (_args, options) => jenkinsfiles.getAllJenkinsfiles(options))
        );
        this.tools.set(
            "get_pipeline_types_summary",
            defineTool(NoArgsSchema, (_args, options) => jenkinsfiles.getPipelineTypesSummary(options))
        );

        this.tools.set(
            "analyze_pipeline_failure",
            defineTool(BuildArgsSchema, (args, options) => monitoringTool.analyzePipelineFailure(args, options))
        );
        this.tools.set(
            "get_pipeline_dependencies",
            defineTool(PipelineArgsSchema, (args, options) => monitoringTool.getPipelineDependencies(args, options))
        );
        this.tools.set(
            "monitor_pipeline_queue",
            defineTool(NoArgsSchema, (_args, options) => monitoringTool.monitorPipelineQueue(options))
        );
    }

    /** Runs one tool and shapes the outcome as MCP text content. */
    async callTool(name: string, args: unknown, options: CallOptions = {}): Promise<ToolResponse> {
        const tool = this.tools.get(name);
        if (!tool) {
            throw new Error(`Unknown tool: ${name}`);
        }

        try {
            const result = await tool(args ?? {}, options);
            const visible = config.redactSensitiveData ? redactDeep(result) : result;
            return {
                content: [
                    {
                        type: "text" as const,
                        text: JSON.stringify(visible, null, 2)
                    }
                ]
            };
        } catch (error) {
            const message = describeToolError(error);
            logger.warn(`Tool ${name} failed`, { error: message });
            return {
                content: [
                    {
                        type: "text" as const,
                        text: JSON.stringify({
                            error: message,
                            tool: name
                        })
                    }
                ],
                isError: true
            };
        }
    }

    private visibleText(text: string): string {
        return config.redactSensitiveData ? redactSensitiveText(text) : text;
    }

    // A fresh SDK server per connection; the handlers share this instance's services.
    createMcpServer(): Server {
        const server = new Server(
            {
                name: "pipeline-awareness-mcp",
                version: config.version
            },
            {
                capabilities: {
                    tools: {},
                    resources: {},
                    prompts: {}
                }
            }
        );

        server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

        server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
            this.callTool(request.params.name, request.params.arguments, { signal: extra.signal })
        );

        server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: STATIC_RESOURCES }));

        server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
            resourceTemplates: RESOURCE_TEMPLATES
        }));

        server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
            const { uri } = request.params;
            const content = await this.resources.read(uri);
            return { contents: [{ uri, mimeType: content.mimeType, text: this.visibleText(content.text) }] };
        });

        server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: PROMPTS }));

        server.setRequestHandler(GetPromptRequestSchema, async (request) => {
            const { name, arguments: args } = request.params;
            const text = await this.prompts.render(name, args ?? {});
            return {
                description: PROMPTS.find((prompt) => prompt.name === name)?.description,
                messages: [{ role: "user" as const, content: { type: "text" as const, text: this.visibleText(text) } }]
            };
        });

        return server;
    }

    async start() {
        if (config.server.transport === "stdio") {
            await this.createMcpServer().connect(new StdioServerTransport());
            logger.info(`${config.appName} MCP server ready on stdio`);
            return;
        }
        await this.startHttp();
    }

    private async startHttp() {
        const app = express();
        app.use(express.json({ limit: "4mb" }));

        const routerPath = config.server.path.startsWith("/") ? config.server.path : `/${config.server.path}`;

        app.post(routerPath, async (req: Request, res: Response, next: NextFunction) => {
            try {
                const server = this.createMcpServer();
                const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
                res.on("close", () => {
                    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
                        logger.warn("Failed to close MCP request transport", { error: errorMessage(error) });
                    });
                });
                await server.connect(transport);
                await transport.handleRequest(req, res, req.body);
            } catch (error) {
                next(error);
            }
        });

        const methodNotAllowed = (_req: Request, res: Response) => {
            res.status(405).json({
                jsonrpc: "2.0",
                error: {
                    code: -32000,
                    message: "Method not allowed."
                },
                id: null
            });
        };
        app.get(routerPath, methodNotAllowed);
        app.delete(routerPath, methodNotAllowed);

        app.get("/health", (_req, res) => {
            res.json({ status: "ok", jenkins_configured: this.connection.isConfigured() });
        });

        app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
            logger.error("Unhandled MCP request error", { error: errorMessage(err) });
            if (!res.headersSent) {
                res.status(500).json({
                    jsonrpc: "2.0",
                    error: {
                        code: -32603,
                        message: errorMessage(err)
                    },
                    id: null
                });
            }
        });

        app.use((req, res) => {
            res.status(404).json({
                jsonrpc: "2.0",
                error: {
                    code: -32004,
                    message: `Route ${req.method} ${req.path} not found`
                },
                id: null
            });
        });

        await new Promise<void>((resolve, reject) => {
            this.httpServer = app.listen(config.server.port, () => {
                logger.info(`${config.appName} MCP server listening on http://0.0.0.0:${config.server.port}${routerPath}`);
                resolve();
            });
            this.httpServer.on("error", reject);
        });
    }
}
