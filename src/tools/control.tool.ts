import { BuildParameters, CallOptions, JenkinsConnection } from "../services/jenkins.service.js";
import { loggerFor } from "../utils/logger.js";

const logger = loggerFor("control");

export interface ConfirmationRequired {
    confirmation_required: true;
    message: string;
}

export interface ControlResult {
    success: true;
    message: string;
    queue_id?: number;
    queue_url?: string;
}

function confirmation(intro: string, effects: string[]): ConfirmationRequired {
    const bullets = effects.map((effect) => `- ${effect}`).join("\n");
    return {
        confirmation_required: true,
        message: `SAFETY CHECK REQUIRED\n\n${intro}\n\nThis will:\n${bullets}\n\nTo proceed, call this tool again with confirm=true`
    };
}

function describeParameters(parameters: BuildParameters | undefined): string {
    if (!parameters || Object.keys(parameters).length === 0) {
        return "";
    }
    const pairs = Object.entries(parameters).map(([key, value]) => `${key}=${String(value)}`);
    return ` with parameters: ${pairs.join(", ")}`;
}

/**
 * State-changing operations. Nothing is sent to Jenkins until the caller
 * repeats the call with confirm=true.
 */
export class ControlTool {
    constructor(private connection: JenkinsConnection) {}

    async triggerBuild(
        args: { pipeline_name: string; parameters?: BuildParameters; confirm: boolean },
        options?: CallOptions
    ): Promise<ConfirmationRequired | ControlResult> {
        const { pipeline_name, parameters, confirm } = args;
        if (!confirm) {
            return confirmation(
                `You are about to trigger a new build for pipeline '${pipeline_name}'${describeParameters(parameters)}.`,
                [
                    "Start a new build immediately",
                    "Consume Jenkins resources",
                    "May trigger downstream pipelines",
                    "Could affect production systems"
                ]
            );
        }

        const queued = await this.connection.require().buildJob(pipeline_name, parameters, options);
        logger.info(`Triggered build for ${pipeline_name}`, { queueId: queued.queueId });
        return {
            success: true,
            message: `Successfully triggered build for pipeline '${pipeline_name}'`,
            queue_id: queued.queueId,
            queue_url: queued.queueUrl
        };
    }

    async stopBuild(
        args: { pipeline_name: string; build_number: number; confirm: boolean },
        options?: CallOptions
    ): Promise<ConfirmationRequired | ControlResult> {
        const { pipeline_name, build_number, confirm } = args;
        if (!confirm) {
            return confirmation(`You are about to STOP build #${build_number} of pipeline '${pipeline_name}'.`, [
                "Immediately halt the running build",
                "Mark the build as ABORTED",
                "Stop any running processes",
                "May leave systems in inconsistent state"
            ]);
        }

        await this.connection.require().stopBuild(pipeline_name, build_number, options);
        logger.info(`Stopped ${pipeline_name} #${build_number}`);
        return { success: true, message: `Successfully stopped build #${build_number} for pipeline '${pipeline_name}'` };
    }

    async setPipelineEnabled(
        args: { pipeline_name: string; enabled: boolean; confirm: boolean },
        options?: CallOptions
    ): Promise<ConfirmationRequired | ControlResult> {
        const { pipeline_name, enabled, confirm } = args;
        if (!confirm) {
            const effects = enabled
                ? ["Allow new builds to start", "Resume scheduled builds", "Enable webhook triggers", "Allow manual triggers"]
                : ["Prevent new builds from starting", "Stop scheduled builds", "Disable webhook triggers", "Block manual triggers"];
            return confirmation(`You are about to ${enabled ? "ENABLE" : "DISABLE"} pipeline '${pipeline_name}'.`, effects);
        }

        const client = this.connection.require();
        if (enabled) {
            await client.enableJob(pipeline_name, options);
        } else {
            await client.disableJob(pipeline_name, options);
        }
        const verb = enabled ? "enabled" : "disabled";
        logger.info(`Pipeline ${pipeline_name} ${verb}`);
        return { success: true, message: `Successfully ${verb} pipeline '${pipeline_name}'` };
    }
}
