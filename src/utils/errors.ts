export class JenkinsNotConfiguredError extends Error {
    constructor() {
        super("Jenkins not initialized. Please configure Jenkins connection first.");
        this.name = "JenkinsNotConfiguredError";
    }
}

export class JenkinsRequestError extends Error {
    constructor(
        message: string,
        readonly path: string,
        readonly status?: number
    ) {
        super(message);
        this.name = "JenkinsRequestError";
    }
}

/** Raised when a script console call returns no delimited payload. */
export class ScriptBridgeError extends Error {
    constructor(readonly rawOutput: string) {
        super(rawOutput);
        this.name = "ScriptBridgeError";
    }
}

export class ToolArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ToolArgumentError";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
