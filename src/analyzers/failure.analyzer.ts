export type FailurePriority = "critical" | "high" | "medium" | "low";

const ERROR_KEYWORDS = ["error", "failed", "exception", "fatal"];
const MAX_ERROR_LINES = 10;

// Checked in order; the root cause comes from the first match, fixes from every match.
const FAILURE_CAUSES: Array<{ keyword: string; rootCause: string; fix: string }> = [
    {
        keyword: "timeout",
        rootCause: "Build timeout - likely due to slow operations or resource constraints",
        fix: "Increase timeout settings or optimize slow operations"
    },
    {
        keyword: "memory",
        rootCause: "Memory issue - insufficient memory or memory leak",
        fix: "Increase memory allocation or optimize memory usage"
    },
    {
        keyword: "permission",
        rootCause: "Permission denied - access rights issue",
        fix: "Check file permissions and user access rights"
    },
    {
        keyword: "network",
        rootCause: "Network connectivity issue",
        fix: "Check network connectivity and firewall settings"
    },
    {
        keyword: "dependency",
        rootCause: "Missing or incompatible dependency",
        fix: "Verify all dependencies are installed and up to date"
    }
];

const GENERIC_FIXES = [
    "Review build logs for specific error details",
    "Check recent changes that might have caused the failure"
];

/** The last error-looking lines of a console log, trimmed. */
export function extractErrorMessage(consoleOutput: string): string {
    if (consoleOutput.length === 0) {
        return "No console output available";
    }
    const errorLines = consoleOutput
        .split("\n")
        .filter((line) => {
            const lowered = line.toLowerCase();
            return ERROR_KEYWORDS.some((keyword) => lowered.includes(keyword));
        })
        .map((line) => line.trim());

    return errorLines.length > 0 ? errorLines.slice(-MAX_ERROR_LINES).join("\n") : "No clear error message found";
}

export function analyzeRootCause(consoleOutput: string): string {
    const lowered = consoleOutput.toLowerCase();
    const cause = FAILURE_CAUSES.find(({ keyword }) => lowered.includes(keyword));
    return cause?.rootCause ?? "Unknown root cause - requires further investigation";
}

export function suggestFixes(consoleOutput: string): string[] {
    const lowered = consoleOutput.toLowerCase();
    const fixes = FAILURE_CAUSES.filter(({ keyword }) => lowered.includes(keyword)).map(({ fix }) => fix);
    return fixes.length > 0 ? fixes : [...GENERIC_FIXES];
}

/** Only failed builds rank above "low". */
export function determinePriority(status: string, consoleOutput: string): FailurePriority {
    if (status !== "FAILURE") {
        return "low";
    }
    const lowered = consoleOutput.toLowerCase();
    if (["fatal", "critical", "security"].some((keyword) => lowered.includes(keyword))) {
        return "critical";
    }
    if (["timeout", "memory", "disk"].some((keyword) => lowered.includes(keyword))) {
        return "high";
    }
    return "medium";
}
