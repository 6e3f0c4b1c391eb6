import { logLine, maskCredentials, readLogLevel } from "../src/utils/logger.js";

describe("readLogLevel", () => {
    it("accepts npm level names in any case", () => {
        expect(readLogLevel(" Debug ")).toBe("debug");
        expect(readLogLevel("warn")).toBe("warn");
    });

    it("falls back to info", () => {
        expect(readLogLevel(undefined)).toBe("info");
        expect(readLogLevel("loud")).toBe("info");
    });
});

describe("maskCredentials", () => {
    it("hides values whose key names a credential", () => {
        expect(
            maskCredentials().transform({ level: "info", message: "configured", token: "test-secret", user: "ci-bot" })
        ).toEqual({ level: "info", message: "configured", token: "***", user: "ci-bot" });
    });
});

describe("logLine", () => {
    it("prints the component, metadata and stack", () => {
        const info = logLine.transform({
            level: "warn",
            message: "Tool failed",
            timestamp: "2026-01-02T03:04:05.000Z",
            component: "jenkins",
            status: 404,
            path: "/job/app/api/json",
            stack: "Error: boom\n    at test"
        });

        expect(typeof info === "object" ? info[Symbol.for("message")] : info).toBe(
            "2026-01-02T03:04:05.000Z warn [jenkins]: Tool failed status=404 path=/job/app/api/json\nError: boom\n    at test"
        );
    });

    it("leaves out the scope when there is no component", () => {
        const info = logLine.transform({ level: "info", message: "ready", timestamp: "t" });

        expect(typeof info === "object" ? info[Symbol.for("message")] : info).toBe("t info: ready");
    });
});
