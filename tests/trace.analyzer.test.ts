import { analyzeTrace, detectTechnologies, formatDuration, toExecutionTrace, toFixedHalfEven } from "../src/analyzers/trace.analyzer.js";

describe("trace analyzer", () => {
    it("formats durations in seconds with one decimal", () => {
        expect(formatDuration(1500)).toBe("1.5 seconds");
        expect(formatDuration(0)).toBe("0.0 seconds");
    });

    it("rounds exact halves to the even digit", () => {
        expect(formatDuration(1250)).toBe("1.2 seconds");
        expect(formatDuration(1750)).toBe("1.8 seconds");
        expect(formatDuration(1251)).toBe("1.3 seconds");
        expect(toFixedHalfEven(12.25, 1)).toBe("12.2");
        expect(toFixedHalfEven(0.45, 1)).toBe("0.5");
    });

    it("normalizes workflow runs", () => {
        const trace = toExecutionTrace({
            durationMillis: Number.NaN,
            stages: [{ name: "Build", durationMillis: 1000 }, { durationMillis: -5 }, { name: "Deploy" }]
        });
        expect(trace).toEqual({
            stages: [
                { name: "Build", duration_ms: 1000 },
                { name: "Unknown", duration_ms: 0 },
                { name: "Deploy", duration_ms: 0 }
            ],
            total_duration_ms: 0
        });
    });

    it("computes each stage's share of the total", () => {
        const analysis = analyzeTrace({
            stages: [
                { name: "Checkout", duration_ms: 5000 },
                { name: "Build", duration_ms: 30000 },
                { name: "Test", duration_ms: 15000 }
            ],
            total_duration_ms: 50000
        });

        expect(analysis.total_stages).toBe(3);
        expect(analysis.total_duration_formatted).toBe("50.0 seconds");
        expect(analysis.stage_breakdown.map((stage) => stage.name)).toEqual(["Checkout", "Build", "Test"]);
        expect(analysis.stage_breakdown[0].percentage).toBeCloseTo(10);
        expect(analysis.stage_breakdown[1].percentage).toBeCloseTo(60);
        expect(analysis.stage_breakdown[2].percentage).toBeCloseTo(30);
        expect(analysis.stage_breakdown[1].duration_formatted).toBe("30.0 seconds");
        expect(analysis.technology_flags).toEqual([]);
    });

    it("reports zero percentages when the total is zero", () => {
        const analysis = analyzeTrace({ stages: [{ name: "Build", duration_ms: 2000 }], total_duration_ms: 0 });
        expect(analysis.stage_breakdown[0].percentage).toBe(0);
    });

    it("measures shares against wall time, not the stage sum", () => {
        const analysis = analyzeTrace({ stages: [{ name: "Build", duration_ms: 2500 }], total_duration_ms: 10000 });
        expect(analysis.stage_breakdown[0].percentage).toBeCloseTo(25);
    });

    it("detects technologies in a fixed order", () => {
        expect(
            detectTechnologies(["Load shared library", "Helm upgrade", "Push Docker image", "Apply k8s manifests", "EC2 smoke"])
        ).toEqual(["AWS", "Kubernetes", "Docker", "Helm", "SharedLibrary"]);
        expect(detectTechnologies(["Compile", "Unit"])).toEqual([]);
    });

    it("derives flags from the set of stage names regardless of order", () => {
        const names = ["Push Docker image", "Helm upgrade", "Compile"];
        const reversed = [...names].reverse();

        expect(detectTechnologies(reversed)).toEqual(detectTechnologies(names));
        expect(detectTechnologies(names)).toEqual(["Docker", "Helm"]);
        expect(detectTechnologies([...names, "Deploy to aws"])).toEqual(["AWS", "Docker", "Helm"]);
        expect(detectTechnologies([...names, "docker compose down"])).toEqual(["Docker", "Helm"]);
    });
});
