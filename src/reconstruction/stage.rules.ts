import { StageRecord } from "../types/index.js";
import { block, quote } from "./groovy.js";

/**
 * Stage synthesis is table driven. Each table is evaluated top to bottom and
 * the first rule whose predicate matches renders the lines. Predicates see the
 * lower-cased stage name as well as the original one.
 */
export interface StageContext {
    stage: StageRecord;
    lowerName: string;
}

export interface StageRule {
    id: string;
    matches: (context: StageContext) => boolean;
    render: (context: StageContext) => string[];
}

const mentions = (...keywords: string[]) => (context: StageContext) =>
    keywords.some((keyword) => context.lowerName.includes(keyword));

const echoScript = (message: string) => block("script", [`echo ${quote(message)}`]);

const steps = (body: string[]) => block("steps", body);

const matrixStep = (label: string) =>
    block(`stage('${label}')`, steps([`echo "Do ${label} for \${PLATFORM} - \${BROWSER}"`]));

const axis = (name: string, values: string[]) =>
    block("axis", [`name ${quote(name)}`, `values ${values.map(quote).join(", ")}`]);

// The trace exposes no matrix cells, so the axes below are a representative skeleton.
function renderMatrix(): string[] {
    return block("matrix", [
        ...block("axes", [
            ...axis("PLATFORM", ["linux", "windows", "mac"]),
            ...axis("BROWSER", ["firefox", "chrome", "safari", "edge"])
        ]),
        ...block("excludes", [
            ...block("exclude", [...axis("PLATFORM", ["linux"]), ...axis("BROWSER", ["safari"])])
        ]),
        ...block("stages", [...matrixStep("Build"), ...matrixStep("Test")])
    ]);
}

function renderParallel(): string[] {
    const branch = (index: number) =>
        block(`stage('Branch ${index}')`, steps([`echo 'Branch ${index} execution'`]));
    return block("parallel", [...branch(1), ...branch(2)]);
}

/** Steps-body rules for an ordinary stage, in priority order. */
export const STAGE_BODY_RULES: StageRule[] = [
    {
        id: "input",
        matches: mentions("input", "prompt"),
        render: () =>
            steps(
                block("input", [
                    "message 'Deploy to production?'",
                    "ok 'Deploy'",
                    "submitter 'admin,deployer'",
                    ...block("parameters", [
                        "string(name: 'VERSION', defaultValue: '1.0.0', description: 'Version to deploy')"
                    ])
                ])
            )
    },
    {
        id: "script",
        matches: mentions("script", "groovy"),
        render: () =>
            steps(
                block("script", [
                    "def browsers = ['chrome', 'firefox']",
                    ...block("for (int i = 0; i < browsers.size(); ++i)", ['echo "Testing the ${browsers[i]} browser"'])
                ])
            )
    },
    {
        id: "checkout",
        matches: mentions("checkout", "scm"),
        render: () => steps(["checkout scm"])
    },
    {
        id: "parallel",
        matches: mentions("parallel"),
        render: renderParallel
    },
    {
        id: "setup",
        matches: mentions("setup", "init"),
        render: () => steps(echoScript("Initializing build environment"))
    },
    {
        id: "build",
        matches: mentions("build", "compile"),
        render: () => steps(echoScript("Building application"))
    },
    {
        id: "test",
        matches: mentions("test"),
        render: () => steps(echoScript("Running tests"))
    },
    {
        id: "deploy",
        matches: mentions("deploy"),
        render: () => steps(echoScript("Deploying application"))
    },
    {
        id: "generic",
        matches: () => true,
        render: ({ stage }) => steps(echoScript(`Executing ${stage.name}`))
    }
];

function stageAgent({ lowerName }: StageContext): string[] {
    const os = ["windows", "mac", "linux"].find((candidate) => lowerName.includes(candidate));
    return os === undefined ? [] : [`agent { label '${os}' }`];
}

function stageEnvironment({ lowerName }: StageContext): string[] {
    if (lowerName.includes("production") || lowerName.includes("prod")) {
        return block("environment", ["DEPLOY_ENV = 'production'"]);
    }
    if (lowerName.includes("staging")) {
        return block("environment", ["DEPLOY_ENV = 'staging'"]);
    }
    return [];
}

function stageTools({ lowerName }: StageContext): string[] {
    const tools: string[] = [];
    if (lowerName.includes("maven") || lowerName.includes("mvn")) {
        tools.push("maven 'maven'");
    }
    if (lowerName.includes("gradle")) {
        tools.push("gradle 'gradle'");
    }
    if (lowerName.includes("npm") || lowerName.includes("node")) {
        tools.push("nodejs 'nodejs'");
    }
    return tools.length === 0 ? [] : block("tools", tools);
}

function stageWhen({ lowerName }: StageContext): string[] {
    if (lowerName.includes("branch")) {
        return block("when", ["branch 'main'"]);
    }
    if (lowerName.includes("environment")) {
        return block("when", ["environment name: 'DEPLOY_TO', value: 'production'"]);
    }
    if (lowerName.includes("not")) {
        return block("when", ["not { branch 'develop' }"]);
    }
    return [];
}

function stagePost({ lowerName }: StageContext): string[] {
    const conditions: string[] = [];
    if (lowerName.includes("archive") || lowerName.includes("artifact")) {
        conditions.push(...block("success", ["archiveArtifacts artifacts: '**/*', fingerprint: true"]));
    }
    if (lowerName.includes("report") || lowerName.includes("junit")) {
        conditions.push(...block("always", ["junit '**/test-results/*.xml'"]));
    }
    return conditions.length === 0 ? [] : block("post", conditions);
}

function renderOrdinaryStage(context: StageContext): string[] {
    const body = STAGE_BODY_RULES.find((rule) => rule.matches(context)) ?? STAGE_BODY_RULES[STAGE_BODY_RULES.length - 1];
    return [
        ...stageAgent(context),
        ...stageEnvironment(context),
        ...stageTools(context),
        ...stageWhen(context),
        ...body.render(context),
        ...stagePost(context)
    ];
}

/** Top-level stage rules: a matrix skeleton, otherwise an ordinary stage. */
export const STAGE_RULES: StageRule[] = [
    {
        id: "matrix",
        matches: mentions("matrix"),
        render: renderMatrix
    },
    {
        id: "ordinary",
        matches: () => true,
        render: renderOrdinaryStage
    }
];

export function renderStage(stage: StageRecord): string[] {
    const context: StageContext = { stage, lowerName: stage.name.toLowerCase() };
    const rule = STAGE_RULES.find((candidate) => candidate.matches(context)) ?? STAGE_RULES[STAGE_RULES.length - 1];
    return block(`stage(${quote(stage.name)})`, rule.render(context));
}
