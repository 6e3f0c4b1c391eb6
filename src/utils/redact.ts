import { createHash } from "crypto";

interface RedactionRule {
    kind: string;
    pattern: RegExp;
    /** Capture group holding the secret; 0 redacts the whole match. */
    group: number;
}

const RULES: RedactionRule[] = [
    { kind: "PASSWORD", pattern: /(password|passwd|pwd)\s*[:=]\s*["']?([^"'\s]{3,})["']?/gi, group: 2 },
    { kind: "TOKEN", pattern: /(token|bearer|api[_-]?key)\s*[:=]\s*["']?([a-zA-Z0-9._-]{10,})["']?/gi, group: 2 },
    { kind: "SECRET", pattern: /(secret|key)\s*[:=]\s*["']?([a-zA-Z0-9._-]{10,})["']?/gi, group: 2 },
    { kind: "EMAIL", pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, group: 0 },
    { kind: "IP", pattern: /\b(?:[0-9]{1,3}\.){3}[0-9]{1,3}\b/g, group: 0 },
    { kind: "URL", pattern: /https?:\/\/[^\s<>"{}|\\^`[\]]+/g, group: 0 }
];

export function hashToken(kind: string, value: string): string {
    const digest = createHash("sha256").update(value).digest("hex").slice(0, 8);
    return `[${kind}_HASH_${digest}]`;
}

function redactMatch(rule: RedactionRule, match: string): string {
    if (rule.group === 0) {
        return hashToken(rule.kind, match);
    }
    const single = new RegExp(rule.pattern.source, rule.pattern.flags.replace("g", ""));
    const value = single.exec(match)?.[rule.group];
    return value ? match.replace(value, hashToken(rule.kind, value)) : match;
}

/**
 * Replaces credentials, e-mail addresses, IPv4 addresses and URLs with a
 * stable hash token so the same value always maps to the same placeholder.
 */
export function redactSensitiveText(text: string): string {
    return RULES.reduce((current, rule) => current.replace(rule.pattern, (match) => redactMatch(rule, match)), text);
}

export function redactDeep(value: unknown): unknown {
    if (typeof value === "string") {
        return redactSensitiveText(value);
    }
    if (Array.isArray(value)) {
        return value.map(redactDeep);
    }
    if (value !== null && typeof value === "object") {
        return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, redactDeep(entry)]));
    }
    return value;
}
