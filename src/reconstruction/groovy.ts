const INDENT = "    ";

/** Single-quoted Groovy string literal. */
export function quote(value: string): string {
    return `'${escapeSingleQuoted(value)}'`;
}

/** Triple-quoted literal; line breaks stay as they are. */
export function tripleQuote(value: string): string {
    return `'''${escapeQuotes(value)}'''`;
}

function escapeQuotes(value: string): string {
    return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export function escapeSingleQuoted(value: string): string {
    return escapeQuotes(value).replace(/\r/g, "\\r").replace(/\n/g, "\\n");
}

export function indent(lines: string[], depth = 1): string[] {
    const pad = INDENT.repeat(depth);
    return lines.map((line) => (line.length > 0 ? `${pad}${line}` : line));
}

export function block(header: string, body: string[]): string[] {
    return [`${header} {`, ...indent(body), "}"];
}

/** Joins groups of lines with one blank line between non-empty groups. */
export function separated(groups: string[][]): string[] {
    const lines: string[] = [];
    for (const group of groups.filter((candidate) => candidate.length > 0)) {
        if (lines.length > 0) {
            lines.push("");
        }
        lines.push(...group);
    }
    return lines;
}
