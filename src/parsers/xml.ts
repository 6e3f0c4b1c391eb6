import { XMLParser } from "fast-xml-parser";

export type XmlValue = string | XmlElement | XmlValue[];

export interface XmlElement {
    [tag: string]: XmlValue;
}

const ATTRIBUTE_PREFIX = "@_";
const TEXT_KEY = "#text";

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    htmlEntities: true,
    trimValues: true
});

function toXmlValue(raw: unknown): XmlValue {
    if (Array.isArray(raw)) {
        return raw.map(toXmlValue);
    }
    if (raw !== null && typeof raw === "object") {
        const element: XmlElement = {};
        for (const [key, value] of Object.entries(raw)) {
            element[key] = toXmlValue(value);
        }
        return element;
    }
    return raw === undefined || raw === null ? "" : String(raw);
}

function isElement(value: XmlValue): value is XmlElement {
    return typeof value === "object" && !Array.isArray(value);
}

/**
 * Builds the element tree of a document. Throws when fast-xml-parser rejects
 * the input; callers decide how to degrade.
 */
export function parseXmlDocument(xml: string): XmlElement {
    const tree = toXmlValue(parser.parse(xml));
    return isElement(tree) ? tree : {};
}

export function isAttributeKey(key: string): boolean {
    return key.startsWith(ATTRIBUTE_PREFIX);
}

export function attribute(node: XmlValue, name: string): string | undefined {
    if (!isElement(node)) {
        return undefined;
    }
    const value = node[`${ATTRIBUTE_PREFIX}${name}`];
    return typeof value === "string" ? value : undefined;
}

export function textOf(node: XmlValue): string {
    if (typeof node === "string") {
        return node;
    }
    if (Array.isArray(node)) {
        return node.length > 0 ? textOf(node[0]) : "";
    }
    const text = node[TEXT_KEY];
    return typeof text === "string" ? text : "";
}

/** Direct children named `tag`, repeated siblings flattened in document order. */
export function children(node: XmlValue, tag: string): XmlValue[] {
    if (Array.isArray(node)) {
        return node.flatMap((item) => children(item, tag));
    }
    if (!isElement(node) || !(tag in node)) {
        return [];
    }
    const value = node[tag];
    return Array.isArray(value) ? value : [value];
}

export function hasChild(node: XmlValue, tag: string): boolean {
    return isElement(node) && tag in node;
}

export function childText(node: XmlValue, tag: string): string | undefined {
    const [first] = children(node, tag);
    return first === undefined ? undefined : textOf(first);
}

/** Depth-first search for the first element named `tag`. */
export function findFirst(node: XmlValue, tag: string): XmlValue | undefined {
    if (Array.isArray(node)) {
        for (const item of node) {
            const found = findFirst(item, tag);
            if (found !== undefined) {
                return found;
            }
        }
        return undefined;
    }
    if (!isElement(node)) {
        return undefined;
    }
    for (const [key, value] of Object.entries(node)) {
        if (isAttributeKey(key) || key === TEXT_KEY) {
            continue;
        }
        if (key === tag) {
            return Array.isArray(value) ? value[0] : value;
        }
        const found = findFirst(value, tag);
        if (found !== undefined) {
            return found;
        }
    }
    return undefined;
}

export function findFirstText(node: XmlValue, tag: string): string | undefined {
    const found = findFirst(node, tag);
    return found === undefined ? undefined : textOf(found);
}

/**
 * Every element, at any depth, whose tag or `class` attribute contains
 * `marker`. Results follow document order within a tag.
 */
export function findByMarker(node: XmlValue, marker: string): XmlValue[] {
    const matches: XmlValue[] = [];

    const visit = (tag: string, value: XmlValue) => {
        const items = Array.isArray(value) ? value : [value];
        for (const item of items) {
            const className = attribute(item, "class") ?? "";
            if (tag.includes(marker) || className.includes(marker)) {
                matches.push(item);
            }
            walk(item);
        }
    };

    const walk = (current: XmlValue) => {
        if (Array.isArray(current)) {
            current.forEach(walk);
            return;
        }
        if (!isElement(current)) {
            return;
        }
        for (const [key, value] of Object.entries(current)) {
            if (!isAttributeKey(key) && key !== TEXT_KEY) {
                visit(key, value);
            }
        }
    };

    walk(node);
    return matches;
}

/** Every string in the subtree: tag names, attribute values and text. */
export function flattenText(node: XmlValue): string {
    if (typeof node === "string") {
        return node;
    }
    if (Array.isArray(node)) {
        return node.map(flattenText).join(" ");
    }
    return Object.entries(node)
        .map(([key, value]) => (key === TEXT_KEY || isAttributeKey(key) ? flattenText(value) : `${key} ${flattenText(value)}`))
        .join(" ");
}
