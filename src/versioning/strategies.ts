/**
 * Extraction and stamping strategies for version locations.
 *
 * Each strategy turns file content into the raw version string it holds, and
 * rewrites content with a new version while leaving everything else intact.
 */

import { isScalar, parseDocument } from "yaml";
import type { VersionLocation } from "#/schemas";

export interface LocationStrategy {
  extract(content: string): string;
  replace(content: string, version: string): string;
}

function splitKey(key: string): string[] {
  return key.split(".").filter(Boolean);
}

function regexStrategy(pattern: string): LocationStrategy {
  const find = (content: string) => {
    const match = new RegExp(pattern, "md").exec(content);
    const span = match?.indices?.[1];
    if (!match || match[1] === undefined || !span) {
      throw new Error(`pattern /${pattern}/ does not match`);
    }
    return { value: match[1], start: span[0], end: span[1] };
  };

  return {
    extract: (content) => find(content).value,
    replace: (content, version) => {
      const { start, end } = find(content);
      return content.slice(0, start) + version + content.slice(end);
    },
  };
}

interface Span {
  start: number;
  end: number;
}

const WHITESPACE = /[ \t\r\n]/;
const LITERAL_END = /[ \t\r\n,\]}]/;

function skipWhitespace(text: string, pos: number): number {
  let i = pos;
  while (i < text.length && WHITESPACE.test(text.charAt(i))) i++;
  return i;
}

/** `pos` is at the opening quote; returns the index after the closing one */
function stringEnd(text: string, pos: number): number {
  let i = pos + 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      i += 2;
    } else if (ch === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  return text.length;
}

function valueEnd(text: string, pos: number): number {
  const first = text.charAt(pos);
  if (first === '"') {
    return stringEnd(text, pos);
  }
  if (first !== "{" && first !== "[") {
    let i = pos;
    while (i < text.length && !LITERAL_END.test(text.charAt(i))) i++;
    return i;
  }

  let depth = 0;
  let i = pos;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '"') {
      i = stringEnd(text, i);
      continue;
    }
    if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return i + 1;
    }
    i++;
  }
  return text.length;
}

/** `pos` is at the object's opening brace */
function findMember(text: string, pos: number, key: string): Span | null {
  let i = skipWhitespace(text, pos + 1);
  while (i < text.length && text.charAt(i) === '"') {
    const keyEnd = stringEnd(text, i);
    const name: unknown = JSON.parse(text.slice(i, keyEnd));
    const valueStart = skipWhitespace(text, skipWhitespace(text, keyEnd) + 1);
    const end = valueEnd(text, valueStart);
    if (name === key) {
      return { start: valueStart, end };
    }
    i = skipWhitespace(text, end);
    if (text.charAt(i) === ",") {
      i = skipWhitespace(text, i + 1);
    }
  }
  return null;
}

/**
 * Source span of the value at `path` in well-formed JSON text.
 */
function locateJsonValue(text: string, path: string[]): Span | null {
  let span: Span = { start: skipWhitespace(text, 0), end: text.length };
  for (const segment of path) {
    if (text.charAt(span.start) !== "{") {
      return null;
    }
    const member = findMember(text, span.start, segment);
    if (!member) {
      return null;
    }
    span = member;
  }
  return span;
}

function jsonStrategy(key: string): LocationStrategy {
  const path = splitKey(key);

  const find = (content: string) => {
    // Rejects malformed files before the span scan, which assumes valid JSON
    JSON.parse(content);
    const span = locateJsonValue(content, path);
    if (!span) {
      throw new Error(`key "${key}" not found`);
    }
    const value: unknown = JSON.parse(content.slice(span.start, span.end));
    if (typeof value !== "string") {
      throw new Error(`key "${key}" is not a string`);
    }
    return { value, ...span };
  };

  return {
    extract: (content) => find(content).value,
    replace: (content, version) => {
      const { start, end } = find(content);
      return content.slice(0, start) + JSON.stringify(version) + content.slice(end);
    },
  };
}

function yamlStrategy(key: string): LocationStrategy {
  const path = splitKey(key);

  return {
    extract: (content) => {
      const value: unknown = parseDocument(content).getIn(path);
      if (typeof value !== "string") {
        throw new Error(`key "${key}" not found or not a string`);
      }
      return value;
    },
    replace: (content, version) => {
      const doc = parseDocument(content);
      // Mutate the scalar in place so its quoting style survives
      const node = doc.getIn(path, true);
      if (!isScalar(node) || typeof node.value !== "string") {
        throw new Error(`key "${key}" not found or not a string`);
      }
      node.value = version;
      return doc.toString();
    },
  };
}

export function getStrategy(location: VersionLocation): LocationStrategy {
  switch (location.strategy) {
    case "regex":
      return regexStrategy(location.pattern);
    case "json":
      return jsonStrategy(location.key);
    case "yaml":
      return yamlStrategy(location.key);
  }
}
