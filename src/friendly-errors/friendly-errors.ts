/**
 * Friendly Errors
 *
 * Parse YAML + Zod validation with human-readable errors, and render engine
 * failures for operators.
 *
 * Use `safeParseYaml` for every YAML file the engine reads (release.yaml,
 * release records) so parse and validation problems read the same way.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, ReleaseConfigSchema, "release.yaml");
 * if (!result.success) {
 *   formatFriendlyError(result.error).forEach((line) => console.error(line));
 *   process.exit(1);
 * }
 * const config = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";
import type { ReleaseError } from "#/core";

export type ParseErrorType = "missing" | "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only; the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string,
  subject: string = "configuration"
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid ${subject}${fileContext}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Render a parse error as indented lines.
 */
export function formatFriendlyError(error: FriendlyError): string[] {
  return [error.message, ...(error.details ?? []).map((detail) => `  ${detail}`)];
}

/**
 * Render a release failure: the error kind, then every sub-item that
 * succeeded or failed, then conflicting paths.
 *
 * @example formatReleaseError(err) → ["[WriteError] Failed to stamp 1 of 2 locations", "  ok      package", "  failed  init: EACCES"]
 */
export function formatReleaseError(error: ReleaseError): string[] {
  const lines = [`[${error.kind}] ${error.message}`];
  const { succeeded = [], failed = [], paths = [], values = {} } = error.details;

  for (const item of succeeded) {
    lines.push(`  ok      ${item}`);
  }
  for (const failure of failed) {
    lines.push(`  failed  ${failure.item}: ${failure.reason}`);
  }
  for (const [item, value] of Object.entries(values)) {
    lines.push(`  ${item} = ${value}`);
  }
  for (const path of paths) {
    lines.push(`  conflict  ${path}`);
  }

  return lines;
}
