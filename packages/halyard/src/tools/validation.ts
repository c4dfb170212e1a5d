import type * as z from "zod";
import type { ArgumentViolation } from "./types.js";

/**
 * Maps zod issues onto missing / extra / mistyped key violations.
 *
 * Unrecognized keys are `extra`. An issue on a top-level key the call did
 * not send is `missing`; any other issue is `mistyped`.
 */
export function toViolations(
  issues: readonly z.core.$ZodIssue[],
  args: Record<string, unknown>,
): ArgumentViolation[] {
  const violations: ArgumentViolation[] = [];

  for (const issue of issues) {
    if (issue.code === "unrecognized_keys") {
      const prefix = issue.path.map(String).join(".");
      for (const key of issue.keys) {
        violations.push({
          kind: "extra",
          key: prefix ? `${prefix}.${key}` : key,
          message: "unexpected key",
        });
      }
      continue;
    }

    const key = issue.path.map(String).join(".");
    const topLevel = issue.path.length > 0 ? String(issue.path[0]) : "";
    const isMissing =
      topLevel !== "" && issue.path.length === 1 && !Object.hasOwn(args, topLevel);

    violations.push({
      kind: isMissing ? "missing" : "mistyped",
      key,
      message: isMissing ? "required key is missing" : issue.message,
    });
  }

  return violations;
}

/**
 * One-line summary of violations for the error message.
 */
export function formatViolations(toolName: string, violations: readonly ArgumentViolation[]): string {
  const parts = violations.map((v) => `${v.kind} '${v.key}': ${v.message}`);
  return `Invalid arguments for '${toolName}': ${parts.join("; ")}`;
}
