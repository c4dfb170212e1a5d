import { isAbsolute, relative, resolve, sep } from "node:path";
import { ToolExecutionError } from "../exceptions.js";

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * Resolves a path the model sent against the project root, relative paths
 * included. The result must stay inside the root.
 */
export function resolveInProject(projectRoot: string, path: string | undefined): string {
  const root = resolve(projectRoot);
  const target = path ? resolve(root, path) : root;
  if (!isInside(root, target)) {
    throw new ToolExecutionError(`path ${path} is outside the project root ${root}`);
  }
  return target;
}

/**
 * Like `resolveInProject`, but only absolute paths are accepted.
 */
export function requireAbsoluteInProject(projectRoot: string, path: string): string {
  if (!isAbsolute(path)) {
    throw new ToolExecutionError(
      `the path ${path} is not an absolute path. Please provide an absolute path.`,
    );
  }
  return resolveInProject(projectRoot, path);
}

/**
 * Project-relative path with forward slashes, as used by glob filters.
 */
export function toProjectRelative(projectRoot: string, absolutePath: string): string {
  return relative(resolve(projectRoot), absolutePath).split(sep).join("/");
}
