import * as path from "path";
import type { GuardPolicy, PathCategory } from "./types.js";

/**
 * Express a target path relative to the project root, with forward slashes.
 * Relative inputs are taken as relative to the root. Returns null when the
 * path escapes the root or names the root itself.
 */
export function toRelativePath(projectRoot: string, targetPath: string): string | null {
  if (!projectRoot || !targetPath) return null;
  const rel = path.relative(path.resolve(projectRoot), path.resolve(projectRoot, targetPath));
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return rel.split(path.sep).join("/");
}

function trimSlashes(p: string): string {
  return p.replace(/^\/+|\/+$/g, "");
}

/** True when rel is dir itself or lies beneath it. */
export function isWithin(rel: string, dir: string): boolean {
  const d = trimSlashes(dir);
  return rel === d || rel.startsWith(`${d}/`);
}

// Pure function of the relative path string: never touches the filesystem.
export function classifyPath(rel: string | null, policy: GuardPolicy): PathCategory {
  if (rel === null) return "protected";
  // The state file stays writable even when an overlay moves it
  if (trimSlashes(policy.state_file) === rel) return "always_writable";
  if (policy.always_writable.some((p) => trimSlashes(p) === rel)) return "always_writable";
  if (isWithin(rel, policy.user_content_dir)) return "user_content";
  return "protected";
}

export function isSystemCritical(rel: string | null, policy: GuardPolicy): boolean {
  if (rel === null) return false;
  return policy.system_critical.some((dir) => isWithin(rel, dir));
}
