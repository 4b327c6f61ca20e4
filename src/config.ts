import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { GuardPolicy } from "./types.js";

export const DEFAULTS_FILE = "write-guard.defaults.json";
export const OVERLAY_FILE = path.join(".claude", "write-guard.json");
export const ROOT_ENV = "PINE_GUARD_ROOT";

/** The package sits at <root>/.claude/hooks/<package>, three levels below the project root. */
const INSTALL_DEPTH = 3;

export class PolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyError";
  }
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const ScriptPolicySchema = z.object({
  extension: z.string().startsWith("."),
  version_pattern: z
    .string()
    .refine(isValidPattern, { message: "version_pattern is not a valid regular expression" }),
  version_example: z.string(),
  template_name: z.string().min(1),
  template_sentinel: z.string().min(1),
});

export const GuardPolicySchema = z.object({
  state_file: z.string().min(1),
  always_writable: z.array(z.string()),
  user_content_dir: z.string().min(1),
  system_critical: z.array(z.string()),
  unlock_command: z.string().min(1),
  script: ScriptPolicySchema,
});

export const PolicyOverlaySchema = GuardPolicySchema.partial().extend({
  script: ScriptPolicySchema.partial().optional(),
});

export type PolicyOverlay = z.infer<typeof PolicyOverlaySchema>;

export function mergeList(base: string[], overlay: string[]): string[] {
  const removals = new Set(
    overlay.filter((s) => s.startsWith("!")).map((s) => s.slice(1)),
  );
  const additions = overlay.filter((s) => !s.startsWith("!"));
  const filtered = base.filter((s) => !removals.has(s));
  return [...additions, ...filtered];
}

export function mergePolicies(base: GuardPolicy, overlay: PolicyOverlay): GuardPolicy {
  return {
    // Scalars: last writer wins
    state_file: overlay.state_file ?? base.state_file,
    user_content_dir: overlay.user_content_dir ?? base.user_content_dir,
    unlock_command: overlay.unlock_command ?? base.unlock_command,
    always_writable: mergeList(base.always_writable, overlay.always_writable ?? []),
    system_critical: mergeList(base.system_critical, overlay.system_critical ?? []),
    script: { ...base.script, ...overlay.script },
  };
}

export function packageRootDir(): string {
  // src/ and dist/ both sit directly under the package root
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
}

export function resolveProjectRoot(opts?: { projectRoot?: string; packageRoot?: string }): string {
  if (opts?.projectRoot) return path.resolve(opts.projectRoot);
  const fromEnv = process.env[ROOT_ENV];
  if (fromEnv) return path.resolve(fromEnv);
  const packageRoot = opts?.packageRoot ?? packageRootDir();
  return path.resolve(packageRoot, ...Array<string>(INSTALL_DEPTH).fill(".."));
}

function readJson(p: string): unknown {
  return JSON.parse(fs.readFileSync(p, "utf-8"));
}

export function loadPolicy(opts?: {
  packageRoot?: string;
  projectRoot?: string;
}): GuardPolicy {
  const packageRoot = opts?.packageRoot ?? packageRootDir();
  const projectRoot = resolveProjectRoot({ projectRoot: opts?.projectRoot, packageRoot });

  const defaultsPath = path.join(packageRoot, DEFAULTS_FILE);
  let raw: unknown;
  try {
    raw = readJson(defaultsPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PolicyError(`cannot read ${defaultsPath}: ${reason}`);
  }
  const parsed = GuardPolicySchema.safeParse(raw);
  if (!parsed.success) {
    throw new PolicyError(`invalid policy in ${defaultsPath}: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
  }

  let policy: GuardPolicy = parsed.data;
  try {
    const overlay = PolicyOverlaySchema.safeParse(readJson(path.join(projectRoot, OVERLAY_FILE)));
    if (overlay.success) policy = mergePolicies(policy, overlay.data);
  } catch {
    // overlay missing or not JSON — keep defaults
  }

  return policy;
}
