import { classifyPath, isSystemCritical, toRelativePath } from "./classify.js";
import { scriptAdvisories, statusLine, systemFileAdvisory } from "./advisories.js";
import { loadPolicy, resolveProjectRoot } from "./config.js";
import { FileLockStateRepository } from "./state.js";
import type { Decision, GuardPolicy, LockState, LockStateRepository, WriteRequest } from "./types.js";

/**
 * Decides whether a write may go ahead. The policy and the lock-state
 * repository are injected so the decision itself never touches disk.
 */
export class WriteGuard {
  private readonly versionPattern: RegExp;

  constructor(
    readonly projectRoot: string,
    readonly policy: GuardPolicy,
    private readonly repository: LockStateRepository,
  ) {
    this.versionPattern = new RegExp(policy.script.version_pattern);
  }

  /** Pure: identical inputs always give an identical Decision. */
  evaluate(absolutePath: string, content: string | undefined, lockState: LockState): Decision {
    const rel = toRelativePath(this.projectRoot, absolutePath);
    const category = classifyPath(rel, this.policy);
    const messages: string[] = [];

    const allow = lockState === "unlocked" || category !== "protected";
    if (!allow) {
      messages.push(
        `⛔ BLOCKED: ${rel ?? (absolutePath || "(empty path)")} is protected while the project is locked.`,
        `   Run '${this.policy.unlock_command}' to allow edits.`,
      );
    }

    if (lockState === "unlocked" && rel !== null && isSystemCritical(rel, this.policy)) {
      messages.push(systemFileAdvisory(rel));
    }
    messages.push(...scriptAdvisories(absolutePath, rel, content, this.policy, this.versionPattern));
    messages.push(statusLine(lockState));

    return { allow, messages };
  }

  /** Reads the lock state once, then evaluates. */
  check(request: WriteRequest): Decision {
    return this.evaluate(request.absolutePath, request.content, this.repository.read());
  }
}

export interface GuardOptions {
  projectRoot?: string;
  packageRoot?: string;
}

/** Wire a guard to the installed project: loaded policy, file-backed state. */
export function createWriteGuard(opts: GuardOptions = {}): {
  guard: WriteGuard;
  repository: FileLockStateRepository;
} {
  const projectRoot = resolveProjectRoot(opts);
  const policy = loadPolicy({ packageRoot: opts.packageRoot, projectRoot });
  const repository = new FileLockStateRepository(projectRoot, policy.state_file);
  return { guard: new WriteGuard(projectRoot, policy, repository), repository };
}
