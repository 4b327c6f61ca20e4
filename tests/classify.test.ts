import { describe, it, expect } from "vitest";
import * as path from "path";
import type { GuardPolicy } from "../src/types.js";
import { classifyPath, isSystemCritical, isWithin, toRelativePath } from "../src/classify.js";

const ROOT = path.resolve("/work/pine");

const POLICY: GuardPolicy = {
  state_file: ".claude/.lock_state",
  always_writable: [
    ".claude/.lock_state",
    ".claude/.onboarding_complete",
    ".claude/.session_state",
    ".claude/.last_session",
  ],
  user_content_dir: "projects",
  system_critical: [".claude/agents", ".claude/hooks"],
  unlock_command: "pine-guard unlock",
  script: {
    extension: ".pine",
    version_pattern: "^//@version=\\d+",
    version_example: "//@version=6",
    template_name: "blank.pine",
    template_sentinel: "Blank Template",
  },
};

describe("toRelativePath", () => {
  it("makes absolute paths relative with forward slashes", () => {
    expect(toRelativePath(ROOT, path.join(ROOT, "projects", "rsi.pine"))).toBe("projects/rsi.pine");
  });

  it("resolves relative inputs against the root", () => {
    expect(toRelativePath(ROOT, "docs/guide.md")).toBe("docs/guide.md");
  });

  it("normalises dot segments", () => {
    expect(toRelativePath(ROOT, path.join(ROOT, "projects", "..", "README.md"))).toBe("README.md");
  });

  it("returns null for paths outside the root", () => {
    expect(toRelativePath(ROOT, path.resolve("/etc/passwd"))).toBeNull();
    expect(toRelativePath(ROOT, path.join(ROOT, "..", "other", "x.pine"))).toBeNull();
  });

  it("returns null for the root itself and empty inputs", () => {
    expect(toRelativePath(ROOT, ROOT)).toBeNull();
    expect(toRelativePath(ROOT, "")).toBeNull();
    expect(toRelativePath("", "x.pine")).toBeNull();
  });

  it("does not treat a sibling with a shared prefix as inside", () => {
    expect(toRelativePath(ROOT, path.resolve("/work/pine-old/x.pine"))).toBeNull();
  });
});

describe("isWithin", () => {
  it("matches the directory and its descendants", () => {
    expect(isWithin("projects", "projects")).toBe(true);
    expect(isWithin("projects/a/b.pine", "projects")).toBe(true);
    expect(isWithin("projects/a/b.pine", "projects/")).toBe(true);
  });

  it("does not match prefixes of other names", () => {
    expect(isWithin("projects-old/a.pine", "projects")).toBe(false);
  });
});

describe("classifyPath", () => {
  it("classifies allow-listed markers as always writable", () => {
    for (const p of POLICY.always_writable) {
      expect(classifyPath(p, POLICY)).toBe("always_writable");
    }
  });

  it("always allows the configured state file", () => {
    const moved = { ...POLICY, state_file: ".claude/guard.lock" };
    expect(classifyPath(".claude/guard.lock", moved)).toBe("always_writable");
    expect(classifyPath(".claude/guard.lock", POLICY)).toBe("protected");
  });

  it("requires an exact allow-list match", () => {
    expect(classifyPath(".claude/.lock_state.bak", POLICY)).toBe("protected");
  });

  it("classifies the projects subtree as user content", () => {
    expect(classifyPath("projects/rsi.pine", POLICY)).toBe("user_content");
    expect(classifyPath("projects/nested/deep/file.txt", POLICY)).toBe("user_content");
  });

  it("classifies everything else as protected", () => {
    expect(classifyPath(".claude/agents/pine-developer.md", POLICY)).toBe("protected");
    expect(classifyPath(".claude/hooks/before-write.sh", POLICY)).toBe("protected");
    expect(classifyPath("CLAUDE.md", POLICY)).toBe("protected");
    expect(classifyPath("templates/blank.pine", POLICY)).toBe("protected");
  });

  it("fails closed when there is no relative path", () => {
    expect(classifyPath(null, POLICY)).toBe("protected");
  });
});

describe("isSystemCritical", () => {
  it("flags agent and hook files", () => {
    expect(isSystemCritical(".claude/agents/pine-developer.md", POLICY)).toBe(true);
    expect(isSystemCritical(".claude/hooks/before-write.sh", POLICY)).toBe(true);
  });

  it("ignores other protected files", () => {
    expect(isSystemCritical("docs/guide.md", POLICY)).toBe(false);
    expect(isSystemCritical(".claude/.lock_state", POLICY)).toBe(false);
    expect(isSystemCritical(null, POLICY)).toBe(false);
  });
});
