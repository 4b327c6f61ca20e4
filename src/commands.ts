import * as fs from "fs";
import * as path from "path";
import { hasScriptExtension, statusLine } from "./advisories.js";
import { createWriteGuard, type GuardOptions } from "./guard.js";
import type { Decision, LockState } from "./types.js";

export const ONBOARDING_MARKER = path.join(".claude", ".onboarding_complete");

const MAX_LISTED_SCRIPTS = 3;

export function setLockState(state: LockState, opts: GuardOptions = {}): string[] {
  const { guard, repository } = createWriteGuard(opts);
  repository.write(state);
  const hint =
    state === "locked"
      ? `Only ${guard.policy.user_content_dir}/ and session markers are writable.`
      : "All files are writable.";
  return [statusLine(state), hint];
}

export function statusLines(opts: GuardOptions = {}): string[] {
  const { repository } = createWriteGuard(opts);
  const lines = [statusLine(repository.read()), `State file: ${repository.statePath}`];
  if (!repository.exists()) lines.push("(no state file: defaulting to unlocked)");
  return lines;
}

export function checkLines(filePath: string, content: string | undefined, opts: GuardOptions = {}): Decision {
  const { guard } = createWriteGuard(opts);
  const decision = guard.check({ absolutePath: filePath, content });
  return {
    allow: decision.allow,
    messages: [decision.allow ? "✅ Write allowed" : "❌ Write denied", ...decision.messages],
  };
}

/** Existing scripts in the user-content area, template excluded, sorted by name. */
export function listUserScripts(opts: GuardOptions = {}): string[] {
  const { guard } = createWriteGuard(opts);
  const { policy, projectRoot } = guard;
  let files: string[];
  try {
    files = fs.readdirSync(path.join(projectRoot, policy.user_content_dir));
  } catch {
    return [];
  }
  return files
    .filter((f) => hasScriptExtension(f, policy) && f !== policy.script.template_name)
    .sort();
}

export function startLines(opts: GuardOptions = {}): string[] {
  const { guard } = createWriteGuard(opts);
  const markerPath = path.join(guard.projectRoot, ONBOARDING_MARKER);
  const lines = ["🚀 PINE SCRIPT DEVELOPMENT ASSISTANT", "===================================", ""];

  if (!fs.existsSync(markerPath)) {
    lines.push(
      "👋 Welcome! This appears to be your first time.",
      "",
      "You can:",
      "  1. Describe any indicator or strategy you want",
      "  2. Provide a YouTube video to analyze",
      "  3. Request complex features (we'll find workarounds)",
      "",
      "Example requests:",
      '  "Create an RSI divergence indicator"',
      '  "Build a moving average crossover strategy"',
      "",
    );
    fs.mkdirSync(path.dirname(markerPath), { recursive: true });
    fs.writeFileSync(markerPath, "");
  } else {
    lines.push("✅ System ready!", "");
    const scripts = listUserScripts(opts);
    if (scripts.length > 0) {
      lines.push(`📁 You have ${scripts.length} existing Pine Script(s):`);
      for (const s of scripts.slice(0, MAX_LISTED_SCRIPTS)) lines.push(`  - ${s}`);
      lines.push("");
    }
  }

  lines.push("💡 Quick start: describe what you want to build.", "", "Ready? Type your request or 'help' for more options.");
  return lines;
}
