import * as path from "path";
import { isWithin } from "./classify.js";
import type { GuardPolicy, LockState } from "./types.js";

export function hasScriptExtension(fileName: string, policy: GuardPolicy): boolean {
  return path.extname(fileName).toLowerCase() === policy.script.extension.toLowerCase();
}

export function firstLine(content: string): string {
  return content.split(/\r?\n/, 1)[0] ?? "";
}

export function systemFileAdvisory(rel: string): string {
  return `⚠️  Editing system file ${rel}: agents and hooks change how the assistant behaves`;
}

/**
 * Content and placement hints for script files. Never blocks. Content checks
 * are skipped when no content was supplied; the location tip only needs the path.
 */
export function scriptAdvisories(
  targetPath: string,
  rel: string | null,
  content: string | undefined,
  policy: GuardPolicy,
  versionPattern: RegExp = new RegExp(policy.script.version_pattern),
): string[] {
  const fileName = path.basename(targetPath);
  if (!hasScriptExtension(fileName, policy)) return [];

  const { script, user_content_dir } = policy;
  const messages: string[] = [];

  if (content !== undefined) {
    if (!versionPattern.test(firstLine(content))) {
      messages.push(`⚠️  Missing version declaration: first line should be ${script.version_example}`);
    }
    if (fileName === script.template_name && !content.includes(script.template_sentinel)) {
      messages.push(
        `💡 ${script.template_name} is the starter template: rename it before adding your script`,
      );
    }
  }

  if (rel === null || !isWithin(rel, user_content_dir)) {
    messages.push(`💡 Tip: keep scripts in ${user_content_dir}/ (e.g. ${user_content_dir}/${fileName})`);
  }

  return messages;
}

export function statusLine(state: LockState): string {
  return state === "locked" ? "🔒 Mode: LOCKED" : "🔓 Mode: UNLOCKED";
}
