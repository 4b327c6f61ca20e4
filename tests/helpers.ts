import type { GuardPolicy } from "../src/types.js";

export const TEST_POLICY: GuardPolicy = {
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
