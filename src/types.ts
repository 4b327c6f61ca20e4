export type LockState = "locked" | "unlocked";

export type PathCategory = "always_writable" | "user_content" | "protected";

export interface ScriptPolicy {
  extension: string;
  version_pattern: string;
  version_example: string;
  template_name: string;
  template_sentinel: string;
}

export interface GuardPolicy {
  state_file: string;
  always_writable: string[];
  user_content_dir: string;
  system_critical: string[];
  unlock_command: string;
  script: ScriptPolicy;
}

export interface WriteRequest {
  absolutePath: string;
  content?: string;
}

export interface Decision {
  allow: boolean;
  messages: string[];
}

export interface LockStateRepository {
  read(): LockState;
  write(state: LockState): void;
}
