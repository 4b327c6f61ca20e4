import * as fs from "fs";
import * as path from "path";
import type { LockState, LockStateRepository } from "./types.js";

export const DEFAULT_LOCK_STATE: LockState = "unlocked";

/** Parse a state file token. Returns null when the text is neither token. */
export function parseLockState(text: string): LockState | null {
  const token = text.trim().toLowerCase();
  if (token === "locked" || token === "unlocked") return token;
  return null;
}

export function getStatePath(projectRoot: string, stateFile: string): string {
  return path.join(projectRoot, stateFile);
}

export class FileLockStateRepository implements LockStateRepository {
  readonly statePath: string;

  constructor(projectRoot: string, stateFile: string) {
    this.statePath = getStatePath(projectRoot, stateFile);
  }

  read(): LockState {
    let data: string;
    try {
      data = fs.readFileSync(this.statePath, "utf-8");
    } catch {
      return DEFAULT_LOCK_STATE; // missing or unreadable
    }
    return parseLockState(data) ?? DEFAULT_LOCK_STATE;
  }

  write(state: LockState): void {
    fs.mkdirSync(path.dirname(this.statePath), { recursive: true });
    fs.writeFileSync(this.statePath, `${state}\n`);
  }

  exists(): boolean {
    return fs.existsSync(this.statePath);
  }
}

export class InMemoryLockStateRepository implements LockStateRepository {
  constructor(private state: LockState = DEFAULT_LOCK_STATE) {}

  read(): LockState {
    return this.state;
  }

  write(state: LockState): void {
    this.state = state;
  }
}
