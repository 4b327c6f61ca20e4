import * as fs from "fs";
import { fileURLToPath } from "url";

export function writeLines(lines: string[], stream: NodeJS.WritableStream = process.stdout): void {
  if (lines.length === 0) return;
  stream.write(lines.join("\n") + "\n");
}

/** True when the module at metaUrl was started directly (bin symlinks included). */
export function isEntry(metaUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return fs.realpathSync(script) === fileURLToPath(metaUrl);
  } catch {
    return false;
  }
}
