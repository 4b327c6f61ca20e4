#!/usr/bin/env node
import * as fs from "fs";
import { z } from "zod";
import { createWriteGuard, type GuardOptions } from "./guard.js";
import { isEntry, writeLines } from "./process-io.js";
import type { WriteRequest } from "./types.js";

/** Exit status the host tool treats as "do not perform this write". */
export const BLOCK_EXIT_CODE = 2;

const HookInputSchema = z.object({
  tool_name: z.string().optional(),
  tool_input: z
    .object({
      file_path: z.string().optional(),
      content: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

/** Parse the host tool's PreToolUse payload. Edits carry a fragment, not the file, so only Write content counts. */
export function requestFromHookInput(raw: string): WriteRequest | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = HookInputSchema.safeParse(data);
  if (!parsed.success) return null;
  const filePath = parsed.data.tool_input?.file_path;
  if (!filePath) return null;
  return { absolutePath: filePath, content: parsed.data.tool_input?.content };
}

export interface HookOptions extends GuardOptions {
  stdinData?: string;
}

export function main(args: string[] = process.argv.slice(2), opts: HookOptions = {}): number {
  let request: WriteRequest | null;
  if (args.length > 0) {
    request = { absolutePath: args[0], content: args.length > 1 ? args[1] : undefined };
  } else {
    let raw: string;
    try {
      raw = opts.stdinData ?? fs.readFileSync(0, "utf-8");
    } catch {
      return 0; // no input to guard
    }
    request = requestFromHookInput(raw);
  }
  if (!request) return 0; // passthrough on bad input

  const { guard } = createWriteGuard(opts);
  const decision = guard.check(request);
  writeLines(decision.messages);
  return decision.allow ? 0 : BLOCK_EXIT_CODE;
}

/** Process entry: a policy that cannot be loaded blocks the write. */
export function run(args: string[] = process.argv.slice(2), opts: HookOptions = {}): number {
  try {
    return main(args, opts);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`pine-write-guard: ${message}\n`);
    return BLOCK_EXIT_CODE;
  }
}

if (isEntry(import.meta.url)) process.exitCode = run();
