#!/usr/bin/env node
import { Command } from "commander";
import { checkLines, setLockState, startLines, statusLines } from "./commands.js";
import type { GuardOptions } from "./guard.js";
import { BLOCK_EXIT_CODE } from "./hook-before-write.js";
import { isEntry, writeLines } from "./process-io.js";

export function createProgram(opts: GuardOptions = {}): Command {
  const program = new Command()
    .name("pine-guard")
    .description("Lock or unlock the project and inspect write-guard decisions");

  program
    .command("lock")
    .description("Protect everything outside the projects area")
    .action(() => writeLines(setLockState("locked", opts)));

  program
    .command("unlock")
    .description("Allow writes everywhere (development mode)")
    .action(() => writeLines(setLockState("unlocked", opts)));

  program
    .command("status")
    .description("Show the current lock state")
    .action(() => writeLines(statusLines(opts)));

  program
    .command("start")
    .description("Show the welcome banner and existing scripts")
    .action(() => writeLines(startLines(opts)));

  program
    .command("check")
    .description("Evaluate a write without performing it")
    .argument("<file>", "target file path")
    .argument("[content]", "content that would be written")
    .action((file: string, content: string | undefined) => {
      const decision = checkLines(file, content, opts);
      writeLines(decision.messages);
      if (!decision.allow) process.exitCode = BLOCK_EXIT_CODE;
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`pine-guard: ${message}\n`);
    process.exitCode = 1;
  }
}

if (isEntry(import.meta.url)) void main();
