import { readFileSync } from "fs";
import { Command } from "commander";
import { initContext } from "./lib/cli-context.js";
import { failCommand } from "./lib/errors/renderer.js";
import {
  createRuntime,
  type GlobalOptions,
  type RuntimeFactory,
  type RuntimeOverrides,
} from "./lib/runtime.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerInfoCommand } from "./modules/info.js";
import { registerListCommand } from "./modules/list.js";
import { registerUpdateCommand } from "./modules/update.js";

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export interface ProgramOptions {
  runtimeOverrides?: RuntimeOverrides;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command()
    .name("serverjar")
    .description("Look up Minecraft versions and download their dedicated server jars")
    .version(readPackageVersion())
    .option("--json", "Output JSON instead of human-readable text")
    .option("-q, --quiet", "Suppress spinners and progress output")
    .option("-v, --verbose", "Log debug information")
    .option("--manifest-url <url>", "Version manifest to read")
    .option("--config <path>", "Use this config file instead of the system and user files");

  const getRuntime: RuntimeFactory = () =>
    createRuntime(program.opts<GlobalOptions>(), options.runtimeOverrides);

  registerDownloadCommand(program, getRuntime);
  registerInfoCommand(program, getRuntime);
  registerListCommand(program, getRuntime);
  registerUpdateCommand(program, getRuntime);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv, options: ProgramOptions = {}): Promise<void> {
  initContext(argv);
  const program = createProgram(options);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    failCommand(error);
  }
}
