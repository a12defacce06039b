import { Command } from "commander";
import chalk from "chalk";
import type { Runtime, RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { failCommand } from "../lib/errors/renderer.js";
import { versionNotFound } from "../lib/errors/catalog.js";
import { formatBytes } from "../lib/format.js";
import { maybeOutputJson } from "../lib/json-output.js";
import { lookupVersion, type VersionInfo } from "../lib/manifest/index.js";

export interface InfoCommandOptions {
  folder?: string;
}

export function registerInfoCommand(program: Command, getRuntime: RuntimeFactory): void {
  program
    .command("info")
    .description("Show metadata of a specific version")
    .argument("<version>", "Version id, or latest_release / latest_snapshot")
    .option("-f, --folder <path>", "Folder the server jars are stored in")
    .action(async (version: string, options: InfoCommandOptions) => {
      await showVersionInfo(getRuntime(), version, options);
    });
}

function formatVersionNumber(value: number): string {
  return value < 0 ? "unknown" : String(value);
}

/**
 * Label/value lines printed by `info`.
 */
export function formatVersionInfo(info: VersionInfo): string[] {
  const rows: Array<[string, string]> = [
    ["Version", info.id],
    ["Type", info.type],
    ["Java version", formatVersionNumber(info.requiredRuntimeMajorVersion)],
    ["Min. launcher version", formatVersionNumber(info.minLauncherVersion)],
    ["Server URL", info.downloadUrl || "(none)"],
    ["Server size", formatBytes(info.fileSizeBytes)],
    ["Server SHA-1", info.serverSha1 ?? "(none)"],
    ["Client size", formatBytes(info.clientFileSizeBytes)],
    ["Metadata URL", info.metadataUrl],
    ["Local path", info.destinationPath],
  ];

  const width = Math.max(...rows.map(([label]) => label.length)) + 1;
  return rows.map(([label, value]) => `  ${chalk.gray(`${label}:`.padEnd(width))} ${value}`);
}

export async function showVersionInfo(
  runtime: Runtime,
  versionId: string,
  options: InfoCommandOptions
): Promise<VersionInfo | null> {
  const spinner = createSpinner("Downloading manifest").start();

  try {
    const table = await runtime.resolver.resolve(
      runtime.config.manifestUrl,
      options.folder ?? runtime.config.folder
    );

    const artifact = lookupVersion(table, versionId);
    if (!artifact) {
      throw versionNotFound(versionId);
    }

    spinner.text = `Fetching metadata for ${artifact.id}`;
    const info = await artifact.toInfo();
    spinner.stop();

    if (!maybeOutputJson(info)) {
      console.log(chalk.bold.cyan("minecraft"));
      for (const line of formatVersionInfo(info)) {
        console.log(line);
      }
    }

    return info;
  } catch (error) {
    spinner.fail("Couldn't load version info");
    failCommand(error);
    return null;
  }
}
