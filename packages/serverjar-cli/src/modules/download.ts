import { Command } from "commander";
import chalk from "chalk";
import { basename } from "path";
import type { Runtime, RuntimeFactory } from "../lib/runtime.js";
import { createSpinner, type Spinner } from "../lib/spinner.js";
import { failCommand } from "../lib/errors/renderer.js";
import { versionNotFound } from "../lib/errors/catalog.js";
import { formatBytes, formatPercent } from "../lib/format.js";
import { maybeOutputJson, type DownloadResultJson } from "../lib/json-output.js";
import { lookupVersion, type DownloadOutcome, type VersionArtifact } from "../lib/manifest/index.js";

export interface DownloadCommandOptions {
  folder?: string;
  verifySize?: boolean;
}

export function registerDownloadCommand(program: Command, getRuntime: RuntimeFactory): void {
  program
    .command("download")
    .description("Download the server jar of a specific version")
    .argument("<version>", "Version id, or latest_release / latest_snapshot")
    .option("-f, --folder <path>", "Folder the server jars are stored in")
    .option("--verify-size", "Replace an existing jar whose size doesn't match")
    .action(async (version: string, options: DownloadCommandOptions) => {
      await downloadVersion(getRuntime(), version, options);
    });
}

function progressText(versionId: string, transferred: number, total: number | null): string {
  const percent = formatPercent(transferred, total);
  const amount = total ? `${formatBytes(transferred)} / ${formatBytes(total)}` : formatBytes(transferred);
  return `Downloading ${versionId} ${percent ? `${percent} ` : ""}(${amount})`;
}

/**
 * Download one artifact, reporting progress on the spinner, and print the
 * outcome. Shared by `download` and `update`.
 */
export async function acquireServerJar(
  artifact: VersionArtifact,
  spinner: Spinner,
  verifySize: boolean
): Promise<DownloadOutcome> {
  spinner.text = `Resolving ${artifact.id}`;

  const outcome = await artifact.download({
    verifySize,
    onProgress: (transferred, total) => {
      spinner.text = progressText(artifact.id, transferred, total);
    },
  });

  const fileName = basename(outcome.path);
  const result: DownloadResultJson = {
    version: artifact.id,
    status: outcome.status,
    path: outcome.path,
    bytes: outcome.bytes,
  };

  spinner.stop();

  if (!maybeOutputJson(result)) {
    if (outcome.status === "skipped") {
      console.log(chalk.yellow(`${fileName} already exists, nothing to download`));
    } else {
      console.log(chalk.green(`✓ Downloaded ${fileName} (${formatBytes(outcome.bytes)})`));
    }
    console.log(chalk.gray(`  ${outcome.path}`));
  }

  return outcome;
}

export async function downloadVersion(
  runtime: Runtime,
  versionId: string,
  options: DownloadCommandOptions
): Promise<DownloadOutcome | null> {
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

    return await acquireServerJar(artifact, spinner, options.verifySize ?? runtime.config.verifySize);
  } catch (error) {
    spinner.fail("Download failed");
    failCommand(error);
    return null;
  }
}
