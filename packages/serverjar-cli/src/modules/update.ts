/**
 * Update command - fetch the newest release (or snapshot) server jar.
 */

import { Command } from "commander";
import chalk from "chalk";
import type { Runtime, RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { failCommand } from "../lib/errors/renderer.js";
import { versionNotFound } from "../lib/errors/catalog.js";
import {
  LATEST_RELEASE_ALIAS,
  LATEST_SNAPSHOT_ALIAS,
  lookupVersion,
  type DownloadOutcome,
} from "../lib/manifest/index.js";
import { acquireServerJar } from "./download.js";

export interface UpdateCommandOptions {
  snapshot?: boolean;
  folder?: string;
}

export function registerUpdateCommand(program: Command, getRuntime: RuntimeFactory): void {
  program
    .command("update")
    .description("Download the newest server jar")
    .option("-s, --snapshot", "Follow the latest snapshot instead of the latest release")
    .option("-f, --folder <path>", "Folder the server jars are stored in")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  serverjar update             ${chalk.gray("Fetch the newest release")}
  serverjar update --snapshot  ${chalk.gray("Fetch the newest snapshot")}
`
    )
    .action(async (options: UpdateCommandOptions) => {
      await updateServer(getRuntime(), options);
    });
}

export async function updateServer(
  runtime: Runtime,
  options: UpdateCommandOptions
): Promise<DownloadOutcome | null> {
  const alias = options.snapshot ? LATEST_SNAPSHOT_ALIAS : LATEST_RELEASE_ALIAS;
  const spinner = createSpinner("Checking for a newer server...").start();

  try {
    const table = await runtime.resolver.resolve(
      runtime.config.manifestUrl,
      options.folder ?? runtime.config.folder
    );

    const artifact = lookupVersion(table, alias);
    if (!artifact) {
      throw versionNotFound(alias);
    }

    runtime.logger.debug("Latest version resolved", { alias, version: artifact.id });
    return await acquireServerJar(artifact, spinner, runtime.config.verifySize);
  } catch (error) {
    spinner.fail("Update failed");
    failCommand(error);
    return null;
  }
}
