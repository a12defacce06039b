import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { Runtime, RuntimeFactory } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { failCommand } from "../lib/errors/renderer.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { maybeOutputJson, type VersionListJson } from "../lib/json-output.js";
import {
  LATEST_RELEASE_ALIAS,
  LATEST_SNAPSHOT_ALIAS,
  VERSION_TYPES,
  listVersions,
  lookupVersion,
  type VersionType,
} from "../lib/manifest/index.js";

export interface ListCommandOptions {
  type?: string;
  limit?: string;
}

const DEFAULT_LIMIT = 20;

export function registerListCommand(program: Command, getRuntime: RuntimeFactory): void {
  program
    .command("list")
    .description("List versions known to the manifest, newest first")
    .option("-t, --type <type>", `Only show one type (${VERSION_TYPES.join(", ")})`)
    .option("-n, --limit <count>", "Maximum number of versions to show, 0 for all", String(DEFAULT_LIMIT))
    .action(async (options: ListCommandOptions) => {
      await listManifestVersions(getRuntime(), options);
    });
}

function isVersionType(value: string): value is VersionType {
  return VERSION_TYPES.some((type) => type === value);
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_LIMIT;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw invalidOption("limit", `"${raw}" is not a non-negative number`);
  }
  return value;
}

export async function listManifestVersions(
  runtime: Runtime,
  options: ListCommandOptions
): Promise<VersionListJson | null> {
  const spinner = createSpinner("Downloading manifest").start();

  try {
    const typeFilter = options.type;
    if (typeFilter !== undefined && !isVersionType(typeFilter)) {
      throw invalidOption("type", `unknown version type "${typeFilter}"`, [...VERSION_TYPES]);
    }
    const limit = parseLimit(options.limit);

    const { table, skipped } = await runtime.resolver.resolveWithReport(
      runtime.config.manifestUrl,
      runtime.config.folder
    );
    spinner.stop();

    const matching = listVersions(table).filter((artifact) => !typeFilter || artifact.type === typeFilter);
    const shown = limit === 0 ? matching : matching.slice(0, limit);

    const result: VersionListJson = {
      latest: {
        release: lookupVersion(table, LATEST_RELEASE_ALIAS)?.id ?? null,
        snapshot: lookupVersion(table, LATEST_SNAPSHOT_ALIAS)?.id ?? null,
      },
      versions: shown.map((artifact) => ({
        id: artifact.id,
        type: artifact.type,
        metadataUrl: artifact.metadataUrl,
      })),
      skipped: skipped.length,
    };

    if (maybeOutputJson(result)) {
      return result;
    }

    console.log(`${chalk.gray("Latest release:")}  ${result.latest.release ?? "(none)"}`);
    console.log(`${chalk.gray("Latest snapshot:")} ${result.latest.snapshot ?? "(none)"}`);

    const table3 = new CliTable3({
      head: [chalk.cyan("Version"), chalk.cyan("Type")],
    });
    for (const version of result.versions) {
      table3.push([version.id, version.type]);
    }
    console.log(table3.toString());

    if (shown.length < matching.length) {
      console.log(chalk.gray(`Showing ${shown.length} of ${matching.length}. Use --limit 0 to show all.`));
    }
    if (skipped.length > 0) {
      console.log(chalk.yellow(`${skipped.length} malformed manifest entries were skipped`));
    }

    return result;
  } catch (error) {
    spinner.fail("Couldn't list versions");
    failCommand(error);
    return null;
  }
}
