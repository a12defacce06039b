import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { describeError } from "../lib/errors/types.js";
import { failCommand } from "../lib/errors/renderer.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";
import type { GlobalOptions } from "../lib/runtime.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# serverjar configuration
# Place at ~/.config/serverjar/config.yaml (user) or /etc/serverjar/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment (SERVERJAR_MANIFEST_URL, SERVERJAR_FOLDER)
# 3. User config (~/.config/serverjar/config.yaml)
# 4. System config (/etc/serverjar/config.yaml)
# 5. Built-in defaults

manifest:
  # Version manifest listing every release and snapshot
  url: "https://launchermeta.mojang.com/mc/game/version_manifest.json"

download:
  # Folder server jars are stored in (can be overridden with --folder)
  folder: "server_versions"

  # Replace an existing jar whose size differs from the published size
  verifySize: false

logging:
  # Log level: debug, info, warn, error, silent
  level: warn

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage serverjar configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", "Create system-wide config at /etc/serverjar/config.yaml")
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Use a text editor to modify it, or delete it first."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${describeError(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .action(() => {
      const explicitPath = program.opts<GlobalOptions>().config;
      const pathsToCheck = explicitPath ? [explicitPath] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicitPath) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${describeError(error)}`));
          hasErrors = true;
        }
      }

      if (hasErrors) {
        process.exitCode = 1;
      } else if (!foundAny) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'serverjar config init' to create one.`));
      } else {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action(() => {
      try {
        const { config: resolved, sources } = loadConfig(program.opts<GlobalOptions>().config);

        const json: ConfigShowJson = { effective: { ...resolved }, sources };
        if (maybeOutputJson(json)) return;

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));
        console.log(
          chalk.gray(sources.length > 0 ? `Sources: ${sources.join(", ")}` : "Sources: (defaults only)")
        );

        console.log();
        console.log(chalk.bold("Manifest:"));
        console.log(`  url:            ${resolved.manifestUrl}`);

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  folder:         ${resolved.folder}`);
        console.log(`  verifySize:     ${resolved.verifySize}`);


        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        failCommand(error);
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(`  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(`  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
    });
}
