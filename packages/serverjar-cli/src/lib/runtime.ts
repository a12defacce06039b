import { loadConfig, type EnvSource, type ResolvedConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { ManifestResolver } from "./manifest/resolver.js";
import { createNodeFetchTransport } from "./adapters/node-fetch-transport.js";
import { createFetchDownloadService } from "./adapters/fetch-download.js";
import type { DownloadService } from "./ports/download.js";
import type { HttpTransport } from "./ports/http.js";

/** Options declared on the root command */
export interface GlobalOptions {
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  manifestUrl?: string;
  config?: string;
}

export interface Runtime {
  config: ResolvedConfig;
  logger: Logger;
  resolver: ManifestResolver;
}

export type RuntimeFactory = () => Runtime;

export interface RuntimeOverrides {
  transport?: HttpTransport;
  downloader?: DownloadService;
  logger?: Logger;
  env?: EnvSource;
}

/**
 * Resolve configuration for one command invocation and build the services
 * it needs.
 */
export function createRuntime(globals: GlobalOptions, overrides: RuntimeOverrides = {}): Runtime {
  const { config } = loadConfig(
    globals.config,
    {
      manifestUrl: globals.manifestUrl,
      logLevel: globals.verbose ? "debug" : undefined,
    },
    overrides.env
  );

  const logger = overrides.logger ?? createLogger({ level: config.logLevel, json: config.logJson });
  const transport = overrides.transport ?? createNodeFetchTransport();
  const downloader = overrides.downloader ?? createFetchDownloadService(transport, logger.child({ component: "download" }));

  const resolver = new ManifestResolver({
    manifestUrl: config.manifestUrl,
    transport,
    downloader,
    logger: logger.child({ component: "manifest" }),
    verifySize: config.verifySize,
  });

  return { config, logger, resolver };
}
