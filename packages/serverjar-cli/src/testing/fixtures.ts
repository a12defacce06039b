import { CONFIG_DEFAULTS, type ResolvedConfig } from "../lib/config.js";
import { ManifestResolver } from "../lib/manifest/resolver.js";
import type { HttpTransport } from "../lib/ports/http.js";
import type { Runtime } from "../lib/runtime.js";
import { createSpyLogger, jsonRoute, type FakeRoute } from "./fake-http.js";

export const MANIFEST_URL = "http://meta.test/version_manifest.json";

/**
 * A small launcher manifest: two current versions with server jars, one
 * release whose metadata is unreachable and one beta without a server.
 */
export function launcherRoutes(): Record<string, FakeRoute> {
  return {
    [MANIFEST_URL]: jsonRoute({
      latest: { release: "1.20.4", snapshot: "24w03a" },
      versions: [
        { id: "24w03a", type: "snapshot", url: "http://meta.test/24w03a.json" },
        { id: "1.20.4", type: "release", url: "http://meta.test/1.20.4.json" },
        { id: "1.20.3", type: "release", url: "http://meta.test/1.20.3.json" },
        { id: "b1.7.3", type: "old_beta", url: "http://meta.test/b1.7.3.json" },
      ],
    }),
    "http://meta.test/1.20.4.json": jsonRoute({
      downloads: {
        server: { url: "http://files.test/1.20.4/server.jar", size: 9, sha1: "0000000000000000000000000000000000000001" },
        client: { size: 24000000 },
      },
      javaVersion: { majorVersion: 17 },
      releaseTime: "2023-12-07T12:56:20+00:00",
    }),
    "http://meta.test/24w03a.json": jsonRoute({
      downloads: { server: { url: "http://files.test/24w03a/server.jar", size: 12 } },
      javaVersion: { majorVersion: 17 },
    }),
    "http://meta.test/b1.7.3.json": jsonRoute({ javaVersion: { majorVersion: 8 } }),
    "http://files.test/1.20.4/server.jar": { body: "jar-bytes", headers: { "content-length": "9" } },
    "http://files.test/24w03a/server.jar": { body: "snapshot-jar" },
  };
}

/**
 * Runtime wired to the given transport, reading the manifest from
 * MANIFEST_URL unless `config` says otherwise.
 */
export function createTestRuntime(transport: HttpTransport, config: Partial<ResolvedConfig> = {}) {
  const logger = createSpyLogger();
  const resolved: ResolvedConfig = { ...CONFIG_DEFAULTS, manifestUrl: MANIFEST_URL, ...config };
  const resolver = new ManifestResolver({
    manifestUrl: resolved.manifestUrl,
    transport,
    logger,
    verifySize: resolved.verifySize,
  });
  const runtime: Runtime = { config: resolved, logger, resolver };
  return { runtime, logger };
}
