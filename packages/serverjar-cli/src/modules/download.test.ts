import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { acquireServerJar, downloadVersion } from "./download.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { lookupVersion } from "../lib/manifest/index.js";
import type { Spinner } from "../lib/spinner.js";
import { createFakeTransport } from "../testing/fake-http.js";
import { createTestRuntime, launcherRoutes } from "../testing/fixtures.js";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => import("../testing/plain-chalk.js"));

describe("download command", () => {
  let folder: string;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(async () => {
    folder = await mkdtemp(join(tmpdir(), "serverjar-download-cmd-"));
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    initContext(["node", "serverjar", "--quiet"], {});
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(folder, { recursive: true, force: true });
  });

  it("downloads the requested version", async () => {
    const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });
    const target = join(folder, "minecraft_server.1.20.4.jar");

    const outcome = await downloadVersion(runtime, "1.20.4", {});

    expect(outcome).toEqual({ status: "downloaded", path: target, bytes: 9 });
    expect(await readFile(target, "utf-8")).toBe("jar-bytes");
    expect(consoleLogSpy).toHaveBeenCalledWith("✓ Downloaded minecraft_server.1.20.4.jar (9.00 Bytes)");
    expect(consoleLogSpy).toHaveBeenCalledWith(`  ${target}`);
    expect(process.exitCode).toBeUndefined();
  });

  it("resolves the latest_snapshot alias", async () => {
    const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });

    const outcome = await downloadVersion(runtime, "latest_snapshot", {});

    expect(outcome?.path).toBe(join(folder, "minecraft_server.24w03a.jar"));
    expect(await readFile(join(folder, "minecraft_server.24w03a.jar"), "utf-8")).toBe("snapshot-jar");
  });

  it("does nothing when the jar is already there", async () => {
    const transport = createFakeTransport(launcherRoutes());
    const { runtime } = createTestRuntime(transport, { folder });
    await writeFile(join(folder, "minecraft_server.1.20.4.jar"), "existing");

    const outcome = await downloadVersion(runtime, "1.20.4", {});

    expect(outcome?.status).toBe("skipped");
    expect(transport.calls).toEqual(["http://meta.test/version_manifest.json"]);
    expect(consoleLogSpy).toHaveBeenCalledWith("minecraft_server.1.20.4.jar already exists, nothing to download");
  });

  it("reports a skipped download once", async () => {
    const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });
    const target = join(folder, "minecraft_server.1.20.4.jar");
    await writeFile(target, "existing");
    const artifact = lookupVersion(await runtime.resolver.resolve(runtime.config.manifestUrl, folder), "1.20.4");
    const spinner: Spinner = { text: "", start: vi.fn(), stop: vi.fn(), fail: vi.fn() };
    if (!artifact) throw new Error("1.20.4 missing from the manifest");
    resetContext();

    await acquireServerJar(artifact, spinner, false);

    expect(spinner.stop).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy.mock.calls).toEqual([
      ["minecraft_server.1.20.4.jar already exists, nothing to download"],
      [`  ${target}`],
    ]);
  });

  it("replaces a jar of the wrong size with --verify-size", async () => {
    const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });
    const target = join(folder, "minecraft_server.1.20.4.jar");
    await writeFile(target, "truncated-download");

    const outcome = await downloadVersion(runtime, "1.20.4", { verifySize: true });

    expect(outcome?.status).toBe("downloaded");
    expect(await readFile(target, "utf-8")).toBe("jar-bytes");
  });

  it("stores the jar in --folder when given", async () => {
    const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });
    const custom = join(folder, "custom", "place");

    await downloadVersion(runtime, "1.20.4", { folder: custom });

    expect(existsSync(join(custom, "minecraft_server.1.20.4.jar"))).toBe(true);
    expect(existsSync(join(folder, "minecraft_server.1.20.4.jar"))).toBe(false);
  });

  it("fails on an unknown version without downloading", async () => {
    const transport = createFakeTransport(launcherRoutes());
    const { runtime } = createTestRuntime(transport, { folder });

    const outcome = await downloadVersion(runtime, "9.9.9", {});

    expect(outcome).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ 9.9.9 is not a valid version");
    expect(transport.calls).toHaveLength(1);
  });

  it("fails when the version publishes no server jar", async () => {
    const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });

    const outcome = await downloadVersion(runtime, "b1.7.3", {});

    expect(outcome).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ No server jar is published for b1.7.3");
  });

  it("fails when the manifest can't be fetched", async () => {
    const { runtime } = createTestRuntime(createFakeTransport({}), { folder });

    await downloadVersion(runtime, "1.20.4", {});

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ Couldn't download the version manifest");
  });

  describe("JSON output", () => {
    beforeEach(() => {
      initContext(["node", "serverjar", "--json"], {});
    });

    it("prints the outcome as JSON", async () => {
      const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });

      await downloadVersion(runtime, "1.20.4", {});

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: {
          version: "1.20.4",
          status: "downloaded",
          path: join(folder, "minecraft_server.1.20.4.jar"),
          bytes: 9,
        },
      });
    });

    it("prints errors as JSON on stderr", async () => {
      const { runtime } = createTestRuntime(createFakeTransport(launcherRoutes()), { folder });

      await downloadVersion(runtime, "9.9.9", {});

      expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
        success: false,
        error: {
          code: "VERSION_NOT_FOUND",
          message: "9.9.9 is not a valid version",
          suggestion: "Try 'latest_release' for the newest stable version",
        },
      });
      expect(process.exitCode).toBe(1);
    });
  });
});
