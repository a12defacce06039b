import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { Readable } from "stream";
import { tmpdir } from "os";
import { join } from "path";
import { createFetchDownloadService, PART_SUFFIX } from "./fetch-download.js";
import { createFakeTransport, createSpyLogger } from "../../testing/fake-http.js";
import type { HttpTransport } from "../ports/http.js";

const JAR_URL = "http://files.test/server.jar";

function streamingTransport(body: Readable): HttpTransport {
  return {
    get: async () => ({
      ok: true,
      status: 200,
      statusText: "OK",
      headers: { get: () => null },
      text: async () => "",
      body,
    }),
  };
}

describe("createFetchDownloadService", () => {
  let folder: string;
  let outputPath: string;

  beforeEach(async () => {
    folder = await mkdtemp(join(tmpdir(), "serverjar-download-"));
    outputPath = join(folder, "minecraft_server.1.20.4.jar");
  });

  afterEach(async () => {
    await rm(folder, { recursive: true, force: true });
  });

  it("streams the body to the output path", async () => {
    const transport = createFakeTransport({
      [JAR_URL]: { body: [Buffer.from("abc"), Buffer.from("de")], headers: { "content-length": "5" } },
    });
    const service = createFetchDownloadService(transport);

    const result = await service.download({ url: JAR_URL, outputPath });

    expect(result).toEqual({ bytesWritten: 5 });
    expect(await readFile(outputPath, "utf-8")).toBe("abcde");
    expect(existsSync(`${outputPath}${PART_SUFFIX}`)).toBe(false);
  });

  it("reports progress against content-length", async () => {
    const transport = createFakeTransport({
      [JAR_URL]: { body: [Buffer.from("abc"), Buffer.from("de")], headers: { "content-length": "5" } },
    });
    const onProgress = vi.fn();

    await createFetchDownloadService(transport).download({ url: JAR_URL, outputPath, expectedSize: 99, onProgress });

    expect(onProgress.mock.calls).toEqual([
      [3, 5],
      [5, 5],
    ]);
  });

  it("falls back to the expected size without content-length", async () => {
    const transport = createFakeTransport({ [JAR_URL]: { body: [Buffer.from("abc")] } });
    const onProgress = vi.fn();

    await createFetchDownloadService(transport).download({ url: JAR_URL, outputPath, expectedSize: 10, onProgress });

    expect(onProgress).toHaveBeenCalledWith(3, 10);
  });

  it("reports an unknown total when neither is available", async () => {
    const transport = createFakeTransport({ [JAR_URL]: { body: [Buffer.from("abc")] } });
    const onProgress = vi.fn();

    await createFetchDownloadService(transport).download({ url: JAR_URL, outputPath, onProgress });

    expect(onProgress).toHaveBeenCalledWith(3, null);
  });

  it("replaces an existing file", async () => {
    await writeFile(outputPath, "stale");
    const transport = createFakeTransport({ [JAR_URL]: { body: "fresh-jar" } });

    await createFetchDownloadService(transport).download({ url: JAR_URL, outputPath });

    expect(await readFile(outputPath, "utf-8")).toBe("fresh-jar");
  });

  it("fails with DOWNLOAD_TRANSPORT_ERROR when the request fails", async () => {
    const transport = createFakeTransport({ [JAR_URL]: { error: new Error("ETIMEDOUT") } });

    await expect(createFetchDownloadService(transport).download({ url: JAR_URL, outputPath })).rejects.toMatchObject({
      code: "DOWNLOAD_TRANSPORT_ERROR",
      details: `${JAR_URL}: ETIMEDOUT`,
    });
    expect(existsSync(outputPath)).toBe(false);
  });

  it("fails with DOWNLOAD_TRANSPORT_ERROR on a non-2xx status", async () => {
    const transport = createFakeTransport({ [JAR_URL]: { status: 404 } });

    await expect(createFetchDownloadService(transport).download({ url: JAR_URL, outputPath })).rejects.toMatchObject({
      code: "DOWNLOAD_TRANSPORT_ERROR",
      details: `${JAR_URL}: HTTP 404 Error`,
    });
    expect(existsSync(outputPath)).toBe(false);
  });

  it("fails with DOWNLOAD_TRANSPORT_ERROR when there is no body", async () => {
    const transport = createFakeTransport({ [JAR_URL]: { noBody: true } });

    await expect(createFetchDownloadService(transport).download({ url: JAR_URL, outputPath })).rejects.toMatchObject({
      code: "DOWNLOAD_TRANSPORT_ERROR",
    });
  });

  it("leaves nothing behind when the body stream breaks", async () => {
    const transport = createFakeTransport({
      [JAR_URL]: { body: [Buffer.from("partial")], bodyError: new Error("connection reset") },
    });

    await expect(createFetchDownloadService(transport).download({ url: JAR_URL, outputPath })).rejects.toMatchObject({
      code: "DOWNLOAD_TRANSPORT_ERROR",
      details: `${JAR_URL}: connection reset`,
    });
    expect(existsSync(outputPath)).toBe(false);
    expect(existsSync(`${outputPath}${PART_SUFFIX}`)).toBe(false);
  });

  it("keeps an existing file when the body stream breaks", async () => {
    await writeFile(outputPath, "previous");
    const transport = createFakeTransport({
      [JAR_URL]: { body: [Buffer.from("partial")], bodyError: new Error("connection reset") },
    });

    await expect(createFetchDownloadService(transport).download({ url: JAR_URL, outputPath })).rejects.toMatchObject({
      code: "DOWNLOAD_TRANSPORT_ERROR",
    });
    expect(await readFile(outputPath, "utf-8")).toBe("previous");
  });

  it("fails with DOWNLOAD_WRITE_ERROR when the folder does not exist", async () => {
    const transport = createFakeTransport({ [JAR_URL]: { body: "jar" } });
    const missing = join(folder, "missing", "server.jar");

    await expect(
      createFetchDownloadService(transport).download({ url: JAR_URL, outputPath: missing })
    ).rejects.toMatchObject({ code: "DOWNLOAD_WRITE_ERROR", message: `Can't write "${missing}"` });
  });

  it("destroys the response body when the part file can't be opened", async () => {
    const body = Readable.from([Buffer.from("jar")]);
    const missing = join(folder, "missing", "server.jar");

    await expect(
      createFetchDownloadService(streamingTransport(body)).download({ url: JAR_URL, outputPath: missing })
    ).rejects.toMatchObject({ code: "DOWNLOAD_WRITE_ERROR" });
    expect(body.destroyed).toBe(true);
  });

  it("keeps the write error when the part file can't be removed", async () => {
    await mkdir(`${outputPath}${PART_SUFFIX}`);
    const transport = createFakeTransport({ [JAR_URL]: { body: "jar" } });
    const logger = createSpyLogger();

    await expect(
      createFetchDownloadService(transport, logger).download({ url: JAR_URL, outputPath })
    ).rejects.toMatchObject({ code: "DOWNLOAD_WRITE_ERROR", message: `Can't write "${outputPath}"` });
    expect(logger.warn).toHaveBeenCalledWith(
      "Couldn't remove partial download",
      expect.objectContaining({ path: `${outputPath}${PART_SUFFIX}` })
    );
  });
});
