import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import sharp from "sharp";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

import fetch, { Response } from "node-fetch";
import { FaceFetcher } from "../../src/images/FaceFetcher.js";
import { ExternalServiceError, ValidationError } from "../../src/utils/ErrorHandler.js";
import type { FaceConfig } from "../../src/utils/config.js";
import { makeJpeg } from "../helpers/jpeg.js";

const fetchMock = vi.mocked(fetch);

describe("FaceFetcher", () => {
  let tmpDir: string;
  let config: FaceConfig;
  let jpeg: Buffer;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "faces-"));
    config = {
      url: "https://faces.test/",
      outputDir: path.join(tmpDir, "people"),
      maxAttempts: 1,
      userAgent: "test-agent",
    };
    jpeg = await makeJpeg();
    fetchMock.mockReset();
    fetchMock.mockImplementation(async () => new Response(jpeg, { status: 200 }));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("stores exactly N colour and N grayscale files", async () => {
    const result = await new FaceFetcher(config).fetchFaces(3);

    expect(result.pairs.map((pair) => pair.index)).toEqual([1, 2, 3]);
    expect((await fs.readdir(path.join(tmpDir, "people", "color"))).sort()).toEqual([
      "00001.jpg",
      "00002.jpg",
      "00003.jpg",
    ]);
    expect((await fs.readdir(path.join(tmpDir, "people", "grayscale"))).sort()).toEqual([
      "00001.jpg",
      "00002.jpg",
      "00003.jpg",
    ]);
  });

  it("makes two requests per pair with the configured user agent", async () => {
    await new FaceFetcher(config).fetchFaces(2);

    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://faces.test/",
      expect.objectContaining({ headers: { "User-Agent": "test-agent" } })
    );
  });

  it("converts the second image of each pair to grayscale", async () => {
    const result = await new FaceFetcher(config).fetchFaces(1);
    const [pair] = result.pairs;

    expect(pair.color.relativePath).toBe("color/00001.jpg");
    expect(pair.grayscale.relativePath).toBe("grayscale/00001.jpg");
    expect(pair.grayscale.grayscale).toBe(true);
    expect((await sharp(pair.color.absolutePath).metadata()).channels).toBe(3);
    expect((await sharp(pair.grayscale.absolutePath).metadata()).channels).toBe(1);
  });

  it("creates the output directories even for zero faces", async () => {
    const result = await new FaceFetcher(config).fetchFaces(0);

    expect(result.pairs).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(await fs.readdir(path.join(tmpDir, "people"))).toEqual(expect.arrayContaining(["color", "grayscale"]));
  });

  it("fails on an error response without retrying", async () => {
    fetchMock.mockImplementation(async () => new Response("busy", { status: 503, statusText: "Service Unavailable" }));

    await expect(new FaceFetcher(config).fetchFaces(1)).rejects.toBeInstanceOf(ExternalServiceError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries when more attempts are configured", async () => {
    fetchMock
      .mockImplementationOnce(async () => new Response("busy", { status: 500 }))
      .mockImplementation(async () => new Response(jpeg, { status: 200 }));

    const result = await new FaceFetcher({ ...config, maxAttempts: 2 }).fetchFaces(1);

    expect(result.pairs).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("rejects a negative count", async () => {
    await expect(new FaceFetcher(config).fetchFaces(-1)).rejects.toBeInstanceOf(ValidationError);
  });
});
