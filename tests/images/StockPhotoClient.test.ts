import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

import fetch, { Response } from "node-fetch";
import { StockPhotoClient, parseSearchResponse } from "../../src/images/StockPhotoClient.js";
import { ExternalServiceError, ValidationError } from "../../src/utils/ErrorHandler.js";
import type { PhotoConfig } from "../../src/utils/config.js";
import { makeJpeg } from "../helpers/jpeg.js";

const fetchMock = vi.mocked(fetch);

const SEARCH_BODY = {
  photos: [
    { id: 1, src: { large: "https://photos.test/1.jpg" } },
    { id: 2, src: { large: "https://photos.test/2.jpg" } },
    { id: 3, src: { large: "https://photos.test/3.jpg" } },
  ],
};

describe("parseSearchResponse", () => {
  it("keeps photos with an id and a large source", () => {
    expect(
      parseSearchResponse({
        photos: [{ id: 7, src: { large: "https://photos.test/7.jpg" } }, { id: 8 }, "junk"],
      })
    ).toEqual([{ id: 7, largeUrl: "https://photos.test/7.jpg" }]);
  });

  it("rejects a body without a photos array", () => {
    expect(() => parseSearchResponse({ error: "nope" })).toThrow(ExternalServiceError);
  });
});

describe("StockPhotoClient", () => {
  let tmpDir: string;
  let config: PhotoConfig;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "photos-"));
    config = {
      apiUrl: "https://pexels.test/v1/search",
      apiKey: "test-key",
      imagesDir: path.join(tmpDir, "images"),
      userAgent: "test-agent",
    };

    const jpeg = await makeJpeg(30, 120, 200);
    fetchMock.mockReset();
    fetchMock.mockImplementation(async (url) => {
      if (String(url).startsWith("https://pexels.test/")) {
        return new Response(JSON.stringify(SEARCH_BODY), {
          status: 200,
          headers: { "Content-Type": "application/json" },
        });
      }
      return new Response(jpeg, { status: 200 });
    });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("searches with the query, page size and API key", async () => {
    await new StockPhotoClient(config).fetchPhotos("wedding", 1);

    expect(fetchMock).toHaveBeenNthCalledWith(
      1,
      "https://pexels.test/v1/search?query=wedding&per_page=2",
      expect.objectContaining({ headers: { Authorization: "test-key", "User-Agent": "test-agent" } })
    );
  });

  it("alternates colour and grayscale files numbered by result position", async () => {
    const result = await new StockPhotoClient(config).fetchPhotos("wedding", 1);

    expect(result.saved.map((image) => image.relativePath)).toEqual([
      "wedding/color/00001.jpg",
      "wedding/grayscale/00002.jpg",
    ]);
    expect(result.saved.map((image) => image.grayscale)).toEqual([false, true]);
    expect(await fs.readdir(path.join(tmpDir, "images", "wedding", "color"))).toEqual(["00001.jpg"]);
    expect(await fs.readdir(path.join(tmpDir, "images", "wedding", "grayscale"))).toEqual(["00002.jpg"]);
  });

  it("stores what the search returned when it has fewer photos than requested", async () => {
    const result = await new StockPhotoClient(config).fetchPhotos("family", 5);

    expect(result.saved.map((image) => image.relativePath)).toEqual([
      "family/color/00001.jpg",
      "family/grayscale/00002.jpg",
      "family/color/00003.jpg",
    ]);
  });

  it("rejects queries with spaces before any request", async () => {
    await expect(new StockPhotoClient(config).fetchPhotos("old family", 1)).rejects.toBeInstanceOf(ValidationError);
    await expect(new StockPhotoClient(config).fetchPhotos("", 1)).rejects.toBeInstanceOf(ValidationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails when the search API answers with an error", async () => {
    fetchMock.mockImplementation(async () => new Response("unauthorized", { status: 401, statusText: "Unauthorized" }));

    await expect(new StockPhotoClient(config).fetchPhotos("wedding", 1)).rejects.toMatchObject({
      name: "ExternalServiceError",
      status: 401,
    });
  });
});
