import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  createFetchState,
  processBatch,
  processUrl,
  summarize,
  type DownloadResult,
  type FetchSettings,
  type FetchState,
} from "./pipeline.js";
import { computeContentHash } from "./content-hash.js";
import {
  createFakeHttpClient,
  imageBytes,
  imageReply,
  systemError,
} from "../testing/fake-http.js";
import { HttpTimeoutError } from "./ports/http.js";
import type { Clock } from "./ports/clock.js";

// Pass-through fs/promises so single writes can be made to fail
vi.mock("fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("fs/promises")>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

import { writeFile } from "fs/promises";

const fixedClock: Clock = { now: () => 1700000000000 };
const noDelay = async () => {};

describe("pipeline", () => {
  let outputDir: string;
  let settings: FetchSettings;
  let state: FetchState;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), "pixgrab-pipeline-"));
    settings = {
      timeoutMs: 1000,
      maxAttempts: 3,
      retryDelayMs: 0,
      maxBytes: 50 * 1024 * 1024,
      allowedTypePrefixes: ["image/"],
      outputDir,
      userAgent: "pixgrab-test/1.0",
    };
    state = createFetchState();
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  describe("processUrl", () => {
    it("saves a valid image under its URL name", async () => {
      const bytes = imageBytes(1000);
      const http = createFakeHttpClient({ "https://example.com/a.png": imageReply(bytes) });

      const result = await processUrl("https://example.com/a.png", settings, state, {
        http,
        delay: noDelay,
      });

      expect(result).toEqual({
        status: "saved",
        url: "https://example.com/a.png",
        filename: "a.png",
        path: join(outputDir, "a.png"),
        size: 1000,
        hash: computeContentHash(bytes),
      });
      expect(readFileSync(join(outputDir, "a.png")).equals(bytes)).toBe(true);
      expect(state.seenHashes.has(computeContentHash(bytes))).toBe(true);
    });

    it("reports the same content twice as a duplicate and writes once", async () => {
      const bytes = imageBytes(1000);
      const http = createFakeHttpClient({ "https://example.com/a.png": imageReply(bytes) });
      const deps = { http, delay: noDelay };

      const first = await processUrl("https://example.com/a.png", settings, state, deps);
      const second = await processUrl("https://example.com/a.png", settings, state, deps);

      expect(first.status).toBe("saved");
      expect(second).toEqual({
        status: "duplicate",
        url: "https://example.com/a.png",
        size: 1000,
        hash: computeContentHash(bytes),
      });
      expect(readdirSync(outputDir)).toEqual(["a.png"]);
    });

    it("detects duplicates across different URLs", async () => {
      const bytes = imageBytes(64);
      const http = createFakeHttpClient({
        "https://one.example/cat.png": imageReply(bytes),
        "https://two.example/copy-of-cat.png": imageReply(bytes),
      });
      const deps = { http, delay: noDelay };

      await processUrl("https://one.example/cat.png", settings, state, deps);
      const copy = await processUrl("https://two.example/copy-of-cat.png", settings, state, deps);

      expect(copy.status).toBe("duplicate");
      expect(readdirSync(outputDir)).toEqual(["cat.png"]);
    });

    it("adds the default scheme to URLs without one", async () => {
      const http = createFakeHttpClient({
        "https://example.com/cat.jpg": imageReply(imageBytes(10), "image/jpeg"),
      });

      const result = await processUrl("example.com/cat.jpg", settings, state, {
        http,
        delay: noDelay,
      });

      expect(http.requests[0].url).toBe("https://example.com/cat.jpg");
      expect(result).toMatchObject({ status: "saved", url: "https://example.com/cat.jpg", filename: "cat.jpg" });
    });

    it("rejects HTML responses without writing a file", async () => {
      const http = createFakeHttpClient({
        "https://example.com/page": {
          headers: { "content-type": "text/html; charset=utf-8" },
          body: Buffer.from("<!doctype html>"),
        },
      });

      const result = await processUrl("https://example.com/page", settings, state, {
        http,
        delay: noDelay,
      });

      expect(result).toEqual({
        status: "rejected",
        url: "https://example.com/page",
        error: {
          code: "UNSUPPORTED_TYPE",
          message: 'Not an image ("text/html")',
        },
      });
      expect(readdirSync(outputDir)).toEqual([]);
      expect(state.seenHashes.size).toBe(0);
    });

    it("rejects a response whose header alone exceeds the ceiling", async () => {
      const http = createFakeHttpClient({
        "https://example.com/huge.png": {
          headers: { "content-type": "image/png", "content-length": String(60 * 1024 * 1024) },
          body: imageBytes(16),
        },
      });

      const result = await processUrl("https://example.com/huge.png", settings, state, {
        http,
        delay: noDelay,
      });

      expect(result).toMatchObject({ status: "rejected", error: { code: "TOO_LARGE" } });
      expect(readdirSync(outputDir)).toEqual([]);
    });

    it("rejects a body that grows past the ceiling while streaming", async () => {
      const http = createFakeHttpClient({
        "https://example.com/stream.png": {
          headers: { "content-type": "image/png" },
          body: [imageBytes(80), imageBytes(80, 2)],
        },
      });

      const result = await processUrl(
        "https://example.com/stream.png",
        { ...settings, maxBytes: 100 },
        state,
        { http, delay: noDelay }
      );

      expect(result).toMatchObject({ status: "rejected", error: { code: "TOO_LARGE" } });
      expect(readdirSync(outputDir)).toEqual([]);
    });

    it("fails with NETWORK_ERROR after three timed-out attempts", async () => {
      const http = createFakeHttpClient({
        "https://slow.example/a.png": { error: new HttpTimeoutError(1000) },
      });

      const result = await processUrl("https://slow.example/a.png", settings, state, {
        http,
        delay: noDelay,
      });

      expect(result).toEqual({
        status: "failed",
        url: "https://slow.example/a.png",
        error: {
          code: "NETWORK_ERROR",
          message: "Network error after 3 attempts: Timed out after 1000ms",
        },
      });
      expect(http.requests).toHaveLength(3);
      expect(readdirSync(outputDir)).toEqual([]);
    });

    it("fails with HTTP_ERROR on 404", async () => {
      const http = createFakeHttpClient({
        "https://example.com/gone.png": { status: 404, statusText: "Not Found" },
      });

      const result = await processUrl("https://example.com/gone.png", settings, state, {
        http,
        delay: noDelay,
      });

      expect(result).toMatchObject({ status: "failed", error: { code: "HTTP_ERROR" } });
    });

    it("rejects invalid URLs without any request", async () => {
      const http = createFakeHttpClient({});

      const result = await processUrl("   ", settings, state, { http, delay: noDelay });

      expect(result).toMatchObject({ status: "rejected", url: "", error: { code: "INVALID_URL" } });
      expect(http.requests).toHaveLength(0);
    });

    it("stores distinct images with the same name side by side", async () => {
      const first = imageBytes(100, 1);
      const second = imageBytes(100, 2);
      const http = createFakeHttpClient({
        "https://a.example/image.jpg": imageReply(first, "image/jpeg"),
        "https://b.example/image.jpg": imageReply(second, "image/jpeg"),
      });
      const deps = { http, delay: noDelay };

      const r1 = await processUrl("https://a.example/image.jpg", settings, state, deps);
      const r2 = await processUrl("https://b.example/image.jpg", settings, state, deps);

      expect(r1).toMatchObject({ status: "saved", filename: "image.jpg" });
      expect(r2).toMatchObject({ status: "saved", filename: "image_1.jpg" });
      expect(readFileSync(join(outputDir, "image.jpg")).equals(first)).toBe(true);
      expect(readFileSync(join(outputDir, "image_1.jpg")).equals(second)).toBe(true);
    });

    it("synthesizes names from the clock and a counter", async () => {
      const http = createFakeHttpClient({
        "https://example.com/render": imageReply(imageBytes(5, 1), "image/webp"),
        "https://example.com/render2": imageReply(imageBytes(5, 2), "image/gif"),
      });
      const deps = { http, clock: fixedClock, delay: noDelay };

      const r1 = await processUrl("https://example.com/render", settings, state, deps);
      const r2 = await processUrl("https://example.com/render2", settings, state, deps);

      expect(r1).toMatchObject({ filename: "image_1700000000000_1.webp" });
      expect(r2).toMatchObject({ filename: "image_1700000000000_2.gif" });
    });

    it("uses the per-request output directory when given", async () => {
      const http = createFakeHttpClient({ "https://example.com/a.png": imageReply(imageBytes(8)) });
      const custom = join(outputDir, "nested", "custom");

      const result = await processUrl(
        { url: "https://example.com/a.png", outputDir: custom },
        settings,
        state,
        { http, delay: noDelay }
      );

      expect(result).toMatchObject({ status: "saved", path: join(custom, "a.png") });
    });

    it("keeps the hash unseen when the output directory is unusable", async () => {
      const bytes = imageBytes(8);
      const http = createFakeHttpClient({ "https://example.com/a.png": imageReply(bytes) });
      const blocked = join(outputDir, "blocked");
      writeFileSync(blocked, "a file where a directory should be");

      const result = await processUrl(
        { url: "https://example.com/a.png", outputDir: blocked },
        settings,
        state,
        { http, delay: noDelay }
      );

      expect(result).toMatchObject({ status: "failed", error: { code: "DIRECTORY_ERROR" } });
      expect(state.seenHashes.size).toBe(0);
    });

    it("keeps the hash unseen when writing into an existing directory fails", async () => {
      const bytes = imageBytes(8);
      const http = createFakeHttpClient({ "https://example.com/a.png": imageReply(bytes) });
      vi.mocked(writeFile).mockRejectedValueOnce(
        systemError("ENOSPC", "ENOSPC: no space left on device")
      );

      const failed = await processUrl("https://example.com/a.png", settings, state, {
        http,
        delay: noDelay,
      });

      expect(failed).toEqual({
        status: "failed",
        url: "https://example.com/a.png",
        error: {
          code: "WRITE_ERROR",
          message: `Could not write "${join(outputDir, "a.png")}": ENOSPC: no space left on device`,
        },
      });
      expect(state.seenHashes.size).toBe(0);
      expect(readdirSync(outputDir)).toEqual([]);

      const retried = await processUrl("https://example.com/a.png", settings, state, {
        http,
        delay: noDelay,
      });

      expect(retried).toMatchObject({ status: "saved", filename: "a.png" });
      expect(state.seenHashes.has(computeContentHash(bytes))).toBe(true);
    });

    it("saves an image whose decoded name is long and multi-byte", async () => {
      const url = `https://example.com/${encodeURIComponent("猫".repeat(100))}.png`;
      const http = createFakeHttpClient({ [url]: imageReply(imageBytes(16)) });

      const result = await processUrl(url, settings, state, { http, delay: noDelay });

      expect(result).toMatchObject({ status: "saved", filename: `${"猫".repeat(65)}.png` });
      expect(readdirSync(outputDir)).toEqual([`${"猫".repeat(65)}.png`]);
    });

    it("keeps separate states independent", async () => {
      const bytes = imageBytes(12);
      const http = createFakeHttpClient({ "https://example.com/a.png": imageReply(bytes) });
      const otherDir = join(outputDir, "other");

      await processUrl("https://example.com/a.png", settings, state, { http, delay: noDelay });
      const fresh = await processUrl(
        "https://example.com/a.png",
        { ...settings, outputDir: otherDir },
        createFetchState(),
        { http, delay: noDelay }
      );

      expect(fresh.status).toBe("saved");
    });
  });

  describe("processBatch", () => {
    it("continues past failures and summarizes the outcome", async () => {
      const bytes = imageBytes(1000);
      const http = createFakeHttpClient({
        "https://example.com/a.png": imageReply(bytes),
        "https://down.example/b.png": { error: systemError("ECONNREFUSED", "connect ECONNREFUSED") },
        "https://example.com/c.gif": imageReply(imageBytes(30, 3), "image/gif"),
      });
      const seen: string[] = [];

      const { results, summary } = await processBatch(
        [
          "https://example.com/a.png",
          "https://down.example/b.png",
          "https://example.com/a.png",
          "https://example.com/c.gif",
        ],
        settings,
        state,
        { http, delay: noDelay },
        { onResult: (result) => seen.push(result.status) }
      );

      expect(results.map((r) => r.status)).toEqual(["saved", "failed", "duplicate", "saved"]);
      expect(seen).toEqual(["saved", "failed", "duplicate", "saved"]);
      expect(summary).toEqual({ total: 4, saved: 2, duplicates: 1, failed: 1 });
      expect(readdirSync(outputDir).sort()).toEqual(["a.png", "c.gif"]);
    });

    it("reports progress before each URL", async () => {
      const http = createFakeHttpClient({});
      const starts: Array<[string, number, number]> = [];

      await processBatch(["a", "b"], settings, state, { http, delay: noDelay }, {
        onStart: (url, index, total) => starts.push([url, index, total]),
      });

      expect(starts).toEqual([
        ["a", 0, 2],
        ["b", 1, 2],
      ]);
    });
  });

  describe("summarize", () => {
    it("counts rejected and failed together", () => {
      const results: DownloadResult[] = [
        { status: "rejected", url: "x", error: { code: "TOO_LARGE", message: "big" } },
        { status: "failed", url: "y", error: { code: "WRITE_ERROR", message: "disk" } },
        { status: "duplicate", url: "z", size: 1, hash: "h" },
      ];

      expect(summarize(results)).toEqual({ total: 3, saved: 0, duplicates: 1, failed: 2 });
    });
  });
});
