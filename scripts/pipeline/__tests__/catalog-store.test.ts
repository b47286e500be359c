import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { catalogUrl } from "../../../shared/config";
import { CatalogUnavailable, NoTransferToolAvailable } from "../../../shared/errors";
import type { Release } from "../../../shared/schema";
import { CatalogStore } from "../catalog-store";
import { TransferOrchestrator, type TransferBackend } from "../transfer-orchestrator";
import { createFakeTools } from "./fixtures";

const WGET: TransferBackend = { kind: "single", tool: "wget", executable: "wget" };
const RELEASE: Release = { version: "r226", dataset: "ar53" };

describe("CatalogStore", () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "gtdb-catalog-"));
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  it("stores the catalog under the version directory", () => {
    const store = new CatalogStore(baseDir, new TransferOrchestrator(null));
    expect(store.catalogPath(RELEASE)).toBe(path.join(baseDir, "r226", "ar53_metadata_r226.tsv.gz"));
  });

  it("reuses a cached catalog without any transfer", async () => {
    const { runner, calls } = createFakeTools();
    const store = new CatalogStore(baseDir, new TransferOrchestrator(WGET, {}, { runner }));
    fs.mkdirSync(path.join(baseDir, "r226"), { recursive: true });
    fs.writeFileSync(store.catalogPath(RELEASE), "cached");

    expect(await store.ensureCatalog(RELEASE)).toBe(store.catalogPath(RELEASE));
    expect(calls).toHaveLength(0);
    expect(await store.isCached(RELEASE)).toBe(true);
  });

  it("refetches an empty cached file", async () => {
    const { runner, calls } = createFakeTools({ content: () => "fresh" });
    const store = new CatalogStore(baseDir, new TransferOrchestrator(WGET, {}, { runner }));
    fs.mkdirSync(path.join(baseDir, "r226"), { recursive: true });
    fs.writeFileSync(store.catalogPath(RELEASE), "");

    const catalog = await store.ensureCatalog(RELEASE);

    expect(calls).toHaveLength(1);
    expect(calls[0].args[calls[0].args.length - 1]).toBe(catalogUrl(RELEASE, "europe"));
    expect(fs.readFileSync(catalog, "utf-8")).toBe("fresh");
  });

  it("falls back to the next mirror", async () => {
    const { runner, calls } = createFakeTools({
      failUrls: new Set([catalogUrl(RELEASE, "asia-pacific1")]),
    });
    const store = new CatalogStore(baseDir, new TransferOrchestrator(WGET, {}, { runner }), {
      mirror: "asia-pacific1",
    });

    await store.ensureCatalog(RELEASE);

    expect(calls.map((c) => c.args[c.args.length - 1])).toEqual([
      catalogUrl(RELEASE, "asia-pacific1"),
      catalogUrl(RELEASE, "europe"),
    ]);
    expect(await store.isCached(RELEASE)).toBe(true);
  });

  it("throws CatalogUnavailable when every mirror fails and leaves no file", async () => {
    const urls = (["europe", "asia-pacific1", "asia-pacific2"] as const).map((m) => catalogUrl(RELEASE, m));
    const { runner } = createFakeTools({ failUrls: new Set(urls) });
    const store = new CatalogStore(baseDir, new TransferOrchestrator(WGET, {}, { runner }));

    await expect(store.ensureCatalog(RELEASE)).rejects.toBeInstanceOf(CatalogUnavailable);
    expect(fs.readdirSync(path.join(baseDir, "r226"))).toEqual([]);
  });

  it("tries only the chosen mirror without fallback", async () => {
    const { runner, calls } = createFakeTools({
      failUrls: new Set([catalogUrl(RELEASE, "europe")]),
    });
    const store = new CatalogStore(baseDir, new TransferOrchestrator(WGET, {}, { runner }), {
      mirrorFallback: false,
    });

    await expect(store.ensureCatalog(RELEASE)).rejects.toThrow(
      "Failed to download metadata for r226 (ar53); tried europe: wget exited with code 8: ERROR 404: Not Found.",
    );
    expect(calls).toHaveLength(1);
  });

  it("surfaces a missing transfer tool", async () => {
    const store = new CatalogStore(baseDir, new TransferOrchestrator(null));
    await expect(store.ensureCatalog(RELEASE)).rejects.toBeInstanceOf(NoTransferToolAvailable);
  });
});
