import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { NoTransferToolAvailable } from "../../../shared/errors";
import {
  parseSessionUris,
  probeTransferBackend,
  TransferOrchestrator,
  type TransferBackend,
  type TransferItem,
} from "../transfer-orchestrator";
import { createFakeTools } from "./fixtures";

const ARIA2: TransferBackend = { kind: "batch", tool: "aria2c", executable: "/usr/bin/aria2c" };
const WGET: TransferBackend = { kind: "single", tool: "wget", executable: "/usr/bin/wget" };

describe("probeTransferBackend", () => {
  it("prefers aria2c when it is on PATH", async () => {
    const locate = vi.fn(async (name: string) => `/usr/bin/${name}`);
    expect(await probeTransferBackend({}, locate)).toEqual(ARIA2);
    expect(locate).toHaveBeenCalledTimes(1);
  });

  it("falls back to wget", async () => {
    const locate = async (name: string) => (name === "wget" ? "/usr/bin/wget" : null);
    expect(await probeTransferBackend({}, locate)).toEqual(WGET);
  });

  it("skips aria2c when batch transfers are disabled", async () => {
    const locate = vi.fn(async (name: string) => `/usr/bin/${name}`);
    expect(await probeTransferBackend({ preferBatch: false }, locate)).toEqual(WGET);
    expect(locate).toHaveBeenCalledWith("wget");
    expect(locate).not.toHaveBeenCalledWith("aria2c");
  });

  it("returns null when neither tool is found", async () => {
    expect(await probeTransferBackend({}, async () => null)).toBeNull();
  });
});

describe("parseSessionUris", () => {
  it("reads URI lines and ignores option lines", () => {
    const session = "https://a/x.gz\n  gid=1\n  dir=/tmp\nhttps://b/y.gz\thttps://c/y.gz\n";
    expect(parseSessionUris(session)).toEqual(
      new Set(["https://a/x.gz", "https://b/y.gz", "https://c/y.gz"]),
    );
  });
});

describe("TransferOrchestrator", () => {
  let dir: string;
  let items: TransferItem[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "gtdb-transfer-"));
    items = ["a", "b", "c"].map((name) => ({
      key: name,
      url: `https://example.test/${name}.fna.gz`,
      destination: path.join(dir, "raw", `${name}.fna.gz`),
    }));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns an empty report for no items, even without a tool", async () => {
    const report = await new TransferOrchestrator(null).fetchAll([]);
    expect(report.succeeded.size).toBe(0);
    expect(report.failed.size).toBe(0);
  });

  it("throws when no transfer tool is available", async () => {
    await expect(new TransferOrchestrator(null).fetchAll(items)).rejects.toBeInstanceOf(
      NoTransferToolAvailable,
    );
  });

  it("downloads a batch with one aria2c invocation", async () => {
    const { runner, calls } = createFakeTools();
    const orchestrator = new TransferOrchestrator(ARIA2, {}, { runner });

    const report = await orchestrator.fetchAll(items);

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe("/usr/bin/aria2c");
    expect(calls[0].args).toContain("--max-connection-per-server=4");
    expect(calls[0].args).toContain("--quiet=true");
    expect(report.succeeded).toEqual(new Set(["a", "b", "c"]));
    expect(fs.readFileSync(items[1].destination, "utf-8")).toBe(">https://example.test/b.fna.gz\nACGT\n");
    expect(fs.readdirSync(path.join(dir, "raw")).sort()).toEqual(["a.fna.gz", "b.fna.gz", "c.fna.gz"]);
  });

  it("attributes aria2c failures through the session file", async () => {
    const { runner } = createFakeTools({ failUrls: new Set([items[1].url]) });
    const orchestrator = new TransferOrchestrator(ARIA2, {}, { runner });

    const report = await orchestrator.fetchAll(items);

    expect(report.succeeded).toEqual(new Set(["a", "c"]));
    expect(report.failed).toEqual(new Set(["b"]));
    expect(report.errors.get("b")).toBe("aria2c exited with code 1: errorCode=3 Resource not found");
    expect(fs.existsSync(items[1].destination)).toBe(false);
    expect(fs.existsSync(items[1].destination + ".partial")).toBe(false);
  });

  it("fails the whole batch when aria2c leaves no session", async () => {
    const { runner } = createFakeTools({ failUrls: new Set([items[1].url]), writeSession: false });
    const orchestrator = new TransferOrchestrator(ARIA2, {}, { runner });

    const report = await orchestrator.fetchAll(items);

    expect(report.succeeded.size).toBe(0);
    expect(report.failed).toEqual(new Set(["a", "b", "c"]));
    expect(fs.readdirSync(path.join(dir, "raw"))).toEqual([]);
  });

  it("splits large requests into batches", async () => {
    const { runner, calls } = createFakeTools();
    const orchestrator = new TransferOrchestrator(ARIA2, { batchSize: 2 }, { runner });

    const report = await orchestrator.fetchAll(items);

    expect(calls).toHaveLength(2);
    expect(report.succeeded.size).toBe(3);
  });

  it("runs wget once per file", async () => {
    const { runner, calls } = createFakeTools({ failUrls: new Set([items[0].url]) });
    const orchestrator = new TransferOrchestrator(WGET, {}, { runner });

    const report = await orchestrator.fetchAll(items);

    expect(calls.map((c) => c.args[c.args.length - 1])).toEqual(items.map((i) => i.url));
    expect(calls[1].args).toEqual(["-q", "-O", items[1].destination + ".partial", items[1].url]);
    expect(report.succeeded).toEqual(new Set(["b", "c"]));
    expect(report.errors.get("a")).toBe("wget exited with code 8: ERROR 404: Not Found.");
    // The empty file wget left behind is not promoted to the destination.
    expect(fs.existsSync(items[0].destination)).toBe(false);
  });

  it("treats a tool that cannot start as a failed transfer", async () => {
    const runner = async () => {
      throw new Error("spawn wget ENOENT");
    };
    const orchestrator = new TransferOrchestrator(WGET, {}, { runner });

    const report = await orchestrator.fetchAll(items.slice(0, 1));

    expect(report.errors.get("a")).toBe("wget exited with code -1: spawn wget ENOENT");
  });

  it("rejects a reported success that wrote nothing", async () => {
    const { runner } = createFakeTools({ content: () => "" });
    const orchestrator = new TransferOrchestrator(WGET, {}, { runner });

    const report = await orchestrator.fetchAll(items.slice(0, 1));

    expect(report.errors.get("a")).toBe("tool reported success but wrote no data");
  });

  it("fails only the item whose destination directory cannot be created", async () => {
    fs.writeFileSync(path.join(dir, "blocked"), "not a directory");
    const blocked: TransferItem = {
      key: "x",
      url: "https://example.test/x.fna.gz",
      destination: path.join(dir, "blocked", "x.fna.gz"),
    };
    const { runner, calls } = createFakeTools();

    const report = await new TransferOrchestrator(WGET, {}, { runner }).fetchAll([blocked, ...items]);

    expect(calls).toHaveLength(3);
    expect(report.succeeded).toEqual(new Set(["a", "b", "c"]));
    expect(report.failed).toEqual(new Set(["x"]));
    expect(report.errors.get("x")).toMatch(/^cannot prepare /);
  });

  it("fails only the item whose download cannot be moved into place", async () => {
    fs.mkdirSync(items[0].destination, { recursive: true });
    fs.writeFileSync(path.join(items[0].destination, "occupied"), "x");
    const { runner } = createFakeTools();

    const report = await new TransferOrchestrator(WGET, {}, { runner }).fetchAll(items);

    expect(report.succeeded).toEqual(new Set(["b", "c"]));
    expect(report.errors.get("a")).toMatch(/^cannot store /);
    expect(fs.existsSync(items[0].destination + ".partial")).toBe(false);
  });

  it("replaces a stale partial left by an interrupted run", async () => {
    fs.mkdirSync(path.join(dir, "raw"), { recursive: true });
    fs.writeFileSync(items[0].destination + ".partial", "truncated");
    const { runner } = createFakeTools();

    await new TransferOrchestrator(WGET, {}, { runner }).fetchAll(items.slice(0, 1));

    expect(fs.readFileSync(items[0].destination, "utf-8")).toBe(">https://example.test/a.fna.gz\nACGT\n");
  });
});
