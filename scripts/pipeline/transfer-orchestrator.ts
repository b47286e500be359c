import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { execFile, spawn } from "child_process";
import { promisify } from "util";
import { errorMessage, NoTransferToolAvailable } from "../../shared/errors";
import { silentLogger, type Logger } from "../../shared/log";
import {
  transferPreferencesSchema,
  type TransferPreferences,
  type TransferPreferencesInput,
} from "../../shared/schema";

const execFileAsync = promisify(execFile);

export const PARTIAL_SUFFIX = ".partial";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** aria2c takes a whole URL list per invocation; wget takes one URL. */
export type TransferBackend =
  | { kind: "batch"; tool: "aria2c"; executable: string }
  | { kind: "single"; tool: "wget"; executable: string };

export interface TransferItem {
  /** Caller's identifier for the item, usually the accession. */
  key: string;
  url: string;
  destination: string;
}

export interface TransferReport {
  succeeded: Set<string>;
  failed: Set<string>;
  /** Failure reason per failed key. */
  errors: Map<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { verbose: boolean },
) => Promise<CommandResult>;

export type ExecutableLocator = (name: string) => Promise<string | null>;

// ---------------------------------------------------------------------------
// Probing and process helpers
// ---------------------------------------------------------------------------

export const locateExecutable: ExecutableLocator = async (name) => {
  try {
    const { stdout } = await execFileAsync("which", [name]);
    const found = stdout.trim();
    return found === "" ? null : found;
  } catch {
    return null;
  }
};

/**
 * Pick the transfer tool for this run: aria2c when allowed and on PATH, then
 * wget. Returns null when neither is found.
 */
export async function probeTransferBackend(
  preferences: Pick<TransferPreferencesInput, "preferBatch"> = {},
  locate: ExecutableLocator = locateExecutable,
): Promise<TransferBackend | null> {
  if (preferences.preferBatch ?? true) {
    const aria2c = await locate("aria2c");
    if (aria2c) return { kind: "batch", tool: "aria2c", executable: aria2c };
  }
  const wget = await locate("wget");
  if (wget) return { kind: "single", tool: "wget", executable: wget };
  return null;
}

export const spawnCommand: CommandRunner = (command, args, { verbose }) =>
  new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stderr = "";

    proc.stdout.on("data", (data: Buffer) => {
      if (verbose) process.stdout.write(data);
    });
    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
      if (verbose) process.stderr.write(data);
    });

    proc.on("close", (code) => resolve({ exitCode: code ?? 1, stderr }));
    proc.on("error", reject);
  });

function partialPath(item: TransferItem): string {
  return item.destination + PARTIAL_SUFFIX;
}

function nonEmptyFile(filePath: string): boolean {
  try {
    const stat = fs.statSync(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

/** URIs listed in an aria2c session file (its unfinished or failed downloads). */
export function parseSessionUris(content: string): Set<string> {
  const uris = new Set<string>();
  for (const line of content.split("\n")) {
    if (line.trim() === "" || /^\s/.test(line)) continue;
    for (const uri of line.split("\t")) {
      if (uri.trim() !== "") uris.add(uri.trim());
    }
  }
  return uris;
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class TransferOrchestrator {
  readonly preferences: TransferPreferences;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(
    readonly backend: TransferBackend | null,
    preferences: TransferPreferencesInput = {},
    options: { runner?: CommandRunner; logger?: Logger } = {},
  ) {
    this.preferences = transferPreferencesSchema.parse(preferences);
    this.runner = options.runner ?? spawnCommand;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Download every item to its destination. Items are written to
   * `<destination>.partial` and renamed once the tool reports success, so a
   * destination never holds a half-written file.
   */
  async fetchAll(items: TransferItem[]): Promise<TransferReport> {
    const report: TransferReport = { succeeded: new Set(), failed: new Set(), errors: new Map() };
    if (items.length === 0) return report;

    const backend = this.backend;
    if (!backend) {
      throw new NoTransferToolAvailable(this.preferences.preferBatch ? ["aria2c", "wget"] : ["wget"]);
    }

    const ready: TransferItem[] = [];
    for (const item of items) {
      try {
        fs.mkdirSync(path.dirname(item.destination), { recursive: true });
        fs.rmSync(partialPath(item), { force: true });
        ready.push(item);
      } catch (err) {
        this.fail(item, `cannot prepare ${item.destination}: ${errorMessage(err)}`, report);
      }
    }
    if (ready.length === 0) return report;

    if (backend.kind === "batch") {
      const { batchSize } = this.preferences;
      for (let i = 0; i < ready.length; i += batchSize) {
        const batch = ready.slice(i, i + batchSize);
        this.logger.debug(
          `  aria2c batch ${Math.floor(i / batchSize) + 1}: ${batch.length} file(s)`,
        );
        await this.runAria2Batch(backend.executable, batch, report);
      }
    } else {
      for (const [i, item] of ready.entries()) {
        this.logger.debug(`  [${i + 1}/${ready.length}] wget ${item.url}`);
        await this.runWget(backend.executable, item, report);
      }
    }

    return report;
  }

  /** A tool that fails to start counts as a failed invocation, not a fatal error. */
  private async run(executable: string, args: string[]): Promise<CommandResult> {
    try {
      return await this.runner(executable, args, { verbose: this.preferences.verbose });
    } catch (err) {
      return { exitCode: -1, stderr: errorMessage(err) };
    }
  }

  private fail(item: TransferItem, reason: string, report: TransferReport): void {
    report.failed.add(item.key);
    report.errors.set(item.key, reason);
  }

  /** Promote or discard one item's partial file. Filesystem errors fail only that item. */
  private settle(item: TransferItem, ok: boolean, reason: string, report: TransferReport): void {
    const partial = partialPath(item);
    try {
      fs.rmSync(`${partial}.aria2`, { force: true });
      if (ok && nonEmptyFile(partial)) {
        fs.renameSync(partial, item.destination);
        report.succeeded.add(item.key);
        return;
      }
      fs.rmSync(partial, { force: true });
      this.fail(item, ok ? "tool reported success but wrote no data" : reason, report);
    } catch (err) {
      this.fail(item, `cannot store ${item.destination}: ${errorMessage(err)}`, report);
      try {
        fs.rmSync(partial, { force: true });
      } catch (cleanupErr) {
        this.logger.warn(`  Could not remove ${partial}: ${errorMessage(cleanupErr)}`);
      }
    }
  }

  private async runAria2Batch(
    executable: string,
    batch: TransferItem[],
    report: TransferReport,
  ): Promise<void> {
    const { maxConnections, maxConcurrentDownloads, verbose } = this.preferences;
    const workDir = fs.mkdtempSync(path.join(os.tmpdir(), "gtdb-aria2-"));
    const inputFile = path.join(workDir, "urls.txt");
    const sessionFile = path.join(workDir, "session.txt");

    try {
      const lines: string[] = [];
      for (const item of batch) {
        lines.push(item.url);
        lines.push(`  dir=${path.dirname(item.destination)}`);
        lines.push(`  out=${path.basename(partialPath(item))}`);
      }
      fs.writeFileSync(inputFile, lines.join("\n") + "\n");

      const args = [
        `--input-file=${inputFile}`,
        `--save-session=${sessionFile}`,
        `--max-concurrent-downloads=${maxConcurrentDownloads}`,
        `--max-connection-per-server=${maxConnections}`,
        `--split=${maxConnections}`,
        "--min-split-size=1M",
        "--allow-overwrite=true",
        "--auto-file-renaming=false",
        "--file-allocation=none",
      ];
      args.push(verbose ? "--console-log-level=notice" : "--quiet=true");

      const { exitCode, stderr } = await this.run(executable, args);

      if (exitCode === 0) {
        for (const item of batch) this.settle(item, true, "", report);
        return;
      }

      const reason = `aria2c exited with code ${exitCode}${stderr ? `: ${lastLine(stderr)}` : ""}`;
      this.logger.warn(`  ${reason}`);

      // aria2c lists the downloads it could not finish in the session file;
      // without one, nothing in the batch can be trusted.
      const unfinished = fs.existsSync(sessionFile)
        ? parseSessionUris(fs.readFileSync(sessionFile, "utf-8"))
        : null;
      for (const item of batch) {
        const ok = unfinished !== null && !unfinished.has(item.url);
        this.settle(item, ok, reason, report);
      }
    } finally {
      fs.rmSync(workDir, { recursive: true, force: true });
    }
  }

  private async runWget(executable: string, item: TransferItem, report: TransferReport): Promise<void> {
    const { verbose } = this.preferences;
    const args = verbose ? [] : ["-q"];
    args.push("-O", partialPath(item), item.url);

    const { exitCode, stderr } = await this.run(executable, args);
    const reason = `wget exited with code ${exitCode}${stderr ? `: ${lastLine(stderr)}` : ""}`;
    if (exitCode !== 0) this.logger.debug(`  ${reason}`);
    this.settle(item, exitCode === 0, reason, report);
  }
}
