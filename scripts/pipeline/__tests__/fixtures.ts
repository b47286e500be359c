import * as fs from "fs";
import * as path from "path";
import * as zlib from "zlib";
import type { CommandResult, CommandRunner } from "../transfer-orchestrator";

export const FIRMICUTES_CLOSTRIDIA =
  "d__Bacteria;p__Firmicutes;c__Clostridia;o__Clostridiales;f__Clostridiaceae;g__Clostridium;s__Clostridium cuniculi";
export const FIRMICUTES_BACILLI =
  "d__Bacteria;p__Firmicutes;c__Bacilli;o__Bacillales;f__Bacillaceae;g__Bacillus;s__Bacillus subtilis";

export interface CatalogRow {
  accession: string;
  taxonomy: string;
  assembly?: string;
}

export const CATALOG_HEADER = ["accession", "checkm_completeness", "gtdb_taxonomy", "ncbi_assembly_name"];

export function catalogText(rows: CatalogRow[], header: string[] = CATALOG_HEADER): string {
  const lines = [header.join("\t")];
  for (const row of rows) {
    const values: Record<string, string> = {
      accession: row.accession,
      Genome: row.accession,
      checkm_completeness: "99.5",
      gtdb_taxonomy: row.taxonomy,
      classification: row.taxonomy,
      ncbi_assembly_name: row.assembly ?? "",
    };
    lines.push(header.map((h) => values[h] ?? "").join("\t"));
  }
  return lines.join("\n") + "\n";
}

export function writeCatalog(filePath: string, rows: CatalogRow[], header?: string[]): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const text = catalogText(rows, header);
  fs.writeFileSync(filePath, filePath.endsWith(".gz") ? zlib.gzipSync(text) : text);
  return filePath;
}

export interface FakeCall {
  command: string;
  args: string[];
}

export interface FakeToolOptions {
  /** URLs the fake tool fails to fetch. */
  failUrls?: Set<string>;
  /** aria2c only: whether a session file is written on failure. */
  writeSession?: boolean;
  /** Bytes written for each successful download. */
  content?: (url: string) => string;
}

/**
 * In-process stand-in for aria2c and wget: reads the same arguments the real
 * tools take and writes the output files itself.
 */
export function createFakeTools(options: FakeToolOptions = {}): {
  runner: CommandRunner;
  calls: FakeCall[];
} {
  const failUrls = options.failUrls ?? new Set<string>();
  const writeSession = options.writeSession ?? true;
  const content = options.content ?? ((url: string) => `>${url}\nACGT\n`);
  const calls: FakeCall[] = [];

  const runAria2 = (args: string[]): CommandResult => {
    const inputArg = args.find((a) => a.startsWith("--input-file="));
    const sessionArg = args.find((a) => a.startsWith("--save-session="));
    if (!inputArg) return { exitCode: 28, stderr: "no input file" };

    const lines = fs.readFileSync(inputArg.slice("--input-file=".length), "utf-8").split("\n");
    const failed: string[] = [];
    let current: { url: string; dir: string; out: string } | null = null;
    const entries: { url: string; dir: string; out: string }[] = [];
    for (const line of lines) {
      if (line.trim() === "") continue;
      if (!line.startsWith(" ")) {
        current = { url: line.trim(), dir: ".", out: "" };
        entries.push(current);
      } else if (current && line.trim().startsWith("dir=")) {
        current.dir = line.trim().slice("dir=".length);
      } else if (current && line.trim().startsWith("out=")) {
        current.out = line.trim().slice("out=".length);
      }
    }

    for (const entry of entries) {
      if (failUrls.has(entry.url)) {
        failed.push(entry.url);
        continue;
      }
      fs.writeFileSync(path.join(entry.dir, entry.out), content(entry.url));
    }

    if (failed.length === 0) return { exitCode: 0, stderr: "" };
    if (sessionArg && writeSession) {
      const sessionLines = failed.flatMap((url) => [url, "  gid=0123456789abcdef"]);
      fs.writeFileSync(sessionArg.slice("--save-session=".length), sessionLines.join("\n") + "\n");
    }
    return { exitCode: 1, stderr: "errorCode=3 Resource not found" };
  };

  const runWget = (args: string[]): CommandResult => {
    const outIdx = args.indexOf("-O");
    const dest = args[outIdx + 1];
    const url = args[args.length - 1];
    if (failUrls.has(url)) {
      // wget -O creates the output file before the request fails.
      fs.writeFileSync(dest, "");
      return { exitCode: 8, stderr: "ERROR 404: Not Found." };
    }
    fs.writeFileSync(dest, content(url));
    return { exitCode: 0, stderr: "" };
  };

  const runner: CommandRunner = async (command, args) => {
    calls.push({ command, args: [...args] });
    if (command.endsWith("aria2c")) return runAria2(args);
    if (command.endsWith("wget")) return runWget(args);
    return { exitCode: 127, stderr: `${command}: not found` };
  };

  return { runner, calls };
}
