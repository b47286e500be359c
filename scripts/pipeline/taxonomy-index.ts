import * as fs from "fs";
import * as readline from "readline";
import * as zlib from "zlib";
import type { Readable } from "stream";
import { CatalogUnavailable, errorMessage } from "../../shared/errors";
import type { GenomeRecord, Rank } from "../../shared/schema";
import { formatLineage, normalizeLabel, parseLineage } from "./lineage";

// Column names differ between catalog layouts; the first one present wins.
const ACCESSION_COLUMNS = ["accession", "Genome"];
const LINEAGE_COLUMNS = ["gtdb_taxonomy", "classification"];
const ASSEMBLY_NAME_COLUMNS = ["ncbi_assembly_name"];

export interface RowWarning {
  line: number;
  reason: string;
}

export interface TaxonomyIndex {
  genomes: Map<string, GenomeRecord>;
  byLineage: Map<string, Set<string>>;
  byLabel: Map<string, Map<Rank, Set<string>>>;
  warnings: RowWarning[];
}

export function createEmptyIndex(): TaxonomyIndex {
  return {
    genomes: new Map(),
    byLineage: new Map(),
    byLabel: new Map(),
    warnings: [],
  };
}

function findColumn(header: string[], candidates: string[]): number {
  for (const name of candidates) {
    const idx = header.indexOf(name);
    if (idx !== -1) return idx;
  }
  return -1;
}

function addToSet<K>(map: Map<K, Set<string>>, key: K, value: string): void {
  let set = map.get(key);
  if (!set) {
    set = new Set();
    map.set(key, set);
  }
  set.add(value);
}

/** Adds one genome to every lookup structure. Returns false for a duplicate accession. */
export function addGenome(index: TaxonomyIndex, genome: GenomeRecord): boolean {
  if (index.genomes.has(genome.accession)) return false;
  index.genomes.set(genome.accession, genome);
  addToSet(index.byLineage, genome.lineageString, genome.accession);

  for (const { rank, label } of genome.lineage) {
    const token = normalizeLabel(label);
    if (token === "") continue;
    let ranks = index.byLabel.get(token);
    if (!ranks) {
      ranks = new Map();
      index.byLabel.set(token, ranks);
    }
    addToSet(ranks, rank, genome.accession);
  }
  return true;
}

function openCatalog(catalogPath: string): Readable {
  const input = fs.createReadStream(catalogPath);
  if (!catalogPath.endsWith(".gz")) return input;
  const gunzip = zlib.createGunzip();
  input.on("error", (err) => gunzip.destroy(err));
  return input.pipe(gunzip);
}

/**
 * Stream a tab-separated catalog into a TaxonomyIndex in one pass. Bad rows
 * are skipped and recorded in `warnings`; a header without accession or
 * lineage columns is fatal.
 */
export async function buildIndex(catalogPath: string): Promise<TaxonomyIndex> {
  const index = createEmptyIndex();
  const input = openCatalog(catalogPath);
  const lines = readline.createInterface({ input, crlfDelay: Infinity });

  // readline does not surface errors from its input stream; end the loop and rethrow below.
  let streamError: Error | undefined;
  input.on("error", (err) => {
    streamError = err;
    lines.close();
  });

  let lineNumber = 0;
  let accessionCol = -1;
  let lineageCol = -1;
  let assemblyCol = -1;

  try {
    for await (const line of lines) {
      lineNumber++;
      if (lineNumber === 1) {
        const header = line.split("\t").map((h) => h.trim());
        accessionCol = findColumn(header, ACCESSION_COLUMNS);
        lineageCol = findColumn(header, LINEAGE_COLUMNS);
        assemblyCol = findColumn(header, ASSEMBLY_NAME_COLUMNS);
        if (accessionCol === -1 || lineageCol === -1) {
          throw new CatalogUnavailable(
            `Malformed catalog ${catalogPath}: header lacks ${accessionCol === -1 ? "an accession" : "a lineage"} column`,
            { catalogPath },
          );
        }
        continue;
      }
      if (line.trim() === "") continue;

      const fields = line.split("\t");
      const accession = fields[accessionCol]?.trim() ?? "";
      const rawLineage = fields[lineageCol]?.trim() ?? "";

      if (accession === "") {
        index.warnings.push({ line: lineNumber, reason: "missing accession" });
        continue;
      }
      if (rawLineage === "") {
        index.warnings.push({ line: lineNumber, reason: `missing lineage for ${accession}` });
        continue;
      }
      const lineage = parseLineage(rawLineage);
      if (!lineage) {
        index.warnings.push({
          line: lineNumber,
          reason: `malformed lineage for ${accession}: ${rawLineage}`,
        });
        continue;
      }

      const assemblyName = assemblyCol === -1 ? "" : (fields[assemblyCol]?.trim() ?? "");
      const added = addGenome(index, {
        accession,
        lineage,
        lineageString: formatLineage(lineage),
        assemblyName: assemblyName === "" ? undefined : assemblyName,
      });
      if (!added) {
        index.warnings.push({ line: lineNumber, reason: `duplicate accession ${accession}` });
      }
    }
    if (streamError) throw streamError;
  } catch (err) {
    if (err instanceof CatalogUnavailable) throw err;
    throw new CatalogUnavailable(
      `Could not read catalog ${catalogPath}: ${errorMessage(err)}`,
      { catalogPath },
    );
  } finally {
    lines.close();
  }

  if (lineNumber === 0) {
    throw new CatalogUnavailable(`Catalog ${catalogPath} is empty`, { catalogPath });
  }

  return index;
}
