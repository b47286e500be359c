import * as fs from "fs";
import * as path from "path";
import { rawGenomesDir } from "../../shared/config";
import { InvalidAccession } from "../../shared/errors";
import type { GenomeRecord, Release } from "../../shared/schema";

export const NCBI_GENOMES_BASE = "https://ftp.ncbi.nlm.nih.gov/genomes/all";

export interface ContentStoreEntry {
  accession: string;
  filename: string;
  path: string;
  url: string;
  present: boolean;
}

interface NcbiAccession {
  /** `GCA_034719275.1` with any GTDB `RS_`/`GB_` prefix removed. */
  accession: string;
  prefix: "GCA" | "GCF";
  digits: string;
}

export function parseNcbiAccession(raw: string): NcbiAccession {
  const accession = raw.replace(/^(RS_|GB_)/, "");
  const match = accession.match(/^(GCA|GCF)_(\d+)(?:\.\d+)?$/);
  if (!match) {
    throw new InvalidAccession(raw, `unknown accession format ${accession}`);
  }
  const prefix = match[1] === "GCF" ? "GCF" : "GCA";
  const digits = match[2];
  if (digits.length < 7) {
    throw new InvalidAccession(raw, `numeric id too short: ${digits}`);
  }
  return { accession, prefix, digits };
}

function assemblyStem(genome: GenomeRecord): { ncbi: NcbiAccession; stem: string } {
  if (!genome.assemblyName) {
    throw new InvalidAccession(genome.accession, "missing ncbi_assembly_name");
  }
  const ncbi = parseNcbiAccession(genome.accession);
  // NCBI replaces anything outside [A-Za-z0-9._-] in assembly names on its FTP site.
  const assembly = genome.assemblyName.replace(/[^a-zA-Z0-9._-]/g, "_");
  return { ncbi, stem: `${ncbi.accession}_${assembly}` };
}

export function genomeFilename(genome: GenomeRecord): string {
  return `${assemblyStem(genome).stem}_genomic.fna.gz`;
}

/**
 * NCBI FTP URL of the genome's nucleotide FASTA, e.g.
 * `…/GCA/034/719/275/GCA_034719275.1_ASM3471927v1/GCA_034719275.1_ASM3471927v1_genomic.fna.gz`.
 */
export function genomeUrl(genome: GenomeRecord): string {
  const { ncbi, stem } = assemblyStem(genome);
  const { digits } = ncbi;
  const dir = [ncbi.prefix, digits.slice(0, 3), digits.slice(3, 6), digits.slice(6), stem].join("/");
  return `${NCBI_GENOMES_BASE}/${dir}/${stem}_genomic.fna.gz`;
}

/** A file counts as present only when it exists with a nonzero size. */
export async function isPresent(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

/** Flat, version-scoped directory holding one genome file per accession. */
export class ContentStore {
  readonly dir: string;

  constructor(
    readonly baseDir: string,
    readonly release: Release,
  ) {
    this.dir = rawGenomesDir(baseDir, release);
  }

  ensureDir(): void {
    fs.mkdirSync(this.dir, { recursive: true });
  }

  pathFor(genome: GenomeRecord): string {
    return path.join(this.dir, genomeFilename(genome));
  }

  /** Throws InvalidAccession when no filename can be derived for the genome. */
  async locate(genome: GenomeRecord): Promise<ContentStoreEntry> {
    const filename = genomeFilename(genome);
    const filePath = path.join(this.dir, filename);
    return {
      accession: genome.accession,
      filename,
      path: filePath,
      url: genomeUrl(genome),
      present: await isPresent(filePath),
    };
  }
}
