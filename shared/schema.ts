import { z } from "zod";

// ---------------------------------------------------------------------------
// Releases, datasets and mirrors
// ---------------------------------------------------------------------------

export const GTDB_VERSIONS = {
  r207: "release207/207.0",
  r214: "release214/214.1",
  r220: "release220/220.0",
  r226: "release226/226.0",
} as const;

export const DATASETS = ["bac120", "ar53"] as const;

export const MIRRORS = {
  europe: "https://data.gtdb.aau.ecogenomic.org/releases/",
  "asia-pacific1": "https://data.gtdb.ecogenomic.org/releases/",
  "asia-pacific2": "https://data.ace.uq.edu.au/public/gtdb/data/releases/",
} as const;

export type GtdbVersion = keyof typeof GTDB_VERSIONS;
export type Dataset = (typeof DATASETS)[number];
export type MirrorName = keyof typeof MIRRORS;

export const MIRROR_NAMES: MirrorName[] = ["europe", "asia-pacific1", "asia-pacific2"];

export const versionSchema = z.enum(["r207", "r214", "r220", "r226"]);
export const datasetSchema = z.enum(DATASETS);
export const mirrorSchema = z.enum(["europe", "asia-pacific1", "asia-pacific2"]);

export const releaseSchema = z.object({
  version: versionSchema,
  dataset: datasetSchema.default("bac120"),
});

export type Release = z.infer<typeof releaseSchema>;

// ---------------------------------------------------------------------------
// Taxonomy
// ---------------------------------------------------------------------------

export const RANKS = [
  "domain",
  "phylum",
  "class",
  "order",
  "family",
  "genus",
  "species",
] as const;

export type Rank = (typeof RANKS)[number];

export const RANK_PREFIX: Record<Rank, string> = {
  domain: "d__",
  phylum: "p__",
  class: "c__",
  order: "o__",
  family: "f__",
  genus: "g__",
  species: "s__",
};

export const rankSchema = z.enum(RANKS);

const RANK_BY_LETTER = {
  d: "domain",
  p: "phylum",
  c: "class",
  o: "order",
  f: "family",
  g: "genus",
  s: "species",
} as const satisfies Record<string, Rank>;

/** Accepts full rank names and their single-letter prefixes ("species", "s"). */
export const rankArgSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(
    z.union([
      rankSchema,
      z
        .enum(["d", "p", "c", "o", "f", "g", "s"])
        .transform((letter): Rank => RANK_BY_LETTER[letter]),
    ]),
  );

export interface RankedLabel<R extends Rank = Rank> {
  readonly rank: R;
  readonly label: string;
}

export type Lineage = readonly [
  RankedLabel<"domain">,
  RankedLabel<"phylum">,
  RankedLabel<"class">,
  RankedLabel<"order">,
  RankedLabel<"family">,
  RankedLabel<"genus">,
  RankedLabel<"species">,
];

export interface GenomeRecord {
  accession: string;
  lineage: Lineage;
  /** Canonical `d__…;p__…;…;s__…` form used for exact lineage matching. */
  lineageString: string;
  assemblyName?: string;
}

// ---------------------------------------------------------------------------
// Run options
// ---------------------------------------------------------------------------

export const layoutSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("tree") }),
  z.object({ kind: z.literal("flat"), rank: rankSchema }),
]);

export type LinkLayout = z.infer<typeof layoutSchema>;

export const transferPreferencesSchema = z.object({
  preferBatch: z.boolean().default(true),
  maxConnections: z.number().int().min(1).max(16).default(4),
  maxConcurrentDownloads: z.number().int().min(1).default(3),
  batchSize: z.number().int().min(1).default(500),
  verbose: z.boolean().default(false),
});

export type TransferPreferences = z.infer<typeof transferPreferencesSchema>;
export type TransferPreferencesInput = z.input<typeof transferPreferencesSchema>;
