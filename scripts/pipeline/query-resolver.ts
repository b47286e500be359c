import { TaxonNotFound } from "../../shared/errors";
import { RANKS, type Rank, type RankedLabel } from "../../shared/schema";
import { formatLineage, labelAt, normalizeLabel, parseComponent, parseLineage } from "./lineage";
import type { TaxonomyIndex } from "./taxonomy-index";

/**
 * How a query string was read:
 * - `lineage`: all seven prefixed ranks, matched exactly against each accession's lineage
 * - `qualified`: a subset of prefixed ranks in rank order (`d__Bacteria;p__Firmicutes`, `g__Bacillus`),
 *   compared case-insensitively
 * - `name`: a bare label, looked up case-insensitively at any rank
 */
export type QueryShape = "lineage" | "qualified" | "name";

export interface TaxonResolution {
  query: string;
  shape: QueryShape;
  accessions: Set<string>;
  /** Ranks at which the query matched; more than one means a bare name was ambiguous. */
  matchedRanks: Rank[];
}

/** Parses every `;`-separated component; null unless all carry rank prefixes in increasing rank order. */
function parseQualified(query: string): RankedLabel[] | null {
  const components: RankedLabel[] = [];
  let lastRank = -1;
  for (const part of query.split(";")) {
    if (part.trim() === "") continue;
    const component = parseComponent(part);
    if (!component) return null;
    const rankIdx = RANKS.indexOf(component.rank);
    if (rankIdx <= lastRank) return null;
    lastRank = rankIdx;
    components.push(component);
  }
  return components.length > 0 ? components : null;
}

function resolveLineage(query: string, index: TaxonomyIndex): TaxonResolution | null {
  const lineage = parseLineage(query);
  if (!lineage) return null;
  const matches = index.byLineage.get(formatLineage(lineage));
  return {
    query,
    shape: "lineage",
    accessions: new Set(matches),
    matchedRanks: matches ? ["species"] : [],
  };
}

function resolveQualified(
  query: string,
  components: RankedLabel[],
  index: TaxonomyIndex,
): TaxonResolution {
  // Seed candidates from the most specific labelled component, then confirm every rank.
  const labelled = components.filter(({ label }) => label !== "");
  const mostSpecific = labelled[labelled.length - 1] ?? components[components.length - 1];
  const candidates = index.byLabel.get(normalizeLabel(mostSpecific.label))?.get(mostSpecific.rank);

  const accessions = new Set<string>();
  for (const accession of candidates ?? []) {
    const genome = index.genomes.get(accession);
    if (!genome) continue;
    const agrees = components.every(
      ({ rank, label }) => normalizeLabel(labelAt(genome.lineage, rank)) === normalizeLabel(label),
    );
    if (agrees) {
      accessions.add(accession);
    }
  }
  return {
    query,
    shape: "qualified",
    accessions,
    matchedRanks: accessions.size > 0 ? [mostSpecific.rank] : [],
  };
}

function resolveName(query: string, index: TaxonomyIndex): TaxonResolution {
  const byRank = index.byLabel.get(normalizeLabel(query));
  const accessions = new Set<string>();
  const matchedRanks: Rank[] = [];
  for (const rank of RANKS) {
    const matches = byRank?.get(rank);
    if (!matches) continue;
    matchedRanks.push(rank);
    for (const accession of matches) accessions.add(accession);
  }
  return { query, shape: "name", accessions, matchedRanks };
}

/**
 * Resolve a taxon query to the accessions it covers, reporting the shape and
 * the ranks it matched. Throws TaxonNotFound when nothing matches.
 */
export function resolveQuery(query: string, index: TaxonomyIndex): TaxonResolution {
  const trimmed = query.trim();
  if (trimmed === "") throw new TaxonNotFound(query);

  let resolution = resolveLineage(trimmed, index);
  if (!resolution) {
    const components = parseQualified(trimmed);
    resolution = components
      ? resolveQualified(trimmed, components, index)
      : resolveName(trimmed, index);
  }

  if (resolution.accessions.size === 0) throw new TaxonNotFound(trimmed);
  return resolution;
}

export function resolve(query: string, index: TaxonomyIndex): Set<string> {
  return resolveQuery(query, index).accessions;
}
