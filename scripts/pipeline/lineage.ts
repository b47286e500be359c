import {
  RANKS,
  RANK_PREFIX,
  type Lineage,
  type Rank,
  type RankedLabel,
} from "../../shared/schema";

export const UNCLASSIFIED_SEGMENT = "Unclassified";

// Characters that cannot appear in a path segment on at least one common filesystem.
const ILLEGAL_PATH_CHARS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

/** One `x__Label` component, or null when the prefix is not a rank prefix. */
export function parseComponent(component: string): RankedLabel | null {
  const trimmed = component.trim();
  for (const rank of RANKS) {
    const prefix = RANK_PREFIX[rank];
    if (trimmed.startsWith(prefix)) {
      return { rank, label: trimmed.slice(prefix.length).trim() };
    }
  }
  return null;
}

/**
 * Parse a GTDB lineage string. Returns null unless it has exactly seven
 * components carrying the rank prefixes in rank order; labels may be empty.
 */
export function parseLineage(raw: string): Lineage | null {
  const parts = raw.split(";");
  if (parts.length !== RANKS.length) return null;

  const labels: string[] = [];
  for (let i = 0; i < RANKS.length; i++) {
    const component = parseComponent(parts[i]);
    if (!component || component.rank !== RANKS[i]) return null;
    labels.push(component.label);
  }

  const [domain, phylum, klass, order, family, genus, species] = labels;
  return [
    { rank: "domain", label: domain },
    { rank: "phylum", label: phylum },
    { rank: "class", label: klass },
    { rank: "order", label: order },
    { rank: "family", label: family },
    { rank: "genus", label: genus },
    { rank: "species", label: species },
  ];
}

export function formatComponent({ rank, label }: RankedLabel): string {
  return `${RANK_PREFIX[rank]}${label}`;
}

export function formatLineage(lineage: Lineage): string {
  return lineage.map(formatComponent).join(";");
}

export function labelAt(lineage: Lineage, rank: Rank): string {
  return lineage[RANKS.indexOf(rank)].label;
}

/** Search-token form of a label or bare query: trimmed, single-spaced, lowercase. */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Turn a rank label into a path segment; empty labels collapse to a placeholder. */
export function sanitizeSegment(label: string): string {
  const cleaned = label.replace(ILLEGAL_PATH_CHARS, "_").trim();
  if (cleaned === "" || cleaned === "." || cleaned === "..") return UNCLASSIFIED_SEGMENT;
  return cleaned;
}
