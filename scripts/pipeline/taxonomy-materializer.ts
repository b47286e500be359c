import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { errorMessage, LinkCreationError } from "../../shared/errors";
import { silentLogger, type Logger } from "../../shared/log";
import { RANK_PREFIX, type Lineage, type LinkLayout } from "../../shared/schema";
import { labelAt, sanitizeSegment } from "./lineage";

export const LEDGER_FILENAME = ".gtdb-links.json";

export type LinkAction = "created" | "unchanged" | "repaired";

export interface MaterializeResult {
  accession: string;
  linkPath: string;
  action: LinkAction;
  /** Link left by an earlier run under a different lineage, now removed. */
  removedStale?: string;
}

// Accession -> link path relative to the output root, as of the last flush.
const ledgerSchema = z.object({
  version: z.literal(1),
  links: z.record(z.string()),
  lastUpdated: z.string(),
});

type LinkLedger = z.infer<typeof ledgerSchema>;

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

function lstatOrNull(filePath: string): fs.Stats | null {
  try {
    return fs.lstatSync(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/**
 * Builds the browsable taxonomy tree: one symlink per accession, placed by
 * lineage, pointing into the content store.
 */
export class TaxonomyMaterializer {
  readonly outputRoot: string;
  readonly ledgerPath: string;
  private ledger: LinkLedger;
  private dirty = false;
  private readonly logger: Logger;

  constructor(
    outputRoot: string,
    readonly layout: LinkLayout = { kind: "tree" },
    options: { logger?: Logger } = {},
  ) {
    this.outputRoot = path.resolve(outputRoot);
    this.ledgerPath = path.join(this.outputRoot, LEDGER_FILENAME);
    this.logger = options.logger ?? silentLogger;
    this.ledger = this.loadLedger();
  }

  private loadLedger(): LinkLedger {
    const empty: LinkLedger = { version: 1, links: {}, lastUpdated: new Date().toISOString() };
    if (!fs.existsSync(this.ledgerPath)) return empty;
    try {
      return ledgerSchema.parse(JSON.parse(fs.readFileSync(this.ledgerPath, "utf-8")));
    } catch (err) {
      this.logger.warn(`  Ignoring unreadable link ledger ${this.ledgerPath}: ${errorMessage(err)}`);
      return empty;
    }
  }

  /** Writes the ledger if anything changed since it was loaded. */
  flush(): boolean {
    if (!this.dirty) return false;
    fs.mkdirSync(this.outputRoot, { recursive: true });
    this.ledger.lastUpdated = new Date().toISOString();
    fs.writeFileSync(this.ledgerPath, JSON.stringify(this.ledger, null, 2));
    this.dirty = false;
    return true;
  }

  /** Directory that holds the link for a lineage under the current layout. */
  linkDir(lineage: Lineage): string {
    if (this.layout.kind === "flat") {
      const { rank } = this.layout;
      return path.join(this.outputRoot, `${RANK_PREFIX[rank]}${sanitizeSegment(labelAt(lineage, rank))}`);
    }
    return path.join(this.outputRoot, ...lineage.map(({ label }) => sanitizeSegment(label)));
  }

  linkPathFor(lineage: Lineage, contentPath: string): string {
    return path.join(this.linkDir(lineage), path.basename(contentPath));
  }

  /**
   * Create or repair the link for one accession. Throws LinkCreationError when
   * the filesystem refuses, or when a regular file already occupies the path.
   */
  materialize(accession: string, lineage: Lineage, contentPath: string): MaterializeResult {
    const target = path.resolve(contentPath);
    const linkPath = this.linkPathFor(lineage, target);

    let action: LinkAction;
    try {
      fs.mkdirSync(path.dirname(linkPath), { recursive: true });
      action = this.placeLink(accession, linkPath, target);
    } catch (err) {
      if (err instanceof LinkCreationError) throw err;
      throw new LinkCreationError(accession, linkPath, err);
    }

    const result: MaterializeResult = { accession, linkPath, action };
    const stale = this.removeStale(accession, linkPath);
    if (stale) result.removedStale = stale;

    const relative = path.relative(this.outputRoot, linkPath);
    if (this.ledger.links[accession] !== relative) {
      this.ledger.links[accession] = relative;
      this.dirty = true;
    }
    return result;
  }

  private placeLink(accession: string, linkPath: string, target: string): LinkAction {
    const existing = lstatOrNull(linkPath);
    if (!existing) {
      fs.symlinkSync(target, linkPath);
      return "created";
    }
    if (!existing.isSymbolicLink()) {
      throw new LinkCreationError(accession, linkPath, new Error("a file that is not a symlink occupies the path"));
    }

    const current = path.resolve(path.dirname(linkPath), fs.readlinkSync(linkPath));
    if (current === target) return "unchanged";

    fs.unlinkSync(linkPath);
    fs.symlinkSync(target, linkPath);
    return "repaired";
  }

  /** Drop the link an earlier lineage left behind, then prune directories it emptied. */
  private removeStale(accession: string, linkPath: string): string | undefined {
    const previous = this.ledger.links[accession];
    if (previous === undefined) return undefined;
    const stalePath = path.resolve(this.outputRoot, previous);
    if (stalePath === linkPath) return undefined;

    try {
      const stat = lstatOrNull(stalePath);
      if (!stat) return undefined;
      if (!stat.isSymbolicLink()) {
        this.logger.warn(`  Not removing ${stalePath}: not a symlink`);
        return undefined;
      }
      fs.unlinkSync(stalePath);
      this.pruneEmptyDirs(path.dirname(stalePath));
      this.logger.debug(`  Removed stale link: ${stalePath}`);
      return stalePath;
    } catch (err) {
      this.logger.warn(`  Could not remove stale link ${stalePath}: ${errorMessage(err)}`);
      return undefined;
    }
  }

  private pruneEmptyDirs(start: string): void {
    let dir = start;
    while (dir !== this.outputRoot && dir.startsWith(this.outputRoot + path.sep)) {
      if (fs.readdirSync(dir).length > 0) return;
      fs.rmdirSync(dir);
      dir = path.dirname(dir);
    }
  }
}
