import * as path from "path";
import pLimit from "p-limit";
import { defaultTaxonomyDir, getBaseDir } from "../../shared/config";
import { InvalidAccession, LinkCreationError } from "../../shared/errors";
import { createLogger, type Logger } from "../../shared/log";
import {
  releaseSchema,
  transferPreferencesSchema,
  type GenomeRecord,
  type LinkLayout,
  type MirrorName,
  type Rank,
  type Release,
  type TransferPreferencesInput,
} from "../../shared/schema";
import { CatalogStore } from "./catalog-store";
import { ContentStore, type ContentStoreEntry } from "./content-store";
import { resolveQuery, type QueryShape } from "./query-resolver";
import { buildIndex, type TaxonomyIndex } from "./taxonomy-index";
import { TaxonomyMaterializer } from "./taxonomy-materializer";
import {
  probeTransferBackend,
  TransferOrchestrator,
  type CommandRunner,
  type TransferBackend,
} from "./transfer-orchestrator";

const PRESENCE_CHECK_CONCURRENCY = 32;
const PREVIEW_LIMIT = 10;
const WARNING_PREVIEW_LIMIT = 5;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunOptions {
  release: { version: Release["version"]; dataset?: Release["dataset"] };
  mirror?: MirrorName;
  /** Cache root; defaults to $GTDBDL_DATA or ~/.gtdb_downloader. */
  baseDir?: string;
  transfer?: TransferPreferencesInput;
  /** Skip probing and use this backend (null: no tool available). */
  backend?: TransferBackend | null;
  runner?: CommandRunner;
  logger?: Logger;
}

export interface TaxonRunOptions extends RunOptions {
  taxon: string;
  /** Root of the symlink tree; defaults to <base>/<version>/genomes/taxonomy. */
  outputDir?: string;
  layout?: LinkLayout;
  dryRun?: boolean;
}

export interface GenomeFailure {
  accession: string;
  stage: "locate" | "transfer" | "link";
  reason: string;
}

export interface RunSummary {
  taxon: string;
  shape: QueryShape;
  matchedRanks: Rank[];
  resolved: number;
  alreadyPresent: number;
  downloaded: number;
  failed: GenomeFailure[];
  linksCreated: number;
  linksRepaired: number;
  linksUnchanged: number;
  staleLinksRemoved: number;
  dryRun: boolean;
  catalogPath: string;
  catalogWarnings: number;
  genomesDir: string;
  taxonomyDir: string;
}

interface RunContext {
  release: Release;
  baseDir: string;
  catalogs: CatalogStore;
  transfer: TransferOrchestrator;
  logger: Logger;
}

interface LocatedGenome {
  genome: GenomeRecord;
  entry: ContentStoreEntry;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

async function createContext(options: RunOptions): Promise<RunContext> {
  const logger = options.logger ?? createLogger();
  const release = releaseSchema.parse(options.release);
  const baseDir = path.resolve(options.baseDir ?? getBaseDir());
  const preferences = transferPreferencesSchema.parse(options.transfer ?? {});

  // Probed once per run; every transfer below goes through the same backend.
  const backend =
    options.backend !== undefined ? options.backend : await probeTransferBackend(preferences);
  if (backend) {
    logger.debug(`Transfer tool: ${backend.tool} (${backend.executable})`);
  } else {
    logger.debug("Transfer tool: none found");
  }

  const transfer = new TransferOrchestrator(backend, preferences, {
    runner: options.runner,
    logger,
  });
  const catalogs = new CatalogStore(baseDir, transfer, { mirror: options.mirror, logger });
  return { release, baseDir, catalogs, transfer, logger };
}

function reportCatalogWarnings(index: TaxonomyIndex, logger: Logger): void {
  if (index.warnings.length === 0) return;
  logger.warn(`  Skipped ${index.warnings.length} malformed catalog row(s)`);
  for (const w of index.warnings.slice(0, WARNING_PREVIEW_LIMIT)) {
    logger.debug(`    line ${w.line}: ${w.reason}`);
  }
  if (index.warnings.length > WARNING_PREVIEW_LIMIT) {
    logger.debug(`    ... and ${index.warnings.length - WARNING_PREVIEW_LIMIT} more`);
  }
}

// ---------------------------------------------------------------------------
// Main exported functions
// ---------------------------------------------------------------------------

/** Metadata-only mode: make sure the release's catalog is cached and return its path. */
export async function downloadCatalogOnly(options: RunOptions): Promise<string> {
  const { release, catalogs } = await createContext(options);
  return catalogs.ensureCatalog(release);
}

/**
 * Resolve a taxon against the release catalog, download the genomes missing
 * from the content store and link every resolved genome into the taxonomy tree.
 *
 * Catalog, resolution and missing-tool errors are thrown; per-genome failures
 * are collected in the summary.
 */
export async function downloadGenomesForTaxon(options: TaxonRunOptions): Promise<RunSummary> {
  const { release, baseDir, catalogs, transfer, logger } = await createContext(options);
  const dryRun = options.dryRun ?? false;
  const contentStore = new ContentStore(baseDir, release);
  const taxonomyDir = path.resolve(options.outputDir ?? defaultTaxonomyDir(baseDir, release));

  // Phase 1: catalog and index
  const catalogPath = await catalogs.ensureCatalog(release);
  const index = await buildIndex(catalogPath);
  logger.debug(`Indexed ${index.genomes.size} genomes from ${catalogPath}`);
  reportCatalogWarnings(index, logger);

  // Phase 2: resolve the taxon
  const resolution = resolveQuery(options.taxon, index);
  if (resolution.shape === "name" && resolution.matchedRanks.length > 1) {
    logger.warn(
      `  '${options.taxon}' matches taxa at several ranks (${resolution.matchedRanks.join(", ")}); ` +
        "using all of them. Pass a rank-qualified name such as 'g__Name' to narrow it.",
    );
  }
  const accessions = [...resolution.accessions].sort();
  logger.info(`Found ${accessions.length} genomes for taxon: ${options.taxon}`);
  logger.debug(`Dataset: ${release.dataset}`);
  logger.debug(`Version: ${release.version}`);
  logger.debug(`Genomes directory: ${contentStore.dir}`);
  logger.debug(`Symlink directory: ${taxonomyDir}`);

  const summary: RunSummary = {
    taxon: options.taxon,
    shape: resolution.shape,
    matchedRanks: resolution.matchedRanks,
    resolved: accessions.length,
    alreadyPresent: 0,
    downloaded: 0,
    failed: [],
    linksCreated: 0,
    linksRepaired: 0,
    linksUnchanged: 0,
    staleLinksRemoved: 0,
    dryRun,
    catalogPath,
    catalogWarnings: index.warnings.length,
    genomesDir: contentStore.dir,
    taxonomyDir,
  };

  // Phase 3: presence check against the content store
  const limit = pLimit(PRESENCE_CHECK_CONCURRENCY);
  const located = await Promise.all(
    accessions.map((accession) =>
      limit(async (): Promise<LocatedGenome | null> => {
        const genome = index.genomes.get(accession);
        if (!genome) return null;
        try {
          return { genome, entry: await contentStore.locate(genome) };
        } catch (err) {
          if (!(err instanceof InvalidAccession)) throw err;
          summary.failed.push({ accession, stage: "locate", reason: err.message });
          return null;
        }
      }),
    ),
  );

  const present: LocatedGenome[] = [];
  const missing: LocatedGenome[] = [];
  for (const item of located) {
    if (!item) continue;
    (item.entry.present ? present : missing).push(item);
  }
  summary.alreadyPresent = present.length;
  logger.info(`  Already present: ${present.length}, to download: ${missing.length}`);

  if (dryRun) {
    logger.info("\n[DRY RUN] Download would proceed for:");
    for (const { entry } of missing.slice(0, PREVIEW_LIMIT)) {
      logger.info(`  - ${entry.accession} <- ${entry.url}`);
    }
    if (missing.length > PREVIEW_LIMIT) {
      logger.info(`  ... and ${missing.length - PREVIEW_LIMIT} more`);
    }
    printSummary(summary, logger);
    return summary;
  }

  // Phase 4: transfer what is missing
  const ready: LocatedGenome[] = [...present];
  if (missing.length > 0) {
    contentStore.ensureDir();
    const report = await transfer.fetchAll(
      missing.map(({ entry }) => ({
        key: entry.accession,
        url: entry.url,
        destination: entry.path,
      })),
    );
    for (const item of missing) {
      const { accession } = item.genome;
      if (report.succeeded.has(accession)) {
        ready.push(item);
        summary.downloaded++;
      } else {
        summary.failed.push({
          accession,
          stage: "transfer",
          reason: report.errors.get(accession) ?? "transfer failed",
        });
      }
    }
  }

  // Phase 5: link every available genome into the taxonomy tree
  const materializer = new TaxonomyMaterializer(taxonomyDir, options.layout, { logger });
  for (const { genome, entry } of ready) {
    try {
      const result = materializer.materialize(genome.accession, genome.lineage, entry.path);
      if (result.action === "created") {
        summary.linksCreated++;
        logger.debug(`  Symlinked: ${result.linkPath}`);
      } else if (result.action === "repaired") {
        summary.linksRepaired++;
        logger.debug(`  Repaired: ${result.linkPath}`);
      } else {
        summary.linksUnchanged++;
      }
      if (result.removedStale) summary.staleLinksRemoved++;
    } catch (err) {
      if (!(err instanceof LinkCreationError)) throw err;
      summary.failed.push({ accession: genome.accession, stage: "link", reason: err.message });
    }
  }
  materializer.flush();

  printSummary(summary, logger);
  return summary;
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export function printSummary(summary: RunSummary, logger: Logger): void {
  logger.info(`\n=== ${summary.dryRun ? "Dry Run" : "Download"} Summary ===`);
  logger.info(`  Resolved:          ${summary.resolved}`);
  logger.info(`  Already present:   ${summary.alreadyPresent}`);
  logger.info(`  Downloaded:        ${summary.downloaded}`);
  logger.info(`  Failed:            ${summary.failed.length}`);
  if (!summary.dryRun) {
    logger.info(
      `  Links:             ${summary.linksCreated} created, ${summary.linksRepaired} repaired, ` +
        `${summary.linksUnchanged} unchanged, ${summary.staleLinksRemoved} stale removed`,
    );
  }
  logger.info(`  Genomes stored in: ${summary.genomesDir}`);
  logger.info(`  Taxonomy tree in:  ${summary.taxonomyDir}`);

  if (summary.failed.length > 0) {
    logger.warn(`\nFailed genomes (${summary.failed.length}):`);
    for (const f of summary.failed) {
      logger.warn(`  ${f.accession} [${f.stage}] ${f.reason}`);
    }
  }
}
