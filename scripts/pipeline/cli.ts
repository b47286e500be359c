import "dotenv/config";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { DATA_DIR_ENV, getBaseDir } from "../../shared/config";
import { formatError, GtdbError, InvalidArgument } from "../../shared/errors";
import { createLogger, type Logger } from "../../shared/log";
import {
  datasetSchema,
  mirrorSchema,
  rankArgSchema,
  versionSchema,
  type Dataset,
  type GtdbVersion,
  type LinkLayout,
  type MirrorName,
  type TransferPreferencesInput,
} from "../../shared/schema";
import { downloadCatalogOnly, downloadGenomesForTaxon } from "./genome-downloader";

const __filename = fileURLToPath(import.meta.url);

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export interface CliConfig {
  version: GtdbVersion;
  dataset: Dataset;
  mirror: MirrorName;
  taxon?: string;
  metadataOnly: boolean;
  dryRun: boolean;
  verbose: boolean;
  baseDir?: string;
  outputDir?: string;
  layout: LinkLayout;
  transfer: TransferPreferencesInput;
}

export type ParsedArgs = { kind: "help" } | { kind: "run"; config: CliConfig };

function printUsage(logger: Logger) {
  logger.info(`
╔══════════════════════════════════════════════════════════════╗
║                GTDB GENOME DOWNLOADER                        ║
╠══════════════════════════════════════════════════════════════╣
║                                                              ║
║  Downloads genome assemblies for a GTDB taxon into a shared  ║
║  cache and links them into a taxonomy-shaped directory tree. ║
║                                                              ║
╚══════════════════════════════════════════════════════════════╝

USAGE:
  npx tsx scripts/pipeline/cli.ts --gtdb <version> (--taxon <taxon> | --download) [options]

OPTIONS:
  --gtdb r226            GTDB version (r207, r214, r220, r226) [required]
  --taxon Firmicutes     Taxon name, rank-qualified name (g__Bacillus) or lineage
  --download             Only download the metadata catalog
  --dataset bac120       Dataset: bac120 or ar53 (default: bac120)
  --mirror europe        Mirror: europe, asia-pacific1, asia-pacific2 (default: europe)
  --flat species         Link genomes into one folder per taxon at this rank
  -o, --output DIR       Root of the symlink tree
                         (default: <base>/<version>/genomes/taxonomy)
  --base-dir DIR         Cache directory (default: $${DATA_DIR_ENV} or ~/.gtdb_downloader)
  --dry-run              Show what would be downloaded without downloading
  --no-aria2             Use wget even when aria2c is installed
  --connections 4        aria2c connections per server (default: 4)
  --batch-size 500       URLs per aria2c invocation (default: 500)
  -v, --verbose          Verbose, time-stamped output
  -h, --help             Show this help

EXAMPLES:
  # Download metadata for r226
  npx tsx scripts/pipeline/cli.ts --gtdb r226 --download

  # Download all Firmicutes genomes
  npx tsx scripts/pipeline/cli.ts --gtdb r226 --taxon "Firmicutes"

  # Rank-qualified lineage prefix, verbose
  npx tsx scripts/pipeline/cli.ts --gtdb r226 --taxon "d__Bacteria;p__Firmicutes" -v

  # Custom cache directory
  ${DATA_DIR_ENV}=/data/gtdb npx tsx scripts/pipeline/cli.ts --gtdb r226 --taxon "Archaea" --dataset ar53

EXIT STATUS:
  0  success    2  finished with per-genome failures    1  fatal error
`);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, flag: string, value: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgument(`Invalid value for ${flag}: ${value}`, { flag, value });
  }
  return result.data;
}

const positiveInt = z.coerce.number().int().positive();

export function parseArgs(args: string[]): ParsedArgs {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    return { kind: "help" };
  }

  let version: GtdbVersion | undefined;
  const config: Omit<CliConfig, "version"> = {
    dataset: "bac120",
    mirror: "europe",
    metadataOnly: false,
    dryRun: false,
    verbose: false,
    layout: { kind: "tree" },
    transfer: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = (): string => {
      const value = args[i + 1];
      if (value === undefined) throw new InvalidArgument(`Missing value for ${arg}`, { flag: arg });
      i++;
      return value;
    };

    if (arg === "--gtdb") {
      version = parseWith(versionSchema, arg, next());
    } else if (arg === "--taxon") {
      config.taxon = next();
    } else if (arg === "--dataset") {
      config.dataset = parseWith(datasetSchema, arg, next());
    } else if (arg === "--mirror") {
      config.mirror = parseWith(mirrorSchema, arg, next());
    } else if (arg === "--flat") {
      config.layout = { kind: "flat", rank: parseWith(rankArgSchema, arg, next()) };
    } else if (arg === "--output" || arg === "-o") {
      config.outputDir = path.resolve(next());
    } else if (arg === "--base-dir") {
      config.baseDir = path.resolve(next());
    } else if (arg === "--download") {
      config.metadataOnly = true;
    } else if (arg === "--dry-run") {
      config.dryRun = true;
    } else if (arg === "--no-aria2") {
      config.transfer.preferBatch = false;
    } else if (arg === "--connections") {
      config.transfer.maxConnections = parseWith(positiveInt, arg, next());
    } else if (arg === "--batch-size") {
      config.transfer.batchSize = parseWith(positiveInt, arg, next());
    } else if (arg === "--verbose" || arg === "-v") {
      config.verbose = true;
    } else {
      throw new InvalidArgument(`Unknown argument: ${arg}`, { arg });
    }
  }

  if (!version) throw new InvalidArgument("--gtdb is required");
  if (!config.metadataOnly && !config.taxon) {
    throw new InvalidArgument("Either --taxon or --download is required");
  }
  config.transfer.verbose = config.verbose;
  return { kind: "run", config: { ...config, version } };
}

export async function main(args: string[], logger?: Logger): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (err) {
    const out = logger ?? createLogger();
    out.error(formatError(err));
    return EXIT_FATAL;
  }

  if (parsed.kind === "help") {
    printUsage(logger ?? createLogger());
    return EXIT_OK;
  }

  const { config } = parsed;
  const log =
    logger ??
    createLogger({ source: "gtdb-dl", verbose: config.verbose, timestamps: config.verbose });
  const baseDir = config.baseDir ?? getBaseDir();
  log.debug(`Using base directory: ${baseDir}`);

  const runOptions = {
    release: { version: config.version, dataset: config.dataset },
    mirror: config.mirror,
    baseDir,
    transfer: config.transfer,
    logger: log,
  };

  const startTime = Date.now();
  try {
    if (config.metadataOnly) {
      log.info(`Downloading metadata for ${config.version} (${config.dataset}) from ${config.mirror}...`);
      const catalogPath = await downloadCatalogOnly(runOptions);
      log.info(`✓ Metadata available at ${catalogPath}`);
      return EXIT_OK;
    }

    const taxon = config.taxon ?? "";
    log.info(`Downloading genomes for taxon: ${taxon}`);
    const summary = await downloadGenomesForTaxon({
      ...runOptions,
      taxon,
      outputDir: config.outputDir,
      layout: config.layout,
      dryRun: config.dryRun,
    });

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    log.debug(`Completed in ${elapsed}s`);
    return summary.failed.length > 0 ? EXIT_PARTIAL : EXIT_OK;
  } catch (err) {
    log.error(formatError(err));
    if (!(err instanceof GtdbError) && err instanceof Error && err.stack) {
      log.debug(err.stack);
    }
    return EXIT_FATAL;
  }
}

if (process.argv[1]?.includes(path.basename(__filename))) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(EXIT_FATAL);
    });
}
