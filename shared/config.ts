import * as os from "os";
import * as path from "path";
import { z } from "zod";
import {
  GTDB_VERSIONS,
  MIRRORS,
  type MirrorName,
  type Release,
} from "./schema";

export const DATA_DIR_ENV = "GTDBDL_DATA";
export const DEFAULT_BASE_DIR = path.join(os.homedir(), ".gtdb_downloader");

const envSchema = z.object({
  [DATA_DIR_ENV]: z
    .string()
    .trim()
    .min(1)
    .optional()
    .catch(undefined),
});

/** Base directory for catalogs and genomes: `$GTDBDL_DATA`, else `~/.gtdb_downloader`. */
export function getBaseDir(env: NodeJS.ProcessEnv = process.env): string {
  const parsed = envSchema.parse(env);
  return path.resolve(parsed[DATA_DIR_ENV] ?? DEFAULT_BASE_DIR);
}

export function catalogFilename(release: Release): string {
  return `${release.dataset}_metadata_${release.version}.tsv.gz`;
}

export function catalogUrl(release: Release, mirror: MirrorName): string {
  return `${MIRRORS[mirror]}${GTDB_VERSIONS[release.version]}/${catalogFilename(release)}`;
}

// Layout under the base directory:
//   <base>/<version>/<dataset>_metadata_<version>.tsv.gz
//   <base>/<version>/genomes/raw/<genome file>
//   <base>/<version>/genomes/taxonomy/   (default link tree)

export function releaseDir(baseDir: string, release: Pick<Release, "version">): string {
  return path.join(baseDir, release.version);
}

export function rawGenomesDir(baseDir: string, release: Pick<Release, "version">): string {
  return path.join(releaseDir(baseDir, release), "genomes", "raw");
}

export function defaultTaxonomyDir(baseDir: string, release: Pick<Release, "version">): string {
  return path.join(releaseDir(baseDir, release), "genomes", "taxonomy");
}
