import * as fs from "fs";
import * as path from "path";
import { catalogFilename, catalogUrl, releaseDir } from "../../shared/config";
import { CatalogUnavailable } from "../../shared/errors";
import { silentLogger, type Logger } from "../../shared/log";
import { MIRROR_NAMES, type MirrorName, type Release } from "../../shared/schema";
import { isPresent } from "./content-store";
import type { TransferOrchestrator } from "./transfer-orchestrator";

export interface CatalogStoreOptions {
  mirror?: MirrorName;
  /** Try the remaining mirrors when the chosen one fails. */
  mirrorFallback?: boolean;
  logger?: Logger;
}

/**
 * Version-scoped cache of GTDB metadata catalogs. A published catalog never
 * changes, so a non-empty file on disk is always reused.
 */
export class CatalogStore {
  readonly mirror: MirrorName;
  private readonly mirrorFallback: boolean;
  private readonly logger: Logger;

  constructor(
    readonly baseDir: string,
    private readonly transfer: TransferOrchestrator,
    options: CatalogStoreOptions = {},
  ) {
    this.mirror = options.mirror ?? "europe";
    this.mirrorFallback = options.mirrorFallback ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  catalogPath(release: Release): string {
    return path.join(releaseDir(this.baseDir, release), catalogFilename(release));
  }

  /** Mirrors to try, chosen one first. */
  mirrorOrder(): MirrorName[] {
    if (!this.mirrorFallback) return [this.mirror];
    return [this.mirror, ...MIRROR_NAMES.filter((m) => m !== this.mirror)];
  }

  async isCached(release: Release): Promise<boolean> {
    return isPresent(this.catalogPath(release));
  }

  async ensureCatalog(release: Release): Promise<string> {
    const dir = releaseDir(this.baseDir, release);
    fs.mkdirSync(dir, { recursive: true });

    const destination = this.catalogPath(release);
    if (await isPresent(destination)) {
      this.logger.debug(`Metadata file already exists: ${destination}`);
      return destination;
    }

    const attempts: string[] = [];
    for (const mirror of this.mirrorOrder()) {
      const url = catalogUrl(release, mirror);
      this.logger.info(`Downloading metadata from: ${url}`);

      const report = await this.transfer.fetchAll([{ key: mirror, url, destination }]);
      if (report.succeeded.has(mirror)) {
        this.logger.info(`Metadata saved to: ${destination}`);
        return destination;
      }

      const reason = report.errors.get(mirror) ?? "transfer failed";
      attempts.push(`${mirror}: ${reason}`);
      this.logger.warn(`  Metadata download from ${mirror} failed (${reason})`);
    }

    throw new CatalogUnavailable(
      `Failed to download metadata for ${release.version} (${release.dataset}); tried ${attempts.join("; ")}`,
      { release, attempts },
    );
  }
}
