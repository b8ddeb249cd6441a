import { Injectable, Logger, OnModuleInit, ServiceUnavailableException } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ReferenceDataError } from '../errors';
import { buildReferenceSnapshot, JOBS_FILE, RUBRIC_FILE, SKILLS_FILE } from '../reference-data.loader';
import { ReferenceSnapshot } from '../types';

/**
 * Owns the current reference snapshot (taxonomy, postings, roadmaps, rubric).
 *
 * Snapshots are immutable. `reload()` builds a complete replacement and swaps
 * it in with one assignment, so a request that called `snapshot()` keeps a
 * consistent view for its whole lifetime. A failed reload leaves the previous
 * snapshot in place.
 */
@Injectable()
export class ReferenceDataService implements OnModuleInit {
  private readonly logger = new Logger(ReferenceDataService.name);
  private readonly dataDir = process.env.DATA_DIR || path.join(process.cwd(), 'data');
  private current: ReferenceSnapshot | null = null;
  private lastVersion = 0;

  async onModuleInit(): Promise<void> {
    await this.reload();
  }

  snapshot(): ReferenceSnapshot {
    if (!this.current) {
      throw new ServiceUnavailableException('Reference data is not loaded');
    }
    return this.current;
  }

  async reload(): Promise<ReferenceSnapshot> {
    const version = ++this.lastVersion;
    try {
      const [skills, jobs, rubric] = await Promise.all([SKILLS_FILE, JOBS_FILE, RUBRIC_FILE].map((f) => this.readJson(f)));
      const { snapshot, warnings } = buildReferenceSnapshot(
        { skills, jobs, rubric },
        { version, loadedAt: new Date().toISOString() },
      );
      warnings.forEach((w) => this.logger.warn(w));

      if (this.current && this.current.version > snapshot.version) {
        this.logger.warn(`Discarding reference snapshot v${snapshot.version}; v${this.current.version} is newer`);
        return this.current;
      }

      this.current = snapshot;
      this.logger.log(
        `Loaded reference snapshot v${snapshot.version} from ${this.dataDir}: ` +
          `${snapshot.taxonomy.skills.length} skills, ${snapshot.postings.length} postings, ${snapshot.roadmaps.length} roadmaps`,
      );
      return snapshot;
    } catch (error) {
      this.logger.error(`Reference data reload v${version} failed: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  }

  private async readJson(file: string): Promise<unknown> {
    const filePath = path.join(this.dataDir, file);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ReferenceDataError(file, [`cannot read ${filePath}: ${String(error)}`]);
    }

    try {
      return JSON.parse(raw.replace(/^\uFEFF/, ''));
    } catch (error) {
      throw new ReferenceDataError(file, [`invalid JSON: ${String(error)}`]);
    }
  }
}
