import { mkdir, readdir, rename, rm, stat } from "fs/promises";
import { join, resolve } from "path";

export interface LocalFileStorageConfig {
  uploadDir: string;
  outputDir: string;
}

export interface StaleEntrySweepResult {
  removed: number;
  failed: number;
}

/**
 * Path layout and file housekeeping for the two working directories:
 * uploads hold `<jobId>_<filename>` sources, outputs hold a `<jobId>/`
 * segment directory and a `<jobId>.zip` archive per job.
 */
export class LocalFileStorage {
  readonly uploadDir: string;
  readonly outputDir: string;

  constructor(config: LocalFileStorageConfig) {
    this.uploadDir = resolve(config.uploadDir);
    this.outputDir = resolve(config.outputDir);
  }

  async ensureDirectories(): Promise<void> {
    await mkdir(this.uploadDir, { recursive: true });
    await mkdir(this.outputDir, { recursive: true });
  }

  sourcePath(jobId: string, filename: string): string {
    return join(this.uploadDir, `${jobId}_${filename}`);
  }

  segmentDir(jobId: string): string {
    return join(this.outputDir, jobId);
  }

  archivePath(jobId: string): string {
    return join(this.outputDir, `${jobId}.zip`);
  }

  async moveInto(fromPath: string, toPath: string): Promise<void> {
    await rename(fromPath, toPath);
  }

  /**
   * Empty (or create) a job's segment directory
   */
  async resetSegmentDir(jobId: string): Promise<string> {
    const dir = this.segmentDir(jobId);
    await rm(dir, { recursive: true, force: true });
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  }

  async sizeOf(path: string): Promise<number> {
    return (await stat(path)).size;
  }

  async remove(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
  }

  /**
   * Job id an entry belongs to, from its `<jobId>...` name
   */
  static jobIdOf(name: string): string | null {
    const match = /^([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})(?:$|[_.])/i.exec(name);
    return match ? match[1] : null;
  }

  /**
   * Delete every entry directly inside either directory whose mtime is
   * before `olderThan`, unless `shouldKeep` claims it
   */
  async removeStaleEntries(
    olderThan: Date,
    shouldKeep: (name: string) => Promise<boolean> = async () => false
  ): Promise<StaleEntrySweepResult> {
    const result: StaleEntrySweepResult = { removed: 0, failed: 0 };
    const cutoff = olderThan.getTime();

    for (const dir of [this.uploadDir, this.outputDir]) {
      let names: string[];
      try {
        names = await readdir(dir);
      } catch (error) {
        console.warn(`[LocalFileStorage] Could not list ${dir}:`, error);
        continue;
      }

      for (const name of names) {
        const path = join(dir, name);
        try {
          const { mtimeMs } = await stat(path);
          if (mtimeMs < cutoff && !(await shouldKeep(name))) {
            await rm(path, { recursive: true, force: true });
            result.removed++;
          }
        } catch (error) {
          result.failed++;
          console.warn(`[LocalFileStorage] Failed to remove stale entry ${path}:`, error);
        }
      }
    }

    return result;
  }
}
