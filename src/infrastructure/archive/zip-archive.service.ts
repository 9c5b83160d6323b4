import JSZip from "jszip";
import { readdir, readFile, writeFile, stat } from "fs/promises";
import { join } from "path";
import { ArchiveResult, IArchiveBuilder } from "../../domain/interfaces/iarchive.builder";
import { ProcessingError, errorMessage } from "../../domain/errors/app-error";

export class ZipArchiveService implements IArchiveBuilder {
  constructor(private readonly compressionLevel: number = 6) {}

  /**
   * Zip the matching files of a directory, flat and DEFLATE-compressed.
   * Entries are added in filename order.
   */
  async build(sourceDir: string, targetPath: string, extension: string): Promise<ArchiveResult> {
    try {
      const files = (await readdir(sourceDir, { withFileTypes: true }))
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(extension.toLowerCase()))
        .map((entry) => entry.name)
        .sort();

      const zip = new JSZip();
      for (const name of files) {
        zip.file(name, await readFile(join(sourceDir, name)));
      }

      const buffer = await zip.generateAsync({
        type: "nodebuffer",
        compression: "DEFLATE",
        compressionOptions: { level: this.compressionLevel },
      });
      await writeFile(targetPath, buffer);
      const { size } = await stat(targetPath);

      console.log(`[ZipArchiveService] Wrote ${files.length} entries to ${targetPath} (${size} bytes)`);
      return { path: targetPath, sizeBytes: size, entries: files };
    } catch (error) {
      console.error("[ZipArchiveService] Error creating archive:", error);
      throw new ProcessingError(`Archive creation failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
