export interface ArchiveResult {
  path: string;
  sizeBytes: number;
  entries: string[];
}

export interface IArchiveBuilder {
  /**
   * Pack every file in `sourceDir` ending in `extension` into `targetPath`,
   * without directory prefixes.
   */
  build(sourceDir: string, targetPath: string, extension: string): Promise<ArchiveResult>;
}
