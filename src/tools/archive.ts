import { createWriteStream } from "fs";
import path from "path";
import archiver from "archiver";
import { ArchiveCompressor } from "./types";

/** Zips a directory, keeping the directory itself as the archive's top-level entry. */
export class ZipCompressor implements ArchiveCompressor {
  constructor(private readonly level = 9) {}

  compress(sourceDir: string, destPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const output = createWriteStream(destPath);
      const archive = archiver("zip", { zlib: { level: this.level } });

      const fail = (error: Error) => {
        archive.abort();
        output.destroy();
        reject(error);
      };

      output.on("close", () => resolve());
      output.on("error", fail);
      archive.on("warning", fail);
      archive.on("error", fail);

      archive.pipe(output);
      archive.directory(sourceDir, path.basename(sourceDir));
      archive.finalize().catch(fail);
    });
  }
}
