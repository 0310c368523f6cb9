/**
 * Temporary directory for files handed to the Hoverfly binary (certificates)
 */
import { copyFile, mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { basename, join } from "path";

export class TempFileManager {
  private tempDir: string | undefined;

  constructor(private readonly prefix = "hoverfly-") {}

  /**
   * Create the directory on first use and return it
   */
  async createTempDir(): Promise<string> {
    if (this.tempDir === undefined) {
      this.tempDir = await mkdtemp(join(tmpdir(), this.prefix));
    }
    return this.tempDir;
  }

  /**
   * Copy a file into the temp directory
   * @param source - File to copy
   * @param name - Target file name (default: the source's base name)
   * @returns Path of the copy
   */
  async copyFile(source: string, name = basename(source)): Promise<string> {
    const dir = await this.createTempDir();
    const target = join(dir, name);
    await copyFile(source, target);
    return target;
  }

  getTempDir(): string | undefined {
    return this.tempDir;
  }

  /**
   * Delete the directory and everything in it; safe to call repeatedly
   */
  async purge(): Promise<void> {
    const dir = this.tempDir;
    if (dir === undefined) {
      return;
    }
    this.tempDir = undefined;
    await rm(dir, { recursive: true, force: true });
  }
}
