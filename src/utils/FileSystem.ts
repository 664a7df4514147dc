import * as fs from 'fs-extra';
import * as path from 'path';

export class FileSystem {
  static async pathExists(targetPath: string): Promise<boolean> {
    return fs.pathExists(targetPath);
  }

  static async isDirectory(dirPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(dirPath);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  static async listEntries(dirPath: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dirPath);
      return entries.sort();
    } catch (error) {
      throw new Error(
        `Failed to read directory ${dirPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async ensureDirExists(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      throw new Error(
        `Failed to create directory ${dirPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  /**
   * Copy a file or a whole directory tree. Nothing already at the destination is replaced.
   */
  static async copyWithoutOverwrite(source: string, destination: string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(destination));
      await fs.copy(source, destination, { overwrite: false, errorOnExist: false });
    } catch (error) {
      throw new Error(
        `Failed to copy ${source} to ${destination}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  static async readText(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf8');
  }

  static async writeText(filePath: string, content: string): Promise<void> {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, content, 'utf8');
  }

  static async writeBuffer(filePath: string, content: Buffer): Promise<void> {
    await fs.ensureDir(path.dirname(filePath));
    await fs.writeFile(filePath, content);
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      if (await fs.pathExists(filePath)) {
        await fs.remove(filePath);
      }
    } catch (error) {
      throw new Error(
        `Failed to delete file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }
}
