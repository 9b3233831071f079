import * as fs from "fs";
import {
  FileSystemPort,
  PortDirectoryEntry,
  PortEntryStats,
} from "../../../application/ports/driven/FileSystemPort";

/**
 * Adaptador para el sistema de archivos
 */
export class FsAdapter implements FileSystemPort {
  async stat(filePath: string): Promise<PortEntryStats | null> {
    try {
      const stats = await fs.promises.lstat(filePath);
      return {
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        isSymbolicLink: stats.isSymbolicLink(),
      };
    } catch {
      return null;
    }
  }

  async listDirectoryEntries(dirPath: string): Promise<PortDirectoryEntry[]> {
    const dirents = await fs.promises.readdir(dirPath, {
      withFileTypes: true,
    });
    return dirents.map((dirent: fs.Dirent) => ({
      name: dirent.name,
      isFile: () => dirent.isFile(),
      isDirectory: () => dirent.isDirectory(),
      isSymbolicLink: () => dirent.isSymbolicLink(),
    }));
  }
}
