/**
 * Transport local pour la lecture de fichiers sur disque.
 * Local transport for reading files from the filesystem.
 */

import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import type { FileTransport, FileReadResult } from './FileTransport';

export class LocalTransport implements FileTransport {
  /**
   * @param baseDir Répertoire de base pour les chemins relatifs.
   */
  constructor(private baseDir: string) {}

  public supports(pathOrUrl: string): boolean {
    return !/^[a-z][a-z0-9+.-]*:\/\//i.test(pathOrUrl);
  }

  public resolve(pathOrUrl: string): string {
    return path.isAbsolute(pathOrUrl) ? pathOrUrl : path.resolve(this.baseDir, pathOrUrl);
  }

  public async readAll(pathOrUrl: string): Promise<FileReadResult> {
    const absPath = this.resolve(pathOrUrl);

    const stats: Stats = await fs.stat(absPath);
    const data: string = await fs.readFile(absPath, 'utf-8');
    return {
      data,
      metadata: {
        createdAt: stats.birthtime,
        updatedAt: stats.mtime,
      },
    };
  }
}
