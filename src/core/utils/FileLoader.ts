import { createHash } from 'crypto';
import * as path from 'path';

import { parseContent } from './parsers';
import { AuditService } from './AuditService';
import type { FileReadResult, FileTransport } from './transports/FileTransport';
import { LocalTransport } from './transports/LocalTransport';
import { HttpTransport } from './transports/HttpTransport';
import { S3Transport } from './transports/S3Transport';

/**
 * Métadonnées retournées par FileLoader.
 */
export interface FileMetadata {
  path: string;
  name: string;
  extension: string;
  createdAt: Date;
  updatedAt: Date;
  fingerprint: string;
  content: unknown;
}

/**
 * Chargement de fichier (local, http(s)://, s3://) avec audit et empreinte SHA-256.
 */
export class FileLoader {
  /** Liste des transports, le premier qui accepte la source est utilisé. */
  private readonly transports: FileTransport[];

  constructor(
    transports?: FileTransport[],
    private readonly audit: AuditService = new AuditService(),
    baseDir: string = process.cwd(),
  ) {
    this.transports = transports ?? [new HttpTransport(), new S3Transport(), new LocalTransport(baseDir)];
  }

  /**
   * Charge un fichier avec audit.
   * @throws Error en cas d’échec I/O
   * @throws FileParsingError si le parsing JSON/XML/INI échoue
   */
  public async load(filePath: string): Promise<FileMetadata> {
    await this.audit.log({
      actor: 'FileLoader',
      event: 'FILE_LOAD_START',
      resource: filePath,
      status: 'INIT',
    });

    const transport = this.transports.find((t) => t.supports(filePath));
    if (!transport) {
      throw new Error(`Aucun transport pour lire ${filePath}`);
    }

    let result: FileReadResult;
    try {
      result = await transport.readAll(filePath);
    } catch (err) {
      await this.audit.log({
        actor: 'FileLoader',
        event: 'FILE_LOAD_ERROR',
        resource: filePath,
        status: 'FAILURE',
        details: { message: err instanceof Error ? err.message : String(err) },
      });
      throw err;
    }

    const fingerprint = createHash('sha256').update(result.data).digest('hex');
    const ext = path.extname(filePath).toLowerCase();
    const content = parseContent(ext, result.data);

    await this.audit.log({
      actor: 'FileLoader',
      event: 'FILE_LOADED',
      resource: filePath,
      status: 'SUCCESS',
      details: { fingerprint },
    });

    return {
      path: filePath,
      name: path.basename(filePath),
      extension: ext,
      createdAt: result.metadata.createdAt,
      updatedAt: result.metadata.updatedAt,
      fingerprint,
      content,
    };
  }
}
