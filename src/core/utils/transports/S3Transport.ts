/**
 * Transport S3 pour la lecture de fichiers depuis un bucket AWS S3.
 * Adresse attendue : s3://bucket/chemin/vers/fichier.ini
 */

import { S3Client, GetObjectCommand, GetObjectCommandOutput } from '@aws-sdk/client-s3';
import type { FileTransport, FileReadResult } from './FileTransport';

export class S3Transport implements FileTransport {
  /**
   * @param client  Instance de S3Client configurée (credentials, region, etc.).
   *                Par défaut, créée au premier appel depuis l'environnement AWS.
   */
  constructor(private client?: S3Client) {}

  public supports(pathOrUrl: string): boolean {
    return /^s3:\/\//i.test(pathOrUrl);
  }

  /**
   * Lit entièrement l’objet S3 et retourne son contenu en string
   * ainsi que sa date de dernière modification.
   */
  public async readAll(url: string): Promise<FileReadResult> {
    const { bucket, key } = S3Transport.parseUrl(url);
    if (!this.client) this.client = new S3Client({});
    const response: GetObjectCommandOutput = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`Empty S3 body for ${url}`);
    }
    const data = await response.Body.transformToString('utf-8');

    // S3 ne fournit pas la date de création, on utilise LastModified
    const updatedAt = response.LastModified ?? new Date();
    return {
      data,
      metadata: {
        createdAt: updatedAt,
        updatedAt,
      },
    };
  }

  public static parseUrl(url: string): { bucket: string; key: string } {
    const match = /^s3:\/\/([^/]+)\/(.+)$/i.exec(url);
    if (!match) {
      throw new Error(`URL S3 invalide : ${url}`);
    }
    return { bucket: match[1], key: match[2] };
  }
}
