import type { FileTransport, FileReadResult } from './FileTransport';

/**
 * Transport HTTP pour la lecture de fichiers distants en GET.
 * HTTP transport for reading remote files via GET.
 */
export class HttpTransport implements FileTransport {
  public supports(pathOrUrl: string): boolean {
    return /^https?:\/\//i.test(pathOrUrl);
  }

  /**
   * Lit entièrement le contenu d'une URL et retourne les données et métadonnées.
   *
   * @param url L'URL du fichier à lire.
   */
  public async readAll(url: string): Promise<FileReadResult> {
    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`HTTP error ${response.status} for URL ${url}`);
    }
    const data = await response.text();
    const lm = response.headers.get('last-modified');
    const modifiedAt = lm ? new Date(lm) : new Date();
    // Pas de création fiable pour HTTP, on utilise la date de modification comme date de création.
    return {
      data,
      metadata: {
        createdAt: modifiedAt,
        updatedAt: modifiedAt,
      },
    };
  }
}
