/**
 * FileReadResult représente le résultat de la lecture complète d'un fichier.
 */
export interface FileReadResult {
  /** Contenu du fichier en mémoire (UTF-8). */
  data: string;
  /** Métadonnées du fichier lues depuis la source. */
  metadata: {
    /** Date de création du fichier (ou approximation). */
    createdAt: Date;
    /** Date de dernière modification du fichier. */
    updatedAt: Date;
  };
}

/**
 * FileTransport définit l'interface pour lire des fichiers de configuration
 * depuis différentes sources (local, HTTP, S3).
 */
export interface FileTransport {
  /** Indique si ce transport sait lire la source donnée. */
  supports(pathOrUrl: string): boolean;

  /**
   * Lit entièrement le fichier (ou URL) spécifié et retourne
   * son contenu et ses métadonnées.
   *
   * @param pathOrUrl Chemin ou URL du fichier à lire.
   */
  readAll(pathOrUrl: string): Promise<FileReadResult>;
}
