import { parseJSON } from './jsonParser';
import { parseXML } from './xmlParser';
import { parseINI } from './iniParser';

type ParserFn = (raw: string) => unknown;

const parsers: Record<string, ParserFn> = {
  '.json': parseJSON,
  '.xml': parseXML,
  '.ini': parseINI,
  '.cfg': parseINI,
  '.conf': parseINI,
};

/** Erreur de parsing d'un fichier dont l'extension est reconnue. */
export class FileParsingError extends Error {
  constructor(
    public readonly extension: string,
    options?: { cause?: unknown },
  ) {
    super(`Erreur lors du parsing du fichier (${extension})`, options);
    this.name = 'FileParsingError';
  }
}

/**
 * Parse le contenu brut selon l'extension. Extension inconnue : contenu brut retourné.
 * @throws FileParsingError si le contenu ne peut pas être interprété
 */
export function parseContent(extension: string, raw: string): unknown {
  const parser = parsers[extension.toLowerCase()];
  if (!parser) return raw;

  try {
    return parser(raw);
  } catch (error) {
    throw new FileParsingError(extension, { cause: error });
  }
}
