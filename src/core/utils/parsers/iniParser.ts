import { parse } from 'ini';

const COMMENT_LINE = /^\s*[;#]/;
const SECTION_LINE = /^\s*\[([^\]]*)\]\s*$/;

/**
 * Parse un fichier INI : une section par stanza.
 * Les valeurs sont lues telles quelles (`;` et `#` n'y ouvrent pas de commentaire)
 * et un point dans un nom de section ne crée pas de sous-section.
 */
export function parseINI(raw: string): unknown {
  const lines = raw.split(/\r?\n/).map((line) => {
    if (COMMENT_LINE.test(line)) return line;
    const section = SECTION_LINE.exec(line);
    if (section) return `[${section[1].replace(/[.;#]/g, '\\$&')}]`;
    const eq = line.indexOf('=');
    if (eq < 0) return line;
    // valeur entre guillemets JSON : ini la relit à l'identique
    return `${line.slice(0, eq)}= ${JSON.stringify(line.slice(eq + 1).trim())}`;
  });
  return parse(lines.join('\n'));
}
