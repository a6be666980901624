import { XMLParser, XMLValidator } from 'fast-xml-parser';

// Valeurs laissées en texte : un jeton numérique ne doit pas devenir un nombre
const parser = new XMLParser({ parseTagValue: false, ignoreDeclaration: true, trimValues: true });

/**
 * Parse un document XML. L'élément racine unique est retiré :
 * `<config><source>...</source></config>` donne `{ source: {...} }`.
 */
export function parseXML(raw: string): unknown {
  const validation = XMLValidator.validate(raw);
  if (validation !== true) {
    throw new Error(`XML invalide ligne ${validation.err.line} : ${validation.err.msg}`);
  }
  const doc: unknown = parser.parse(raw);
  if (doc && typeof doc === 'object') {
    const roots = Object.values(doc);
    if (roots.length === 1 && roots[0] && typeof roots[0] === 'object') {
      return roots[0];
    }
  }
  return doc;
}
