/**
 * Conversion du balisage wiki Jira vers du markdown.
 * Fonction pure ; les blocs {code} / {noformat} sont recopiés tels quels.
 */

type FencedBlock = { tag: 'code' | 'noformat' };

const FENCE_OPEN = /^\s*\{(code|noformat)(?::([^}]*))?\}(.*)$/;
const HEADING = /^\s*h([1-6])\.\s+(.*)$/;
const BLOCKQUOTE = /^\s*bq\.\s+(.*)$/;
const TABLE_HEADER = /^\s*\|\|(.*)\|\|\s*$/;
const TABLE_ROW = /^\s*\|(.*)\|\s*$/;
const LIST_ITEM = /^\s*([*#]+|-)\s+(.*)$/;
const RULE = /^\s*-{4,}\s*$/;

export function convertJiraMarkup(markup: string | null | undefined): string {
  if (!markup) return '';

  const out: string[] = [];
  let fence: FencedBlock | null = null;
  let inQuote = false;
  const push = (line: string) => out.push(inQuote ? (line ? `> ${line}` : '>') : line);

  for (const raw of markup.replace(/\r\n?/g, '\n').split('\n')) {
    if (fence) {
      const closing = `{${fence.tag}}`;
      const end = raw.indexOf(closing);
      if (end === -1) {
        push(raw);
        continue;
      }
      if (raw.slice(0, end)) push(raw.slice(0, end));
      push('```');
      fence = null;
      const rest = raw.slice(end + closing.length);
      if (rest.trim()) push(convertLine(rest));
      continue;
    }

    const open = FENCE_OPEN.exec(raw);
    if (open) {
      const tag = open[1] === 'code' ? 'code' : 'noformat';
      const lang = tag === 'code' ? codeLanguage(open[2]) : '';
      push('```' + lang);
      const rest = open[3];
      const closing = `{${tag}}`;
      const end = rest.indexOf(closing);
      if (end === -1) {
        fence = { tag };
        if (rest) push(rest);
      } else {
        if (rest.slice(0, end)) push(rest.slice(0, end));
        push('```');
      }
      continue;
    }

    let text = raw;
    if (text.trimStart().startsWith('{quote}')) {
      inQuote = !inQuote;
      text = text.trimStart().slice('{quote}'.length);
      if (!text.trim()) continue;
    }
    let closeQuoteAfter = false;
    if (text.trimEnd().endsWith('{quote}')) {
      closeQuoteAfter = true;
      text = text.trimEnd().slice(0, -'{quote}'.length);
    }
    push(convertLine(text));
    if (closeQuoteAfter) inQuote = !inQuote;
  }

  // bloc non refermé
  if (fence) out.push('```');
  return out.join('\n');
}

function codeLanguage(param: string | undefined): string {
  if (!param) return '';
  const named = /(?:^|\|)\s*language=([^|]+)/.exec(param);
  if (named) return named[1].trim();
  return param.includes('=') ? '' : param.split('|')[0].trim();
}

function convertLine(line: string): string {
  if (RULE.test(line)) return '---';

  const heading = HEADING.exec(line);
  if (heading) return `${'#'.repeat(Number(heading[1]))} ${convertInline(heading[2])}`;

  const quote = BLOCKQUOTE.exec(line);
  if (quote) return `> ${convertInline(quote[1])}`;

  const header = TABLE_HEADER.exec(line);
  if (header) {
    const cells = header[1].split('||').map((c) => convertInline(c.trim()));
    return `| ${cells.join(' | ')} |\n|${cells.map(() => ' --- |').join('')}`;
  }

  const row = TABLE_ROW.exec(line);
  if (row) {
    const cells = row[1].split('|').map((c) => convertInline(c.trim()));
    return `| ${cells.join(' | ')} |`;
  }

  const item = LIST_ITEM.exec(line);
  if (item) {
    const marker = item[1];
    const depth = marker === '-' ? 1 : marker.length;
    const bullet = marker.endsWith('#') ? '1.' : '-';
    return `${'  '.repeat(depth - 1)}${bullet} ${convertInline(item[2])}`;
  }

  return convertInline(line);
}

/** Conversion en ligne ; le contenu {{monospace}} n'est pas interprété. */
export function convertInline(text: string): string {
  return text
    .split(/(\{\{.*?\}\})/)
    .map((part, i) => (i % 2 === 1 ? '`' + part.slice(2, -2) + '`' : convertFormatting(part)))
    .join('');
}

function convertFormatting(text: string): string {
  return (
    text
      // mentions [~user]
      .replace(/\[~([^\]]+)\]/g, '@$1')
      // liens nus [http://...]
      .replace(/\[((?:https?|ftp|file|mailto):[^\]|\s]*)\]/g, '<$1>')
      // liens nommés [texte|url]
      .replace(/\[([^[\]|]+)\|([^[\]]+)\]/g, '[$1]($2)')
      .replace(/\{color(?::[^}]*)?\}/g, '')
      .replace(/(^|[^\w*])\*(?=\S)([^*\n]*?\S)\*(?![\w*])/g, '$1**$2**')
      .replace(/(^|\W)_(?=\S)([^_\n]*?\S)_(?!\w)/g, '$1*$2*')
      .replace(/(^|\s)-(?=[^\s-])([^-\n]*?[^\s-])-(?=\s|$)/g, '$1~~$2~~')
  );
}
