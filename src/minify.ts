/**
 * Text-level minifier: drops whitespace, line comments and block comments
 * outside string literals. The result is not validated.
 */

export function minify(json: string): string {
  const out: string[] = [];
  const len = json.length;
  let i = 0;
  while (i < len) {
    const c = json[i];
    if (c === ' ' || c === '\t' || c === '\r' || c === '\n') {
      i++;
      continue;
    }
    if (c === '/' && json[i + 1] === '/') {
      while (i < len && json[i] !== '\n') i++;
      continue;
    }
    if (c === '/' && json[i + 1] === '*') {
      const close = json.indexOf('*/', i + 2);
      i = close === -1 ? len : close + 2;
      continue;
    }
    if (c === '"') {
      const start = i;
      i++;
      while (i < len && json[i] !== '"') {
        if (json[i] === '\\') i++;
        i++;
      }
      i = Math.min(i + 1, len);
      out.push(json.slice(start, i));
      continue;
    }
    out.push(json.slice(i, i + 1));
    i++;
  }
  return out.join('');
}
