const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;
const GLOB_META = /[*?[\\]/;
const GLOB_TOKEN = /\\([\s\S])?|\*\*|\*|\?|\[([^\]]*)\]|\[|[^\\*?[]+/g;

export function hasGlobMeta(text: string): boolean {
  return GLOB_META.test(text);
}

function literal(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

function charClass(body: string): string {
  const negated = body.startsWith('!') || body.startsWith('^');
  const members = (negated ? body.slice(1) : body).replace(/\\/g, '\\\\');
  return negated ? `[^/${members}]` : `[${members}]`;
}

function translate(pattern: string): string {
  let source = '';
  for (const [token, escaped, classBody] of pattern.matchAll(GLOB_TOKEN)) {
    if (token.startsWith('\\')) {
      source += escaped === undefined ? '\\\\' : literal(escaped);
    } else if (token === '**') {
      source += '.*';
    } else if (token === '*') {
      source += '[^/]*';
    } else if (token === '?') {
      source += '[^/]';
    } else if (classBody !== undefined) {
      source += charClass(classBody);
    } else {
      source += literal(token);
    }
  }
  return source;
}

// Tested against `/`-prefixed paths; a trailing `/**` also matches the directory itself.
export function globToRegExp(pattern: string, anchored: boolean): RegExp {
  const subtree = pattern.endsWith('/**');
  const body = translate(subtree ? pattern.slice(0, -3) : pattern);
  const head = anchored ? '^' : '^(?:.*/)?';
  return new RegExp(`${head}${body}${subtree ? '(?:/.*)?' : ''}$`);
}
