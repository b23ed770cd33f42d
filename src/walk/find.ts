import type { FileSource } from '../types/source.js';
import { NodeKind } from '../types/enums.js';
import { isNotFoundError } from '../errors/SourceError.js';
import { ROOT_PATH, assertValidPath, pathDepth } from '../path/validPath.js';
import { globToRegExp, hasGlobMeta } from './glob.js';
import { PathMatcher, type PathRules } from './PathMatcher.js';
import { statPath } from './read.js';
import { walk } from './walk.js';

function staticBase(pattern: string): string {
  const segments = pattern.split('/');
  const fixed: string[] = [];
  for (const segment of segments) {
    if (hasGlobMeta(segment)) break;
    fixed.push(segment);
  }
  return fixed.length === 0 ? ROOT_PATH : fixed.join('/');
}

export async function glob(source: FileSource, pattern: string): Promise<string[]> {
  if (pattern.startsWith('/')) {
    throw new Error(`Invalid glob pattern: ${pattern}`);
  }
  const base = staticBase(pattern);
  assertValidPath(base);
  const matcher = globToRegExp(`/${pattern}`, true);
  const maxDepth = pattern.includes('**') ? Infinity : pathDepth(pattern);
  try {
    await statPath(source, base);
  } catch (err) {
    if (isNotFoundError(err)) return [];
    throw err;
  }
  const matches: string[] = [];
  await walk(source, base, (path, info) => {
    if (path !== ROOT_PATH && matcher.test(`/${path}`)) {
      matches.push(path);
    }
    if (info.kind === NodeKind.DIR && pathDepth(path) >= maxDepth) {
      return 'skip';
    }
  });
  return matches;
}

export async function findPaths(source: FileSource, rules: PathRules, root: string = ROOT_PATH): Promise<string[]> {
  const matcher = new PathMatcher(rules);
  const found: string[] = [];
  if (matcher.isEmpty) return found;
  await walk(source, root, (path) => {
    if (path !== root && matcher.matches(path)) {
      found.push(path);
    }
  });
  return found;
}
