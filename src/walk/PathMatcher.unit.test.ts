import { describe, expect, it } from 'vitest';
import { PathMatcher } from './PathMatcher.js';

describe('PathMatcher', () => {
  it('matches unanchored globs at any depth', () => {
    const matcher = new PathMatcher({ glob: ['*.log'] });
    expect(matcher.matches('app.log')).toBe(true);
    expect(matcher.matches('logs/app.log')).toBe(true);
    expect(matcher.matches('app.txt')).toBe(false);
  });

  it('anchors globs with a leading slash', () => {
    const matcher = new PathMatcher({ glob: ['/build/**'] });
    expect(matcher.matches('build')).toBe(true);
    expect(matcher.matches('build/out/main.js')).toBe(true);
    expect(matcher.matches('src/build')).toBe(false);
  });

  it('tests regular expressions against relative paths', () => {
    const matcher = new PathMatcher({ regex: ['^src/.*\\.ts$'] });
    expect(matcher.matches('src/index.ts')).toBe(true);
    expect(matcher.matches('lib/src/index.ts')).toBe(false);
  });

  it('reports when it has no rules', () => {
    expect(new PathMatcher({}).isEmpty).toBe(true);
    expect(new PathMatcher({ regex: ['x'] }).isEmpty).toBe(false);
  });
});
