import { globToRegExp } from './glob.js';

export interface PathRules {
  glob?: string[];
  regex?: string[];
}

export class PathMatcher {
  private readonly globMatchers: RegExp[];
  private readonly regexMatchers: RegExp[];

  constructor(rules: PathRules) {
    this.globMatchers = (rules.glob ?? []).map((pattern) => globToRegExp(pattern, pattern.startsWith('/')));
    this.regexMatchers = (rules.regex ?? []).map((pattern) => new RegExp(pattern));
  }

  get isEmpty(): boolean {
    return this.globMatchers.length === 0 && this.regexMatchers.length === 0;
  }

  matches(path: string): boolean {
    const rooted = `/${path}`;
    for (const matcher of this.globMatchers) {
      if (matcher.test(rooted)) return true;
    }
    for (const matcher of this.regexMatchers) {
      if (matcher.test(path)) return true;
    }
    return false;
  }
}
