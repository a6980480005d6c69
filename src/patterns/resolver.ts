import { compileWildcardGlob, globSpecificity } from '../common/glob';

export interface PatternRule {
  glob: string;
  matcher: RegExp;
  strategy: string;
  specificity: number;
  /** Position in the map the rule was compiled from; breaks specificity ties. */
  order: number;
}

export type PatternMap = Record<string, string>;

export const DEFAULT_STRATEGY = 'full';

function compileRules(patterns: PatternMap): PatternRule[] {
  return Object.entries(patterns).map(([glob, strategy], order) => ({
    glob,
    matcher: compileWildcardGlob(glob),
    strategy,
    specificity: globSpecificity(glob),
    order,
  }));
}

/** Most specific matching rule; on equal specificity the earlier rule wins. */
function bestMatch(rules: readonly PatternRule[], subject: string): PatternRule | undefined {
  let best: PatternRule | undefined;
  for (const rule of rules) {
    if (!rule.matcher.test(subject)) {
      continue;
    }
    if (!best || rule.specificity > best.specificity) {
      best = rule;
    }
  }
  return best;
}

/**
 * Maps keys and source file names to strategy names. Rules are only ever replaced
 * as a whole by `compile`; lookups do not mutate anything.
 */
export class PatternResolver {
  private keyRules: PatternRule[] = [];
  private sourceRules: PatternRule[] = [];
  private defaultStrategy = DEFAULT_STRATEGY;

  constructor(keyPatterns: PatternMap = {}, sourcePatterns: PatternMap = {}, defaultStrategy = DEFAULT_STRATEGY) {
    this.compile(keyPatterns, sourcePatterns, defaultStrategy);
  }

  compile(keyPatterns: PatternMap, sourcePatterns: PatternMap, defaultStrategy: string): void {
    this.keyRules = compileRules(keyPatterns);
    this.sourceRules = compileRules(sourcePatterns);
    this.defaultStrategy = defaultStrategy;
  }

  resolveForKey(key: string): string | undefined {
    return bestMatch(this.keyRules, key)?.strategy;
  }

  resolveForSource(basename: string): string | undefined {
    return bestMatch(this.sourceRules, basename)?.strategy;
  }

  /** Key rules first, then source rules, then the default strategy. */
  determineStrategy(key: string, sourceBasename?: string): string {
    const byKey = this.resolveForKey(key);
    if (byKey !== undefined) {
      return byKey;
    }
    if (sourceBasename) {
      const bySource = this.resolveForSource(sourceBasename);
      if (bySource !== undefined) {
        return bySource;
      }
    }
    return this.defaultStrategy;
  }

  getDefaultStrategy(): string {
    return this.defaultStrategy;
  }

  rules(): { keys: readonly PatternRule[]; sources: readonly PatternRule[] } {
    return { keys: this.keyRules, sources: this.sourceRules };
  }
}
