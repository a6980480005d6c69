import { describe, it, expect } from 'vitest';
import { compileWildcardGlob, countWildcards, globSpecificity } from '../../src/common/glob';
import { PatternResolver } from '../../src/patterns/resolver';

describe('compileWildcardGlob', () => {
  it('treats only * as a wildcard', () => {
    const regex = compileWildcardGlob('*.env.*');
    expect(regex.test('prod.env.local')).toBe(true);
    expect(regex.test('.env.')).toBe(true);
    expect(regex.test('prodXenvXlocal')).toBe(false);
    expect(compileWildcardGlob('A+B').test('A+B')).toBe(true);
    expect(compileWildcardGlob('A+B').test('AAB')).toBe(false);
  });

  it('anchors the match', () => {
    const regex = compileWildcardGlob('DB_*');
    expect(regex.test('DB_HOST')).toBe(true);
    expect(regex.test('MY_DB_HOST')).toBe(false);
  });

  it('ranks longer and less wild patterns higher', () => {
    expect(countWildcards('*_*_KEY')).toBe(2);
    expect(globSpecificity('DB_PASSWORD')).toBe(11);
    expect(globSpecificity('DB_*')).toBe(-6);
    expect(globSpecificity('*')).toBe(-9);
  });
});

describe('PatternResolver', () => {
  it('prefers key rules over source rules over the default', () => {
    const resolver = new PatternResolver({ '*_SECRET': 'full' }, { '.env.local': 'none' }, 'partial');
    expect(resolver.determineStrategy('DB_SECRET', '.env.local')).toBe('full');
    expect(resolver.determineStrategy('DB_HOST', '.env.local')).toBe('none');
    expect(resolver.determineStrategy('DB_HOST', '.env')).toBe('partial');
    expect(resolver.determineStrategy('DB_HOST')).toBe('partial');
  });

  it('picks the most specific matching rule', () => {
    const resolver = new PatternResolver({ '*': 'none', 'DB_*': 'partial', DB_PASSWORD: 'full' });
    expect(resolver.determineStrategy('DB_PASSWORD')).toBe('full');
    expect(resolver.determineStrategy('DB_HOST')).toBe('partial');
    expect(resolver.determineStrategy('OTHER')).toBe('none');
  });

  it('breaks ties by registration order', () => {
    const resolver = new PatternResolver({ '*_KEY': 'partial', 'API_*': 'none' });
    expect(resolver.resolveForKey('API_KEY')).toBe('partial');

    const reversed = new PatternResolver({ 'API_*': 'none', '*_KEY': 'partial' });
    expect(reversed.resolveForKey('API_KEY')).toBe('none');
  });

  it('replaces all rules on compile', () => {
    const resolver = new PatternResolver({ 'A.B': 'none' });
    expect(resolver.resolveForKey('AxB')).toBeUndefined();
    expect(resolver.resolveForKey('A.B')).toBe('none');

    resolver.compile({}, { '*.env': 'partial' }, 'none');
    expect(resolver.resolveForKey('A.B')).toBeUndefined();
    expect(resolver.determineStrategy('A.B', 'prod.env')).toBe('partial');
    expect(resolver.getDefaultStrategy()).toBe('none');
    expect(resolver.rules().sources.map((rule) => rule.glob)).toEqual(['*.env']);
  });
});
