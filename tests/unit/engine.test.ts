import { describe, it, expect, vi } from 'vitest';
import { LruCache } from '../../src/cache/lru';
import { EdfParseError } from '../../src/common/errors';
import { Logger } from '../../src/common/logger';
import { MaskEngine } from '../../src/masking/engine';
import { maskValue } from '../../src/masking/api';
import { MaskingMetrics } from '../../src/observability/metrics';
import { DotenvParser } from '../../src/parser/dotenv';
import type { ParsedDocument } from '../../src/parser/types';
import { PatternResolver } from '../../src/patterns/resolver';
import { StrategyRegistry } from '../../src/strategies/registry';

const logger = new Logger({ level: 'silent' });

function createEngine(options: { skipComments?: boolean } = {}) {
  const parser = new DotenvParser();
  const metrics = new MaskingMetrics();
  const engine = new MaskEngine({
    parser,
    cache: new LruCache<ParsedDocument>(10),
    resolver: new PatternResolver({ '*_SECRET': 'full' }, { '.env.local': 'none' }, 'partial'),
    registry: new StrategyRegistry({ logger, metrics }),
    settings: { skipComments: options.skipComments ?? true },
    metrics,
    logger,
  });
  return { engine, parser, metrics };
}

describe('MaskEngine', () => {
  it('resolves strategies by key, then source, then default', () => {
    const { engine } = createEngine();
    const content = 'DB_SECRET=supersecretvalue\nNAME=plainvalue\n';

    const local = engine.generateMasks(content, '/project/.env.local');
    expect(local.maskedLines.map((line) => [line.key, line.strategy, line.mask])).toEqual([
      ['DB_SECRET', 'full', '****************'],
      ['NAME', 'none', 'plainvalue'],
    ]);

    const plain = engine.generateMasks(content, '/project/.env');
    expect(plain.maskedLines[1]).toMatchObject({ key: 'NAME', strategy: 'partial', mask: 'pla****lue' });
  });

  it('describes where each mask belongs', () => {
    const { engine } = createEngine();
    const result = engine.generateMasks('A_SECRET="x y"\n');
    expect(result.maskedLines).toEqual([
      {
        key: 'A_SECRET',
        strategy: 'full',
        startLine: 1,
        endLine: 1,
        mask: '***',
        valueStart: 9,
        valueEnd: 14,
        quote: 'double',
        isComment: false,
      },
    ]);
    expect(result.lineOffsets).toEqual([0, 15]);
  });

  it('parses each distinct content once', () => {
    const { engine, parser } = createEngine();
    const parse = vi.spyOn(parser, 'parse');
    const content = 'TOKEN=abcdefghijkl\n';

    const first = engine.generateMasks(content);
    const second = engine.generateMasks(content);

    expect(parse).toHaveBeenCalledTimes(1);
    expect(first.fromCache).toBe(false);
    expect(second.fromCache).toBe(true);
    expect(second.maskedLines).toEqual(first.maskedLines);
    expect(engine.stats()).toEqual({ hits: 1, misses: 1, size: 1 });

    engine.clearCache();
    engine.generateMasks(content);
    expect(parse).toHaveBeenCalledTimes(2);
  });

  it('skips commented assignments unless configured otherwise', () => {
    const { engine } = createEngine();
    const content = '# OLD_SECRET=value\nNEW_SECRET=value2\n';
    expect(engine.generateMasks(content).maskedLines.map((line) => line.key)).toEqual(['NEW_SECRET']);

    engine.updateSettings({ skipComments: false });
    const masks = engine.generateMasks(content).maskedLines;
    expect(masks.map((line) => [line.key, line.isComment])).toEqual([
      ['OLD_SECRET', true],
      ['NEW_SECRET', false],
    ]);
  });

  it('propagates parse errors without caching', async () => {
    const { engine, metrics } = createEngine();
    expect(() => engine.generateMasks('A="open')).toThrow(EdfParseError);
    expect(engine.stats().size).toBe(0);
    expect(await metrics.snapshot()).toContain('envshroud_parse_failures_total 1');
  });

  it('masks single values through the same rules', () => {
    const { engine } = createEngine();
    const context = { key: 'X_SECRET', lineNumber: 1, quote: 'none' as const, isComment: false };
    expect(engine.maskValue('abcdefghijk', context)).toBe('***********');
    expect(engine.maskValue('abcdefghijk', { ...context, key: 'OTHER' })).toBe('abc*****ijk');
    expect(engine.maskValue('abcdefghijk', context, 'none')).toBe('abcdefghijk');
  });
});

describe('maskValue', () => {
  it('uses full masking by default', () => {
    expect(maskValue('secret')).toBe('******');
  });

  it('applies the mode, mask character and options to a private copy', () => {
    const registry = new StrategyRegistry({ logger });
    expect(maskValue('mysecretvalue', { mode: 'partial', maskChar: '#', registry })).toBe('mys#######lue');
    expect(maskValue('mysecretvalue', { mode: 'partial', options: { show_start: 1, show_end: 1 }, registry })).toBe(
      'm***********e',
    );
    expect(registry.apply('partial', 'mysecretvalue')).toBe('mys*******lue');
  });

  it('ignores the mask character for strategies without one', () => {
    expect(maskValue('visible', { mode: 'none', maskChar: '#' })).toBe('visible');
  });

  it('falls back to full masking for unknown modes', () => {
    const registry = new StrategyRegistry({ logger });
    expect(maskValue('abc', { mode: 'missing', maskChar: '#', registry })).toBe('***');
  });
});
