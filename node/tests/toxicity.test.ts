import { describe, expect, it } from 'vitest';
import { TOXIC_RESPONSES, ToxicityFilter } from '@/services/toxicity';

const filter = new ToxicityFilter();

describe('ToxicityFilter', () => {
  it('lets ordinary questions through', () => {
    const result = filter.check('Где ближайший МФЦ на Васильевском острове?');

    expect(result).toEqual({ isToxic: false, level: 'safe', matchedPatterns: [], confidence: 1, shouldBlock: false });
    expect(filter.responseFor(result)).toBeUndefined();
  });

  it('blocks insults regardless of case', () => {
    const result = filter.check('Ты ИДИОТ');

    expect(result.level).toBe('medium');
    expect(result.shouldBlock).toBe(true);
    expect(result.confidence).toBeCloseTo(0.7);
    expect(filter.responseFor(result)).toBe(TOXIC_RESPONSES.medium);
  });

  it('reports the most severe level when several patterns match', () => {
    const result = filter.check('тупой дурак, ты тварь');

    expect(result.level).toBe('high');
    expect(result.matchedPatterns).toHaveLength(3);
    expect(result.confidence).toBe(1);
    expect(filter.responseFor(result)).toBe(TOXIC_RESPONSES.high);
  });

  it('flags mild words without blocking', () => {
    const result = filter.check('Блин, опять очередь в МФЦ');

    expect(result).toMatchObject({ isToxic: true, level: 'low', shouldBlock: false });
    expect(filter.responseFor(result)).toBeUndefined();
  });

  it('matches only at the start of a word', () => {
    expect(filter.check('Где посмотреть истребитель в музее?').level).toBe('safe');
    expect(filter.check('Всполохи салюта видно с набережной?').level).toBe('safe');
  });

  it('treats blank input as safe', () => {
    expect(filter.check('   ').shouldBlock).toBe(false);
  });

  it('accepts a custom pattern set', () => {
    const custom = new ToxicityFilter({ high: [], medium: ['негодя\\p{L}*'], low: [] });

    expect(custom.check('Негодяи!').level).toBe('medium');
    expect(custom.check('Ты идиот').level).toBe('safe');
  });
});
