import { SamplerConfigurationWarning } from './errors';
import { Sampler } from './sampler';

jest.mock('./logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

/** Small deterministic PRNG (mulberry32) so distribution checks are repeatable */
function seeded(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function draw(sampler: Sampler, count: number): number[] {
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(sampler.next());
  }
  return values;
}

describe('Sampler', () => {
  describe('constructor', () => {
    it('should reject an empty or inverted range', () => {
      expect(() => new Sampler({ min: 20, max: 10 })).toThrow(RangeError);
      expect(() => new Sampler({ min: 10, max: 10 })).toThrow(
        'Invalid sampling range [10, 10): min must be less than max'
      );
    });

    it('should reject non-finite bounds', () => {
      expect(() => new Sampler({ min: 0, max: Infinity })).toThrow(RangeError);
    });

    it('should reject integer ranges that contain no integer', () => {
      expect(() => new Sampler({ min: 10.2, max: 10.8 })).toThrow('Sampling range [10.2, 10.8) contains no integer');
    });

    it('should accept the same range for real-valued sampling', () => {
      expect(() => new Sampler({ min: 10.2, max: 10.8, config: { kind: 'uniform', integer: false } })).not.toThrow();
    });
  });

  describe('uniform', () => {
    it('should map the random source onto [min, max)', () => {
      expect(new Sampler({ min: 10, max: 20, random: () => 0 }).next()).toBe(10);
      expect(new Sampler({ min: 10, max: 20, random: () => 0.5 }).next()).toBe(15);
      expect(new Sampler({ min: 10, max: 20, random: () => 0.999999 }).next()).toBe(19);
    });

    it('should round fractional bounds inwards', () => {
      expect(new Sampler({ min: 1.5, max: 4, random: () => 0 }).next()).toBe(2);
      expect(new Sampler({ min: 1.5, max: 4, random: () => 0.99 }).next()).toBe(3);
    });

    it('should keep 10,000 draws inside [min, max)', () => {
      const values = draw(new Sampler({ min: 10, max: 20, random: seeded(7) }), 10000);

      expect(values.every(value => Number.isInteger(value) && value >= 10 && value < 20)).toBe(true);
      expect(new Set(values).size).toBe(10);
    });

    it('should produce real values when integer sampling is off', () => {
      const sampler = new Sampler({ min: 0.5, max: 1.5, config: { kind: 'uniform', integer: false }, random: () => 0.25 });

      expect(sampler.next()).toBe(0.75);
    });

    it('should keep 10,000 real-valued draws inside [min, max)', () => {
      const sampler = new Sampler({ min: 0.5, max: 1.5, config: { kind: 'uniform', integer: false }, random: seeded(3) });

      expect(draw(sampler, 10000).every(value => value >= 0.5 && value < 1.5)).toBe(true);
    });
  });

  describe('skewed', () => {
    it('should center draws on the mean', () => {
      // cos(pi / 2) is ~0, so the normal draw is ~0 and the value is the median
      const sampler = new Sampler({ min: 10, max: 20, config: { kind: 'skewed', mean: 15 }, random: () => 0.25 });

      expect(sampler.next()).toBe(15);
    });

    it('should keep 10,000 draws strictly inside the range', () => {
      const sampler = new Sampler({ min: 10, max: 20, config: { kind: 'skewed', mean: 12 }, random: seeded(11) });

      expect(draw(sampler, 10000).every(value => Number.isInteger(value) && value >= 10 && value < 20)).toBe(true);
    });

    it('should concentrate draws near the mean', () => {
      const uniform = draw(new Sampler({ min: 10, max: 100, random: seeded(5) }), 10000);
      const skewed = draw(
        new Sampler({ min: 10, max: 100, config: { kind: 'skewed', mean: 12 }, random: seeded(5) }),
        10000
      );

      const shareBelow20 = (values: number[]) => values.filter(value => value < 20).length / values.length;

      expect(shareBelow20(uniform)).toBeLessThan(0.2);
      expect(shareBelow20(skewed)).toBeGreaterThan(0.6);
    });

    it('should fall back to uniform sampling and warn once', () => {
      const warnings: SamplerConfigurationWarning[] = [];
      const sampler = new Sampler({
        min: 10,
        max: 20,
        config: { kind: 'skewed', mean: 1000, sigma: 0.01, maxRetries: 5 },
        random: () => 0.5,
        onWarning: warning => warnings.push(warning),
      });

      expect(sampler.next()).toBe(15);
      expect(sampler.next()).toBe(15);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].rejections).toBe(5);
      expect(warnings[0].message).toContain('falling back to uniform sampling');
    });
  });

  describe('samples', () => {
    it('should yield an endless sequence', () => {
      const iterator = new Sampler({ min: 10, max: 20, random: () => 0 }).samples();

      expect([iterator.next().value, iterator.next().value, iterator.next().value]).toEqual([10, 10, 10]);
    });
  });
});
