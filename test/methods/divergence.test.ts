import Divergence from '../../src/methods/divergence';

describe('Divergence', () => {
  const eps = 1e-8;

  describe('safeLog()', () => {
    it('adds epsilon before taking the log of zero', () => {
      // Arrange
      const value = 0;
      // Act
      const result = Divergence.safeLog(value);
      // Assert
      expect(result).toBe(Math.log(eps));
    });
    it('clamps negative inputs to zero', () => {
      // Act
      const result = Divergence.safeLog(-5);
      // Assert
      expect(result).toBe(Math.log(eps));
    });
    it('honours a custom epsilon', () => {
      // Act
      const result = Divergence.safeLog(0, 1);
      // Assert
      expect(result).toBe(0);
    });
  });

  describe('oneHot()', () => {
    it('places a single 1 at the index', () => {
      // Act
      const vector = Divergence.oneHot(4, 2);
      // Assert
      expect(Array.from(vector)).toEqual([0, 0, 1, 0]);
    });
    it('rejects an index past the end', () => {
      // Act & Assert
      expect(() => Divergence.oneHot(4, 4)).toThrow(RangeError);
    });
    it('rejects a fractional index', () => {
      // Act & Assert
      expect(() => Divergence.oneHot(4, 1.5)).toThrow(RangeError);
    });
  });

  describe('klDivergence()', () => {
    describe('Scenario: one-hot against a spread distribution', () => {
      it('reduces to the log-ratio at the hot index', () => {
        // Arrange
        const p = [1, 0];
        const q = [0.25, 0.75];
        const expected = Math.log(1 + eps) - Math.log(0.25 + eps);
        // Act
        const result = Divergence.klDivergence(p, q);
        // Assert
        expect(result).toBeCloseTo(expected, 12);
      });
    });
    describe('Scenario: identical distributions', () => {
      it('returns zero', () => {
        // Act
        const result = Divergence.klDivergence([0.5, 0.5], [0.5, 0.5]);
        // Assert
        expect(result).toBeCloseTo(0, 12);
      });
    });
    describe('Scenario: zero entries in p', () => {
      it('skips them even when q is also zero there', () => {
        // Act
        const result = Divergence.klDivergence([0, 1], [0, 1]);
        // Assert
        expect(result).toBeCloseTo(0, 12);
      });
    });
    describe('Scenario: q is zero where p has mass', () => {
      it('stays finite', () => {
        // Act
        const result = Divergence.klDivergence([1, 0], [0, 1]);
        // Assert
        expect(result).toBeCloseTo(Math.log(1 + eps) - Math.log(eps), 9);
      });
    });
    it('throws when the lengths differ', () => {
      // Act & Assert
      expect(() => Divergence.klDivergence([1], [0.5, 0.5])).toThrow(
        'Probability vectors must have the same length.'
      );
    });
  });

  describe('entropy()', () => {
    it('is ln 2 for a fair coin', () => {
      // Act
      const result = Divergence.entropy([0.5, 0.5]);
      // Assert
      expect(result).toBeCloseTo(Math.LN2, 6);
    });
    it('is ~0 for a certain outcome', () => {
      // Act
      const result = Divergence.entropy([1, 0, 0]);
      // Assert
      expect(result).toBeCloseTo(0, 6);
    });
  });

  describe('sum()', () => {
    it('adds every entry of a typed array', () => {
      // Act
      const result = Divergence.sum(new Float64Array([0.5, 0.25, 0.25]));
      // Assert
      expect(result).toBe(1);
    });
  });
});
