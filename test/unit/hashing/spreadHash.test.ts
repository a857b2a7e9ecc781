import { bucketIndex, spreadHash } from '../../../src/utils/hashing/spreadHash';

describe('spreadHash', () => {
  describe('spreadHash', () => {
    it('case - small shifts', () => {
      const state = { a: 1, b: 2, c: 3, d: 4 };
      expect(spreadHash(97, state)).toBe(68);
      expect(spreadHash(3136, state)).toBe(2249);
      expect(spreadHash(98307, state)).toBe(71170);
    });
    it('case - reference shifts', () => {
      const state = { a: 20, b: 12, c: 7, d: 4 };
      expect(spreadHash(97, state)).toBe(103);
      expect(spreadHash(0xdeadbeef, state)).toBe(3539410160);
    });
    it('case - all-zero shifts leave the code unchanged', () => {
      const state = { a: 0, b: 0, c: 0, d: 0 };
      expect(spreadHash(12345, state)).toBe(12345);
      expect(spreadHash(0xffffffff, state)).toBe(0xffffffff);
    });
    it('always returns an unsigned value', () => {
      const state = { a: 31, b: 1, c: 31, d: 1 };
      const spread = spreadHash(0x80000000, state);
      expect(spread).toBeGreaterThanOrEqual(0);
      expect(spread).toBeLessThanOrEqual(0xffffffff);
    });
  });

  describe('bucketIndex', () => {
    it('case - masks the low bits', () => {
      expect(bucketIndex(68, 4)).toBe(0);
      expect(bucketIndex(2249, 4)).toBe(1);
      expect(bucketIndex(71170, 4)).toBe(2);
    });
    it('case - full 32-bit code', () => {
      expect(bucketIndex(0xffffffff, 1024)).toBe(1023);
      expect(bucketIndex(0xffffffff, 2 ** 31)).toBe(2 ** 31 - 1);
    });
    it('stays within [0, size - 1]', () => {
      const size = 8;
      [0, 1, 7, 8, 9, 255, 0x7fffffff, 0x80000000, 0xffffffff].forEach(h => {
        const bucket = bucketIndex(h, size);
        expect(bucket).toBeGreaterThanOrEqual(0);
        expect(bucket).toBeLessThan(size);
      });
    });
  });
});
