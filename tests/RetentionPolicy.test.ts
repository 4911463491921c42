import { cutoffDate, formatDate, isEligible } from '../src/clients/RetentionPolicy';

describe('RetentionPolicy', () => {
  describe('cutoffDate', () => {
    it('should subtract the retention window in calendar days', () => {
      expect(cutoffDate(new Date(2024, 2, 10, 2, 0, 0), 7)).toBe('2024-03-03');
    });

    it('should ignore the time of day', () => {
      expect(cutoffDate(new Date(2024, 2, 10, 23, 59, 59), 7)).toBe('2024-03-03');
      expect(cutoffDate(new Date(2024, 2, 10, 0, 0, 1), 7)).toBe('2024-03-03');
    });

    it('should cross month and year boundaries', () => {
      expect(cutoffDate(new Date(2024, 0, 3, 12), 7)).toBe('2023-12-27');
      expect(cutoffDate(new Date(2024, 2, 1, 12), 1)).toBe('2024-02-29');
    });

    it('should return today for a zero-day window', () => {
      expect(cutoffDate(new Date(2024, 5, 15, 8), 0)).toBe('2024-06-15');
    });

    it('should reject negative or fractional windows', () => {
      expect(() => cutoffDate(new Date(2024, 5, 15), -1)).toThrow(RangeError);
      expect(() => cutoffDate(new Date(2024, 5, 15), 1.5)).toThrow(RangeError);
    });
  });

  describe('isEligible', () => {
    const cutoff = '2024-03-03';

    it('should make files before the cutoff eligible', () => {
      expect(isEligible('2024-03-02', cutoff)).toBe(true);
      expect(isEligible('2023-12-31', cutoff)).toBe(true);
    });

    it('should keep a file dated exactly on the cutoff', () => {
      expect(isEligible('2024-03-03', cutoff)).toBe(false);
    });

    it('should keep files after the cutoff', () => {
      expect(isEligible('2024-03-04', cutoff)).toBe(false);
    });
  });

  describe('formatDate', () => {
    it('should zero-pad month and day', () => {
      expect(formatDate(new Date(2024, 0, 5))).toBe('2024-01-05');
    });
  });
});
