import { classify, matchesPattern, normalizePrefix, remoteKeyFor } from '../src/clients/FileClassifier';

describe('FileClassifier', () => {
  describe('classify', () => {
    it('should extract the embedded date from a log filename', () => {
      expect(classify('oempro-2024-01-15-0002.csv')).toBe('2024-01-15');
    });

    it('should return the first date when several are present', () => {
      expect(classify('acct-2023-12-31-rotated-2024-01-01.csv')).toBe('2023-12-31');
    });

    it('should return null when no date is present', () => {
      expect(classify('notes.txt')).toBeNull();
    });

    it('should not accept dates without zero padding', () => {
      expect(classify('oempro-2024-1-5-0001.csv')).toBeNull();
    });

    it('should ignore the selection pattern entirely', () => {
      expect(classify('other-prefix-2022-07-04.log')).toBe('2022-07-04');
    });
  });

  describe('matchesPattern', () => {
    it('should match files selected by the default glob', () => {
      expect(matchesPattern('oempro-2024-01-15-0002.csv', 'oempro-*.csv')).toBe(true);
    });

    it('should reject files outside the glob', () => {
      expect(matchesPattern('oempro-2024-01-15-0002.csv.gz', 'oempro-*.csv')).toBe(false);
      expect(matchesPattern('acct-2024-01-15-0002.csv', 'oempro-*.csv')).toBe(false);
    });

    it('should match anything with a bare star', () => {
      expect(matchesPattern('notes.txt', '*')).toBe(true);
    });
  });

  describe('normalizePrefix', () => {
    it('should strip leading and trailing slashes', () => {
      expect(normalizePrefix('/pmta-logs/')).toBe('pmta-logs');
      expect(normalizePrefix('//archive/pmta//')).toBe('archive/pmta');
    });

    it('should reduce a bare slash to the bucket root', () => {
      expect(normalizePrefix('/')).toBe('');
    });
  });

  describe('remoteKeyFor', () => {
    it('should partition by the embedded year and month', () => {
      expect(remoteKeyFor('pmta-logs', 'oempro-2024-01-15-0002.csv', '2024-01-15')).toBe(
        'pmta-logs/2024-01/oempro-2024-01-15-0002.csv'
      );
    });

    it('should normalize leading and trailing slashes in the prefix', () => {
      expect(remoteKeyFor('/archive/pmta/', 'oempro-2023-11-02-0001.csv', '2023-11-02')).toBe(
        'archive/pmta/2023-11/oempro-2023-11-02-0001.csv'
      );
    });

    it('should omit an empty prefix', () => {
      expect(remoteKeyFor('', 'oempro-2023-11-02-0001.csv', '2023-11-02')).toBe(
        '2023-11/oempro-2023-11-02-0001.csv'
      );
    });
  });
});
