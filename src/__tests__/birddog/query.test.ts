/**
 * Query Construction Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  buildQueryString,
  encodeQueryKey,
  encodeQueryValue,
  formatSearchDate,
  indexedParams,
} from '../../integrations/birddog/query.js';

describe('query construction', () => {
  describe('indexedParams', () => {
    it('should suffix each value with its position', () => {
      expect(indexedParams('userName', ['a@x.com', 'b@y.com', 'c@z.com'])).toEqual([
        ['userName[0]', 'a@x.com'],
        ['userName[1]', 'b@y.com'],
        ['userName[2]', 'c@z.com'],
      ]);
    });

    it('should return no pairs for no values', () => {
      expect(indexedParams('userName', [])).toEqual([]);
    });
  });

  describe('buildQueryString', () => {
    it('should join pairs in insertion order, keeping repeated-style keys readable', () => {
      const query = buildQueryString(indexedParams('userName', ['a@x.com', 'b@y.com']));
      expect(query).toBe('userName[0]=a@x.com&userName[1]=b@y.com');
    });

    it('should keep dates and e-mail addresses verbatim', () => {
      expect(
        buildQueryString([
          ['SearchDate', '03/05/2024'],
          ['userName', 'jane@example.com'],
        ])
      ).toBe('SearchDate=03/05/2024&userName=jane@example.com');
    });

    it('should return an empty string for no pairs', () => {
      expect(buildQueryString([])).toBe('');
    });
  });

  describe('encoding', () => {
    it('should escape separators and spaces in values', () => {
      expect(encodeQueryValue('a b&c=d+e#f')).toBe('a%20b%26c%3Dd%2Be%23f');
    });

    it('should escape everything in keys except brackets', () => {
      expect(encodeQueryKey('user name[0]')).toBe('user%20name[0]');
    });
  });

  describe('formatSearchDate', () => {
    it('should format as zero-padded MM/dd/yyyy', () => {
      expect(formatSearchDate(new Date(2024, 0, 9))).toBe('01/09/2024');
    });

    it('should use the local calendar day', () => {
      expect(formatSearchDate(new Date(2023, 11, 31, 23, 59))).toBe('12/31/2023');
    });
  });
});
