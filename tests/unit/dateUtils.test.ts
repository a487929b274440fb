import { describe, it, expect } from 'vitest';
import {
  STUDIO_TIMEZONE,
  formatStudioISOString,
  getStudioOffsetMinutes,
  isPastInStudioTime,
  normalizeToStudioTime,
  nowInStudioTime,
} from '../../server/utils/dateUtils';
import { InvalidTimestampError } from '../../server/core/errors';

describe('Studio time utilities', () => {
  describe('STUDIO_TIMEZONE constant', () => {
    it('should be set to Asia/Kolkata', () => {
      expect(STUDIO_TIMEZONE).toBe('Asia/Kolkata');
    });
  });

  describe('getStudioOffsetMinutes', () => {
    it('should be +05:30 all year round', () => {
      expect(getStudioOffsetMinutes(new Date('2099-01-15T00:00:00Z'))).toBe(330);
      expect(getStudioOffsetMinutes(new Date('2099-07-15T00:00:00Z'))).toBe(330);
    });
  });

  describe('normalizeToStudioTime', () => {
    it('should read a naive timestamp as studio civil time', () => {
      const result = normalizeToStudioTime('2099-01-01T09:00:00');
      expect(result.local).toBe('2099-01-01T09:00:00+05:30');
      expect(result.instant.toISOString()).toBe('2099-01-01T03:30:00.000Z');
    });

    it('should convert a UTC timestamp keeping the instant', () => {
      const result = normalizeToStudioTime('2099-01-01T03:30:00Z');
      expect(result.local).toBe('2099-01-01T09:00:00+05:30');
      expect(result.instant.toISOString()).toBe('2099-01-01T03:30:00.000Z');
    });

    it('should convert a negative offset', () => {
      const result = normalizeToStudioTime('2099-06-15T10:00:00-04:00');
      expect(result.local).toBe('2099-06-15T19:30:00+05:30');
    });

    it('should roll over to the next studio day', () => {
      const result = normalizeToStudioTime('2099-01-01T23:00:00+00:00');
      expect(result.local).toBe('2099-01-02T04:30:00+05:30');
    });

    it('should accept compact and hour-only offsets', () => {
      expect(normalizeToStudioTime('2099-01-01T09:00:00+0530').local).toBe('2099-01-01T09:00:00+05:30');
      expect(normalizeToStudioTime('2099-01-01T10:00:00+01').local).toBe('2099-01-01T14:30:00+05:30');
    });

    it('should accept a space separator without seconds', () => {
      expect(normalizeToStudioTime('2099-01-01 09:00').local).toBe('2099-01-01T09:00:00+05:30');
    });

    it('should treat a bare date as studio midnight', () => {
      expect(normalizeToStudioTime('2099-03-01').local).toBe('2099-03-01T00:00:00+05:30');
    });

    it('should keep fractional seconds on the instant', () => {
      const result = normalizeToStudioTime('2099-01-01T09:00:00.250Z');
      expect(result.instant.getUTCMilliseconds()).toBe(250);
      expect(result.local).toBe('2099-01-01T14:30:00+05:30');
    });

    it('should accept Date objects', () => {
      const result = normalizeToStudioTime(new Date('2030-05-05T00:00:00Z'));
      expect(result.local).toBe('2030-05-05T05:30:00+05:30');
    });

    it('should accept leap days only in leap years', () => {
      expect(normalizeToStudioTime('2096-02-29T08:00:00').local).toBe('2096-02-29T08:00:00+05:30');
      expect(() => normalizeToStudioTime('2099-02-29T08:00:00')).toThrow(InvalidTimestampError);
    });

    it('should keep years below 100 as written', () => {
      expect(normalizeToStudioTime('0000-02-29T00:00:00Z').instant.toISOString()).toBe('0000-02-29T00:00:00.000Z');
      expect(normalizeToStudioTime('0050-06-15T12:00:00Z').instant.toISOString()).toBe('0050-06-15T12:00:00.000Z');
      expect(() => normalizeToStudioTime('0001-02-29T00:00:00Z')).toThrow(InvalidTimestampError);
    });

    it.each([
      'not a date',
      '',
      '2099-02-30T10:00:00',
      '2099-13-01T00:00:00',
      '2099-01-01T24:00:00',
      '2099-01-01T09:60:00',
      '01/02/2099 09:00',
      '2099-01-01T09:00:00+25:00',
    ])('should reject %j', (input) => {
      expect(() => normalizeToStudioTime(input)).toThrow(InvalidTimestampError);
    });

    it('should reject an invalid Date', () => {
      expect(() => normalizeToStudioTime(new Date('nope'))).toThrow(InvalidTimestampError);
    });

    it('should report the failure with its error code', () => {
      const error = (() => {
        try {
          normalizeToStudioTime('garbage');
        } catch (e) {
          return e;
        }
      })();
      expect(error).toBeInstanceOf(InvalidTimestampError);
      expect(error).toMatchObject({ code: 'INVALID_TIMESTAMP', statusCode: 400 });
    });
  });

  describe('formatStudioISOString', () => {
    it('should format midnight UTC as 05:30 studio time', () => {
      expect(formatStudioISOString(new Date('2099-12-31T18:30:00Z'))).toBe('2100-01-01T00:00:00+05:30');
    });
  });

  describe('isPastInStudioTime', () => {
    const now = new Date('2099-01-01T03:30:00.000Z');

    it('should treat the current instant as past', () => {
      expect(isPastInStudioTime(normalizeToStudioTime('2099-01-01T09:00:00'), now)).toBe(true);
    });

    it('should treat earlier instants as past regardless of offset', () => {
      expect(isPastInStudioTime(normalizeToStudioTime('2099-01-01T03:29:59Z'), now)).toBe(true);
      expect(isPastInStudioTime(normalizeToStudioTime('2099-01-01T08:59:59'), now)).toBe(true);
    });

    it('should treat later instants as future', () => {
      expect(isPastInStudioTime(normalizeToStudioTime('2099-01-01T03:30:00.001Z'), now)).toBe(false);
      expect(isPastInStudioTime(normalizeToStudioTime('2099-01-01T09:00:01'), now)).toBe(false);
    });

    it('should compare against the real clock by default', () => {
      expect(isPastInStudioTime(normalizeToStudioTime('2000-01-01T00:00:00'))).toBe(true);
      expect(isPastInStudioTime(normalizeToStudioTime('2099-01-01T00:00:00'))).toBe(false);
    });
  });

  describe('nowInStudioTime', () => {
    it('should render the current instant with the studio offset', () => {
      expect(nowInStudioTime().local).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\+05:30$/);
    });
  });
});
