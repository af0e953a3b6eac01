import { describe, it, expect } from 'vitest';
import { CalendarDate } from '../src/Common/CalendarDate.js';
import {
    CompileFormat,
    FormatCalendarDate,
    FormatDateTime,
    ParseCalendarDate,
    ParseDateTime,
} from '../src/Common/DateFormat.js';
import { ValidationError } from '../src/Common/Errors.js';

const DATE = '%Y-%m-%d';
const DATETIME = '%Y-%m-%dT%H:%M:%SZ';

describe('DateFormat', () => {
    describe('formatting', () => {
        it('should format timestamps in UTC', () => {
            const date = new Date(Date.UTC(2024, 0, 5, 8, 30));
            expect(FormatDateTime(date, DATETIME)).toBe('2024-01-05T08:30:00Z');
        });

        it('should format calendar days with custom layouts', () => {
            expect(FormatCalendarDate(new CalendarDate(2024, 3, 9), '%d.%m.%Y')).toBe('09.03.2024');
        });

        it('should treat %% as a literal percent sign', () => {
            expect(FormatCalendarDate(new CalendarDate(2024, 3, 9), '%Y%%')).toBe('2024%');
        });

        it('should reject unknown directives', () => {
            expect(() => {
                return CompileFormat('%Y-%j');
            }).toThrow(ValidationError);
        });
    });

    describe('parsing', () => {
        it('should parse a timestamp matching the whole format', () => {
            const parsed = ParseDateTime('2024-01-05T08:30:00Z', DATETIME);
            expect(parsed?.toISOString()).toBe('2024-01-05T08:30:00.000Z');
        });

        it('should parse a calendar day', () => {
            const parsed = ParseCalendarDate('2024-02-29', DATE);
            expect(parsed).toBeInstanceOf(CalendarDate);
            expect(parsed?.toString()).toBe('2024-02-29');
        });

        it('should return null for partial matches', () => {
            expect(ParseDateTime('2024-01-05', DATETIME)).toBeNull();
            expect(ParseCalendarDate('2024-01-05T08:30:00Z', DATE)).toBeNull();
        });

        it('should return null for impossible dates and times', () => {
            expect(ParseCalendarDate('2023-02-29', DATE)).toBeNull();
            expect(ParseCalendarDate('2024-13-01', DATE)).toBeNull();
            expect(ParseDateTime('2024-01-05T24:00:00Z', DATETIME)).toBeNull();
        });

        it('should return null for non-strings and unusable formats', () => {
            expect(ParseCalendarDate(20240105, DATE)).toBeNull();
            expect(ParseDateTime(null, DATETIME)).toBeNull();
            expect(ParseDateTime('2024-01-05', '%Y-%q')).toBeNull();
        });
    });
});

describe('CalendarDate', () => {
    it('should refuse days that do not exist', () => {
        expect(() => {
            return new CalendarDate(2024, 4, 31);
        }).toThrow(RangeError);
    });

    it('should compare by value', () => {
        expect(new CalendarDate(2024, 3, 9).equals(CalendarDate.fromDate(new Date(Date.UTC(2024, 2, 9, 23))))).toBe(true);
    });
});
