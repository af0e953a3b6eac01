/**
 * A calendar day without time of day or zone. Wire payloads carry these as plain date strings
 * (`start_date`, `due_date`, `spent_on`), distinct from timestamps which map to `Date`.
 */
export class CalendarDate {
    public readonly year: number;
    /** 1-based month. */
    public readonly month: number;
    public readonly day: number;

    /**
     * @param year number - Full year, e.g. 2024
     * @param month number - Month 1..12
     * @param day number - Day of month, validated against the month
     * @throws RangeError when the combination is not a real day
     */
    constructor(year: number, month: number, day: number) {
        if (!CalendarDate.isValid(year, month, day)) {
            throw new RangeError(`Invalid calendar date ${year}-${month}-${day}`);
        }
        this.year = year;
        this.month = month;
        this.day = day;
    }

    /** Checks that year/month/day describe an existing day (proleptic Gregorian). */
    public static isValid(year: number, month: number, day: number): boolean {
        if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
            return false;
        }
        if (month < 1 || month > 12 || day < 1) {
            return false;
        }
        const probe = new Date(0);
        probe.setUTCFullYear(year, month - 1, day);
        return probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
    }

    /** Builds the UTC calendar day of a timestamp. */
    public static fromDate(date: Date): CalendarDate {
        return new CalendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
    }

    public equals(other: CalendarDate): boolean {
        return this.year === other.year && this.month === other.month && this.day === other.day;
    }

    /** ISO form, e.g. `2024-03-09`. */
    public toString(): string {
        const pad = (value: number, width: number): string => {
            return String(value).padStart(width, `0`);
        };
        return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
    }
}
