/**
 * strftime-style formatting and strict parsing for the date formats a tracker connection is configured with.
 * Supported directives: %Y %m %d %H %M %S and %%. All other characters are literal. Times are UTC.
 */
import { CalendarDate } from './CalendarDate.js';
import { ValidationError } from './Errors.js';

type Directive = `Y` | `m` | `d` | `H` | `M` | `S`;

type FormatToken = { kind: `literal`; text: string } | { kind: `field`; directive: Directive };

interface DateParts {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
}

const DIRECTIVES: ReadonlySet<string> = new Set([`Y`, `m`, `d`, `H`, `M`, `S`]);

/** Regex fragment accepted for each directive, mirroring strptime's widths. */
const FIELD_PATTERN: Record<Directive, string> = {
    Y: `(\\d{4})`,
    m: `(\\d{1,2})`,
    d: `(\\d{1,2})`,
    H: `(\\d{1,2})`,
    M: `(\\d{1,2})`,
    S: `(\\d{1,2})`,
};

const _compiled = new Map<string, FormatToken[]>();

function isDirective(value: string): value is Directive {
    return DIRECTIVES.has(value);
}

/**
 * Splits a format string into literal and field tokens.
 * @throws ValidationError on an unknown or dangling directive
 */
export function CompileFormat(format: string): FormatToken[] {
    const cached = _compiled.get(format);
    if (cached) {
        return cached;
    }
    const tokens: FormatToken[] = [];
    let literal = ``;

    for (let i = 0; i < format.length; i++) {
        const char = format[i];
        if (char !== `%`) {
            literal += char;
            continue;
        }
        const next = format[i + 1];
        i++;
        if (next === `%`) {
            literal += `%`;
            continue;
        }
        if (next === undefined || !isDirective(next)) {
            throw new ValidationError(`Unsupported date format directive '%${next ?? ``}' in '${format}'`, { format });
        }
        if (literal) {
            tokens.push({ kind: `literal`, text: literal });
            literal = ``;
        }
        tokens.push({ kind: `field`, directive: next });
    }
    if (literal) {
        tokens.push({ kind: `literal`, text: literal });
    }
    _compiled.set(format, tokens);
    return tokens;
}

function render(parts: DateParts, format: string): string {
    const pad = (value: number, width: number): string => {
        return String(value).padStart(width, `0`);
    };
    const values: Record<Directive, string> = {
        Y: pad(parts.year, 4),
        m: pad(parts.month, 2),
        d: pad(parts.day, 2),
        H: pad(parts.hour, 2),
        M: pad(parts.minute, 2),
        S: pad(parts.second, 2),
    };
    return CompileFormat(format)
        .map(token => {
            return token.kind === `literal` ? token.text : values[token.directive];
        })
        .join(``);
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, `\\$&`);
}

function match(value: string, format: string): DateParts | null {
    let tokens: FormatToken[];
    try {
        tokens = CompileFormat(format);
    } catch(error) {
        if (error instanceof ValidationError) {
            return null;
        }
        throw error;
    }
    const order: Directive[] = [];
    const pattern = tokens
        .map(token => {
            if (token.kind === `literal`) {
                return escapeRegExp(token.text);
            }
            order.push(token.directive);
            return FIELD_PATTERN[token.directive];
        })
        .join(``);
    const found = new RegExp(`^${pattern}$`).exec(value);
    if (!found) {
        return null;
    }
    const parts: DateParts = { year: 1900, month: 1, day: 1, hour: 0, minute: 0, second: 0 };
    const keys: Record<Directive, keyof DateParts> = {
        Y: `year`,
        m: `month`,
        d: `day`,
        H: `hour`,
        M: `minute`,
        S: `second`,
    };
    order.forEach((directive, index) => {
        parts[keys[directive]] = Number(found[index + 1]);
    });
    if (!CalendarDate.isValid(parts.year, parts.month, parts.day)) {
        return null;
    }
    if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) {
        return null;
    }
    return parts;
}

/**
 * Formats a timestamp in UTC.
 * @example
 * FormatDateTime(new Date(Date.UTC(2024, 0, 5, 8, 30)), '%Y-%m-%dT%H:%M:%SZ'); // '2024-01-05T08:30:00Z'
 */
export function FormatDateTime(date: Date, format: string): string {
    return render(
        {
            year: date.getUTCFullYear(),
            month: date.getUTCMonth() + 1,
            day: date.getUTCDate(),
            hour: date.getUTCHours(),
            minute: date.getUTCMinutes(),
            second: date.getUTCSeconds(),
        },
        format,
    );
}

/** Formats a calendar day; time directives render as zero. */
export function FormatCalendarDate(date: CalendarDate, format: string): string {
    return render({ year: date.year, month: date.month, day: date.day, hour: 0, minute: 0, second: 0 }, format);
}

/**
 * Parses a timestamp that must match the whole format. Returns null for anything else, including non-strings.
 */
export function ParseDateTime(value: unknown, format: string): Date | null {
    if (typeof value !== `string`) {
        return null;
    }
    const parts = match(value, format);
    if (!parts) {
        return null;
    }
    const date = new Date(0);
    date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
    date.setUTCHours(parts.hour, parts.minute, parts.second, 0);
    return date;
}

/** Parses a calendar day that must match the whole format. Returns null on mismatch. */
export function ParseCalendarDate(value: unknown, format: string): CalendarDate | null {
    if (typeof value !== `string`) {
        return null;
    }
    const parts = match(value, format);
    return parts ? new CalendarDate(parts.year, parts.month, parts.day) : null;
}
