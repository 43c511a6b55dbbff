const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// ddd, dd MMM yyyy HH:mm:ss GMT
const RFC1123_DATE = /^([A-Za-z]{3}), (\d{2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;

/**
 * Content-Length as a non-negative integer, or undefined when absent or malformed
 */
export function parseContentLength(value: string | null | undefined): number | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }

    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        return undefined;
    }

    const length = Number(trimmed);
    return Number.isSafeInteger(length) ? length : undefined;
}

/**
 * Strict RFC 1123 date with English day and month names, e.g.
 * `Wed, 21 Oct 2015 07:28:00 GMT`. Undefined when absent, malformed, out of
 * range, or when the weekday does not match the date.
 */
export function parseHttpDate(value: string | null | undefined): Date | undefined {
    if (!value) {
        return undefined;
    }

    const match = RFC1123_DATE.exec(value.trim());
    if (!match) {
        return undefined;
    }

    const [, dayName, day, monthName, year, hours, minutes, seconds] = match;
    const month = MONTH_NAMES.indexOf(capitalize(monthName));
    const weekday = DAY_NAMES.indexOf(capitalize(dayName));
    if (month === -1 || weekday === -1) {
        return undefined;
    }

    const parts = {
        year: Number(year),
        day: Number(day),
        hours: Number(hours),
        minutes: Number(minutes),
        seconds: Number(seconds)
    };
    if (parts.hours > 23 || parts.minutes > 59 || parts.seconds > 59) {
        return undefined;
    }

    const date = new Date(Date.UTC(parts.year, month, parts.day, parts.hours, parts.minutes, parts.seconds));

    // Date.UTC rolls 31 Feb over into March; reject instead
    if (date.getUTCFullYear() !== parts.year || date.getUTCMonth() !== month || date.getUTCDate() !== parts.day) {
        return undefined;
    }
    if (date.getUTCDay() !== weekday) {
        return undefined;
    }

    return date;
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
