export const DEFAULT_COUNTRY_CODE = '91';

const digitsOf = (value: string): string => value.replace(/\D/g, '');

/**
 * Normalizes a destination number to `+<digits>`. Bare 10-digit numbers are treated as
 * domestic and get the default country code; 12-digit numbers that already start with it
 * only gain the `+`. Returns null when no digits remain.
 */
export function normalizePhone(raw: string, countryCode: string = DEFAULT_COUNTRY_CODE): string | null {
    const value = raw.trim();
    if (!value) {
        return null;
    }

    if (value.startsWith('+')) {
        const digits = digitsOf(value.slice(1));
        return digits ? `+${digits}` : null;
    }

    const digits = digitsOf(value);
    if (!digits) {
        return null;
    }
    if (digits.length === 10) {
        return `+${countryCode}${digits}`;
    }
    return `+${digits}`;
}
