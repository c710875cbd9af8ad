import { isValid, parse } from 'date-fns';

/** Normalized timestamp layout produced by the decoder, always UTC */
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

const RFC2822_WEEKDAY_PREFIX = /^[A-Za-z]{3},\s*/;

/** Named zones of RFC 2822 section 4.3 */
const RFC2822_ZONES: Readonly<Record<string, string>> = {
    UT: '+0000',
    UTC: '+0000',
    GMT: '+0000',
    Z: '+0000',
    EST: '-0500',
    EDT: '-0400',
    CST: '-0600',
    CDT: '-0500',
    MST: '-0700',
    MDT: '-0600',
    PST: '-0800',
    PDT: '-0700',
};

const TRAILING_ZONE_NAME = /\s([A-Za-z]{1,3})$/;

function numericZone(text: string): string {
    return text.replace(TRAILING_ZONE_NAME, (match, zone: string) => {
        const offset = RFC2822_ZONES[zone.toUpperCase()];
        return offset === undefined ? match : ` ${offset}`;
    });
}

export function formatTimestamp(date: Date): string {
    return date.toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Parses `YYYY-MM-DD HH:MM:SS` (as UTC), then RFC 2822 with a numeric or named zone.
 * Returns `undefined` when neither layout matches.
 */
export function parseTimestamp(text: string, referenceDate: Date = new Date()): Date | undefined {
    const trimmed = text.trim();

    if (TIMESTAMP_PATTERN.test(trimmed)) {
        const utc = parse(`${trimmed}Z`, "yyyy-MM-dd HH:mm:ssX", referenceDate);
        if (isValid(utc)) {
            return utc;
        }
    }

    const rfc2822 = parse(
        numericZone(trimmed.replace(RFC2822_WEEKDAY_PREFIX, '')),
        'd MMM yyyy HH:mm:ss xx',
        referenceDate,
    );
    if (isValid(rfc2822)) {
        return rfc2822;
    }

    return undefined;
}
