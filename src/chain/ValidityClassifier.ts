import { differenceInMilliseconds, isBefore } from 'date-fns';
import { parseTimestamp } from '../certificate/timestamps';
import { createLogger } from '../logger';
import { ValidityStatus } from './types';

const logger = createLogger('validity');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DEFAULT_EXPIRING_SOON_DAYS = 30;

/**
 * Classifies a certificate's `notAfter` timestamp.
 *
 * Text that matches none of the accepted layouts is reported as `Valid`, so a
 * malformed date never fails chain assembly.
 */
export function classifyValidity(
    notAfter: string,
    now: Date = new Date(),
    expiringSoonDays: number = DEFAULT_EXPIRING_SOON_DAYS,
): ValidityStatus {
    const expiry = parseTimestamp(notAfter, now);
    if (!expiry) {
        logger.debug('Unparseable expiry date, assuming valid', { notAfter });
        return ValidityStatus.Valid;
    }

    if (isBefore(expiry, now)) {
        return ValidityStatus.Expired;
    }

    // whole elapsed days of the exact duration, independent of the local time zone
    const daysLeft = Math.trunc(differenceInMilliseconds(expiry, now) / MS_PER_DAY);
    return daysLeft <= expiringSoonDays ? ValidityStatus.ExpiringSoon : ValidityStatus.Valid;
}
