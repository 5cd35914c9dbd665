// src/domains/expiration.selector.ts
import { addDays, isBefore, min } from 'date-fns';
import { Domain } from './entities/domain.entity';

/** Earliest of the OV/EV expirations, or null when the domain was never validated. */
export function earliestExpiration(domain: Domain): Date | null {
  const dates = [domain.expiration?.ov, domain.expiration?.ev].filter(
    (d): d is Date => d instanceof Date,
  );
  return dates.length ? min(dates) : null;
}

/**
 * Domains whose earliest validation expires before `now + horizonDays`.
 * Never-validated domains are always selected so they surface for attention.
 */
export function selectExpiring(
  domains: readonly Domain[],
  horizonDays: number,
  now: Date = new Date(),
): Domain[] {
  const cutoff = addDays(now, horizonDays);
  return domains.filter((domain) => {
    const expiry = earliestExpiration(domain);
    return expiry === null || isBefore(expiry, cutoff);
  });
}
