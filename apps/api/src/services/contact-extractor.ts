/**
 * Contact Extractor
 *
 * Deterministic email and phone extraction from free-form message text.
 * Runs before any LLM call so that most contact details cost nothing to find.
 *
 * Everything here is pure: no I/O, no logging, and absence of a match is
 * reported as null or an empty array, never as an error.
 */

import type { ContactRecord } from '../../../../packages/shared-types/src';

/**
 * Describes how national numbers are written and normalized.
 * Only the North American plan ships today; other plans plug in here.
 */
export interface NumberingPlan {
  /** Country calling code without the leading plus, e.g. "1" */
  countryCode: string;
  /** Digit group sizes of a national number, e.g. [3, 3, 4] */
  groups: readonly number[];
}

export const NORTH_AMERICAN_PLAN: NumberingPlan = {
  countryCode: '1',
  groups: [3, 3, 4],
};

// local-part "@" one or more dot-terminated labels, then a letters-only TLD.
// A match starts only where the local part starts, keeping long tokens linear.
const EMAIL_SOURCE = '(?<![A-Za-z0-9._+-])[A-Za-z0-9._+-]+@(?:[A-Za-z0-9-]+\\.)+[A-Za-z]{2,}';

// Optional +1 / 1- prefix, then (NNN) NNN-NNNN, NNN-NNN-NNNN, NNN.NNN.NNNN or
// NNN NNN NNNN. A bare 10-digit run (optionally 1- or +1-prefixed) must not sit
// inside a longer run of digits.
const PHONE_SOURCE =
  '(?:\\+1\\s*|1-)?(?:\\(\\d{3}\\)\\s*\\d{3}[\\s.-]?\\d{4}|\\d{3}[\\s.-]\\d{3}[\\s.-]\\d{4})' +
  '|(?<!\\d)(?:\\+?1[\\s.-]?)?\\d{10}(?!\\d)';

function nationalLength(plan: NumberingPlan): number {
  return plan.groups.reduce((sum, size) => sum + size, 0);
}

/**
 * Normalize a raw phone string into the plan's canonical form
 * (`+1-NNN-NNN-NNNN` for the default plan). Returns null when the digits do not
 * make exactly one national number.
 */
export function normalizePhone(raw: string, plan: NumberingPlan = NORTH_AMERICAN_PLAN): string | null {
  let digits = raw.replace(/\D/g, '');
  const length = nationalLength(plan);

  if (digits.length === length + plan.countryCode.length && digits.startsWith(plan.countryCode)) {
    digits = digits.slice(plan.countryCode.length);
  }

  if (digits.length !== length) {
    return null;
  }

  const parts: string[] = [];
  let offset = 0;
  for (const size of plan.groups) {
    parts.push(digits.slice(offset, offset + size));
    offset += size;
  }

  return `+${plan.countryCode}-${parts.join('-')}`;
}

export function isValidEmail(value: string): boolean {
  return new RegExp(`^${EMAIL_SOURCE}$`).test(value);
}

/**
 * First (leftmost) email address in text, returned verbatim
 */
export function extractEmail(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = new RegExp(EMAIL_SOURCE).exec(text);
  return match ? match[0] : null;
}

/**
 * First (leftmost) phone number in text that normalizes to a national number
 */
export function extractPhone(
  text: string | null | undefined,
  plan: NumberingPlan = NORTH_AMERICAN_PLAN
): string | null {
  if (!text) return null;
  for (const match of text.matchAll(new RegExp(PHONE_SOURCE, 'g'))) {
    const normalized = normalizePhone(match[0], plan);
    if (normalized) {
      return normalized;
    }
  }
  return null;
}

/**
 * Extract both email and phone. Each lookup is independent of the other.
 */
export function extractContacts(text: string | null | undefined): ContactRecord {
  return {
    email: extractEmail(text),
    phone: extractPhone(text),
  };
}

/**
 * Every email in text, left to right
 */
export function extractAllEmails(text: string | null | undefined): string[] {
  if (!text) return [];
  return Array.from(text.matchAll(new RegExp(EMAIL_SOURCE, 'g')), (match) => match[0]);
}

/**
 * Every phone number in text, left to right, in canonical form
 */
export function extractAllPhones(
  text: string | null | undefined,
  plan: NumberingPlan = NORTH_AMERICAN_PLAN
): string[] {
  if (!text) return [];
  const phones: string[] = [];
  for (const match of text.matchAll(new RegExp(PHONE_SOURCE, 'g'))) {
    const normalized = normalizePhone(match[0], plan);
    if (normalized) {
      phones.push(normalized);
    }
  }
  return phones;
}
