/**
 * Contact Extractor Unit Tests
 */

import { describe, test, expect } from 'vitest';
import {
  extractAllEmails,
  extractAllPhones,
  extractContacts,
  extractEmail,
  extractPhone,
  isValidEmail,
  normalizePhone,
  type NumberingPlan,
} from './contact-extractor';

describe('extractContacts', () => {
  const cases = [
    {
      name: 'simple email',
      text: 'Hi, my email is john.doe@example.com',
      expected: { email: 'john.doe@example.com', phone: null },
    },
    {
      name: 'email in sentence',
      text: 'You can reach me at contact@company.org for any questions',
      expected: { email: 'contact@company.org', phone: null },
    },
    {
      name: 'phone with parentheses',
      text: 'Call me at (305) 555-1234',
      expected: { email: null, phone: '+1-305-555-1234' },
    },
    {
      name: 'phone with dashes',
      text: 'My number is 305-555-1234',
      expected: { email: null, phone: '+1-305-555-1234' },
    },
    {
      name: 'phone with dots',
      text: 'Reach me at 305.555.1234',
      expected: { email: null, phone: '+1-305-555-1234' },
    },
    {
      name: '10 digit phone',
      text: 'My phone is 3055551234',
      expected: { email: null, phone: '+1-305-555-1234' },
    },
    {
      name: 'phone with +1',
      text: 'Call +1 305 555 1234',
      expected: { email: null, phone: '+1-305-555-1234' },
    },
    {
      name: 'email and phone together',
      text: 'Contact me at john@example.com or call (305) 555-1234',
      expected: { email: 'john@example.com', phone: '+1-305-555-1234' },
    },
    {
      name: 'longer message',
      text: "Hi! I'm interested in your services. You can email me at customer@gmail.com or text 305-555-9999. Thanks!",
      expected: { email: 'customer@gmail.com', phone: '+1-305-555-9999' },
    },
    {
      name: 'no contact info',
      text: 'I need help with my order',
      expected: { email: null, phone: null },
    },
  ];

  for (const { name, text, expected } of cases) {
    test(name, () => {
      expect(extractContacts(text)).toEqual(expected);
    });
  }

  test('returns empty record for empty or missing text', () => {
    expect(extractContacts('')).toEqual({ email: null, phone: null });
    expect(extractContacts(null)).toEqual({ email: null, phone: null });
    expect(extractContacts(undefined)).toEqual({ email: null, phone: null });
  });

  test('a bad phone does not block the email', () => {
    expect(extractContacts('mail a.b@test.io, phone 555-12')).toEqual({ email: 'a.b@test.io', phone: null });
  });
});

describe('extractEmail', () => {
  test('returns the address verbatim, case preserved', () => {
    expect(extractEmail('Write to John.Smith+quotes@Mail.Example.COM today')).toBe(
      'John.Smith+quotes@Mail.Example.COM'
    );
  });

  test('returns the leftmost address', () => {
    expect(extractEmail('first@one.com then second@two.com')).toBe('first@one.com');
  });

  test('stops before trailing punctuation', () => {
    expect(extractEmail('my email is sam@example.com.')).toBe('sam@example.com');
  });

  test('scans a long unbroken token in linear time', () => {
    const token = 'a'.repeat(100_000);
    const started = performance.now();

    expect(extractEmail(token)).toBeNull();
    expect(extractEmail(`${token} then reach me at jo@example.com`)).toBe('jo@example.com');
    expect(performance.now() - started).toBeLessThan(1000);
  });

  test('requires a letters-only final label of two or more', () => {
    expect(extractEmail('user@host.c')).toBeNull();
    expect(extractEmail('user@host.123')).toBeNull();
    expect(extractEmail('user@localhost')).toBeNull();
  });
});

describe('extractPhone', () => {
  test('all six surface forms give the same canonical number', () => {
    const forms = [
      '3055551234',
      '(305) 555-1234',
      '305-555-1234',
      '305.555.1234',
      '+1 305-555-1234',
      '1-305-555-1234',
    ];

    for (const form of forms) {
      expect(extractPhone(`call ${form} after 5`)).toBe('+1-305-555-1234');
    }
  });

  test('accepts +1 without separator', () => {
    expect(extractPhone('+13055551234')).toBe('+1-305-555-1234');
  });

  test('finds a formatted number glued to other digits', () => {
    expect(extractPhone('ID 99305-555-1234')).toBe('+1-305-555-1234');
  });

  test('does not cut a bare 10-digit run out of a longer one', () => {
    expect(extractPhone('Ticket 98765432101234 is open')).toBeNull();
    expect(extractPhone('ref 23055551234')).toBeNull();
  });

  test('ignores short numbers', () => {
    expect(extractPhone('order 555-1234')).toBeNull();
  });
});

describe('normalizePhone', () => {
  test('drops the country code from 11 digits', () => {
    expect(normalizePhone('1 (305) 555-1234')).toBe('+1-305-555-1234');
  });

  test('rejects anything that is not one national number', () => {
    expect(normalizePhone('555-1234')).toBeNull();
    expect(normalizePhone('23055551234')).toBeNull();
    expect(normalizePhone('not a phone')).toBeNull();
  });

  test('uses the numbering plan it is given', () => {
    const plan: NumberingPlan = { countryCode: '44', groups: [4, 6] };
    expect(normalizePhone('+44 2079 460000', plan)).toBe('+44-2079-460000');
    expect(normalizePhone('2079460000', plan)).toBe('+44-2079-460000');
  });
});

describe('isValidEmail', () => {
  test('matches whole strings only', () => {
    expect(isValidEmail('jane@example.com')).toBe(true);
    expect(isValidEmail('jane at example.com')).toBe(false);
    expect(isValidEmail('see jane@example.com')).toBe(false);
  });
});

describe('extractAll*', () => {
  const text = 'Email a@one.com or b@two.org, call 305-555-1234 or (212) 555-0000.';

  test('returns every match left to right', () => {
    expect(extractAllEmails(text)).toEqual(['a@one.com', 'b@two.org']);
    expect(extractAllPhones(text)).toEqual(['+1-305-555-1234', '+1-212-555-0000']);
  });

  test('same input gives the same sequence', () => {
    expect(extractAllEmails(text)).toEqual(extractAllEmails(text));
    expect(extractAllPhones(text)).toEqual(extractAllPhones(text));
  });

  test('empty input gives empty sequences', () => {
    expect(extractAllEmails('')).toEqual([]);
    expect(extractAllPhones(null)).toEqual([]);
  });
});
