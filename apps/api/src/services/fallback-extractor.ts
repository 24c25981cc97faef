/**
 * Fallback Extractor
 *
 * Asks the intelligence client to pull contact details out of text the
 * pattern extractor could not read. Best-effort: an unavailable client, a
 * timeout or an unparseable reply all come back as an empty record.
 */

import { z } from 'zod';
import type { ContactRecord } from '../../../../packages/shared-types/src';
import type { IntelligenceClient } from './claude-client';
import { isValidEmail, normalizePhone, NORTH_AMERICAN_PLAN, type NumberingPlan } from './contact-extractor';
import { describeError, maskEmail, maskPhone } from '../utils/logging';

export interface FallbackExtractorConfig {
  client: IntelligenceClient;
  timeoutMs: number;
  plan?: NumberingPlan;
}

const EMPTY_CONTACT: ContactRecord = { email: null, phone: null };

const SYSTEM_PROMPT = `You extract contact information from customer messages.
Respond with a single JSON object and nothing else.`;

// The model may omit a key, send null, or send the string "null"
const replySchema = z.object({
  email: z.union([z.string(), z.null()]).optional(),
  phone: z.union([z.string(), z.number(), z.null()]).optional(),
});

class ExtractionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Extraction timed out after ${timeoutMs}ms`);
    this.name = 'ExtractionTimeoutError';
  }
}

export function buildExtractionPrompt(text: string): string {
  return `Extract contact information from this message if present.

Message: ${text}

Look for:
- Email address (in format xxx@xxx.xxx)
- Phone number (any format)

Return ONLY a JSON object with these fields. Use null if not found.
Example:
{
  "email": "user@example.com",
  "phone": "+1-305-555-0100"
}`;
}

function cleanField(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = String(value).trim();
  if (!trimmed || trimmed.toLowerCase() === 'null') return null;
  return trimmed;
}

/**
 * Parse the model reply into a contact record.
 * Emails must match the email grammar; phones go through the same
 * normalization as pattern-extracted ones. Anything else is dropped.
 */
export function parseExtractionReply(
  reply: string,
  plan: NumberingPlan = NORTH_AMERICAN_PLAN
): ContactRecord {
  const jsonMatch = reply.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    console.warn('[FallbackExtractor] No JSON found in LLM response');
    return { ...EMPTY_CONTACT };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (error) {
    console.warn('[FallbackExtractor] Unparseable LLM response:', describeError(error));
    return { ...EMPTY_CONTACT };
  }

  const parsed = replySchema.safeParse(raw);
  if (!parsed.success) {
    console.warn('[FallbackExtractor] LLM response did not match contact shape');
    return { ...EMPTY_CONTACT };
  }

  const email = cleanField(parsed.data.email);
  const phone = cleanField(parsed.data.phone);

  return {
    email: email && isValidEmail(email) ? email : null,
    phone: phone ? normalizePhone(phone, plan) : null,
  };
}

export class FallbackExtractor {
  private client: IntelligenceClient;
  private timeoutMs: number;
  private plan: NumberingPlan;

  constructor(config: FallbackExtractorConfig) {
    this.client = config.client;
    this.timeoutMs = config.timeoutMs;
    this.plan = config.plan ?? NORTH_AMERICAN_PLAN;
  }

  /**
   * Extract contact info through the intelligence client. Never throws.
   */
  async extractViaIntelligence(text: string): Promise<ContactRecord> {
    if (!text.trim()) {
      return { ...EMPTY_CONTACT };
    }

    const abortController = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        abortController.abort();
        reject(new ExtractionTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    try {
      const result = await Promise.race([
        this.client.run({
          prompt: buildExtractionPrompt(text),
          systemPrompt: SYSTEM_PROMPT,
          timeout: this.timeoutMs,
          signal: abortController.signal,
        }),
        timeout,
      ]);

      const contact = parseExtractionReply(result.response, this.plan);
      console.log(
        `[FallbackExtractor] LLM extraction: email=${maskEmail(contact.email)} phone=${maskPhone(contact.phone)}`
      );
      return contact;
    } catch (error) {
      console.warn('[FallbackExtractor] Could not extract contact info with LLM:', describeError(error));
      return { ...EMPTY_CONTACT };
    } finally {
      clearTimeout(timer);
    }
  }
}
