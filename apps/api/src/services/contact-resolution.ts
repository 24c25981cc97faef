/**
 * Contact Resolution Policy
 *
 * Runs extraction strategies in order until one finds something. The default
 * chain is the free pattern pass followed by the LLM pass, so the LLM is only
 * paid for when the pattern pass found neither an email nor a phone. A partial
 * pattern result (only one field) still stops the chain.
 */

import type {
  ContactRecord,
  ExtractionMethod,
  ExtractionResult,
} from '../../../../packages/shared-types/src';
import { hasContact } from '../../../../packages/shared-types/src';
import { extractContacts } from './contact-extractor';
import type { FallbackExtractor } from './fallback-extractor';
import { maskEmail, maskPhone } from '../utils/logging';

export interface ContactExtractionStrategy {
  method: ExtractionMethod;
  extract(text: string): ContactRecord | Promise<ContactRecord>;
}

export interface ContactResolver {
  resolve(text: string): Promise<ExtractionResult>;
}

export const patternStrategy: ContactExtractionStrategy = {
  method: 'regex',
  extract: (text) => extractContacts(text),
};

export function intelligenceStrategy(fallback: FallbackExtractor): ContactExtractionStrategy {
  return {
    method: 'llm',
    extract: (text) => fallback.extractViaIntelligence(text),
  };
}

export class ContactResolutionPolicy implements ContactResolver {
  private strategies: ContactExtractionStrategy[];

  constructor(strategies: ContactExtractionStrategy[]) {
    if (strategies.length === 0) {
      throw new Error('ContactResolutionPolicy needs at least one strategy');
    }
    this.strategies = strategies;
  }

  /**
   * Resolve contact info from text, tagged with the tier that produced it.
   * When every tier misses, the result is empty and tagged with the last tier.
   */
  async resolve(text: string): Promise<ExtractionResult> {
    let result: ExtractionResult = { email: null, phone: null, method: this.strategies[0].method };

    for (const [index, strategy] of this.strategies.entries()) {
      if (index > 0) {
        console.log(`[ContactResolution] ${this.strategies[index - 1].method} found nothing, trying ${strategy.method}`);
      }

      const record = await strategy.extract(text);
      result = { email: record.email, phone: record.phone, method: strategy.method };

      if (hasContact(result)) {
        console.log(
          `[ContactResolution] Resolved via ${strategy.method}: email=${maskEmail(result.email)} phone=${maskPhone(result.phone)}`
        );
        return result;
      }
    }

    console.log('[ContactResolution] No contact info found');
    return result;
  }
}

/**
 * Pattern pass first, LLM pass only on a complete miss
 */
export function createContactResolutionPolicy(fallback: FallbackExtractor): ContactResolutionPolicy {
  return new ContactResolutionPolicy([patternStrategy, intelligenceStrategy(fallback)]);
}
