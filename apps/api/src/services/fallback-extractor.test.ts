/**
 * Fallback Extractor Unit Tests
 */

import { describe, test, expect, vi } from 'vitest';
import { buildExtractionPrompt, FallbackExtractor, parseExtractionReply } from './fallback-extractor';
import type { ClaudeQueryOptions, ClaudeRunResult, IntelligenceClient } from './claude-client';

function createClient(run: (options: ClaudeQueryOptions) => Promise<ClaudeRunResult>) {
  const fn = vi.fn(run);
  const client: IntelligenceClient = { run: fn };
  return { client, run: fn };
}

function reply(response: string) {
  return createClient(async () => ({ response, sessionId: 'test-session' }));
}

describe('parseExtractionReply', () => {
  test('reads the JSON object out of surrounding prose', () => {
    const text = 'Sure! Here it is:\n{"email": "jane@example.com", "phone": "(305) 555-1234"}\nAnything else?';
    expect(parseExtractionReply(text)).toEqual({ email: 'jane@example.com', phone: '+1-305-555-1234' });
  });

  test('treats null and the string "null" as absent', () => {
    expect(parseExtractionReply('{"email": "null", "phone": null}')).toEqual({ email: null, phone: null });
    expect(parseExtractionReply('{"email": "  ", "phone": "NULL"}')).toEqual({ email: null, phone: null });
  });

  test('tolerates missing keys', () => {
    expect(parseExtractionReply('{"email": "sam@example.org"}')).toEqual({ email: 'sam@example.org', phone: null });
  });

  test('normalizes numeric phones', () => {
    expect(parseExtractionReply('{"email": null, "phone": 13055551234}')).toEqual({
      email: null,
      phone: '+1-305-555-1234',
    });
  });

  test('drops values that fail validation', () => {
    expect(parseExtractionReply('{"email": "jane at example", "phone": "555-12"}')).toEqual({
      email: null,
      phone: null,
    });
  });

  test('returns empty record for replies without usable JSON', () => {
    expect(parseExtractionReply('I could not find anything')).toEqual({ email: null, phone: null });
    expect(parseExtractionReply('{email: jane@example.com}')).toEqual({ email: null, phone: null });
    expect(parseExtractionReply('{"email": 42}')).toEqual({ email: null, phone: null });
  });
});

describe('buildExtractionPrompt', () => {
  test('embeds the message', () => {
    expect(buildExtractionPrompt('it is jane at example dot com')).toContain(
      'Message: it is jane at example dot com'
    );
  });
});

describe('FallbackExtractor', () => {
  test('returns the parsed contact from the client', async () => {
    const { client, run } = reply('{"email": "jane@example.com", "phone": null}');
    const extractor = new FallbackExtractor({ client, timeoutMs: 1000 });

    const result = await extractor.extractViaIntelligence('it is jane at example dot com');

    expect(result).toEqual({ email: 'jane@example.com', phone: null });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0].prompt).toContain('it is jane at example dot com');
    expect(run.mock.calls[0][0].timeout).toBe(1000);
  });

  test('does not call the client for blank text', async () => {
    const { client, run } = reply('{}');
    const extractor = new FallbackExtractor({ client, timeoutMs: 1000 });

    expect(await extractor.extractViaIntelligence('   ')).toEqual({ email: null, phone: null });
    expect(run).not.toHaveBeenCalled();
  });

  test('returns empty record when the client fails', async () => {
    const { client } = createClient(async () => {
      throw new Error('service unavailable');
    });
    const extractor = new FallbackExtractor({ client, timeoutMs: 1000 });

    expect(await extractor.extractViaIntelligence('reach me somehow')).toEqual({ email: null, phone: null });
  });

  test('returns empty record and aborts the call on timeout', async () => {
    const { client, run } = createClient(() => new Promise<ClaudeRunResult>(() => undefined));
    const extractor = new FallbackExtractor({ client, timeoutMs: 20 });

    expect(await extractor.extractViaIntelligence('reach me somehow')).toEqual({ email: null, phone: null });
    expect(run.mock.calls[0][0].signal?.aborted).toBe(true);
  });
});
