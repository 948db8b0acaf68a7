/**
 * Route table for the HTTP service. Kept free of sockets so it can be
 * exercised directly; index.ts adapts it to node's http server.
 */

import type { Corrector } from '@corrector/data';
import { JsonBodyError, parseJsonBody, requireString } from './body.js';

export type SpellingService = Pick<
  Corrector,
  'correct' | 'isWordKnown' | 'getSuggestions' | 'rankedSuggestions' | 'getInfinitive' | 'stats'
>;

export interface ApiResponse {
  status: number;
  body: unknown;
}

type Handler = (service: SpellingService, readBody: () => Promise<string>) => Promise<ApiResponse>;

const ok = (body: unknown): ApiResponse => ({ status: 200, body });

async function readJson(readBody: () => Promise<string>): Promise<unknown> {
  return parseJsonBody(await readBody());
}

const ROUTES: Record<string, Handler> = {
  'GET /health': async (service) => {
    const stats = service.stats();
    return ok({ status: 'ok', language: stats.language, words: stats.words });
  },

  'POST /check': async (service, readBody) => {
    const word = requireString(await readJson(readBody), 'word');
    const correct = service.isWordKnown(word);
    return ok({ word, correct, suggestions: correct ? [] : service.getSuggestions(word) });
  },

  'POST /suggest': async (service, readBody) => {
    const word = requireString(await readJson(readBody), 'word');
    return ok({ word, suggestions: service.rankedSuggestions(word) });
  },

  'POST /infinitive': async (service, readBody) => {
    const word = requireString(await readJson(readBody), 'word');
    return ok({ word, infinitive: service.getInfinitive(word) ?? null });
  },

  'POST /correct': async (service, readBody) => {
    const text = requireString(await readJson(readBody), 'text', true);
    return ok({ text, corrected: service.correct(text) });
  },

  'GET /api': async () =>
    ok({
      name: 'Corrector REST API',
      version: '0.1.0',
      endpoints: {
        'GET /health': 'Health check',
        'POST /check': 'Is a word correct, with suggestions when it is not (body: {word: string})',
        'POST /suggest': 'Ranked suggestions with distance and frequency (body: {word: string})',
        'POST /infinitive': 'Infinitive of a verb form, or null (body: {word: string})',
        'POST /correct': 'Mark misspelled words in a text (body: {text: string})',
      },
    }),
};

/**
 * Resolve one request. Body errors map to their own status, unknown routes
 * to 404 and anything else to 500, always as `{ error }`.
 */
export async function dispatch(
  service: SpellingService,
  method: string,
  pathname: string,
  readBody: () => Promise<string>
): Promise<ApiResponse> {
  const key = `${method.toUpperCase()} ${pathname}`;
  if (!Object.hasOwn(ROUTES, key)) {
    return { status: 404, body: { error: 'Not found' } };
  }
  const handler = ROUTES[key];

  try {
    return await handler(service, readBody);
  } catch (error) {
    if (error instanceof JsonBodyError) {
      return { status: error.status, body: { error: error.message } };
    }
    console.error('Request error:', error);
    const message = error instanceof Error ? error.message : 'Internal server error';
    return { status: 500, body: { error: message } };
  }
}
