import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { ExpertChat } from '../advisor/chat/expertChat.js';
import { RECOMMENDATION_SYSTEM_PROMPT, SENTIMENT_SYSTEM_PROMPT } from '../advisor/preferences/prompts.js';
import { RecommendationService } from '../advisor/recommendationService.js';
import type { GenerateRequest, TextGenerator } from '../advisor/textGenerator.js';
import { advisorRoutes, healthRoutes } from '../routes/index.js';
import { InMemorySessionStore } from '../session/InMemorySessionStore.js';

const NOW = new Date();
const BASE = '/v1/sessions/buyer-1';

const recommendationPayload = JSON.stringify([
  {
    model: 'Exter',
    brand: 'Hyundai',
    price: '₹6L - ₹10L',
    why_suitable: 'Tall seating and easy controls',
    key_features: ['Dashcam', 'Six airbags'],
    pros: ['Easy entry'],
    cons: ['Small boot'],
    senior_friendly_rating: 8,
    maintenance_cost: 'Low',
  },
  {
    model: 'City',
    brand: 'Honda',
    price: '₹11L - ₹16L',
    why_suitable: 'Smooth and comfortable automatic',
    key_features: ['Six airbags'],
    pros: ['Refined'],
    cons: ['Low seating'],
    senior_friendly_rating: 9,
  },
]);

async function fakeReply(request: GenerateRequest): Promise<string> {
  if (request.systemPrompt === RECOMMENDATION_SYSTEM_PROMPT) {
    return recommendationPayload;
  }
  if (request.systemPrompt === SENTIMENT_SYSTEM_PROMPT) {
    return 'Sentiment: positive';
  }
  return 'Consider the Honda City.';
}

const preferences = {
  budget_min: 500000,
  budget_max: 1500000,
  primary_use: 'Daily commuting',
  family_size: '2 people',
  driving_experience: 'Experienced city driver',
  fuel_preference: 'Petrol',
  important_features: ['Advanced safety features'],
};

describe('advisor routes', () => {
  let fastify: FastifyInstance;
  let sessionStore: InMemorySessionStore;
  let generate: Mock<(request: GenerateRequest) => Promise<string>>;

  async function build(generator: TextGenerator | null): Promise<FastifyInstance> {
    const app = Fastify({ logger: false });
    await app.register(healthRoutes, { upstreamConfigured: generator !== null, sessionStoreType: 'memory' });
    await app.register(advisorRoutes, {
      sessionStore,
      generator,
      recommendationService: new RecommendationService(generator, { maxTokens: 2000 }),
      expertChat: new ExpertChat(generator, { maxTokens: 800 }),
      sessionTtlSeconds: 3600,
      maxMessageChars: 50,
      now: () => NOW,
    });
    await app.ready();
    return app;
  }

  async function setPreferences() {
    return fastify.inject({ method: 'PUT', url: `${BASE}/preferences`, payload: preferences });
  }

  beforeEach(async () => {
    sessionStore = new InMemorySessionStore();
    generate = vi.fn(fakeReply);
    fastify = await build({ generate });
  });

  afterEach(async () => {
    await fastify.close();
    await sessionStore.close();
  });

  describe('GET /health', () => {
    it('reports the upstream and store', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', upstream: 'configured', sessionStore: 'memory' });
    });
  });

  describe('preferences', () => {
    it('stores answers and returns the summary', async () => {
      const response = await setPreferences();

      expect(response.statusCode).toBe(200);
      expect(response.json().summary).toBe(
        'Budget: ₹5,00,000 - ₹15,00,000 | Primary use: Daily commuting | Family size: 2 people | ' +
        'Fuel preference: Petrol | Key features: Advanced safety features'
      );

      const stored = await fastify.inject({ method: 'GET', url: `${BASE}/preferences` });
      expect(stored.json().preferences.budget_max).toBe(1500000);
    });

    it('rejects invalid answers with a validation payload', async () => {
      const response = await fastify.inject({
        method: 'PUT',
        url: `${BASE}/preferences`,
        payload: { ...preferences, important_features: [] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({ category: 'VALIDATION', code: 'VALIDATION_REQUEST_INVALID' });
    });

    it('reports missing preferences as not found', async () => {
      const response = await fastify.inject({ method: 'GET', url: `${BASE}/preferences` });
      expect(response.statusCode).toBe(404);
    });

    it('rejects a blank session id', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/v1/sessions/%20%20/preferences' });
      expect(response.statusCode).toBe(400);
    });
  });

  describe('recommendations', () => {
    it('requires preferences first', async () => {
      const response = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.message).toBe('Buyer preferences must be set before requesting recommendations');
    });

    it('generates, caches and refreshes', async () => {
      await setPreferences();

      const first = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });
      expect(first.statusCode).toBe(200);
      expect(first.json()).toMatchObject({ cached: false, source: 'json', confidence: 'high' });
      expect(first.json().records.map((record: { model: string }) => record.model)).toEqual(['Exter', 'City']);
      expect(first.json().scores).toHaveLength(2);
      expect(first.json().prices.map((bar: { tier: string }) => bar.tier)).toEqual(['budget', 'mid-range']);

      const second = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations`, payload: {} });
      expect(second.json().cached).toBe(true);
      expect(generate).toHaveBeenCalledTimes(1);

      const refreshed = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations`, payload: { refresh: true } });
      expect(refreshed.json().cached).toBe(false);
      expect(generate).toHaveBeenCalledTimes(2);
    });

    it('regenerates after the list is cleared', async () => {
      await setPreferences();
      await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });

      const cleared = await fastify.inject({ method: 'DELETE', url: `${BASE}/recommendations` });
      expect(cleared.statusCode).toBe(204);

      const again = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });
      expect(again.json().cached).toBe(false);
    });

    it('serves the catalog when no upstream is configured', async () => {
      await fastify.close();
      fastify = await build(null);
      await setPreferences();

      const response = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });

      expect(response.json()).toMatchObject({ source: 'fallback', confidence: 'static' });
      expect(response.json().records.map((record: { model: string }) => record.model)).toEqual(['Swift', 'City', 'Creta', 'Nexon']);
    });
  });

  describe('comparison', () => {
    beforeEach(async () => {
      await setPreferences();
      await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });
    });

    it('adds a recommendation once', async () => {
      const added = await fastify.inject({
        method: 'POST',
        url: `${BASE}/comparison`,
        payload: { brand: 'hyundai', model: 'exter' },
      });
      expect(added.json()).toEqual({ added: true, key: 'Hyundai Exter', count: 1 });

      const duplicate = await fastify.inject({
        method: 'POST',
        url: `${BASE}/comparison`,
        payload: { brand: 'Hyundai', model: 'Exter' },
      });
      expect(duplicate.json()).toEqual({ added: false, key: 'Hyundai Exter', count: 1 });
    });

    it('rejects cars that are not among the recommendations', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: `${BASE}/comparison`,
        payload: { brand: 'Kia', model: 'Sonet' },
      });
      expect(response.statusCode).toBe(404);
      expect(response.json().error.category).toBe('NOT_FOUND');
    });

    it('reports, removes and clears', async () => {
      await fastify.inject({ method: 'POST', url: `${BASE}/comparison`, payload: { brand: 'Hyundai', model: 'Exter' } });
      await fastify.inject({ method: 'POST', url: `${BASE}/comparison`, payload: { brand: 'Honda', model: 'City' } });

      const report = await fastify.inject({ method: 'GET', url: `${BASE}/comparison` });
      expect(report.json().count).toBe(2);
      expect(report.json().commonFeatures).toEqual(['Six airbags']);
      expect(report.json().highlights.mostSeniorFriendly.key).toBe('Honda City');
      expect(report.json().highlights.mostAffordable.key).toBe('Hyundai Exter');

      const removed = await fastify.inject({ method: 'DELETE', url: `${BASE}/comparison/${encodeURIComponent('Hyundai Exter')}` });
      expect(removed.json()).toEqual({ removed: 'Hyundai Exter', count: 1 });

      const missing = await fastify.inject({ method: 'DELETE', url: `${BASE}/comparison/${encodeURIComponent('Hyundai Exter')}` });
      expect(missing.statusCode).toBe(404);

      const cleared = await fastify.inject({ method: 'DELETE', url: `${BASE}/comparison` });
      expect(cleared.statusCode).toBe(204);
      expect((await fastify.inject({ method: 'GET', url: `${BASE}/comparison` })).json().count).toBe(0);
    });
  });

  describe('reviews', () => {
    it('searches the seeded reviews', async () => {
      const response = await fastify.inject({ method: 'GET', url: `${BASE}/reviews?sortBy=helpful&limit=2` });

      expect(response.statusCode).toBe(200);
      expect(response.json().count).toBe(2);
      expect(response.json().reviews.map((review: { car_model: string }) => review.car_model)).toEqual(['Innova Crysta', 'City']);
    });

    it('rejects an unknown sort order', async () => {
      const response = await fastify.inject({ method: 'GET', url: `${BASE}/reviews?sortBy=random` });
      expect(response.statusCode).toBe(400);
    });

    it('accepts a review and analyses its sentiment', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: `${BASE}/reviews`,
        payload: { car_brand: 'Tata', car_model: 'Punch', rating: 4, review_text: 'Easy to park.', pros_text: 'Light steering' },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json().review).toMatchObject({
        id: 6,
        reviewer_name: 'Anonymous Senior Buyer',
        pros: ['Light steering'],
        verified: false,
        date: NOW.toISOString(),
      });
      expect(response.json().sentiment).toEqual({ sentiment: 'positive', confidence: 0.8, analysis: 'Sentiment: positive' });

      const listed = await fastify.inject({ method: 'GET', url: `${BASE}/reviews?brand=Tata&model=Punch` });
      expect(listed.json().count).toBe(1);
    });

    it('counts helpful votes', async () => {
      const voted = await fastify.inject({ method: 'POST', url: `${BASE}/reviews/1/helpful` });
      expect(voted.json().review.helpful_votes).toBe(24);

      const again = await fastify.inject({ method: 'POST', url: `${BASE}/reviews/1/helpful` });
      expect(again.json().review.helpful_votes).toBe(25);

      const missing = await fastify.inject({ method: 'POST', url: `${BASE}/reviews/99/helpful` });
      expect(missing.statusCode).toBe(404);
    });

    it('summarizes ratings', async () => {
      const all = await fastify.inject({ method: 'GET', url: `${BASE}/reviews/analytics` });
      expect(all.json().summary.totalReviews).toBe(5);
      expect(all.json().brands).toHaveLength(5);
      expect(all.json().topCategory.category).toBe('Safety Features');
      expect(all.json().bottomCategory.category).toBe('Fuel Efficiency');

      const city = await fastify.inject({ method: 'GET', url: `${BASE}/reviews/analytics?brand=Honda&model=City` });
      expect(city.json().summary).toMatchObject({ overall: 4.8, totalReviews: 1 });

      const partial = await fastify.inject({ method: 'GET', url: `${BASE}/reviews/analytics?brand=Honda` });
      expect(partial.statusCode).toBe(400);
    });
  });

  describe('DELETE /v1/sessions/:sessionId', () => {
    it('drops everything stored for the session', async () => {
      await setPreferences();
      expect(sessionStore.size).toBe(1);

      const ended = await fastify.inject({ method: 'DELETE', url: BASE });
      expect(ended.statusCode).toBe(204);
      expect(sessionStore.size).toBe(0);

      const preferencesAfter = await fastify.inject({ method: 'GET', url: `${BASE}/preferences` });
      expect(preferencesAfter.statusCode).toBe(404);
    });
  });

  describe('chat', () => {
    it('replies and keeps the history', async () => {
      const first = await fastify.inject({ method: 'POST', url: `${BASE}/chat`, payload: { message: 'Which sedan?' } });
      expect(first.json()).toEqual({ reply: 'Consider the Honda City.', generated: true, exchanges: 1 });

      const second = await fastify.inject({ method: 'POST', url: `${BASE}/chat`, payload: { message: 'Why?' } });
      expect(second.json().exchanges).toBe(2);
      expect(generate.mock.calls[1][0].history).toEqual([{ user: 'Which sedan?', assistant: 'Consider the Honda City.' }]);

      const cleared = await fastify.inject({ method: 'DELETE', url: `${BASE}/chat` });
      expect(cleared.statusCode).toBe(204);
    });

    it('reports the error code when the upstream fails', async () => {
      generate.mockRejectedValue(new Error('connection reset'));

      const chat = await fastify.inject({ method: 'POST', url: `${BASE}/chat`, payload: { message: 'Hello' } });
      expect(chat.statusCode).toBe(200);
      expect(chat.json()).toMatchObject({ generated: false, errorCode: 'INTERNAL_ERROR', exchanges: 1 });

      await setPreferences();
      const recommendations = await fastify.inject({ method: 'POST', url: `${BASE}/recommendations` });
      expect(recommendations.json()).toMatchObject({ source: 'fallback', upstreamError: 'INTERNAL_ERROR' });
    });

    it('rejects empty and over-long messages', async () => {
      const empty = await fastify.inject({ method: 'POST', url: `${BASE}/chat`, payload: { message: '   ' } });
      expect(empty.statusCode).toBe(400);

      const long = await fastify.inject({ method: 'POST', url: `${BASE}/chat`, payload: { message: 'x'.repeat(51) } });
      expect(long.statusCode).toBe(400);
    });
  });
});
