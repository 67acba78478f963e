jest.mock('twilio', () => {
  const validateRequest = jest.fn().mockReturnValue(true);
  return Object.assign(
    jest.fn(() => ({ messages: { create: jest.fn() } })),
    { validateRequest }
  );
});

import crypto from 'crypto';
import request from 'supertest';
import twilio from 'twilio';
import { createApp } from '../../src/app';
import type { AppServices } from '../../src/container';
import { AnalyticsService } from '../../src/services/analytics.service';
import { BroadcastService } from '../../src/services/broadcast.service';
import { buildMessage, ChatHistoryService } from '../../src/services/chat-history.service';
import { ConversationService } from '../../src/services/conversation.service';
import { createHandlerRegistry } from '../../src/services/handlers';
import { IdentityService } from '../../src/services/identity.service';
import { IntentRouterService } from '../../src/services/intent-router.service';
import { ReferralService } from '../../src/services/referral.service';
import { InMemoryStore } from '../helpers/memoryStore';
import { FakeChannel, makeCustomer, ScriptedModel } from '../helpers/fakes';

const PHONE = '15550001234';
const API_KEY = 'test-key';

function sign(body: string, secret: string = 'test-secret'): string {
  return `sha256=${crypto.createHmac('sha256', secret).update(body).digest('hex')}`;
}

function buildTestServices() {
  const store = new InMemoryStore();
  const channel = new FakeChannel();
  const model = new ScriptedModel();
  const broadcast = new BroadcastService();
  const noProfile = { lookupByPhone: jest.fn().mockResolvedValue(null) };
  const health = jest.fn().mockResolvedValue({ database: { status: 'healthy' }, queue: { status: 'healthy' } });

  const conversation = new ConversationService({
    channel,
    identity: new IdentityService(store, noProfile, noProfile),
    referrals: new ReferralService(
      store,
      { isActive: jest.fn().mockResolvedValue(true) },
      { dispatch: jest.fn().mockResolvedValue(undefined) },
      { botNumber: '15550001111', brandName: 'Test Shop', defaultCampaignCode: 'WELC' },
      () => 0
    ),
    router: new IntentRouterService(model),
    handlers: createHandlerRegistry(model, { search: jest.fn() }, store),
    history: new ChatHistoryService(store),
    broadcast,
    customers: store,
    historyWindow: 10,
  });

  const services: AppServices = {
    conversation,
    customers: store,
    analytics: new AnalyticsService(store, { highValueThreshold: 10000 }),
    channel,
    broadcast,
    health,
  };
  return { services, store, channel, model, health };
}

function addSecondaryCustomers(store: InMemoryStore): void {
  store.customers.set(
    '15550002222',
    makeCustomer({
      phone_number: '15550002222',
      customer_name: 'Bo Chen',
      email: 'bo@example.com',
      company_name: 'Chen Traders',
      customer_type: 'business',
      total_spend: 25000,
      escalation_status: true,
    })
  );
  store.customers.set(
    '15550003333',
    makeCustomer({
      phone_number: '15550003333',
      customer_name: 'Cy Diaz',
      email: 'cy@example.com',
      company_name: null,
      total_spend: 12000,
      is_active: false,
    })
  );
}

describe('HTTP API', () => {
  let ctx: ReturnType<typeof buildTestServices>;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    ctx = buildTestServices();
    app = createApp(ctx.services);
  });

  describe('health', () => {
    it('GET /health returns ok without an API key', async () => {
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
    });

    it('GET /api/admin/health reports dependency checks', async () => {
      const res = await request(app).get('/api/admin/health');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'healthy', database: { status: 'healthy' } });
    });

    it('GET /api/admin/health returns 503 when a dependency is down', async () => {
      ctx.health.mockResolvedValueOnce({
        database: { status: 'unhealthy', error: 'connection refused' },
        queue: { status: 'healthy' },
      });

      const res = await request(app).get('/api/admin/health');

      expect(res.status).toBe(503);
      expect(res.body.status).toBe('degraded');
    });
  });

  describe('API key auth', () => {
    it('rejects a missing key with 401', async () => {
      const res = await request(app).get('/api/customers');
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ success: false, error: 'Missing API key' });
    });

    it('rejects an unknown key with 403', async () => {
      const res = await request(app).get('/api/customers').set('x-api-key', 'wrong-key');
      expect(res.status).toBe(403);
    });
  });

  describe('customers', () => {
    beforeEach(() => {
      ctx.store.customers.set(PHONE, makeCustomer());
    });

    it('lists and fetches customers', async () => {
      const list = await request(app).get('/api/customers?customer_type=consumer').set('x-api-key', API_KEY);
      expect(list.status).toBe(200);
      expect(list.body.count).toBe(1);

      const one = await request(app).get(`/api/customers/${PHONE}`).set('x-api-key', API_KEY);
      expect(one.body.customer.customer_name).toBe('Ana Lopez');
    });

    it('returns 404 for an unknown customer', async () => {
      const res = await request(app).get('/api/customers/15559999999').set('x-api-key', API_KEY);
      expect(res.status).toBe(404);
      expect(res.body.error).toBe('Customer 15559999999 not found');
    });

    it('rejects an invalid phone number', async () => {
      const res = await request(app).get('/api/customers/not-a-phone').set('x-api-key', API_KEY);
      expect(res.status).toBe(400);
      expect(res.body.error).toBe('input: phone must be 6-15 digits');
    });

    it('updates allowed fields', async () => {
      const res = await request(app)
        .put(`/api/customers/${PHONE}`)
        .set('x-api-key', API_KEY)
        .send({ company_name: 'Lopez Design', tags: ['vip'] });

      expect(res.status).toBe(200);
      expect(ctx.store.customers.get(PHONE)).toMatchObject({ company_name: 'Lopez Design', tags: ['vip'] });
    });

    it('refuses to change the escalation flag through an update', async () => {
      const res = await request(app)
        .put(`/api/customers/${PHONE}`)
        .set('x-api-key', API_KEY)
        .send({ escalation_status: true });

      expect(res.status).toBe(400);
      expect(ctx.store.customers.get(PHONE)?.escalation_status).toBe(false);
    });

    it('escalates and de-escalates', async () => {
      const up = await request(app).post(`/api/customers/${PHONE}/escalate`).set('x-api-key', API_KEY);
      expect(up.body).toEqual({ success: true, phone_number: PHONE, escalation_status: true });
      expect(ctx.store.customers.get(PHONE)?.escalation_status).toBe(true);

      await request(app).post(`/api/customers/${PHONE}/de-escalate`).set('x-api-key', API_KEY);
      expect(ctx.store.customers.get(PHONE)?.escalation_status).toBe(false);
    });

    describe('search and high-value lists', () => {
      beforeEach(() => {
        addSecondaryCustomers(ctx.store);
      });

      it('searches name, company and email case-insensitively', async () => {
        const res = await request(app).get('/api/customers/search?q=CHEN').set('x-api-key', API_KEY);

        expect(res.status).toBe(200);
        expect(res.body.total).toBe(1);
        expect(res.body.query).toBe('CHEN');
        expect(res.body.customers.map((c: { phone_number: string }) => c.phone_number)).toEqual(['15550002222']);
      });

      it('reports the full match count when the list is cut by limit', async () => {
        const res = await request(app).get('/api/customers/search?q=example.com&limit=2').set('x-api-key', API_KEY);

        expect(res.body.total).toBe(3);
        expect(res.body.customers).toHaveLength(2);
      });

      it('requires a search term', async () => {
        const res = await request(app).get('/api/customers/search?q=').set('x-api-key', API_KEY);

        expect(res.status).toBe(400);
        expect(res.body.error).toBe('q: q is required');
      });

      it('lists high-value customers by spend with the default threshold', async () => {
        const res = await request(app).get('/api/customers/high-value').set('x-api-key', API_KEY);

        expect(res.status).toBe(200);
        expect(res.body.min_spend_threshold).toBe(10000);
        expect(res.body.total).toBe(2);
        expect(res.body.customers.map((c: { phone_number: string }) => c.phone_number)).toEqual([
          '15550002222',
          '15550003333',
        ]);
      });

      it('applies a custom spend threshold', async () => {
        const res = await request(app).get('/api/customers/high-value?min_spend=20000').set('x-api-key', API_KEY);

        expect(res.body).toMatchObject({ total: 1, min_spend_threshold: 20000 });
        expect(res.body.customers[0].customer_name).toBe('Bo Chen');
      });
    });
  });

  describe('analytics', () => {
    beforeEach(() => {
      ctx.store.customers.set(PHONE, makeCustomer());
      addSecondaryCustomers(ctx.store);
    });

    it('summarises the dashboard', async () => {
      const res = await request(app).get('/api/analytics/dashboard').set('x-api-key', API_KEY);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        total_customers: 3,
        active_customers: 2,
        escalated_customers: 1,
        total_revenue: 37000,
        avg_customer_value: 12333.33,
        customer_breakdown: { business: 1, consumer: 2 },
        escalation_rate: 33.33,
      });
    });

    it('breaks customers down by activity, type and spend', async () => {
      const res = await request(app).get('/api/analytics/customers/stats').set('x-api-key', API_KEY);

      expect(res.body).toEqual({
        success: true,
        total: 3,
        active: 2,
        inactive: 1,
        escalated: 1,
        by_type: { business: 1, consumer: 2 },
        spend_analysis: {
          total_spend: 37000,
          avg_spend: 12333.33,
          high_value_customers: 2,
          high_value_threshold: 10000,
        },
      });
    });

    it('lists escalated customers with the escalation rate', async () => {
      const res = await request(app).get('/api/analytics/escalations').set('x-api-key', API_KEY);

      expect(res.body).toEqual({
        success: true,
        total_escalations: 1,
        escalation_rate: 33.33,
        escalated_by_type: { business: 1, consumer: 0 },
        escalated_customers: [
          { phone_number: '15550002222', customer_name: 'Bo Chen', customer_type: 'business', total_spend: 25000 },
        ],
      });
    });

    it('counts conversations and message kinds', async () => {
      ctx.store.histories.set(PHONE, [
        buildMessage('Hi', 'customer'),
        buildMessage('![Image](https://cdn.example.com/a.jpg)', 'customer'),
      ]);
      ctx.store.histories.set('15550002222', [buildMessage('Hello', 'agent')]);

      const res = await request(app).get('/api/analytics/messages/stats').set('x-api-key', API_KEY);

      expect(res.body).toEqual({
        success: true,
        total_conversations: 2,
        total_messages: 3,
        avg_messages_per_conversation: 1.5,
        message_types: { text: 2, image: 1, audio: 0, document: 0 },
      });
    });

    it('combines customer stats, message stats and top spenders', async () => {
      const res = await request(app).get('/api/analytics/overview').set('x-api-key', API_KEY);

      expect(res.status).toBe(200);
      expect(res.body.customer_stats).toEqual({
        total_customers: 3,
        active_customers: 2,
        escalated_customers: 1,
        business_customers: 1,
        consumer_customers: 2,
        avg_total_spend: 12333.33,
      });
      expect(res.body.message_stats).toEqual({
        total_conversations: 0,
        total_messages: 0,
        avg_messages_per_conversation: 0,
        message_types: { text: 0, image: 0, audio: 0, document: 0 },
      });
      expect(res.body.top_customers_by_spend.map((c: { total_spend: number }) => c.total_spend)).toEqual([
        25000, 12000, 0,
      ]);
    });

    it('requires an API key', async () => {
      const res = await request(app).get('/api/analytics/dashboard');
      expect(res.status).toBe(401);
    });
  });

  describe('chats', () => {
    it('returns 404 when there is no history', async () => {
      const res = await request(app).get(`/api/chats/${PHONE}`).set('x-api-key', API_KEY);
      expect(res.status).toBe(404);
    });

    it('sends a representative message and pages it back', async () => {
      const sent = await request(app)
        .post(`/api/chats/${PHONE}/send`)
        .set('x-api-key', API_KEY)
        .send({ content: 'Your parcel left the warehouse' });

      expect(sent.status).toBe(201);
      expect(sent.body.message).toMatchObject({ content: 'Your parcel left the warehouse', sender: 'representative' });
      expect(ctx.channel.sent).toEqual([{ to: PHONE, text: 'Your parcel left the warehouse' }]);

      const page = await request(app).get(`/api/chats/${PHONE}?page=1&messages_count=10`).set('x-api-key', API_KEY);
      expect(page.status).toBe(200);
      expect(page.body.total_messages).toBe(1);
      expect(page.body.pagination).toEqual({
        current_page: 1,
        total_pages: 1,
        messages_per_page: 10,
        has_next: false,
        has_previous: false,
      });
    });

    it('sends media', async () => {
      const res = await request(app)
        .post(`/api/chats/${PHONE}/send-media`)
        .set('x-api-key', API_KEY)
        .send({ kind: 'document', url: 'https://cdn.example.com/invoice.pdf', caption: 'Invoice' });

      expect(res.status).toBe(201);
      expect(res.body.message).toMatchObject({
        content: '[Invoice](https://cdn.example.com/invoice.pdf)',
        message_type: 'document',
      });
    });

    it('maps provider failures to 502', async () => {
      ctx.channel.failSends = true;

      const res = await request(app)
        .post(`/api/chats/${PHONE}/send`)
        .set('x-api-key', API_KEY)
        .send({ content: 'Hello' });

      expect(res.status).toBe(502);
      expect(res.body).toEqual({ success: false, error: 'Messaging provider error' });
    });

    it('rejects an empty message', async () => {
      const res = await request(app).post(`/api/chats/${PHONE}/send`).set('x-api-key', API_KEY).send({ content: '' });
      expect(res.status).toBe(400);
    });
  });

  describe('referrals', () => {
    it('returns an invite for the customer', async () => {
      ctx.store.customers.set(PHONE, makeCustomer());

      const res = await request(app).post(`/api/referrals/${PHONE}/invite`).set('x-api-key', API_KEY);

      expect(res.status).toBe(200);
      expect(res.body.phone_number).toBe(PHONE);
      expect(res.body.invite).toContain('https://wa.me/15550001111/?text=');
      expect(ctx.store.referrals.get('AAAAAA')?.referrer_phone).toBe(PHONE);
    });
  });

  describe('WhatsApp Cloud webhook', () => {
    it('echoes the challenge for a valid verify token', async () => {
      const res = await request(app).get(
        '/webhook?hub.mode=subscribe&hub.verify_token=test-verify-token&hub.challenge=12345'
      );
      expect(res.status).toBe(200);
      expect(res.text).toBe('12345');
    });

    it('rejects a wrong verify token', async () => {
      const res = await request(app).get('/webhook?hub.mode=subscribe&hub.verify_token=nope&hub.challenge=12345');
      expect(res.status).toBe(403);
      expect(res.text).toBe('Invalid verification');
    });

    it('processes a signed message and replies on the channel', async () => {
      ctx.store.customers.set(PHONE, makeCustomer());
      ctx.model.structured.push({ intent: 'greeting' });
      const body = JSON.stringify({ from: PHONE, text: 'Hi' });

      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Hub-Signature-256', sign(body))
        .send(body);

      expect(res.status).toBe(200);
      expect(res.text).toBe('EVENT_RECEIVED');
      expect(ctx.channel.sent).toEqual([{ to: PHONE, text: 'Hello from the bot' }]);
    });

    it('acknowledges even when processing fails', async () => {
      ctx.store.customers.set(PHONE, makeCustomer());
      const body = JSON.stringify({ from: PHONE, text: 'Hi' });

      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Hub-Signature-256', sign(body))
        .send(body);

      expect(res.status).toBe(200);
      expect(ctx.channel.sent).toEqual([]);
    });

    it('rejects a bad signature', async () => {
      const body = JSON.stringify({ from: PHONE, text: 'Hi' });

      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Hub-Signature-256', sign(body, 'other-secret'))
        .send(body);

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'Invalid signature' });
      expect(ctx.store.histories.size).toBe(0);
    });

    it('rejects a missing signature', async () => {
      const res = await request(app).post('/webhook').send({ from: PHONE, text: 'Hi' });
      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: 'Missing signature' });
    });
  });

  describe('Twilio webhook', () => {
    it('returns empty TwiML for a validated request', async () => {
      const res = await request(app)
        .post('/webhook/twilio')
        .set('X-Twilio-Signature', 'test-signature')
        .type('form')
        .send({ From: `whatsapp:+${PHONE}`, Body: 'Hi' });

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toContain('text/xml');
      expect(res.text).toBe('<Response></Response>');
      expect(twilio.validateRequest).toHaveBeenCalledWith(
        'test-token',
        'test-signature',
        'http://localhost:3000/webhook/twilio',
        { From: `whatsapp:+${PHONE}`, Body: 'Hi' }
      );
    });

    it('rejects an unsigned request', async () => {
      const res = await request(app).post('/webhook/twilio').type('form').send({ From: `whatsapp:+${PHONE}` });
      expect(res.status).toBe(403);
    });
  });
});
