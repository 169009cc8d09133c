import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app';
import type { RateLimitSettings } from '../middleware/rate-limit.middleware';
import { MemoryCounterStore } from '../services/rate-limit.service';
import { AuthService } from '../services/auth.service';
import { InvitationService } from '../services/invitation.service';
import { SubscriptionService } from '../services/subscription.service';
import { WebhookService } from '../services/webhook.service';
import { issueAccessToken } from '../utils/jwt.util';
import { hashPassword } from '../utils/password.util';
import type { AdminUser } from '../types';
import {
  FakeBillingGateway,
  InMemoryAdminUserRepository,
  InMemoryEntityRepository,
  InMemoryInvitationRepository,
  InMemorySubscriptionRepository,
} from './helpers/fakes';
import { checkoutCompleted, signEvent } from './helpers/stripe-events';

const LOGIN = '/api/v1/admin/auth/login';
const ME = '/api/v1/admin/auth/me';

function rateLimit(overrides: Partial<RateLimitSettings> = {}): RateLimitSettings {
  return {
    enabled: true,
    windowMs: 60_000,
    limits: { auth: 100, public: 100, admin: 100, webhooks: 100 },
    store: new MemoryCounterStore(),
    ...overrides,
  };
}

describe('HTTP API', () => {
  let users: InMemoryAdminUserRepository;
  let invitations: InMemoryInvitationRepository;
  let subscriptions: InMemorySubscriptionRepository;
  let databaseOk: boolean;
  let admin: AdminUser;
  let superAdmin: AdminUser;

  function buildApp(settings: RateLimitSettings = rateLimit()): Express {
    const entities = new InMemoryEntityRepository().add(
      { entityType: 'institution', entityId: 7 },
      'Lakeside College'
    );
    return createApp(
      {
        authService: new AuthService(users, invitations, entities),
        invitationService: new InvitationService(invitations, entities),
        subscriptionService: new SubscriptionService(subscriptions, entities, new FakeBillingGateway()),
        webhookService: new WebhookService(subscriptions),
        checkDatabase: async () => databaseOk,
      },
      { rateLimit: settings, cronSecret: 'test-cron-secret' }
    );
  }

  beforeEach(async () => {
    users = new InMemoryAdminUserRepository();
    invitations = new InMemoryInvitationRepository(users);
    subscriptions = new InMemorySubscriptionRepository();
    databaseOk = true;
    admin = await users.create({
      email: 'admin@example.test',
      passwordHash: await hashPassword('correct-password'),
      entityType: 'institution',
      entityId: 7,
      role: 'admin',
    });
    superAdmin = await users.create({
      email: 'root@example.test',
      passwordHash: await hashPassword('root-password'),
      entityType: null,
      entityId: null,
      role: 'super_admin',
    });
  });

  describe('health', () => {
    it('reports ok when the database answers', async () => {
      const response = await request(buildApp()).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: 'ok', database: 'connected', environment: 'test' });
    });

    it('reports degraded when the database does not', async () => {
      databaseOk = false;

      const response = await request(buildApp()).get('/health');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({ status: 'degraded', database: 'disconnected' });
    });
  });

  describe('login', () => {
    it('accepts the OAuth2 password form', async () => {
      const response = await request(buildApp())
        .post(LOGIN)
        .type('form')
        .send({ username: 'admin@example.test', password: 'correct-password' });

      expect(response.status).toBe(200);
      expect(response.body.token_type).toBe('bearer');
      expect(typeof response.body.access_token).toBe('string');
    });

    it('accepts a JSON body with an email field', async () => {
      const response = await request(buildApp())
        .post(LOGIN)
        .send({ email: 'admin@example.test', password: 'correct-password' });

      expect(response.status).toBe(200);
    });

    it('answers an unknown email and a wrong password identically', async () => {
      const app = buildApp();

      const unknownEmail = await request(app)
        .post(LOGIN)
        .type('form')
        .send({ username: 'nobody@example.test', password: 'correct-password' });
      const wrongPassword = await request(app)
        .post(LOGIN)
        .type('form')
        .send({ username: 'admin@example.test', password: 'wrong-password' });

      expect(unknownEmail.status).toBe(401);
      expect(unknownEmail.headers['www-authenticate']).toBe('Bearer');
      expect(unknownEmail.body).toEqual({ success: false, error: 'Incorrect email or password' });
      expect(wrongPassword.status).toBe(unknownEmail.status);
      expect(wrongPassword.body).toEqual(unknownEmail.body);
    });

    it('answers 403 for a deactivated account', async () => {
      admin.isActive = false;

      const response = await request(buildApp())
        .post(LOGIN)
        .type('form')
        .send({ username: 'admin@example.test', password: 'correct-password' });

      expect(response.status).toBe(403);
      expect(response.body).toEqual({ success: false, error: 'Account is deactivated' });
    });

    it('rejects a form without a password', async () => {
      const response = await request(buildApp())
        .post(LOGIN)
        .type('form')
        .send({ username: 'admin@example.test' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Validation failed');
    });
  });

  describe('bearer authentication', () => {
    it('requires a token', async () => {
      const response = await request(buildApp()).get(ME);

      expect(response.status).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer');
      expect(response.body).toEqual({ success: false, error: 'Not authenticated' });
    });

    it('rejects a token it cannot verify', async () => {
      const response = await request(buildApp()).get(ME).set('Authorization', 'Bearer not-a-jwt');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ success: false, error: 'Could not validate credentials' });
    });

    it('rejects an expired token', async () => {
      const token = issueAccessToken(admin, { now: Date.now() - 31 * 60 * 1000 });

      const response = await request(buildApp()).get(ME).set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ success: false, error: 'Token expired' });
    });

    it('returns the current admin for a valid token', async () => {
      const token = issueAccessToken(admin);

      const response = await request(buildApp()).get(ME).set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        id: admin.id,
        email: 'admin@example.test',
        entity_type: 'institution',
        entity_id: 7,
        role: 'admin',
      });
    });
  });

  describe('super admin routes', () => {
    it('forbids regular admins', async () => {
      const token = issueAccessToken(admin);

      const response = await request(buildApp())
        .post('/api/v1/admin/auth/invitations')
        .set('Authorization', `Bearer ${token}`)
        .send({ entity_type: 'institution', entity_id: 7 });

      expect(response.status).toBe(403);
      expect(response.body).toEqual({ success: false, error: 'Insufficient permissions' });
    });

    it('lets a super admin invite, and the invitee register', async () => {
      const app = buildApp();
      const token = issueAccessToken(superAdmin);

      const created = await request(app)
        .post('/api/v1/admin/auth/invitations')
        .set('Authorization', `Bearer ${token}`)
        .send({ entity_type: 'institution', entity_id: 7, assigned_email: 'invitee@example.test' });
      const registered = await request(app)
        .post('/api/v1/admin/auth/register')
        .send({ email: 'invitee@example.test', password: 'a-long-password', invitation_code: created.body.code });
      const reused = await request(app)
        .post('/api/v1/admin/auth/register')
        .send({ email: 'invitee@example.test', password: 'a-long-password', invitation_code: created.body.code });

      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ status: 'pending', entity_type: 'institution', entity_id: 7 });
      expect(registered.status).toBe(201);
      expect(registered.body).toMatchObject({ email: 'invitee@example.test', role: 'admin' });
      expect(reused.status).toBe(400);
      expect(reused.body).toEqual({ success: false, error: 'Invalid or already used invitation code' });
    });

    it('deactivates an admin', async () => {
      const token = issueAccessToken(superAdmin);

      const response = await request(buildApp())
        .post(`/api/v1/admin/auth/users/${admin.id}/deactivate`)
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.is_active).toBe(false);
    });
  });

  describe('rate limiting', () => {
    it('rejects the request after the limit with 429', async () => {
      const app = buildApp(rateLimit({ limits: { auth: 2, public: 100, admin: 100, webhooks: 100 } }));
      const attempt = () =>
        request(app).post(LOGIN).type('form').send({ username: 'admin@example.test', password: 'wrong-password' });

      expect((await attempt()).status).toBe(401);
      expect((await attempt()).status).toBe(401);
      const limited = await attempt();

      expect(limited.status).toBe(429);
      expect(limited.body).toEqual({ success: false, error: 'Too many requests, please try again later.' });
    });

    it('does not limit when disabled', async () => {
      const app = buildApp(
        rateLimit({ enabled: false, limits: { auth: 1, public: 1, admin: 1, webhooks: 1 } })
      );

      for (let i = 0; i < 3; i++) {
        expect((await request(app).get('/health')).status).toBe(200);
      }
    });
  });

  describe('stripe webhook', () => {
    const WEBHOOK = '/api/v1/webhooks/stripe';

    it('rejects an unsigned body', async () => {
      const { payload } = signEvent(checkoutCompleted('evt_http_1', 1_700_000_000));

      const response = await request(buildApp())
        .post(WEBHOOK)
        .set('Content-Type', 'application/json')
        .send(payload);

      expect(response.status).toBe(400);
      expect(subscriptions.subscriptions).toHaveLength(0);
    });

    it('rejects a mis-signed body', async () => {
      const { payload } = signEvent(checkoutCompleted('evt_http_1', 1_700_000_000));

      const response = await request(buildApp())
        .post(WEBHOOK)
        .set('Content-Type', 'application/json')
        .set('Stripe-Signature', 't=1700000000,v1=deadbeef')
        .send(payload);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, error: 'Webhook signature verification failed' });
      expect(subscriptions.subscriptions).toHaveLength(0);
    });

    it('acknowledges a signed event and reports a replay as duplicate', async () => {
      const app = buildApp();
      const { payload, signature } = signEvent(checkoutCompleted('evt_http_1', 1_700_000_000));
      const deliver = () =>
        request(app)
          .post(WEBHOOK)
          .set('Content-Type', 'application/json')
          .set('Stripe-Signature', signature)
          .send(payload);

      const first = await deliver();
      const second = await deliver();

      expect(first.status).toBe(200);
      expect(first.body).toEqual({ received: true, outcome: 'applied' });
      expect(second.body).toEqual({ received: true, outcome: 'duplicate' });
      expect(subscriptions.subscriptions).toHaveLength(1);
    });

    it('answers 500 when the write fails so the event is redelivered', async () => {
      subscriptions.failWrites = true;
      const { payload, signature } = signEvent(checkoutCompleted('evt_http_2', 1_700_000_000));

      const response = await request(buildApp())
        .post(WEBHOOK)
        .set('Content-Type', 'application/json')
        .set('Stripe-Signature', signature)
        .send(payload);

      expect(response.status).toBe(500);
    });
  });

  describe('subscriptions', () => {
    it('returns the free tier for an entity without a subscription', async () => {
      const token = issueAccessToken(admin);

      const response = await request(buildApp())
        .get('/api/v1/admin/subscriptions/current')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'none', plan_tier: 'free', message: 'No active subscription' });
    });

    it('maps a missing subscription on cancel to 404', async () => {
      const token = issueAccessToken(admin);

      const response = await request(buildApp())
        .post('/api/v1/admin/subscriptions/cancel')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, error: 'No active subscription found' });
    });
  });

  describe('cron', () => {
    it('rejects calls without the cron secret', async () => {
      const response = await request(buildApp())
        .post('/api/v1/cron/expire-invitations')
        .set('Authorization', 'Bearer wrong-secret');

      expect(response.status).toBe(401);
    });

    it('expires overdue invitations', async () => {
      await invitations.create({
        code: 'ABC-DEF-GHJ-KLM',
        entityType: 'institution',
        entityId: 7,
        assignedEmail: null,
        expiresAt: new Date(Date.now() - 1000),
        createdBy: 'root@example.test',
      });

      const response = await request(buildApp())
        .post('/api/v1/cron/expire-invitations')
        .set('Authorization', 'Bearer test-cron-secret');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, expired: 1 });
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await request(buildApp()).get('/api/v1/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'Route GET /api/v1/nope not found' });
  });

  it('answers malformed JSON with 400', async () => {
    const response = await request(buildApp())
      .post('/api/v1/admin/auth/register')
      .set('Content-Type', 'application/json')
      .send('{"email":');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ success: false, error: 'Invalid request body' });
  });
});
