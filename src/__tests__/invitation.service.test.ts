import { NotFoundError } from '../errors/app.errors';
import { InvitationService } from '../services/invitation.service';
import { INVITATION_CODE_PATTERN } from '../utils/invitation-code.util';
import type { AdminPrincipal } from '../types';
import {
  InMemoryAdminUserRepository,
  InMemoryEntityRepository,
  InMemoryInvitationRepository,
} from './helpers/fakes';

const NOW = new Date('2025-01-15T12:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

const superAdmin: AdminPrincipal = {
  id: 'f0000000-0000-4000-8000-000000000000',
  email: 'root@example.test',
  role: 'super_admin',
  entityType: null,
  entityId: null,
};

describe('InvitationService', () => {
  let invitations: InMemoryInvitationRepository;
  let now: Date;
  let service: InvitationService;

  beforeEach(() => {
    invitations = new InMemoryInvitationRepository(new InMemoryAdminUserRepository());
    const entities = new InMemoryEntityRepository()
      .add({ entityType: 'institution', entityId: 7 }, 'Lakeside College')
      .add({ entityType: 'scholarship', entityId: 3 }, 'River Valley Award');
    now = NOW;
    service = new InvitationService(invitations, entities, () => now);
  });

  it('creates a pending code for an existing entity', async () => {
    const view = await service.create(
      { entityType: 'scholarship', entityId: 3, assignedEmail: ' Invited@Example.test ', expiresInDays: 14 },
      superAdmin
    );

    expect(view.code).toMatch(INVITATION_CODE_PATTERN);
    expect(view).toMatchObject({
      entity_type: 'scholarship',
      entity_id: 3,
      assigned_email: 'invited@example.test',
      status: 'pending',
      expires_at: new Date(NOW.getTime() + 14 * DAY_MS).toISOString(),
      claimed_at: null,
    });
    expect(invitations.invitations[0].createdBy).toBe('root@example.test');
  });

  it('refuses codes for entities that do not exist', async () => {
    await expect(
      service.create({ entityType: 'institution', entityId: 404, expiresInDays: 30 }, superAdmin)
    ).rejects.toThrow(NotFoundError);
    expect(invitations.invitations).toHaveLength(0);
  });

  it('lists codes filtered by status', async () => {
    const first = await service.create({ entityType: 'institution', entityId: 7, expiresInDays: 30 }, superAdmin);
    await service.create({ entityType: 'institution', entityId: 7, expiresInDays: 30 }, superAdmin);
    await service.revoke(first.code, superAdmin);

    const pending = await service.list('pending', 50);
    const revoked = await service.list('revoked', 50);
    const all = await service.list(undefined, 50);

    expect(pending).toHaveLength(1);
    expect(revoked.map((invitation) => invitation.code)).toEqual([first.code]);
    expect(all).toHaveLength(2);
  });

  it('revokes only pending codes', async () => {
    const created = await service.create({ entityType: 'institution', entityId: 7, expiresInDays: 30 }, superAdmin);

    const revoked = await service.revoke(created.code.toLowerCase(), superAdmin);

    expect(revoked.status).toBe('revoked');
    await expect(service.revoke(created.code, superAdmin)).rejects.toThrow(NotFoundError);
  });

  it('expires pending codes past their expiry', async () => {
    await service.create({ entityType: 'institution', entityId: 7, expiresInDays: 1 }, superAdmin);
    await service.create({ entityType: 'institution', entityId: 7, expiresInDays: 30 }, superAdmin);

    now = new Date(NOW.getTime() + 2 * DAY_MS);
    const expired = await service.expireOverdue();

    expect(expired).toBe(1);
    expect(invitations.invitations.map((invitation) => invitation.status)).toEqual(['expired', 'pending']);
  });
});
