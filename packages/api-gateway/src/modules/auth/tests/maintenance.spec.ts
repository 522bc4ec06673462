import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { AuthorizationException } from '../../../common/exceptions/api.exceptions';
import { MaintenanceController } from '../controllers/maintenance.controller';
import { RolesGuard } from '../guards/roles.guard';
import { RoleSeederService } from '../services/role-seeder.service';
import { SessionSweeperService } from '../services/session-sweeper.service';
import { InMemoryIdentityDatabase, InMemoryUnitOfWork } from './support/in-memory-identity';

describe('RoleSeederService', () => {
  it('creates the fixed roles once', async () => {
    const db = new InMemoryIdentityDatabase();
    const seeder = new RoleSeederService(new InMemoryUnitOfWork(db));

    expect(await seeder.seed()).toBe(3);
    expect(await seeder.seed()).toBe(0);
    expect(db.tables.roles.map(role => role.name)).toEqual(['admin', 'careseeker', 'caregiver']);
  });

  it('fills in only the missing roles', async () => {
    const db = new InMemoryIdentityDatabase();
    await db.stores.roles.ensureSeeded(['admin']);

    await new RoleSeederService(new InMemoryUnitOfWork(db)).onApplicationBootstrap();

    expect(db.tables.roles.map(role => role.name)).toEqual(['admin', 'careseeker', 'caregiver']);
  });
});

describe('SessionSweeperService', () => {
  const NOW = new Date('2026-03-01T12:00:00Z');

  async function seed(db: InMemoryIdentityDatabase) {
    await db.stores.sessions.create({ userId: 'user-1', expiresAt: new Date('2026-03-01T11:59:59Z') });
    await db.stores.sessions.create({ userId: 'user-1', expiresAt: new Date('2026-03-31T12:00:00Z') });
    await db.stores.verificationCodes.replace({
      userId: 'user-1',
      intent: 'verify_email',
      value: '123456',
      token: 'stale-token',
      expiresAt: new Date('2026-03-01T11:45:00Z'),
    });
    await db.stores.verificationCodes.replace({
      userId: 'user-1',
      intent: 'forgot_password',
      value: '654321',
      token: 'live-token',
      expiresAt: new Date('2026-03-01T12:10:00Z'),
    });
  }

  it('removes only expired sessions and codes', async () => {
    const db = new InMemoryIdentityDatabase();
    await seed(db);
    const sweeper = new SessionSweeperService(new InMemoryUnitOfWork(db));

    expect(await sweeper.sweep(NOW)).toEqual({ sessions: 1, verificationCodes: 1 });
    expect(db.tables.sessions.map(session => session.expiresAt.toISOString())).toEqual([
      '2026-03-31T12:00:00.000Z',
    ]);
    expect(db.tables.verificationCodes.map(code => code.token)).toEqual(['live-token']);
  });

  it('logs instead of throwing when the scheduled sweep fails', async () => {
    const db = new InMemoryIdentityDatabase();
    jest.spyOn(db.stores.sessions, 'deleteExpired').mockRejectedValueOnce(new Error('db offline'));
    const sweeper = new SessionSweeperService(new InMemoryUnitOfWork(db));

    await expect(sweeper.handleCron()).resolves.toBeUndefined();
  });
});

describe('MaintenanceController', () => {
  let db: InMemoryIdentityDatabase;
  let controller: MaintenanceController;

  beforeEach(() => {
    db = new InMemoryIdentityDatabase();
    const unitOfWork = new InMemoryUnitOfWork(db);
    controller = new MaintenanceController(
      new SessionSweeperService(unitOfWork),
      new RoleSeederService(unitOfWork),
    );
  });

  function contextFor(handler: 'sweep' | 'seedRoles', roles: string[]) {
    const request = { headers: {}, principal: { userId: 'user-1', sessionId: 'session-1', roles } };
    return new ExecutionContextHost(
      [request, {}],
      MaintenanceController,
      MaintenanceController.prototype[handler],
    );
  }

  it('is reserved for admins', () => {
    const guard = new RolesGuard(new Reflector());

    expect(guard.canActivate(contextFor('sweep', ['admin']))).toBe(true);
    expect(() => guard.canActivate(contextFor('sweep', ['caregiver']))).toThrow(
      AuthorizationException,
    );
    expect(() => guard.canActivate(contextFor('seedRoles', ['careseeker']))).toThrow(
      AuthorizationException,
    );
  });

  it('sweeps expired records on demand', async () => {
    await db.stores.sessions.create({ userId: 'user-1', expiresAt: new Date('2000-01-01T00:00:00Z') });

    expect(await controller.sweep()).toEqual({ sessions: 1, verificationCodes: 0 });
    expect(db.tables.sessions).toHaveLength(0);
  });

  it('reports how many roles it seeded', async () => {
    expect(await controller.seedRoles()).toEqual({ created: 3 });
    expect(await controller.seedRoles()).toEqual({ created: 0 });
  });
});
