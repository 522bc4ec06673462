import { and, eq, inArray } from 'drizzle-orm';
import { DbExecutor } from '../../../database/services/drizzle.service';
import { roles, userToRole } from '../../../db/schema';
import { RoleStore } from '../interfaces/identity-stores.interface';
import { Role } from '../interfaces/identity.types';

export class RolesRepository implements RoleStore {
  constructor(private readonly db: DbExecutor) {}

  async findByName(name: string): Promise<Role | null> {
    const [role] = await this.db.select().from(roles).where(eq(roles.name, name)).limit(1);
    return role ?? null;
  }

  async findByNames(names: readonly string[]): Promise<Role[]> {
    if (names.length === 0) {
      return [];
    }
    return this.db
      .select()
      .from(roles)
      .where(inArray(roles.name, [...names]));
  }

  async ensureSeeded(names: readonly string[]): Promise<number> {
    if (names.length === 0) {
      return 0;
    }
    const created = await this.db
      .insert(roles)
      .values(names.map(name => ({ name })))
      .onConflictDoNothing({ target: roles.name })
      .returning({ id: roles.id });
    return created.length;
  }

  async addUserRole(userId: string, roleId: string): Promise<void> {
    await this.db.insert(userToRole).values({ userId, roleId }).onConflictDoNothing();
  }

  async userHasRole(userId: string, roleId: string): Promise<boolean> {
    const rows = await this.db
      .select({ roleId: userToRole.roleId })
      .from(userToRole)
      .where(and(eq(userToRole.userId, userId), eq(userToRole.roleId, roleId)))
      .limit(1);
    return rows.length > 0;
  }

  async listRoleNames(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ name: roles.name })
      .from(userToRole)
      .innerJoin(roles, eq(userToRole.roleId, roles.id))
      .where(eq(userToRole.userId, userId));
    return rows.map(row => row.name);
  }
}
