import type pg from 'pg';
import { PermissionDeniedError } from '../shared/errors.js';
import { isRole } from '../domain/status.js';
import type { Role, UserProfile } from '../domain/types.js';

/** Role lookup owned by the identity subsystem. */
export interface IdentityResolver {
  resolveRole(identityId: string): Promise<Role | null>;
}

export class InMemoryIdentityResolver implements IdentityResolver {
  private readonly roles: Map<string, Role>;

  constructor(profiles: UserProfile[] = []) {
    this.roles = new Map(profiles.map((p) => [p.id, p.role]));
  }

  assign(identityId: string, role: Role): void {
    this.roles.set(identityId, role);
  }

  async resolveRole(identityId: string): Promise<Role | null> {
    return this.roles.get(identityId) ?? null;
  }
}

export class PgIdentityResolver implements IdentityResolver {
  constructor(private readonly pool: pg.Pool) {}

  async resolveRole(identityId: string): Promise<Role | null> {
    const { rows } = await this.pool.query<{ role: unknown }>(
      'SELECT role FROM user_profiles WHERE user_id = $1',
      [identityId],
    );
    if (rows.length === 0) return null;
    const role = rows[0].role;
    return isRole(role) ? role : null;
  }
}

export async function resolveProfile(
  resolver: IdentityResolver,
  identityId: string,
): Promise<UserProfile> {
  const role = await resolver.resolveRole(identityId);
  if (!role) {
    throw new PermissionDeniedError(`Identity ${identityId} has no procurement role`, 'role');
  }
  return { id: identityId, role };
}
