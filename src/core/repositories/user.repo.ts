import type { UserContact, UserDirectory } from '@core/interfaces/index.js';

import type { Queryable } from '@infra/database/pg.client.js';

export class UserRepository implements UserDirectory {
  constructor(private readonly db: Queryable) {}

  async getContact(userId: string): Promise<UserContact | null> {
    const res = await this.db.query<{ id: string; email: string; full_name: string }>(
      'SELECT id, email, full_name FROM users WHERE id = $1',
      [userId],
    );
    const row = res.rows[0];
    return row ? { id: row.id, email: row.email, fullName: row.full_name } : null;
  }
}
