import bcrypt from 'bcryptjs';
import type { StorageGateway } from '../../../lib/local-db/storage-gateway';
import { ValidationError } from '../../shared/errors';
import { USER_ROLES, normalizeUsername, type SaveUserInput, type User, type UserRole } from '../../shared/users';

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  display_name: string;
  role: string;
  created_at: string;
}

export interface UsersRepositoryOptions {
  bcryptRounds?: number;
}

const USER_COLUMNS = 'id, username, password_hash, display_name, role, created_at';

export const ADMIN_USERNAME = 'admin';

export class UsersRepository {
  private readonly bcryptRounds: number;

  constructor(
    private readonly storage: StorageGateway,
    options: UsersRepositoryOptions = {},
  ) {
    this.bcryptRounds = options.bcryptRounds ?? 10;
  }

  list(): User[] {
    return this.storage.db
      .prepare<[], UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY username ASC`)
      .all()
      .map(mapUserRow);
  }

  findByUsername(username: string): User | null {
    const normalized = normalizeUsername(username);
    if (!normalized) return null;
    const row = this.storage.db
      .prepare<[string], UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = ? LIMIT 1`)
      .get(normalized);
    return row ? mapUserRow(row) : null;
  }

  authenticate(username: string, password: string): User | null {
    const user = this.findByUsername(username);
    if (!user || !password) return null;
    return bcrypt.compareSync(password, user.passwordHash) ? user : null;
  }

  saveUser(input: SaveUserInput): User {
    const username = normalizeUsername(input.username);
    if (!username) throw new ValidationError('Username cannot be empty');

    const existing = this.findByUsername(username);
    const password = (input.password || '').trim();
    if (!password && !existing) {
      throw new ValidationError('Password cannot be empty for new user');
    }

    const passwordHash = password ? bcrypt.hashSync(password, this.bcryptRounds) : existing?.passwordHash;
    if (!passwordHash) throw new ValidationError('Password cannot be empty for new user');

    const params = {
      username,
      password_hash: passwordHash,
      display_name: input.displayName.trim() || username,
      role: input.role,
    };

    if (existing) {
      this.storage.db
        .prepare<typeof params>(`
          UPDATE users
          SET password_hash = @password_hash, display_name = @display_name, role = @role
          WHERE username = @username
        `)
        .run(params);
    } else {
      this.storage.db
        .prepare<typeof params & { created_at: string }>(`
          INSERT INTO users (username, password_hash, display_name, role, created_at)
          VALUES (@username, @password_hash, @display_name, @role, @created_at)
        `)
        .run({ ...params, created_at: new Date().toISOString() });
    }

    const saved = this.findByUsername(username);
    if (!saved) throw new ValidationError(`User could not be saved: ${username}`);
    return saved;
  }

  ensureAdminAccount(password: string): User {
    const existing = this.findByUsername(ADMIN_USERNAME);
    if (existing) return existing;
    return this.saveUser({
      username: ADMIN_USERNAME,
      displayName: 'Administrator',
      role: 'ADMIN',
      password,
    });
  }
}

/** Report scope for a user: admins see every sale, everyone else only their own. */
export function salesScopeFor(user: Pick<User, 'username' | 'role'>): string | null {
  return user.role === 'ADMIN' ? null : user.username;
}

function toUserRole(value: string): UserRole {
  return USER_ROLES.find((role) => role === value) ?? 'CASHIER';
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    displayName: row.display_name,
    role: toUserRole(row.role),
    createdAt: row.created_at,
  };
}
