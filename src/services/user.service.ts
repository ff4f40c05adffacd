/**
 * User persistence. Emails are normalized to lower-case before they reach the store.
 */
import { v4 as uuidv4 } from 'uuid';
import { isUniqueViolation, type Queryable } from '../db/client';
import { toIso, toText, toTextOrNull } from '../db/rows';
import { HttpError, InfrastructureError } from './errors';
import type { PublicUser, User, UserRole } from '../types';

export interface UserCreate {
  name: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  profileImageUrl?: string | null;
}

export interface UserRepository {
  create(input: UserCreate): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  updatePasswordHash(id: string, passwordHash: string): Promise<User | null>;
  updateProfileImage(id: string, url: string): Promise<User | null>;
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _omit, ...rest } = user;
  return rest;
}

function emailTaken(): HttpError {
  return new HttpError(409, 'EMAIL_TAKEN', 'User with this email already exists');
}

type UserRow = {
  id: string;
  name: unknown;
  email: unknown;
  password_hash: unknown;
  role: unknown;
  profile_image_url: unknown;
  created_at: unknown;
  updated_at: unknown;
};

const COLUMNS = 'id, name, email, password_hash, role, profile_image_url, created_at, updated_at';

function toUser(row: UserRow): User {
  const role = row.role === 'admin' ? 'admin' : row.role === 'user' ? 'user' : null;
  if (!role) throw new InfrastructureError('Column users.role holds an unknown role');
  return {
    id: row.id,
    name: toText(row.name, 'users.name'),
    email: toText(row.email, 'users.email'),
    passwordHash: toText(row.password_hash, 'users.password_hash'),
    role,
    profileImageUrl: toTextOrNull(row.profile_image_url, 'users.profile_image_url'),
    createdAt: toIso(row.created_at, 'users.created_at'),
    updatedAt: toIso(row.updated_at, 'users.updated_at'),
  };
}

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: UserCreate): Promise<User> {
    try {
      const { rows } = await this.db.query<UserRow>(
        `INSERT INTO users (id, name, email, password_hash, role, profile_image_url, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, NOW(), NOW())
         RETURNING ${COLUMNS}`,
        [uuidv4(), input.name, input.email.toLowerCase(), input.passwordHash, input.role, input.profileImageUrl ?? null]
      );
      return toUser(rows[0]);
    } catch (e) {
      if (isUniqueViolation(e)) throw emailTaken();
      throw e;
    }
  }

  async findById(id: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = $1`, [id]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE email = $1 LIMIT 1`, [
      email.toLowerCase(),
    ]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      `UPDATE users SET password_hash = $2, updated_at = NOW() WHERE id = $1 RETURNING ${COLUMNS}`,
      [id, passwordHash]
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async updateProfileImage(id: string, url: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      `UPDATE users SET profile_image_url = $2, updated_at = NOW() WHERE id = $1 RETURNING ${COLUMNS}`,
      [id, url]
    );
    return rows[0] ? toUser(rows[0]) : null;
  }
}

export class MemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, User>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(input: UserCreate): Promise<User> {
    const email = input.email.toLowerCase();
    if (this.lookupEmail(email)) throw emailTaken();
    const ts = this.now().toISOString();
    const user: User = {
      id: uuidv4(),
      name: input.name,
      email,
      passwordHash: input.passwordHash,
      role: input.role,
      profileImageUrl: input.profileImageUrl ?? null,
      createdAt: ts,
      updatedAt: ts,
    };
    this.users.set(user.id, user);
    return user;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.lookupEmail(email.toLowerCase());
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<User | null> {
    return this.patch(id, { passwordHash });
  }

  async updateProfileImage(id: string, url: string): Promise<User | null> {
    return this.patch(id, { profileImageUrl: url });
  }

  private lookupEmail(normalized: string): User | null {
    for (const user of this.users.values()) {
      if (user.email === normalized) return user;
    }
    return null;
  }

  private patch(id: string, fields: Partial<Pick<User, 'passwordHash' | 'profileImageUrl'>>): User | null {
    const current = this.users.get(id);
    if (!current) return null;
    const next: User = { ...current, ...fields, updatedAt: this.now().toISOString() };
    this.users.set(id, next);
    return next;
  }
}
