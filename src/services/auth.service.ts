/**
 * Accounts: password hashing (bcryptjs), bearer tokens (jsonwebtoken) and the
 * register / login / password-change flows built on them.
 */
import bcrypt from 'bcryptjs';
import jwt, { type SignOptions } from 'jsonwebtoken';
import { HttpError } from './errors';
import { toPublicUser, type UserRepository } from './user.service';
import type { PublicUser, UserRole } from '../types';

const BCRYPT_ROUNDS = 10;

export interface TokenPayload {
  sub: string;
  role: UserRole;
}

export interface AuthUser {
  id: string;
  role: UserRole;
}

export class TokenService {
  constructor(
    private readonly secret: string,
    private readonly expiresIn: string
  ) {}

  sign(user: AuthUser): string {
    const payload: TokenPayload = { sub: user.id, role: user.role };
    return jwt.sign(payload, this.secret, { expiresIn: this.expiresIn as SignOptions['expiresIn'] });
  }

  /** Returns null for malformed, tampered or expired tokens. */
  verify(token: string): AuthUser | null {
    try {
      const decoded = jwt.verify(token, this.secret);
      if (typeof decoded === 'string') return null;
      const { sub, role } = decoded;
      if (typeof sub !== 'string' || (role !== 'user' && role !== 'admin')) return null;
      return { id: sub, role };
    } catch {
      return null;
    }
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
  profileImageUrl?: string | null;
  adminInviteToken?: string;
}

export interface AuthResult {
  user: PublicUser;
  token: string;
}

function invalidCredentials(): HttpError {
  return new HttpError(401, 'INVALID_CREDENTIALS', 'Invalid email or password');
}

export class AccountService {
  constructor(
    private readonly users: UserRepository,
    private readonly tokens: TokenService,
    private readonly adminInviteToken: string
  ) {}

  async register(input: RegisterInput): Promise<AuthResult> {
    if (await this.users.findByEmail(input.email)) {
      throw new HttpError(409, 'EMAIL_TAKEN', 'User with this email already exists');
    }
    const role: UserRole =
      this.adminInviteToken !== '' && input.adminInviteToken === this.adminInviteToken ? 'admin' : 'user';
    const user = await this.users.create({
      name: input.name,
      email: input.email,
      passwordHash: await hashPassword(input.password),
      role,
      profileImageUrl: input.profileImageUrl ?? null,
    });
    return { user: toPublicUser(user), token: this.tokens.sign(user) };
  }

  async login(email: string, password: string): Promise<AuthResult> {
    const user = await this.users.findByEmail(email);
    if (!user) throw invalidCredentials();
    if (!(await verifyPassword(password, user.passwordHash))) throw invalidCredentials();
    return { user: toPublicUser(user), token: this.tokens.sign(user) };
  }

  async profile(userId: string): Promise<PublicUser> {
    const user = await this.users.findById(userId);
    if (!user) throw new HttpError(404, 'USER_NOT_FOUND', 'User not found');
    return toPublicUser(user);
  }

  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.users.findById(userId);
    if (!user) throw new HttpError(404, 'USER_NOT_FOUND', 'User not found');
    if (!(await verifyPassword(currentPassword, user.passwordHash))) {
      throw new HttpError(401, 'INVALID_CREDENTIALS', 'Current password is incorrect');
    }
    await this.users.updatePasswordHash(userId, await hashPassword(newPassword));
  }

  async setProfileImage(userId: string, url: string): Promise<PublicUser> {
    const user = await this.users.updateProfileImage(userId, url);
    if (!user) throw new HttpError(404, 'USER_NOT_FOUND', 'User not found');
    return toPublicUser(user);
  }
}
