// src/services/user.service.ts
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { AppConfig } from '../config/env';
import { DataStore } from '../repositories/repository.types';
import {
  AccountDeletionRequest,
  AccountDeletionStats,
  IAuthPayload,
  ILoginResponse,
  IUserPayload,
  IUserRegistration,
  PublicUser,
  UserRecord
} from '../types/user.types';
import { AuthenticationError, ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { LifecycleDispatcher } from './lifecycle/hooks';

export type AuthSettings = Pick<AppConfig, 'jwtSecret' | 'jwtExpiresInSeconds' | 'bcryptSaltRounds'>;

export const toPublicUser = ({ passwordHash: _passwordHash, ...user }: UserRecord): PublicUser => user;

const isAuthPayload = (value: unknown): value is IAuthPayload => {
  if (typeof value !== 'object' || value === null || !('user' in value)) return false;
  const { user } = value;
  return typeof user === 'object' && user !== null && 'id' in user && typeof user.id === 'string';
};

export class UserService {
  constructor(
    private readonly store: DataStore,
    private readonly lifecycle: LifecycleDispatcher,
    private readonly auth: AuthSettings
  ) {}

  /**
   * Generate JWT token
   */
  generateToken(user: Pick<UserRecord, 'id'>): string {
    const payload: IAuthPayload = { user: { id: user.id } };
    return jwt.sign(payload, this.auth.jwtSecret, { expiresIn: this.auth.jwtExpiresInSeconds });
  }

  /**
   * Throws AuthenticationError for expired, forged or malformed tokens
   */
  verifyToken(token: string): IUserPayload {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.auth.jwtSecret);
    } catch (error) {
      throw new AuthenticationError('Token is not valid', { cause: error });
    }

    if (!isAuthPayload(decoded)) {
      throw new AuthenticationError('Invalid token format');
    }
    return decoded.user;
  }

  async register(input: IUserRegistration): Promise<ILoginResponse> {
    const username = input.username.trim();
    const email = input.email.trim().toLowerCase();

    if (!username || !email || !input.password) {
      throw new ValidationError('Username, email and password are required');
    }

    if (await this.store.users.existsWithUsernameOrEmail(username, email)) {
      throw new ConflictError('User already exists with that email or username');
    }

    const passwordHash = await bcrypt.hash(input.password, this.auth.bcryptSaltRounds);
    const user = await this.store.users.create({
      username,
      email,
      passwordHash,
      firstName: input.firstName?.trim() ?? '',
      lastName: input.lastName?.trim() ?? ''
    });

    return { token: this.generateToken(user), user: toPublicUser(user) };
  }

  async authenticate(email: string, password: string): Promise<ILoginResponse> {
    const user = await this.store.users.findByEmail(email);
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      throw new AuthenticationError('Invalid credentials');
    }
    if (!user.isActive) {
      throw new AuthenticationError('This account has been deactivated');
    }

    return { token: this.generateToken(user), user: toPublicUser(user) };
  }

  async getById(userId: string): Promise<PublicUser> {
    const user = await this.store.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return toPublicUser(user);
  }

  /**
   * What deleting this account would remove
   */
  async deletionStats(userId: string): Promise<AccountDeletionStats> {
    const user = await this.getById(userId);

    const [sentMessages, receivedMessages, notifications, messageHistories] = await Promise.all([
      this.store.messages.countBySender(userId),
      this.store.messages.countByReceiver(userId),
      this.store.notifications.countForUser(userId),
      this.store.history.countByEditor(userId)
    ]);
    const totalMessages = sentMessages + receivedMessages;

    return {
      username: user.username,
      email: user.email,
      sentMessages,
      receivedMessages,
      totalMessages,
      notifications,
      messageHistories,
      totalDataPoints: totalMessages + notifications + messageHistories
    };
  }

  /**
   * Deletes the account and everything that references it. The store cascade
   * runs in the deleting transaction; the cleanup hooks run after it commits.
   */
  async deleteAccount(userId: string, request: AccountDeletionRequest): Promise<AccountDeletionStats> {
    if (request.confirm !== true) {
      throw new ValidationError('You must confirm the deletion to proceed.', 'confirm');
    }

    const stats = await this.deletionStats(userId);

    if (request.password !== undefined) {
      const user = await this.store.users.findById(userId);
      if (!user || !(await bcrypt.compare(request.password, user.passwordHash))) {
        throw new ValidationError('Invalid password confirmation.', 'password');
      }
    }

    await this.store.transaction(async store => {
      const deleted = await store.users.delete(userId);
      if (!deleted) {
        throw new NotFoundError('User', userId);
      }
    });

    await this.lifecycle.afterUserDelete(userId, { store: this.store });
    return stats;
  }
}
