// src/repositories/memory/user.repository.ts
import { NewUserInput, UserRecord, UserSummary } from '../../types/user.types';
import { ConflictError } from '../../utils/errors';
import { UserRepository } from '../repository.types';
import { MemoryTables, deleteMessagesCascade, newId } from './memory.tables';

export class MemoryUserRepository implements UserRepository {
  constructor(private readonly tables: MemoryTables) {}

  async create(input: NewUserInput): Promise<UserRecord> {
    if (await this.existsWithUsernameOrEmail(input.username, input.email)) {
      throw new ConflictError('User already exists with that email or username');
    }

    const user: UserRecord = {
      id: newId(),
      username: input.username.trim(),
      email: input.email.trim().toLowerCase(),
      firstName: input.firstName.trim(),
      lastName: input.lastName.trim(),
      passwordHash: input.passwordHash,
      isActive: true,
      createdAt: new Date()
    };
    this.tables.users.set(user.id, user);
    return { ...user };
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.tables.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const wanted = email.trim().toLowerCase();
    for (const user of this.tables.users.values()) {
      if (user.email === wanted) return { ...user };
    }
    return null;
  }

  async existsWithUsernameOrEmail(username: string, email: string): Promise<boolean> {
    const wantedEmail = email.trim().toLowerCase();
    const wantedUsername = username.trim();
    return Array.from(this.tables.users.values()).some(
      user => user.username === wantedUsername || user.email === wantedEmail
    );
  }

  async findSummaries(ids: string[]): Promise<UserSummary[]> {
    return ids.flatMap(id => {
      const user = this.tables.users.get(id);
      return user
        ? [{ id: user.id, username: user.username, firstName: user.firstName, lastName: user.lastName }]
        : [];
    });
  }

  async delete(id: string): Promise<boolean> {
    if (!this.tables.users.has(id)) return false;

    const participated = Array.from(this.tables.messages.values())
      .filter(message => message.senderId === id || message.receiverId === id)
      .map(message => message.id);
    deleteMessagesCascade(this.tables, participated);

    this.tables.history.forEach((entry, entryId) => {
      if (entry.editedById === id) this.tables.history.delete(entryId);
    });
    this.tables.notifications.forEach((notification, notificationId) => {
      if (notification.userId === id) this.tables.notifications.delete(notificationId);
    });
    this.tables.users.delete(id);

    return true;
  }
}
