// src/types/user.types.ts

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  isActive: boolean;
  createdAt: Date;
}

export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export type UserSummary = Pick<UserRecord, 'id' | 'username' | 'firstName' | 'lastName'>;

export interface NewUserInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
}

export interface IUserRegistration {
  username: string;
  email: string;
  password: string;
  firstName?: string;
  lastName?: string;
}

export interface IUserPayload {
  id: string;
}

export interface IAuthPayload {
  user: IUserPayload;
}

export interface ILoginResponse {
  token: string;
  user: PublicUser;
}

export interface AccountDeletionRequest {
  confirm?: unknown;
  password?: string;
}

export interface AccountDeletionStats {
  username: string;
  email: string;
  sentMessages: number;
  receivedMessages: number;
  totalMessages: number;
  notifications: number;
  messageHistories: number;
  totalDataPoints: number;
}

export interface CleanupReport {
  messages: number;
  messageHistories: number;
  notifications: number;
  failures: string[];
}
