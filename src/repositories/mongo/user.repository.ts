// src/repositories/mongo/user.repository.ts
import User, { toUserRecord } from '../../models/User';
import { Message } from '../../models/Message';
import { MessageHistory } from '../../models/MessageHistory';
import Notification from '../../models/Notification';
import { NewUserInput, UserRecord, UserSummary } from '../../types/user.types';
import { ConflictError } from '../../utils/errors';
import { UserRepository } from '../repository.types';
import { Session, deleteMessagesCascade, isDuplicateKeyError, toObjectId, toObjectIds } from './mongo.utils';

export class MongoUserRepository implements UserRepository {
  constructor(private readonly session: Session = null) {}

  async create(input: NewUserInput): Promise<UserRecord> {
    const user = new User({
      username: input.username,
      email: input.email,
      password: input.passwordHash,
      firstName: input.firstName,
      lastName: input.lastName
    });

    try {
      await user.save({ session: this.session });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError('User already exists with that email or username');
      }
      throw error;
    }

    return toUserRecord(user);
  }

  async findById(id: string): Promise<UserRecord | null> {
    const objectId = toObjectId(id);
    if (!objectId) return null;

    const user = await User.findById(objectId).session(this.session);
    return user ? toUserRecord(user) : null;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const user = await User.findOne({ email: email.toLowerCase() }).session(this.session);
    return user ? toUserRecord(user) : null;
  }

  async existsWithUsernameOrEmail(username: string, email: string): Promise<boolean> {
    const count = await User.countDocuments({
      $or: [{ username }, { email: email.toLowerCase() }]
    }).session(this.session);
    return count > 0;
  }

  async findSummaries(ids: string[]): Promise<UserSummary[]> {
    const users = await User.find({ _id: { $in: toObjectIds(ids) } })
      .select('username firstName lastName')
      .session(this.session);

    return users.map(user => ({
      id: user._id.toString(),
      username: user.username,
      firstName: user.firstName,
      lastName: user.lastName
    }));
  }

  async delete(id: string): Promise<boolean> {
    const userId = toObjectId(id);
    if (!userId) return false;

    const user = await User.findById(userId).session(this.session);
    if (!user) return false;

    const messages = await Message.find({ $or: [{ sender: userId }, { receiver: userId }] })
      .select('_id')
      .session(this.session);

    await deleteMessagesCascade(messages.map(message => message._id), this.session);
    await MessageHistory.deleteMany({ editedBy: userId }).session(this.session);
    await Notification.deleteMany({ user: userId }).session(this.session);
    await User.deleteOne({ _id: userId }).session(this.session);

    return true;
  }
}
