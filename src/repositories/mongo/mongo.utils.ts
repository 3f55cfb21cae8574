// src/repositories/mongo/mongo.utils.ts
import mongoose, { ClientSession, Types } from 'mongoose';
import { Message } from '../../models/Message';
import { MessageHistory } from '../../models/MessageHistory';
import Notification from '../../models/Notification';

export type Session = ClientSession | null;

/**
 * Parse a route/store id; anything that is not an ObjectId matches nothing.
 */
export const toObjectId = (id: string): Types.ObjectId | null =>
  Types.ObjectId.isValid(id) ? new Types.ObjectId(id) : null;

export const toObjectIds = (ids: string[]): Types.ObjectId[] =>
  ids.flatMap(id => {
    const objectId = toObjectId(id);
    return objectId ? [objectId] : [];
  });

export const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

const WRITE_CONFLICT = 112;

/**
 * Another transaction wrote the same document first
 */
export const isWriteConflictError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError &&
  (error.code === WRITE_CONFLICT || error.hasErrorLabel('TransientTransactionError'));

/**
 * The given messages plus every reply below them, walked level by level.
 */
const collectThreadIds = async (rootIds: Types.ObjectId[], session: Session): Promise<Types.ObjectId[]> => {
  const seen = new Set<string>();
  const collected: Types.ObjectId[] = [];
  let frontier = rootIds;

  while (frontier.length > 0) {
    const fresh = frontier.filter(id => !seen.has(id.toString()));
    if (fresh.length === 0) break;

    for (const id of fresh) {
      seen.add(id.toString());
      collected.push(id);
    }

    const replies = await Message.find({ parentMessage: { $in: fresh } })
      .select('_id')
      .session(session);
    frontier = replies.map(reply => reply._id);
  }

  return collected;
};

/**
 * Cascade rules of Message:
 * replies, history and notifications go with their message.
 */
export const deleteMessagesCascade = async (ids: Types.ObjectId[], session: Session): Promise<number> => {
  if (ids.length === 0) return 0;

  const threadIds = await collectThreadIds(ids, session);

  await MessageHistory.deleteMany({ message: { $in: threadIds } }).session(session);
  await Notification.deleteMany({ message: { $in: threadIds } }).session(session);
  const result = await Message.deleteMany({ _id: { $in: threadIds } }).session(session);

  return result.deletedCount;
};
