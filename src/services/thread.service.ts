// src/services/thread.service.ts
import { DataStore } from '../repositories/repository.types';
import { MessageRecord, MessageThread, ThreadNode } from '../types/message.types';
import { NotFoundError } from '../utils/errors';
import { assertCanPerform } from '../utils/messagePermissions';

/**
 * Rebuilds reply threads from parent links.
 */
export class ThreadService {
  constructor(private readonly store: DataStore) {}

  /**
   * Follows parent links up to the message that has none.
   * Stops at the first repeated id or a missing parent.
   */
  async getThreadRoot(messageId: string, store: DataStore = this.store): Promise<MessageRecord> {
    const start = await store.messages.findById(messageId);
    if (!start) {
      throw new NotFoundError('Message', messageId);
    }

    let current = start;
    const visited = new Set<string>([current.id]);

    while (current.parentMessageId !== null && !visited.has(current.parentMessageId)) {
      const parent = await store.messages.findById(current.parentMessageId);
      if (!parent) break;

      visited.add(parent.id);
      current = parent;
    }

    return current;
  }

  /**
   * Replies below message as a tree. Direct replies have depth 0; siblings are
   * ordered by timestamp, then id. Walks one level per query with a worklist.
   */
  async buildReplyTree(message: MessageRecord, store: DataStore = this.store): Promise<ThreadNode[]> {
    const topLevel: ThreadNode[] = [];
    const nodes = new Map<string, ThreadNode>();
    const seen = new Set<string>([message.id]);

    let frontier = [message.id];
    let depth = 0;

    while (frontier.length > 0) {
      const replies = await store.messages.findReplies(frontier);
      const next: string[] = [];

      for (const reply of replies) {
        if (reply.parentMessageId === null || seen.has(reply.id)) continue;
        seen.add(reply.id);

        const node: ThreadNode = { message: reply, depth, replies: [] };
        nodes.set(reply.id, node);

        if (reply.parentMessageId === message.id) {
          topLevel.push(node);
        } else {
          nodes.get(reply.parentMessageId)?.replies.push(node);
        }
        next.push(reply.id);
      }

      frontier = next;
      depth += 1;
    }

    return topLevel;
  }

  /**
   * Whole thread around a message, for one of its participants.
   * Reads inside one transaction.
   */
  async getThread(actorId: string, messageId: string): Promise<MessageThread> {
    return this.store.transaction(async store => {
      const message = await store.messages.findById(messageId);
      if (!message) {
        throw new NotFoundError('Message', messageId);
      }
      assertCanPerform(message, actorId, 'view');

      const root = await this.getThreadRoot(message.id, store);
      const replies = await this.buildReplyTree(root, store);
      return { root, replies };
    });
  }
}
