import { MemoryDataStore } from '../repositories/memory/memory.store';
import { NotificationType } from '../types/notifications.types';
import { ConflictError } from '../utils/errors';

describe('MemoryDataStore', () => {
  let store: MemoryDataStore;

  const newUser = (username: string) =>
    store.users.create({
      username,
      email: `${username}@example.com`,
      firstName: '',
      lastName: '',
      passwordHash: 'not-a-real-hash'
    });

  beforeEach(() => {
    store = new MemoryDataStore();
  });

  it('rolls back every write of a failed transaction', async () => {
    const alice = await newUser('alice');

    await expect(
      store.transaction(async tx => {
        await tx.users.create({
          username: 'bob',
          email: 'bob@example.com',
          firstName: '',
          lastName: '',
          passwordHash: 'not-a-real-hash'
        });
        await tx.messages.create({ senderId: alice.id, receiverId: alice.id, content: 'note to self' });
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');

    expect(await store.users.findByEmail('bob@example.com')).toBeNull();
    expect(await store.messages.countBySender(alice.id)).toBe(0);
    expect(await store.users.findById(alice.id)).not.toBeNull();
  });

  it('joins nested transactions into the outer one', async () => {
    const alice = await newUser('alice');

    await expect(
      store.transaction(async tx => {
        await tx.transaction(inner =>
          inner.messages.create({ senderId: alice.id, receiverId: alice.id, content: 'inner' })
        );
        throw new Error('outer failed');
      })
    ).rejects.toThrow('outer failed');

    expect(await store.messages.countBySender(alice.id)).toBe(0);
  });

  it('runs transactions one after another', async () => {
    const order: string[] = [];
    const slow = store.transaction(async () => {
      order.push('slow:start');
      await new Promise(resolve => setTimeout(resolve, 10));
      order.push('slow:end');
    });
    const fast = store.transaction(async () => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);

    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps running transactions after one fails', async () => {
    await expect(store.transaction(async () => Promise.reject(new Error('first')))).rejects.toThrow('first');

    await expect(store.transaction(async () => 'second')).resolves.toBe('second');
  });

  it('rejects duplicate users and history versions', async () => {
    const alice = await newUser('alice');
    await expect(newUser('alice')).rejects.toBeInstanceOf(ConflictError);

    const message = await store.messages.create({ senderId: alice.id, receiverId: alice.id, content: 'v0' });
    const entry = { messageId: message.id, oldContent: 'v0', editedById: alice.id, editedAt: new Date(), version: 1 };
    await store.history.create(entry);

    await expect(store.history.create(entry)).rejects.toBeInstanceOf(ConflictError);
    expect(await store.history.latestVersion(message.id)).toBe(1);
  });

  it('deletes a message with its replies, history and notifications', async () => {
    const alice = await newUser('alice');
    const bob = await newUser('bob');
    const root = await store.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'root' });
    const child = await store.messages.create({
      senderId: bob.id,
      receiverId: alice.id,
      content: 'child',
      parentMessageId: root.id
    });
    await store.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'grandchild', parentMessageId: child.id });
    const other = await store.messages.create({ senderId: alice.id, receiverId: bob.id, content: 'other' });
    await store.history.create({ messageId: child.id, oldContent: 'kid', editedById: bob.id, editedAt: new Date(), version: 1 });
    await store.notifications.create({
      userId: alice.id,
      messageId: child.id,
      type: NotificationType.MESSAGE,
      title: 'New message from bob',
      content: "You have received a new message: 'child'"
    });

    expect(await store.messages.delete(root.id)).toBe(3);

    expect(await store.messages.countBySender(alice.id)).toBe(1);
    expect(await store.messages.findById(other.id)).not.toBeNull();
    expect(await store.history.countForMessage(child.id)).toBe(0);
    expect(await store.notifications.countForUser(alice.id)).toBe(0);
  });

  it('lists notifications newest first and filters unread ones', async () => {
    const alice = await newUser('alice');
    const base = { userId: alice.id, messageId: null, type: NotificationType.SYSTEM, content: 'body' };
    const older = await store.notifications.create({ ...base, title: 'older', createdAt: new Date(1_000) });
    await store.notifications.create({ ...base, title: 'newer', createdAt: new Date(2_000) });

    expect((await store.notifications.listForUser(alice.id)).map(n => n.title)).toEqual(['newer', 'older']);

    expect(await store.notifications.markRead(alice.id, older.id)).toBe(true);
    expect((await store.notifications.listForUser(alice.id, { unreadOnly: true })).map(n => n.title)).toEqual(['newer']);
    expect(await store.notifications.clearRead(alice.id)).toBe(1);
    expect(await store.notifications.countForUser(alice.id)).toBe(1);
  });
});
