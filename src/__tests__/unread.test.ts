import { Types } from 'mongoose';
import { TestContext, TestUser, createTestContext, registerUser } from './helpers/testContext';

describe('Unread messages', () => {
  let ctx: TestContext;
  let alice: TestUser;
  let bob: TestUser;
  let carol: TestUser;

  beforeEach(async () => {
    ctx = createTestContext();
    alice = await registerUser(ctx.services, 'alice');
    bob = await registerUser(ctx.services, 'bob');
    carol = await registerUser(ctx.services, 'carol');
  });

  const sendToBob = async () => {
    const { messages } = ctx.services;
    const first = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'First' });
    const second = await messages.send(carol.user.id, { receiverId: bob.user.id, content: 'Second' });
    const third = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Third' });
    return { first, second, third };
  };

  it('lists unread messages newest first with their senders', async () => {
    await sendToBob();

    const unread = await ctx.services.unread.unreadFor(bob.user.id);

    expect(unread.map(message => message.content)).toEqual(['Third', 'Second', 'First']);
    expect(unread[0].sender).toEqual({ id: alice.user.id, username: 'alice', firstName: 'Alice', lastName: 'Tester' });
    expect(unread[1].sender?.username).toBe('carol');
    expect(await ctx.services.unread.unreadCount(bob.user.id)).toBe(unread.length);
  });

  it('only lists messages the user received', async () => {
    await sendToBob();

    expect(await ctx.services.unread.unreadFor(alice.user.id)).toEqual([]);
    expect(await ctx.services.unread.unreadCount(alice.user.id)).toBe(0);
  });

  it('marks only the given ids read', async () => {
    const { second } = await sendToBob();

    expect(await ctx.services.unread.markRead(bob.user.id, [second.id])).toBe(1);

    const remaining = await ctx.services.unread.unreadFor(bob.user.id);
    expect(remaining.map(message => message.content)).toEqual(['Third', 'First']);
    expect(await ctx.services.unread.unreadCount(bob.user.id)).toBe(2);
  });

  it('skips ids that are not unread messages of the user', async () => {
    const { first } = await sendToBob();

    expect(await ctx.services.unread.markRead(alice.user.id, [first.id])).toBe(0);
    expect(await ctx.services.unread.markRead(bob.user.id, [new Types.ObjectId().toHexString()])).toBe(0);
    expect(await ctx.services.unread.unreadCount(bob.user.id)).toBe(3);
  });

  it('marks everything read when no ids are given', async () => {
    await sendToBob();

    expect(await ctx.services.unread.markRead(bob.user.id)).toBe(3);
    expect(await ctx.services.unread.unreadCount(bob.user.id)).toBe(0);
    expect(await ctx.services.unread.unreadFor(bob.user.id)).toEqual([]);
    expect(await ctx.services.unread.markRead(bob.user.id)).toBe(0);
  });

  it('treats an empty id list like no list', async () => {
    await sendToBob();

    expect(await ctx.services.unread.markRead(bob.user.id, [])).toBe(3);
    expect(await ctx.services.unread.unreadCount(bob.user.id)).toBe(0);
  });

  it('attaches no sender when the sender is gone', async () => {
    const ghostId = new Types.ObjectId().toHexString();
    await ctx.store.messages.create({ senderId: ghostId, receiverId: bob.user.id, content: 'from nowhere' });

    const [message] = await ctx.services.unread.unreadFor(bob.user.id);

    expect(message).toMatchObject({ content: 'from nowhere', sender: null });
  });
});
