import { MemoryMessageHistoryRepository } from '../repositories/memory/messageHistory.repository';
import { EditInterceptor } from '../services/lifecycle/editInterceptor';
import { ConflictError, NotFoundError, PermissionDeniedError, ValidationError } from '../utils/errors';
import { START, TestContext, TestUser, createTestContext, registerUser } from './helpers/testContext';

describe('Message edit history', () => {
  let ctx: TestContext;
  let alice: TestUser;
  let bob: TestUser;

  beforeEach(async () => {
    ctx = createTestContext();
    alice = await registerUser(ctx.services, 'alice');
    bob = await registerUser(ctx.services, 'bob');
  });

  it('records one version per content change', async () => {
    const { messages, notifications } = ctx.services;
    const sent = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Hello' });
    expect(await notifications.list(bob.user.id)).toHaveLength(1);

    await messages.edit(sent.id, 'Hello there', alice.user.id);
    let history = await messages.history(alice.user.id, sent.id);
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ version: 1, oldContent: 'Hello', editedById: alice.user.id });

    const edited = await messages.edit(sent.id, 'Hi', alice.user.id);
    history = await messages.history(alice.user.id, sent.id);
    expect(history.map(entry => [entry.version, entry.oldContent])).toEqual([
      [1, 'Hello'],
      [2, 'Hello there']
    ]);
    expect(history.map(entry => entry.editedAt)).toEqual([new Date(START + 1000), new Date(START + 2000)]);

    expect(edited.content).toBe('Hi');
    expect(edited.edited).toBe(true);
    expect(edited.editedAt).toEqual(new Date(START + 2000));
  });

  it('does not notify again when a message is edited', async () => {
    const { messages, notifications } = ctx.services;
    const sent = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Hello' });

    await messages.edit(sent.id, 'Hello again', alice.user.id);
    await messages.edit(sent.id, 'Hello once more', alice.user.id);

    expect(await notifications.list(bob.user.id)).toHaveLength(1);
  });

  it('ignores edits that leave the content unchanged', async () => {
    const { messages } = ctx.services;
    const sent = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Hello' });

    const result = await messages.edit(sent.id, '  Hello  ', alice.user.id);

    expect(result.edited).toBe(false);
    expect(result.editedAt).toBeNull();
    expect(await ctx.store.history.countForMessage(sent.id)).toBe(0);
  });

  it('keeps edited in step with the history rows', async () => {
    const { messages } = ctx.services;
    const untouched = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'one' });
    const changed = await messages.send(alice.user.id, { receiverId: bob.user.id, content: 'two' });
    await messages.edit(changed.id, 'three', alice.user.id);

    for (const id of [untouched.id, changed.id]) {
      const message = await ctx.store.messages.findById(id);
      const rows = await ctx.store.history.countForMessage(id);
      expect(message?.edited).toBe(rows > 0);
    }
  });

  it('records the sender as editor when no actor is given', async () => {
    const { messages } = ctx.services;
    const sent = await messages.send(bob.user.id, { receiverId: alice.user.id, content: 'draft' });

    await messages.edit(sent.id, 'final');

    const [entry] = await ctx.store.history.listForMessage(sent.id);
    expect(entry.editedById).toBe(bob.user.id);
  });

  it('lets only the sender edit', async () => {
    const sent = await ctx.services.messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Hello' });

    await expect(ctx.services.messages.edit(sent.id, 'Hacked', bob.user.id)).rejects.toThrow(
      new PermissionDeniedError('You are not allowed to edit this message')
    );
    expect(await ctx.store.history.countForMessage(sent.id)).toBe(0);
  });

  it('rejects blank content and unknown messages', async () => {
    const sent = await ctx.services.messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Hello' });

    await expect(ctx.services.messages.edit(sent.id, '   ', alice.user.id)).rejects.toBeInstanceOf(ValidationError);
    await expect(ctx.services.messages.edit('65a000000000000000000000', 'x', alice.user.id)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('leaves the message untouched when the history row cannot be written', async () => {
    const sent = await ctx.services.messages.send(alice.user.id, { receiverId: bob.user.id, content: 'Hello' });
    jest
      .spyOn(MemoryMessageHistoryRepository.prototype, 'create')
      .mockRejectedValueOnce(new ConflictError('Version 1 of message was recorded concurrently'));

    await expect(ctx.services.messages.edit(sent.id, 'Hello there', alice.user.id)).rejects.toBeInstanceOf(
      ConflictError
    );

    const stored = await ctx.store.messages.findById(sent.id);
    expect(stored?.content).toBe('Hello');
    expect(stored?.edited).toBe(false);
  });

  describe('EditInterceptor', () => {
    const interceptor = new EditInterceptor();

    it('skips drafts of new messages', async () => {
      const draft = {
        senderId: alice.user.id,
        receiverId: bob.user.id,
        parentMessageId: null,
        content: 'new',
        timestamp: new Date(START),
        isRead: false,
        edited: false,
        editedAt: null
      };

      await interceptor.beforeSave(draft, { store: ctx.store, now: new Date(START) });

      expect(draft.edited).toBe(false);
      await expect(ctx.store.history.countByEditor(alice.user.id)).resolves.toBe(0);
    });

    it('warns and skips when the persisted message is gone', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const draft = {
        id: '65a000000000000000000001',
        senderId: alice.user.id,
        receiverId: bob.user.id,
        parentMessageId: null,
        content: 'orphan',
        timestamp: new Date(START),
        isRead: false,
        edited: false,
        editedAt: null
      };

      await interceptor.beforeSave(draft, { store: ctx.store, now: new Date(START) });

      expect(draft.edited).toBe(false);
      expect(warn).toHaveBeenCalledWith(
        '[EditInterceptor] message 65a000000000000000000001 is gone, skipping edit history'
      );
    });
  });
});
