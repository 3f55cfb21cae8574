// src/services/lifecycle/editInterceptor.ts
import { MessageDraft } from '../../types/message.types';
import { HookContext, MessageHook } from './hooks';

/**
 * Before an existing message is rewritten, snapshot the persisted content
 * as the next history version and flag the message as edited.
 */
export class EditInterceptor implements MessageHook {
  readonly name = 'edit-interceptor';

  async beforeSave(draft: MessageDraft, { store, now, editorId }: HookContext): Promise<void> {
    if (!draft.id) return;

    const persisted = await store.messages.findById(draft.id);
    if (!persisted) {
      console.warn(`[EditInterceptor] message ${draft.id} is gone, skipping edit history`);
      return;
    }

    if (persisted.content === draft.content) return;

    const version = (await store.history.latestVersion(draft.id)) + 1;
    await store.history.create({
      messageId: draft.id,
      oldContent: persisted.content,
      // falls back to the sender when the caller did not say who edited
      editedById: editorId ?? persisted.senderId,
      editedAt: now,
      version
    });

    draft.edited = true;
    draft.editedAt = now;
  }
}
