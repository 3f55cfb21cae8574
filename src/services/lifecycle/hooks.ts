// src/services/lifecycle/hooks.ts
import { DataStore } from '../../repositories/repository.types';
import { MessageDraft, MessageRecord } from '../../types/message.types';

export interface HookContext {
  /** Store bound to the transaction of the triggering write */
  store: DataStore;
  now: Date;
  /** Acting editor of an update, when the caller knows it */
  editorId?: string;
}

export interface MessageHook {
  readonly name: string;
  /**
   * Runs right before the draft is written; may mutate the draft.
   */
  beforeSave?(draft: MessageDraft, context: HookContext): Promise<void>;
  /**
   * Runs right after the write. Returning a record replaces the one handed to later hooks and the caller.
   */
  afterSave?(message: MessageRecord, created: boolean, context: HookContext): Promise<MessageRecord | void>;
}

export interface UserHook {
  readonly name: string;
  afterDelete?(userId: string, context: Pick<HookContext, 'store'>): Promise<void>;
}

/**
 * Runs the registered hooks in registration order, from inside the write path.
 */
export class LifecycleDispatcher {
  constructor(
    private readonly messageHooks: MessageHook[] = [],
    private readonly userHooks: UserHook[] = []
  ) {}

  async beforeMessageSave(draft: MessageDraft, context: HookContext): Promise<void> {
    for (const hook of this.messageHooks) {
      if (hook.beforeSave) {
        await hook.beforeSave(draft, context);
      }
    }
  }

  async afterMessageSave(message: MessageRecord, created: boolean, context: HookContext): Promise<MessageRecord> {
    let current = message;
    for (const hook of this.messageHooks) {
      if (hook.afterSave) {
        const replaced = await hook.afterSave(current, created, context);
        if (replaced) current = replaced;
      }
    }
    return current;
  }

  async afterUserDelete(userId: string, context: Pick<HookContext, 'store'>): Promise<void> {
    for (const hook of this.userHooks) {
      if (hook.afterDelete) {
        await hook.afterDelete(userId, context);
      }
    }
  }
}
