// src/services/lifecycle/cascadeCleaner.ts
import { DataStore } from '../../repositories/repository.types';
import { CleanupReport } from '../../types/user.types';
import { HookContext, UserHook } from './hooks';

/**
 * Second pass after a user is deleted. Each step is idempotent; failures
 * are logged and never rethrown.
 */
export class CascadeCleaner implements UserHook {
  readonly name = 'cascade-cleaner';

  async afterDelete(userId: string, { store }: Pick<HookContext, 'store'>): Promise<void> {
    const report = await this.clean(userId, store);
    const removed = report.messages + report.messageHistories + report.notifications;

    if (removed > 0 || report.failures.length > 0) {
      console.log(
        `[CascadeCleaner] user ${userId}: removed ${report.messages} messages, ` +
          `${report.messageHistories} history entries, ${report.notifications} notifications` +
          (report.failures.length ? `; failed: ${report.failures.join(', ')}` : '')
      );
    }
  }

  async clean(userId: string, store: DataStore): Promise<CleanupReport> {
    const report: CleanupReport = { messages: 0, messageHistories: 0, notifications: 0, failures: [] };

    const attempt = async (label: string, step: () => Promise<number>): Promise<number> => {
      try {
        return await step();
      } catch (error) {
        report.failures.push(label);
        console.error(`[CascadeCleaner] could not clean ${label} of user ${userId}:`, error);
        return 0;
      }
    };

    report.messages = await attempt('messages', () => store.messages.deleteByParticipant(userId));
    report.messageHistories = await attempt('message histories', () => store.history.deleteByEditor(userId));
    report.notifications = await attempt('notifications', () => store.notifications.deleteForUser(userId));

    return report;
  }
}
