// src/services/index.ts
import { DataStore } from '../repositories/repository.types';
import { CascadeCleaner } from './lifecycle/cascadeCleaner';
import { EditInterceptor } from './lifecycle/editInterceptor';
import { LifecycleDispatcher } from './lifecycle/hooks';
import { NotificationDispatcher, UnreadOnCreate } from './lifecycle/notificationDispatcher';
import { Clock, MessageService } from './message.service';
import { NotificationService } from './notification.service';
import { ThreadService } from './thread.service';
import { UnreadService } from './unread.service';
import { AuthSettings, UserService } from './user.service';

export interface Services {
  store: DataStore;
  lifecycle: LifecycleDispatcher;
  messages: MessageService;
  threads: ThreadService;
  unread: UnreadService;
  notifications: NotificationService;
  users: UserService;
}

export interface ServiceOptions extends AuthSettings {
  clock?: Clock;
}

/**
 * Wires the services over one store. Hook order matters: the edit
 * interceptor must see the draft before it is written, and new messages are
 * forced unread before the notification goes out.
 */
export const buildServices = (store: DataStore, options: ServiceOptions): Services => {
  const lifecycle = new LifecycleDispatcher(
    [new EditInterceptor(), new UnreadOnCreate(), new NotificationDispatcher()],
    [new CascadeCleaner()]
  );

  return {
    store,
    lifecycle,
    messages: new MessageService(store, lifecycle, options.clock),
    threads: new ThreadService(store),
    unread: new UnreadService(store),
    notifications: new NotificationService(store),
    users: new UserService(store, lifecycle, options)
  };
};
