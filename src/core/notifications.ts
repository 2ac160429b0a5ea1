import type { RequestKind, ResultEvent } from '../types/request.js';

export type NotificationSeverity = 'success' | 'info' | 'warning' | 'error';

export interface Notification {
  id: number;
  /** Worktree the notification belongs to; the repository root for repository-wide requests. */
  path: string;
  severity: NotificationSeverity;
  message: string;
}

export type NotificationListener = (current: Notification[]) => void;

export const DEFAULT_DISMISS_MS = 3000;

// Routine successes (refresh, switch, kill) are silent.
const SUCCESS_MESSAGES: Partial<Record<RequestKind, string>> = {
  create: 'Worktree created',
  delete: 'Worktree deleted',
  fetch: 'Fetched from remote',
  pull: 'Pulled base branch',
  push: 'Pushed branch',
  'rename-branch': 'Branch renamed',
  'change-base-branch': 'Base branch changed',
  checkout: 'Branch checked out',
  'record-pr': 'Pull request recorded',
};

/** Transient messages derived from result events, each dismissed after a fixed delay. */
export class Notifications {
  private readonly items: Notification[] = [];
  private readonly timers = new Map<number, NodeJS.Timeout>();
  private readonly listeners = new Set<NotificationListener>();
  private nextId = 1;

  constructor(private readonly dismissAfterMs: number = DEFAULT_DISMISS_MS) {}

  fromResult(event: ResultEvent): Notification[] {
    switch (event.status) {
      case 'failed':
        return [this.push(event.path, 'error', event.error.message)];
      case 'rejected':
        return [this.push(event.path, 'info', event.error.message)];
      case 'discarded':
        return [];
      case 'ok': {
        if (event.warnings.length > 0) {
          return event.warnings.map((w) => this.push(event.path, 'warning', w.message));
        }
        const message = SUCCESS_MESSAGES[event.kind];
        return message ? [this.push(event.path, 'success', message)] : [];
      }
    }
  }

  push(path: string, severity: NotificationSeverity, message: string): Notification {
    const notification: Notification = { id: this.nextId++, path, severity, message };
    this.items.push(notification);
    this.timers.set(notification.id, setTimeout(() => this.dismiss(notification.id), this.dismissAfterMs));
    this.emit();
    return notification;
  }

  dismiss(id: number): void {
    const index = this.items.findIndex((n) => n.id === id);
    const timer = this.timers.get(id);
    if (timer) clearTimeout(timer);
    this.timers.delete(id);
    if (index === -1) return;
    this.items.splice(index, 1);
    this.emit();
  }

  list(path?: string): Notification[] {
    return this.items.filter((n) => path === undefined || n.path === path);
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    this.items.length = 0;
    this.emit();
  }

  private emit(): void {
    const current = this.list();
    for (const listener of this.listeners) listener(current);
  }
}
