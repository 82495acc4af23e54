/**
 * Local notification feed.
 *
 * The node host has no notification tray, so notices are logged and kept in
 * a `notifications` collection where a UI can read them back. `show` never
 * blocks the caller; writes are queued and `flush` waits for them.
 */

import { v4 as uuidv4 } from 'uuid';
import { getLogger, isRecord } from '@parley/service';
import type { LocalNotificationEmitter, LocalNotificationKind, RecordStore } from '@parley/service';

export const NOTIFICATIONS_COLLECTION = 'notifications';

export interface StoredNotice {
  id: string;
  title: string;
  body: string;
  kind: LocalNotificationKind;
  data: Record<string, unknown>;
  createdAt: number;
  read: boolean;
}

const KINDS: readonly LocalNotificationKind[] = [
  'invitation_sent',
  'invitation_received',
  'invitation_accepted',
  'invitation_declined',
  'invitation_cancelled',
  'invitation_failed',
  'resync_required',
];

function toStoredNotice(raw: unknown): StoredNotice | null {
  if (!isRecord(raw)) return null;
  const { id, title, body, kind, data, createdAt, read } = raw;
  if (
    typeof id !== 'string' ||
    typeof title !== 'string' ||
    typeof body !== 'string' ||
    typeof kind !== 'string' ||
    typeof createdAt !== 'number' ||
    !isRecord(data)
  ) {
    return null;
  }
  const known = KINDS.find((k) => k === kind);
  if (!known) return null;
  return { id, title, body, kind: known, data, createdAt, read: read === true };
}

export class NotificationFeed implements LocalNotificationEmitter {
  private pending: Promise<void> = Promise.resolve();
  private log = getLogger().child({ module: 'notifications' });

  constructor(
    private readonly records: RecordStore,
    private readonly now: () => number = Date.now,
  ) {}

  show(title: string, body: string, kind: LocalNotificationKind, data: Record<string, unknown>): void {
    const notice: StoredNotice = {
      id: uuidv4(),
      title,
      body,
      kind,
      data,
      createdAt: this.now(),
      read: false,
    };
    this.log.info({ kind, data }, `${title}: ${body}`);
    this.pending = this.pending
      .then(() => this.records.put(NOTIFICATIONS_COLLECTION, notice.id, notice))
      .catch((err: unknown) => {
        this.log.error({ err, kind }, 'Failed to store notification');
      });
  }

  /** Wait for every queued write. */
  async flush(): Promise<void> {
    await this.pending;
  }

  /** Stored notices, oldest first. */
  async list(): Promise<StoredNotice[]> {
    await this.flush();
    const rows = await this.records.list(NOTIFICATIONS_COLLECTION);
    const notices: StoredNotice[] = [];
    for (const row of rows) {
      const notice = toStoredNotice(row);
      if (notice) {
        notices.push(notice);
      } else {
        this.log.warn('Skipping unreadable notification record');
      }
    }
    return notices.sort((a, b) => a.createdAt - b.createdAt);
  }

  /** @returns false if no notice has this ID */
  async markRead(id: string): Promise<boolean> {
    await this.flush();
    const notice = toStoredNotice(await this.records.get(NOTIFICATIONS_COLLECTION, id));
    if (!notice) return false;
    await this.records.put(NOTIFICATIONS_COLLECTION, id, { ...notice, read: true });
    return true;
  }
}
