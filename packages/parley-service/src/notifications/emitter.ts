/**
 * Local notification sink.
 *
 * Surfaces in-app alerts to the current user. The controller calls it only
 * after a state change is durably committed and never reads anything back.
 */

import type { LocalNotificationKind } from '../types';
import type { Logger } from '../util/logger';

export interface LocalNotificationEmitter {
  show(title: string, body: string, kind: LocalNotificationKind, data: Record<string, unknown>): void;
}

/**
 * Wrap an emitter so that a throwing sink is logged and otherwise ignored.
 */
export function quietEmitter(inner: LocalNotificationEmitter, log: Logger): LocalNotificationEmitter {
  return {
    show(title, body, kind, data) {
      try {
        inner.show(title, body, kind, data);
      } catch (err) {
        log.warn({ err, kind }, 'Local notification sink failed');
      }
    },
  };
}
