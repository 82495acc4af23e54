/**
 * Invitation store
 *
 * Durable invitation records keyed by invitation ID. The store checks record
 * shape but not transition legality; the controller owns the state machine.
 *
 * @packageDocumentation
 */

import { ErrorCode, ParleyError } from '../errors';
import type { Invitation } from '../types';
import type { RecordStore } from './record-store';
import { decodeInvitation } from './records';

export const INVITATIONS_COLLECTION = 'invitations';

export class InvitationStore {
  constructor(private readonly records: RecordStore) {}

  /**
   * Persist a new invitation.
   *
   * @throws {ParleyError} DuplicateId if the ID is already stored
   */
  async create(invitation: Invitation): Promise<void> {
    const existing = await this.records.get(INVITATIONS_COLLECTION, invitation.id);
    if (existing !== undefined) {
      throw new ParleyError(ErrorCode.DuplicateId, `Invitation ${invitation.id} already exists`);
    }
    await this.records.put(INVITATIONS_COLLECTION, invitation.id, invitation);
  }

  /**
   * @throws {ParleyError} NotFound if no invitation has this ID
   */
  async get(id: string): Promise<Invitation> {
    const invitation = await this.find(id);
    if (!invitation) {
      throw new ParleyError(ErrorCode.NotFound, `Invitation ${id} not found`);
    }
    return invitation;
  }

  async find(id: string): Promise<Invitation | null> {
    const raw = await this.records.get(INVITATIONS_COLLECTION, id);
    return raw === undefined ? null : decodeInvitation(raw);
  }

  /**
   * Replace a stored invitation in full.
   *
   * @throws {ParleyError} NotFound if the invitation was never created
   */
  async update(invitation: Invitation): Promise<void> {
    const existing = await this.records.get(INVITATIONS_COLLECTION, invitation.id);
    if (existing === undefined) {
      throw new ParleyError(ErrorCode.NotFound, `Invitation ${invitation.id} not found`);
    }
    await this.records.put(INVITATIONS_COLLECTION, invitation.id, invitation);
  }

  /** Invitations sent by `peerId`, oldest first. Each iteration re-reads the store. */
  listBySender(peerId: string): AsyncIterable<Invitation> {
    return this.query((inv) => inv.senderId === peerId);
  }

  /** Invitations addressed to `peerId`, oldest first. Each iteration re-reads the store. */
  listByRecipient(peerId: string): AsyncIterable<Invitation> {
    return this.query((inv) => inv.recipientId === peerId);
  }

  /** Invitations in either direction between two peers, oldest first. */
  listBetween(a: string, b: string): AsyncIterable<Invitation> {
    return this.query(
      (inv) =>
        (inv.senderId === a && inv.recipientId === b) ||
        (inv.senderId === b && inv.recipientId === a),
    );
  }

  private query(predicate: (invitation: Invitation) => boolean): AsyncIterable<Invitation> {
    const records = this.records;
    return {
      async *[Symbol.asyncIterator]() {
        const snapshot = (await records.list(INVITATIONS_COLLECTION))
          .map(decodeInvitation)
          .filter(predicate)
          .sort((x, y) => x.createdAt - y.createdAt);
        yield* snapshot;
      },
    };
  }
}

/**
 * Drain an async sequence into an array.
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}
