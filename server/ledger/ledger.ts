import { LedgerEvent } from '../../shared/schema';
import { GENESIS_HASH } from './constants';
import { hashObject } from './hash';

export interface LedgerEventDraft
  extends Omit<LedgerEvent, 'id' | 'prev_hash' | 'event_hash'> {
  id?: string;
}

export interface LedgerIntegrityReport {
  ok: boolean;
  events: number;
  errors: string[];
}

function stripEventHash(event: LedgerEvent): Omit<LedgerEvent, 'event_hash'> {
  const { event_hash, ...rest } = event;
  return rest;
}

/**
 * Append-only event log. Each event commits to its predecessor's hash, so a
 * checkpoint edited after the fact fails `verifyIntegrity`.
 */
export class Ledger {
  private events: LedgerEvent[] = [];

  constructor(initialEvents?: LedgerEvent[]) {
    if (initialEvents && initialEvents.length > 0) {
      this.events = [...initialEvents];
    }
  }

  getEvents(): LedgerEvent[] {
    return [...this.events];
  }

  size(): number {
    return this.events.length;
  }

  getLatestHash(): string {
    if (this.events.length === 0) {
      return GENESIS_HASH;
    }
    return this.events[this.events.length - 1].event_hash;
  }

  append(draft: LedgerEventDraft): LedgerEvent {
    const prev_hash = this.getLatestHash();
    const sequence = this.events.length;
    const id =
      draft.id ??
      hashObject({
        prev_hash,
        sequence,
        type: draft.type,
        actor_id: draft.actor_id,
        tx_hash: draft.tx_hash ?? null,
      });

    const eventBase: LedgerEvent = {
      ...draft,
      id,
      prev_hash,
      event_hash: '',
    };

    const event_hash = hashObject(stripEventHash(eventBase));
    const event: LedgerEvent = { ...eventBase, event_hash };

    this.events.push(event);
    return event;
  }

  verifyIntegrity(): LedgerIntegrityReport {
    const errors: string[] = [];
    for (let i = 0; i < this.events.length; i += 1) {
      const event = this.events[i];
      const expectedPrev = i === 0 ? GENESIS_HASH : this.events[i - 1].event_hash;
      if (event.prev_hash !== expectedPrev) {
        errors.push(`event ${event.id} has invalid prev_hash`);
      }

      const expectedHash = hashObject(stripEventHash(event));
      if (event.event_hash !== expectedHash) {
        errors.push(`event ${event.id} has invalid event_hash`);
      }
      if (i > 0 && event.height < this.events[i - 1].height) {
        errors.push(`event ${event.id} has decreasing height`);
      }
    }

    return { ok: errors.length === 0, events: this.events.length, errors };
  }
}
