/**
 * Senders - where delivered events end up
 */

import { v4 as uuid } from 'uuid';
import { SQLiteMailbox } from '../storage/sqlite.js';
import { SeededRandom, type RandomSource } from '../utils/random.js';
import { TerminalDeliveryError, TransientDeliveryError, classifyDeliveryError } from '../errors.js';
import { createReceiptId } from '../types.js';
import type { DeliveryResult, EventDescriptor, Sender, TimeSource } from '../types.js';

export interface MailboxSenderOptions {
  /** Share of deliveries that fail transiently before touching the mailbox */
  failureRate?: number;
  random?: RandomSource;
  timeSource?: TimeSource;
}

/**
 * Writes each event into the local SQLite mailbox. Lock contention surfaces
 * as a transient failure; anything else SQLite rejects is terminal.
 */
export class MailboxSender implements Sender {
  private readonly failureRate: number;
  private readonly random: RandomSource;
  private readonly timeSource: TimeSource;

  constructor(
    private readonly mailbox: SQLiteMailbox,
    options: MailboxSenderOptions = {}
  ) {
    this.failureRate = options.failureRate ?? 0;
    this.random = options.random ?? new SeededRandom();
    this.timeSource = options.timeSource ?? (() => Date.now());
  }

  async open(): Promise<void> {
    if (!this.mailbox.isOpen) {
      throw new TerminalDeliveryError('Mailbox database is closed');
    }
    const { valid, errors } = this.mailbox.validateSchema();
    if (!valid) {
      throw new TerminalDeliveryError(`Mailbox schema invalid: ${errors.join('; ')}`);
    }
  }

  async deliver(event: EventDescriptor, attempt: number): Promise<DeliveryResult> {
    if (this.failureRate > 0 && this.random.next() < this.failureRate) {
      return { ok: false, error: new TransientDeliveryError(`Mailbox temporarily unavailable for ${event.id}`) };
    }

    const id = createReceiptId(uuid());
    const deliveredAt = new Date(this.timeSource());
    try {
      this.mailbox.recordDelivery(id, event, attempt, deliveredAt);
    } catch (error) {
      return { ok: false, error: classifyDeliveryError(error) };
    }

    return { ok: true, receipt: { id, eventId: event.id, deliveredAt, attempt } };
  }

  async close(): Promise<void> {
    this.mailbox.close();
  }
}

export function createMailboxSender(mailbox: SQLiteMailbox, options?: MailboxSenderOptions): MailboxSender {
  return new MailboxSender(mailbox, options);
}
