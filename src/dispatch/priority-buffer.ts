/**
 * Priority buffer for pending events
 *
 * One FIFO per tier, drained highest tier first.
 * - push: O(1)
 * - peek/shift: O(tiers)
 * - overflow eviction: O(tiers)
 *
 * Tiers are arrays rather than one sorted list so same-priority order is the
 * enqueue order without a sequence number.
 */

import { PRIORITIES } from '../types.js';
import type { EventDescriptor, Priority } from '../types.js';

export class PriorityBuffer {
  private tiers: Record<Priority, EventDescriptor[]> = {
    critical: [],
    high: [],
    normal: [],
    low: [],
  };
  private size = 0;

  constructor(readonly capacity: number) {}

  /**
   * Add an event. When full, evicts the oldest event of the lowest non-empty
   * tier that does not outrank the newcomer; if everything buffered outranks
   * it, the newcomer is the one dropped.
   *
   * @returns The dropped event, if any
   */
  push(event: EventDescriptor): EventDescriptor | undefined {
    let dropped: EventDescriptor | undefined;

    if (this.size >= this.capacity) {
      dropped = this.evictFor(event.priority);
      if (dropped === undefined) return event;
    }

    this.tiers[event.priority].push(event);
    this.size++;
    return dropped;
  }

  peek(): EventDescriptor | undefined {
    for (const priority of PRIORITIES) {
      const tier = this.tiers[priority];
      if (tier.length > 0) return tier[0];
    }
    return undefined;
  }

  shift(): EventDescriptor | undefined {
    for (const priority of PRIORITIES) {
      const next = this.tiers[priority].shift();
      if (next) {
        this.size--;
        return next;
      }
    }
    return undefined;
  }

  get length(): number {
    return this.size;
  }

  depthByPriority(): Record<Priority, number> {
    return {
      critical: this.tiers.critical.length,
      high: this.tiers.high.length,
      normal: this.tiers.normal.length,
      low: this.tiers.low.length,
    };
  }

  clear(): void {
    for (const priority of PRIORITIES) {
      this.tiers[priority] = [];
    }
    this.size = 0;
  }

  private evictFor(incoming: Priority): EventDescriptor | undefined {
    const incomingRank = PRIORITIES.indexOf(incoming);
    for (let rank = PRIORITIES.length - 1; rank >= incomingRank; rank--) {
      const evicted = this.tiers[PRIORITIES[rank]].shift();
      if (evicted) {
        this.size--;
        return evicted;
      }
    }
    return undefined;
  }
}
