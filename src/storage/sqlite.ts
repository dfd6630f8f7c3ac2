/**
 * SQLite Mailbox
 *
 * Local delivery target using better-sqlite3. Every event the dispatch queue
 * delivers becomes one row, so a run can be inspected after the fact.
 */

import Database from 'better-sqlite3';
import type { EventDescriptor, Priority } from '../types.js';

export interface DeliveryRecord {
  id: string;
  eventId: string;
  priority: Priority;
  category: string;
  targetCount: number;
  simDay: number;
  simHour: number;
  theme: string;
  attempt: number;
  deliveredAt: Date;
}

interface DeliveryRow {
  id: string;
  event_id: string;
  priority: Priority;
  category: string;
  target_count: number;
  sim_day: number;
  sim_hour: number;
  theme: string;
  attempt: number;
  delivered_at: string;
}

const REQUIRED_COLUMNS = [
  'id',
  'event_id',
  'priority',
  'category',
  'target_count',
  'sim_day',
  'sim_hour',
  'theme',
  'attempt',
  'delivered_at',
];

export class SQLiteMailbox {
  private db: Database.Database;

  constructor(dbPath: string = ':memory:') {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS deliveries (
        id TEXT PRIMARY KEY,
        event_id TEXT NOT NULL,
        priority TEXT NOT NULL,
        category TEXT NOT NULL,
        target_count INTEGER NOT NULL,
        sim_day INTEGER NOT NULL,
        sim_hour INTEGER NOT NULL,
        theme TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        delivered_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_deliveries_delivered_at ON deliveries(delivered_at);
    `);
  }

  recordDelivery(id: string, event: EventDescriptor, attempt: number, deliveredAt: Date): void {
    this.db
      .prepare(
        `INSERT INTO deliveries
          (id, event_id, priority, category, target_count, sim_day, sim_hour, theme, attempt, delivered_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        event.id,
        event.priority,
        event.category,
        event.targetCount,
        event.simDay,
        event.simHour,
        event.theme,
        attempt,
        deliveredAt.toISOString()
      );
  }

  /** Most recent deliveries first */
  getDeliveries(limit = 50): DeliveryRecord[] {
    const rows = this.db
      .prepare<[number], DeliveryRow>('SELECT * FROM deliveries ORDER BY delivered_at DESC, rowid DESC LIMIT ?')
      .all(limit);

    return rows.map((row) => ({
      id: row.id,
      eventId: row.event_id,
      priority: row.priority,
      category: row.category,
      targetCount: row.target_count,
      simDay: row.sim_day,
      simHour: row.sim_hour,
      theme: row.theme,
      attempt: row.attempt,
      deliveredAt: new Date(row.delivered_at),
    }));
  }

  countDeliveries(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM deliveries').get();
    return row?.count ?? 0;
  }

  /**
   * Check that the deliveries table has every column the sender writes.
   */
  validateSchema(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const columns = this.db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('deliveries')")
      .all()
      .map((c) => c.name);

    if (columns.length === 0) {
      errors.push('Missing table: deliveries');
    } else {
      for (const column of REQUIRED_COLUMNS) {
        if (!columns.includes(column)) {
          errors.push(`Missing column: deliveries.${column}`);
        }
      }
    }

    return { valid: errors.length === 0, errors };
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}

// Factory function
export function createMailbox(dbPath?: string): SQLiteMailbox {
  return new SQLiteMailbox(dbPath);
}
