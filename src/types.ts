/**
 * TimeWarp Core Types
 *
 * Foundational types for the clock, scenario generator, orchestrator and
 * dispatch queue.
 */

import type { DeliveryError } from './errors.js';

// ============================================================================
// IDENTIFIERS (branded types for type safety)
// ============================================================================

export type IssueId = string & { readonly __brand: 'IssueId' };
export type EventId = string & { readonly __brand: 'EventId' };
export type ReceiptId = string & { readonly __brand: 'ReceiptId' };

// ID factories
export const createIssueId = (id: string): IssueId => id as IssueId;
export const createEventId = (id: string): EventId => id as EventId;
export const createReceiptId = (id: string): ReceiptId => id as ReceiptId;

/** Milliseconds since the Unix epoch, read from the real world. */
export type TimeSource = () => number;

// ============================================================================
// CLOCK
// ============================================================================

export type SpeedLevel = 1 | 2 | 3 | 4 | 5;

export interface SpeedLevelDefinition {
  level: SpeedLevel;
  name: string;
  /** Simulated seconds per real second */
  multiplier: number;
  description: string;
}

export interface ClockState {
  simulatedEpoch: number;
  realAnchor: number;
  level: SpeedLevel;
  running: boolean;
}

// ============================================================================
// SCENARIOS
// ============================================================================

export type Priority = 'critical' | 'high' | 'normal' | 'low';

/** Drain order, highest first */
export const PRIORITIES: readonly Priority[] = ['critical', 'high', 'normal', 'low'];

export type IssueSeverity = 'medium' | 'high' | 'critical';

export type IssueType =
  | 'server_overload'
  | 'weekend_order_backlog'
  | 'quality_complaints'
  | 'defective_batch'
  | 'supplier_delay'
  | 'material_shortage'
  | 'customer_complaints'
  | 'delivery_delays'
  | 'system_overload'
  | 'staff_shortage'
  | 'urgent_orders';

export interface Issue {
  id: IssueId;
  type: IssueType;
  category: string;
  title: string;
  severity: IssueSeverity;
  createdAtSimDay: number;
  createdAtSimHour: number;
  status: 'active' | 'resolved';
  resolvedAtSimDay?: number;
  resolvedAtSimHour?: number;
}

export interface EventDescriptor {
  readonly id: EventId;
  readonly priority: Priority;
  readonly category: string;
  readonly targetCount: number;
  readonly simDay: number;
  readonly simHour: number;
  readonly theme: string;
  /** Set when the event was raised by an active issue */
  readonly issueId?: IssueId;
}

export interface CycleState {
  cycleNumber: number;
  /** 1..7 */
  simDay: number;
  /** 0..23 */
  simHour: number;
  issues: Issue[];
}

export type OrchestratorPhase = 'idle' | 'running' | 'stopping';

// ============================================================================
// DELIVERY
// ============================================================================

export interface DeliveryReceipt {
  id: ReceiptId;
  eventId: EventId;
  deliveredAt: Date;
  attempt: number;
}

export type DeliveryResult =
  | { ok: true; receipt: DeliveryReceipt }
  | { ok: false; error: DeliveryError };

/**
 * External collaborator that carries events out of the simulator.
 * Only ever called from the dispatch queue's single consumer.
 */
export interface Sender {
  deliver(event: EventDescriptor, attempt: number): Promise<DeliveryResult>;
  open?(): Promise<void>;
  close?(): Promise<void>;
}

/** Where the orchestrator forwards generated events */
export interface EventSink {
  enqueue(event: EventDescriptor): void;
}

export interface DispatchMetrics {
  depth: number;
  depthByPriority: Record<Priority, number>;
  delivered: number;
  deliveryErrors: number;
  retried: number;
  dropped: number;
  recentRateMinute: number;
  recentRateHour: number;
}

// ============================================================================
// LIFECYCLE
// ============================================================================

export type WorkerName = 'clock' | 'orchestrator' | 'dispatcher';

export const WORKER_NAMES: readonly WorkerName[] = ['clock', 'orchestrator', 'dispatcher'];

export type WorkerState = 'stopped' | 'starting' | 'active' | 'errored';

export interface WorkerStatus {
  name: WorkerName;
  state: WorkerState;
  lastActivity: Date;
  errorCount: number;
  lastError?: string;
}

// ============================================================================
// STATUS
// ============================================================================

export interface SimulationStatus {
  cycleNumber: number;
  simDay: number;
  simHour: number;
  speedLevel: SpeedLevel;
  running: boolean;
  activeIssueCount: number;
  queueDepth: number;
  recentRateMinute: number;
  recentRateHour: number;
  healthScore: number;
  speedName: string;
  multiplier: number;
  paused: boolean;
  simulatedTime: string;
  completedCycles: number;
  delivered: number;
  deliveryErrors: number;
  dropped: number;
  theme: string;
}
