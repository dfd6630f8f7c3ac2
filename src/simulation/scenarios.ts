/**
 * Business Week Scenarios
 *
 * Day themes, hour-of-day volume curve and the issue catalogue.
 * Issue effects live here as data so the generator never special-cases an
 * issue type.
 */

import type { IssueSeverity, IssueType, Priority } from '../types.js';

// =============================================================================
// DAY THEMES
// =============================================================================

export interface DayTheme {
  key: string;
  name: string;
  /** Events per simulated hour before hour and issue scaling */
  baseRate: number;
  priorityWeights: Record<Priority, number>;
  categories: readonly string[];
  issueTypes: readonly IssueType[];
}

/** Monday..Friday; simulated days 6 and 7 wrap around to Monday and Tuesday */
export const DAY_THEMES: readonly DayTheme[] = [
  {
    key: 'monday_rush',
    name: 'Monday Morning Rush',
    baseRate: 12,
    priorityWeights: { critical: 0.05, high: 0.35, normal: 0.45, low: 0.15 },
    categories: ['weekly_order', 'order_backlog', 'customer_inquiry', 'internal_coordination'],
    issueTypes: ['server_overload', 'weekend_order_backlog'],
  },
  {
    key: 'quality_crisis',
    name: 'Quality Control Crisis',
    baseRate: 5,
    priorityWeights: { critical: 0.2, high: 0.4, normal: 0.3, low: 0.1 },
    categories: ['quality_complaint', 'defective_batch_alert', 'quality_review'],
    issueTypes: ['quality_complaints', 'defective_batch'],
  },
  {
    key: 'supply_disruption',
    name: 'Supply Chain Disruption',
    baseRate: 12,
    priorityWeights: { critical: 0.15, high: 0.35, normal: 0.35, low: 0.15 },
    categories: ['supplier_update', 'material_shortage', 'logistics_coordination'],
    issueTypes: ['supplier_delay', 'material_shortage'],
  },
  {
    key: 'customer_escalation',
    name: 'Customer Escalation Day',
    baseRate: 20,
    priorityWeights: { critical: 0.15, high: 0.45, normal: 0.3, low: 0.1 },
    categories: ['customer_escalation', 'refund_request', 'customer_follow_up'],
    issueTypes: ['customer_complaints', 'delivery_delays'],
  },
  {
    key: 'friday_chaos',
    name: 'Friday Pressure Cooker',
    baseRate: 35,
    priorityWeights: { critical: 0.2, high: 0.35, normal: 0.3, low: 0.15 },
    categories: ['emergency_order', 'capacity_alert', 'week_summary', 'logistics_planning'],
    issueTypes: ['system_overload', 'staff_shortage', 'urgent_orders'],
  },
];

// =============================================================================
// HOUR CURVE
// =============================================================================

export const HOUR_MULTIPLIERS: readonly number[] = [
  0.2, 0.2, 0.2, 0.2, 0.2, 0.2, 0.2,  // 00-06 night
  0.6, 0.6,                           // 07-08 early
  1.5, 1.5, 1.5,                      // 09-11 morning rush
  1.0,                                // 12 lunch
  1.3, 1.3, 1.3,                      // 13-15 afternoon peak
  1.8, 1.8, 1.8,                      // 16-18 end-of-day rush
  0.6, 0.6, 0.6,                      // 19-21 evening
  0.2, 0.2,                           // 22-23 night
];

export const BUSINESS_HOURS = { first: 9, last: 18 } as const;

/** Per-tick chance that a theme's issue type breaks out */
export const INJECTION_THRESHOLDS = { businessHours: 0.3, offHours: 0.05 } as const;

export const JITTER_RANGE = { min: 0.7, max: 1.3 } as const;

// =============================================================================
// ISSUE CATALOGUE
// =============================================================================

export interface IssueDefinition {
  type: IssueType;
  title: string;
  description: string;
  /** Category of the critical events this issue raises */
  category: string;
  severity: IssueSeverity;
  /** Added to the theme's priority weights while the issue is active */
  priorityBoost: Partial<Record<Priority, number>>;
  /** Multiplies tick volume while the issue is active */
  volumeFactor: number;
  /** Per-tick chance the issue clears on its own */
  resolveChance: number;
}

export const ISSUE_CATALOGUE: Record<IssueType, IssueDefinition> = {
  server_overload: {
    type: 'server_overload',
    title: 'Server Overload',
    description: 'Email processing servers at 95% capacity',
    category: 'infrastructure_alert',
    severity: 'high',
    priorityBoost: { high: 0.1 },
    volumeFactor: 1.1,
    resolveChance: 0.2,
  },
  weekend_order_backlog: {
    type: 'weekend_order_backlog',
    title: 'Weekend Order Backlog',
    description: '127 orders accumulated over weekend',
    category: 'order_backlog',
    severity: 'medium',
    priorityBoost: { high: 0.1 },
    volumeFactor: 1.2,
    resolveChance: 0.25,
  },
  quality_complaints: {
    type: 'quality_complaints',
    title: 'Quality Complaint Spike',
    description: '15% increase in quality complaints',
    category: 'quality_complaint',
    severity: 'high',
    priorityBoost: { critical: 0.1, high: 0.05 },
    volumeFactor: 1.15,
    resolveChance: 0.15,
  },
  defective_batch: {
    type: 'defective_batch',
    title: 'Defective Batch',
    description: 'Batch failure rate above tolerance',
    category: 'defective_batch_alert',
    severity: 'critical',
    priorityBoost: { critical: 0.2 },
    volumeFactor: 1.1,
    resolveChance: 0.1,
  },
  supplier_delay: {
    type: 'supplier_delay',
    title: 'Supplier Delivery Delay',
    description: 'Key materials delayed by 72 hours',
    category: 'supplier_update',
    severity: 'critical',
    priorityBoost: { critical: 0.15 },
    volumeFactor: 1.0,
    resolveChance: 0.1,
  },
  material_shortage: {
    type: 'material_shortage',
    title: 'Material Shortage',
    description: 'Material levels insufficient for planned production',
    category: 'material_shortage',
    severity: 'high',
    priorityBoost: { high: 0.15 },
    volumeFactor: 1.05,
    resolveChance: 0.15,
  },
  customer_complaints: {
    type: 'customer_complaints',
    title: 'Customer Complaint Escalation',
    description: 'VIP customer threatening contract cancellation',
    category: 'customer_escalation',
    severity: 'critical',
    priorityBoost: { critical: 0.2, high: 0.1 },
    volumeFactor: 1.25,
    resolveChance: 0.1,
  },
  delivery_delays: {
    type: 'delivery_delays',
    title: 'Delivery Delays',
    description: 'Outbound shipments running behind schedule',
    category: 'logistics_coordination',
    severity: 'high',
    priorityBoost: { high: 0.1 },
    volumeFactor: 1.1,
    resolveChance: 0.2,
  },
  system_overload: {
    type: 'system_overload',
    title: 'System Overload',
    description: 'All agents at maximum capacity',
    category: 'capacity_alert',
    severity: 'high',
    priorityBoost: { critical: 0.1 },
    volumeFactor: 1.3,
    resolveChance: 0.15,
  },
  staff_shortage: {
    type: 'staff_shortage',
    title: 'Staff Shortage',
    description: 'Teams running below minimum staffing',
    category: 'internal_coordination',
    severity: 'medium',
    priorityBoost: { normal: 0.1 },
    volumeFactor: 1.0,
    resolveChance: 0.25,
  },
  urgent_orders: {
    type: 'urgent_orders',
    title: 'Urgent Orders',
    description: 'Last-minute orders demanding weekend delivery',
    category: 'emergency_order',
    severity: 'high',
    priorityBoost: { critical: 0.1, high: 0.1 },
    volumeFactor: 1.2,
    resolveChance: 0.2,
  },
};

export function themeForDay(simDay: number): DayTheme {
  return DAY_THEMES[(simDay - 1) % DAY_THEMES.length];
}

export function isBusinessHour(simHour: number): boolean {
  return simHour >= BUSINESS_HOURS.first && simHour <= BUSINESS_HOURS.last;
}
