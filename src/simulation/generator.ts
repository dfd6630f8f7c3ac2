/**
 * Scenario Generator
 *
 * Derives event descriptors and issue changes from the simulated calendar
 * position. All randomness comes from one seedable source, so a generator
 * rebuilt with the same seed replays the same week.
 */

import { v4 as uuid } from 'uuid';
import {
  INJECTION_THRESHOLDS,
  ISSUE_CATALOGUE,
  JITTER_RANGE,
  HOUR_MULTIPLIERS,
  isBusinessHour,
  themeForDay,
  type DayTheme,
} from './scenarios.js';
import { ConfigurationError } from '../errors.js';
import { SeededRandom, pick, uniform, type RandomSource } from '../utils/random.js';
import { createEventId, createIssueId, PRIORITIES } from '../types.js';
import type { EventDescriptor, Issue, IssueType, Priority } from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface GeneratorOptions {
  seed?: number;
  /** Supply a source directly, e.g. a scripted one in tests */
  random?: RandomSource;
}

export interface TickPlan {
  theme: DayTheme;
  jitter: number;
  total: number;
  counts: Record<Priority, number>;
}

export interface IssueChanges {
  created: Issue[];
  resolved: Issue[];
  /** The issue set after this tick: still-active issues plus the new ones */
  issues: Issue[];
}

// =============================================================================
// GENERATOR
// =============================================================================

export class ScenarioGenerator {
  private random: RandomSource;

  constructor(options: GeneratorOptions = {}) {
    this.random = options.random ?? new SeededRandom(options.seed);
  }

  get seed(): number {
    return this.random.seed;
  }

  /**
   * Restart the random sequence.
   */
  reseed(seed: number): void {
    this.random = new SeededRandom(seed);
  }

  themeFor(simDay: number): DayTheme {
    assertPosition(simDay, 0);
    return themeForDay(simDay);
  }

  /**
   * Decide how many events each priority tier gets this tick.
   * Consumes one random draw (the jitter).
   */
  plan(simDay: number, simHour: number, issues: readonly Issue[]): TickPlan {
    assertPosition(simDay, simHour);

    const theme = themeForDay(simDay);
    const active = issues.filter((i) => i.status === 'active');

    const volumeFactor = active.reduce((acc, issue) => acc * ISSUE_CATALOGUE[issue.type].volumeFactor, 1);
    const jitter = uniform(this.random, JITTER_RANGE.min, JITTER_RANGE.max);
    const total = Math.round(theme.baseRate * HOUR_MULTIPLIERS[simHour] * volumeFactor * jitter);

    const weights = { ...theme.priorityWeights };
    for (const issue of active) {
      const boost = ISSUE_CATALOGUE[issue.type].priorityBoost;
      for (const priority of PRIORITIES) {
        weights[priority] += boost[priority] ?? 0;
      }
    }

    return { theme, jitter, total, counts: apportion(total, weights) };
  }

  /**
   * Lazily yield one descriptor per non-empty priority tier, critical first.
   * The plan is drawn when iteration starts.
   */
  *generate(simDay: number, simHour: number, issues: readonly Issue[]): Generator<EventDescriptor> {
    const plan = this.plan(simDay, simHour, issues);
    const latestIssue = [...issues].reverse().find((i) => i.status === 'active');

    for (const priority of PRIORITIES) {
      const targetCount = plan.counts[priority];
      if (targetCount === 0) continue;

      const issueDriven = priority === 'critical' && latestIssue !== undefined;
      const category = issueDriven ? latestIssue.category : pick(this.random, plan.theme.categories);

      const event: EventDescriptor = {
        id: createEventId(uuid()),
        priority,
        category,
        targetCount,
        simDay,
        simHour,
        theme: plan.theme.name,
        ...(issueDriven ? { issueId: latestIssue.id } : {}),
      };
      yield Object.freeze(event);
    }
  }

  /**
   * Roll issue resolution for every active issue, then issue injection for
   * every theme issue type that was not already active.
   */
  evolveIssues(simDay: number, simHour: number, issues: readonly Issue[]): IssueChanges {
    assertPosition(simDay, simHour);

    const theme = themeForDay(simDay);
    const activeTypes = new Set<IssueType>(issues.filter((i) => i.status === 'active').map((i) => i.type));

    const resolved: Issue[] = [];
    const remaining: Issue[] = [];
    for (const issue of issues) {
      if (issue.status !== 'active') continue;
      if (this.random.next() < ISSUE_CATALOGUE[issue.type].resolveChance) {
        resolved.push(this.resolveIssue(issue, simDay, simHour));
      } else {
        remaining.push(issue);
      }
    }

    const threshold = isBusinessHour(simHour)
      ? INJECTION_THRESHOLDS.businessHours
      : INJECTION_THRESHOLDS.offHours;

    const created: Issue[] = [];
    for (const type of theme.issueTypes) {
      const draw = this.random.next();
      if (activeTypes.has(type)) continue;
      if (draw < threshold) {
        created.push(this.createIssue(type, simDay, simHour));
      }
    }

    return { created, resolved, issues: [...remaining, ...created] };
  }

  createIssue(type: IssueType, simDay: number, simHour: number): Issue {
    const def = ISSUE_CATALOGUE[type];
    return {
      id: createIssueId(uuid()),
      type,
      category: def.category,
      title: def.title,
      severity: def.severity,
      createdAtSimDay: simDay,
      createdAtSimHour: simHour,
      status: 'active',
    };
  }

  resolveIssue(issue: Issue, simDay: number, simHour: number): Issue {
    return { ...issue, status: 'resolved', resolvedAtSimDay: simDay, resolvedAtSimHour: simHour };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Split `total` across tiers in proportion to `weights` using largest
 * remainders. Ties go to the higher priority. Counts always sum to `total`.
 */
export function apportion(total: number, weights: Record<Priority, number>): Record<Priority, number> {
  const counts: Record<Priority, number> = { critical: 0, high: 0, normal: 0, low: 0 };
  const weightSum = PRIORITIES.reduce((acc, p) => acc + Math.max(0, weights[p]), 0);
  if (total <= 0 || weightSum === 0) return counts;

  const remainders: Array<{ priority: Priority; fraction: number }> = [];
  let assigned = 0;
  for (const priority of PRIORITIES) {
    const exact = (total * Math.max(0, weights[priority])) / weightSum;
    counts[priority] = Math.floor(exact);
    assigned += counts[priority];
    remainders.push({ priority, fraction: exact - counts[priority] });
  }

  // Stable sort keeps PRIORITIES order among equal fractions
  remainders.sort((a, b) => b.fraction - a.fraction);
  for (let i = 0; i < total - assigned; i++) {
    counts[remainders[i].priority]++;
  }
  return counts;
}

function assertPosition(simDay: number, simHour: number): void {
  if (!Number.isInteger(simDay) || simDay < 1 || simDay > 7) {
    throw new ConfigurationError(`Simulated day must be 1-7, got ${simDay}`, 'simDay');
  }
  if (!Number.isInteger(simHour) || simHour < 0 || simHour > 23) {
    throw new ConfigurationError(`Simulated hour must be 0-23, got ${simHour}`, 'simHour');
  }
}
