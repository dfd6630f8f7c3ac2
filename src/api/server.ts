/**
 * TimeWarp API Server
 *
 * Hono-based control surface for the simulation engine.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { TimeWarpEngine } from '../engine.js';
import type { SQLiteMailbox } from '../storage/sqlite.js';

export interface AppOptions {
  /** Enables GET /api/deliveries */
  mailbox?: SQLiteMailbox;
}

const MAX_DELIVERY_PAGE = 500;

export function createApp(engine: TimeWarpEngine, options: AppOptions = {}): Hono {
  const app = new Hono();

  // ===========================================================================
  // MIDDLEWARE
  // ===========================================================================

  app.use('*', cors());

  // ===========================================================================
  // STATUS
  // ===========================================================================

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/status', (c) => {
    return c.json(engine.getStatus());
  });

  app.get('/api/speed-levels', (c) => {
    return c.json({ levels: engine.getSpeedLevels(), current: engine.clock.level });
  });

  app.get('/api/workers', (c) => {
    return c.json({
      workers: engine.getWorkers(),
      healthScore: engine.monitor.healthScore(),
      totalErrors: engine.monitor.totalErrors(),
    });
  });

  // ===========================================================================
  // CONTROL
  // ===========================================================================

  app.post('/api/speed', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const level = readLevel(body);
    if (level === undefined) {
      return c.json({ error: 'Body must contain a numeric "level"' }, 400);
    }
    if (!engine.setSpeedLevel(level)) {
      return c.json({ error: `Invalid speed level: ${level}. Must be 1-${engine.getSpeedLevels().length}.` }, 400);
    }

    return c.json({ success: true, status: engine.getStatus() });
  });

  app.post('/api/simulation/start', async (c) => {
    try {
      await engine.startContinuousSimulation();
      return c.json({ success: true, status: engine.getStatus() });
    } catch (error) {
      console.error('Start simulation error:', error);
      const message = error instanceof Error ? error.message : String(error);
      return c.json({ error: `Failed to start simulation: ${message}` }, 500);
    }
  });

  app.post('/api/simulation/pause', (c) => {
    engine.pauseClock();
    return c.json({ success: true, status: engine.getStatus() });
  });

  app.post('/api/simulation/resume', (c) => {
    engine.resumeClock();
    return c.json({ success: true, status: engine.getStatus() });
  });

  app.post('/api/simulation/reset', (c) => {
    engine.resetSimulation();
    return c.json({ success: true, status: engine.getStatus() });
  });

  app.post('/api/simulation/stop', async (c) => {
    await engine.stopContinuousSimulation();
    return c.json({ success: true, status: engine.getStatus() });
  });

  // ===========================================================================
  // ISSUES & DELIVERIES
  // ===========================================================================

  app.get('/api/issues', (c) => {
    return c.json({ issues: engine.getIssues() });
  });

  app.post('/api/issues/:id/resolve', (c) => {
    const issue = engine.resolveIssue(c.req.param('id'));
    if (!issue) {
      return c.json({ error: 'Issue not found' }, 404);
    }
    return c.json({ success: true, issue });
  });

  app.get('/api/deliveries', (c) => {
    const { mailbox } = options;
    if (!mailbox) {
      return c.json({ error: 'No mailbox configured' }, 404);
    }

    const requested = parseInt(c.req.query('limit') ?? '50', 10);
    const limit = Number.isNaN(requested) ? 50 : Math.min(Math.max(requested, 1), MAX_DELIVERY_PAGE);

    try {
      return c.json({ total: mailbox.countDeliveries(), deliveries: mailbox.getDeliveries(limit) });
    } catch (error) {
      console.error('Get deliveries error:', error);
      return c.json({ error: 'Failed to read deliveries' }, 500);
    }
  });

  return app;
}

function readLevel(body: unknown): number | undefined {
  if (typeof body !== 'object' || body === null || !('level' in body)) return undefined;
  const { level } = body;
  if (typeof level === 'number') return level;
  if (typeof level === 'string' && level.trim() !== '' && !Number.isNaN(Number(level))) return Number(level);
  return undefined;
}

// =============================================================================
// SERVER START
// =============================================================================

export function startServer(app: Hono, port: number): ReturnType<typeof serve> {
  return serve(
    {
      fetch: app.fetch,
      port,
    },
    (info) => {
      console.log(`TimeWarp server running at http://localhost:${info.port}`);
    }
  );
}
