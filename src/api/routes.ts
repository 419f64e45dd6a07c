import express, { Router } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { StreamMonitor } from '../monitor/StreamMonitor.js';
import type { RecordingOrchestrator } from '../recording/RecordingOrchestrator.js';
import { cleanUsername } from '../roster/rosterFile.js';
import { DEFAULT_PAUSE_SECONDS } from '../control/ControlSignals.js';

export type MonitorControl = Pick<StreamMonitor, 'getStatus' | 'pause' | 'resume' | 'requestStop'>;
export type RecordingControl = Pick<RecordingOrchestrator, 'activeKeys' | 'getSession' | 'stop'>;

export interface ApiContext {
  monitor: MonitorControl;
  orchestrator: RecordingControl;
}

const pauseBody = z.object({
  seconds: z.number().int().positive().default(DEFAULT_PAUSE_SECONDS),
}).default({});

const stopBody = z.object({
  reason: z.string().min(1).default('api request'),
}).default({});

export function createApiRoutes(ctx: ApiContext): Router {
  const router = Router();

  // ─── Status ───

  router.get('/status', (_req, res) => {
    res.json(ctx.monitor.getStatus());
  });

  // ─── Polling control ───

  router.post('/pause', (req, res) => {
    const parsed = pauseBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join('; ') });
      return;
    }
    ctx.monitor.pause(parsed.data.seconds);
    res.json(ctx.monitor.getStatus());
  });

  router.post('/resume', (_req, res) => {
    ctx.monitor.resume();
    res.json(ctx.monitor.getStatus());
  });

  router.post('/stop', (req, res) => {
    const parsed = stopBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map((i) => i.message).join('; ') });
      return;
    }
    logger.info(`🛑 Stop requested over HTTP: ${parsed.data.reason}`);
    ctx.monitor.requestStop(parsed.data.reason);
    res.status(202).json({ stopping: true });
  });

  // ─── Recordings ───

  router.post('/recordings/:username/stop', async (req, res) => {
    const wanted = cleanUsername(req.params.username);
    const key = ctx.orchestrator.activeKeys().find((k) => {
      const session = ctx.orchestrator.getSession(k);
      return k === wanted || (session !== undefined && cleanUsername(session.entry.username) === wanted);
    });
    if (!key) {
      res.status(404).json({ error: `No active recording for ${wanted}` });
      return;
    }
    const summary = await ctx.orchestrator.stop(key, 'manual');
    if (!summary) {
      res.status(409).json({ error: `Recording for ${wanted} is already stopping` });
      return;
    }
    res.json(summary);
  });

  return router;
}

/** Express app with the API mounted under /api. */
export function createApiApp(ctx: ApiContext): express.Express {
  const app = express();
  app.use(express.json());
  app.use('/api', createApiRoutes(ctx));
  return app;
}

export function startApiServer(ctx: ApiContext, port: number): Promise<Server> {
  const app = createApiApp(ctx);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      const address = server.address();
      logger.info(`Status API listening on port ${typeof address === 'object' && address ? address.port : port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
