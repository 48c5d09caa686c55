import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { z } from 'zod';
import { checkDatabaseHealth } from '../config/database';
import { checkRedisHealth } from '../config/redis';
import { HandoffService } from '../services/handoff.service';
import { ImportService } from '../services/import.service';
import { AnalyticsService } from '../services/analytics.service';
import { normalizePhone } from '../utils/phone';
import { ValidationError } from '../utils/errors';

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

export interface AdminRouterDeps {
  handoff: HandoffService;
  importer: ImportService;
  analytics: AnalyticsService;
}

const replySchema = z.object({
  message: z.string().trim().min(1).max(4096),
});

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES },
});

function phoneParam(req: Request): string {
  const phone = normalizePhone(req.params.phone);
  if (!phone) {
    throw new ValidationError('Phone number required');
  }
  return phone;
}

export function createAdminRouter(deps: AdminRouterDeps): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const [dbHealth, redisHealth] = await Promise.all([checkDatabaseHealth(), checkRedisHealth()]);
    const healthy = dbHealth.status === 'healthy' && redisHealth.status === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      database: dbHealth,
      redis: redisHealth,
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/candidates', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const conversations = await deps.handoff.listConversations();
      res.json({ success: true, conversations });
    } catch (error) {
      next(error);
    }
  });

  router.get('/escalated', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const candidates = await deps.handoff.listEscalated();
      res.json({ success: true, candidates });
    } catch (error) {
      next(error);
    }
  });

  router.get('/candidates/:phone/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = phoneParam(req);
      const history = await deps.handoff.getHistory(phone);
      res.json({ success: true, phone, history });
    } catch (error) {
      next(error);
    }
  });

  router.post('/candidates/:phone/reply', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const phone = phoneParam(req);
      const parsed = replySchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join(', '));
      }

      await deps.handoff.sendAdminReply(phone, parsed.data.message);
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  router.post('/candidates/:phone/resume', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const candidate = await deps.handoff.resume(phoneParam(req));
      res.json({ success: true, phone: candidate.phone_number, status: candidate.status });
    } catch (error) {
      next(error);
    }
  });

  router.post('/candidates/import', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new ValidationError('An .xlsx file is required in the "file" field');
      }
      if (!req.file.originalname.toLowerCase().endsWith('.xlsx')) {
        throw new ValidationError('Only .xlsx files are supported');
      }

      const result = await deps.importer.importCandidates(req.file.buffer);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get('/reports', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await deps.analytics.getReport();
      res.json({ success: true, ...report });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
