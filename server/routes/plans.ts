/**
 * Plan Routes
 * Create a trip plan, fetch it again, and inspect how the agents built it
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { planRequestSchema } from '@shared/schema';
import { isAIConfigured } from '../services/aiClientFactory';
import { STYLE_CATALOGUE } from '../services/agents/styleClassifier';
import { PlanValidationError, type PlanService } from '../services/planService';
import { planCreationRateLimiter, planReadRateLimiter } from '../middleware/rateLimiter';

export interface PlansRouterOptions {
  service: Pick<PlanService, 'createPlan' | 'getPlan'>;
  /** Whether a language-model provider is configured */
  aiReady?: () => boolean;
  /** Off in tests, which share one client IP */
  rateLimit?: boolean;
}

export function createPlansRouter({ service, aiReady = isAIConfigured, rateLimit = true }: PlansRouterOptions): Router {
  const router = Router();
  const passThrough: RequestHandler = (_req, _res, next) => next();
  const createLimit: RequestHandler = rateLimit ? planCreationRateLimiter : passThrough;
  const readLimit: RequestHandler = rateLimit ? planReadRateLimiter : passThrough;

  /**
   * GET /api/plans/styles
   * Travel style catalogue used by the classifier
   */
  router.get('/styles', readLimit, (_req: Request, res: Response) => {
    res.json({
      styles: Object.values(STYLE_CATALOGUE).map((style) => ({
        id: style.id,
        name: style.name,
        keywords: style.keywords,
        characteristics: style.characteristics,
        recommendations: style.recommendations,
      })),
    });
  });

  /**
   * POST /api/plans
   * Run the full planning flow and store the result
   */
  router.post('/', createLimit, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = planRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      return res.status(400).json({
        error: 'validation_error',
        message: issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid request',
        details: parsed.error.flatten(),
      });
    }

    if (!aiReady()) {
      return res.status(503).json({
        error: 'ai_unavailable',
        message: 'No AI provider configured. Set OPENAI_API_KEY or DEEPSEEK_API_KEY.',
      });
    }

    try {
      const result = await service.createPlan(parsed.data);
      if (!result.ok) {
        return res.status(502).json({
          error: 'orchestration_failed',
          message: result.error,
          collaborationLog: result.collaborationLog,
        });
      }
      return res.status(201).json({ planId: result.plan.id, plan: result.plan });
    } catch (error) {
      if (error instanceof PlanValidationError) {
        return res.status(400).json({ error: 'validation_error', message: error.message, field: error.field });
      }
      return next(error);
    }
  });

  /**
   * GET /api/plans/:id
   */
  router.get('/:id', readLimit, (req: Request, res: Response) => {
    const plan = service.getPlan(req.params.id);
    if (!plan) {
      return res.status(404).json({ error: 'not_found', message: 'Plan not found or expired' });
    }
    return res.json(plan);
  });

  /**
   * GET /api/plans/:id/commands
   * Collaboration log of the run that produced the plan
   */
  router.get('/:id/commands', readLimit, (req: Request, res: Response) => {
    const plan = service.getPlan(req.params.id);
    if (!plan) {
      return res.status(404).json({ error: 'not_found', message: 'Plan not found or expired' });
    }
    return res.json({ planId: plan.id, ...plan.collaborationLog });
  });

  return router;
}
