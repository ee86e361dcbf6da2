import { Router } from 'express';
import { z } from 'zod';
import { createLogger } from '@headline/config';
import { fitRequestSchema, fitText, placeLines, selectMetrics, type FontSet } from '@headline/text-fit';
import { CARD_TEMPLATES } from '../services/card-templates.js';
import { planCard } from '../services/card-plan.service.js';

const log = createLogger('cards');

// ─── Body Validation ──────────────────────────────────────────────────
const MAX_TEXT_LENGTH = 2000;

const fitBodySchema = fitRequestSchema.and(z.object({ text: z.string().max(MAX_TEXT_LENGTH) }));

const cardLayoutSchema = z.object({
  text: z.string().max(MAX_TEXT_LENGTH),
  kind: z.string().min(1),
  imageWidth: z.number().int().positive().max(10_000),
  imageHeight: z.number().int().positive().max(10_000),
});

export function createCardsRouter(fonts: FontSet): Router {
  const router = Router();

  // ─── GET /templates — Available card styles ─────────────────────────
  router.get('/templates', (_req, res) => {
    res.json({ data: Object.values(CARD_TEMPLATES) });
  });

  // ─── POST /fit — Raw fit for an arbitrary box ───────────────────────
  router.post('/fit', (req, res, next) => {
    try {
      const request = fitBodySchema.parse(req.body);
      const result = fitText(request, fonts);
      const placements = placeLines(
        result,
        { width: request.boxWidth, height: request.boxHeight },
        selectMetrics(result.glyphClass, fonts),
      );

      log.debug({ fontSize: result.fontSize, lines: result.lines.length, fitGuaranteed: result.fitGuaranteed }, 'Fit computed');
      res.json({ data: { ...result, placements } });
    } catch (err) {
      next(err);
    }
  });

  // ─── POST /layout — Full card plan for a template ───────────────────
  router.post('/layout', (req, res, next) => {
    try {
      const input = cardLayoutSchema.parse(req.body);
      const plan = planCard(input, fonts);

      if (!plan.fit.fitGuaranteed) {
        log.info({ kind: input.kind, textLength: input.text.length }, 'Card text may overflow its box');
      }
      res.json({ data: plan });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
