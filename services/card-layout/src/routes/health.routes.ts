import { Router } from 'express';
import type { FontSet } from '@headline/text-fit';

export interface HealthFonts extends FontSet {
  readonly usingFallback?: boolean;
}

export function createHealthRouter(service: string, fonts: HealthFonts): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const checks: Record<string, string> = {
      fonts: fonts.usingFallback ? 'fallback' : 'ok',
      emojiFont: fonts.emoji ? 'ok' : 'degraded',
    };

    // Missing fonts degrade measurement but never stop the service
    res.status(200).json({
      status: 'ok',
      service,
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  return router;
}
