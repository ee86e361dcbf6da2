import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config, createLogger, resolveFontPaths } from '@headline/config';
import { FontCache } from '@headline/text-fit';
import { createCardsRouter } from './routes/cards.routes.js';
import { createHealthRouter } from './routes/health.routes.js';
import { errorHandler } from './middleware/error-handler.js';

const log = createLogger('card-layout');

// Fonts are loaded once here and shared read-only by every request
const fonts = FontCache.open(resolveFontPaths(config));

const app = express();

app.use(helmet());
app.use(cors({ origin: config.APP_URL, credentials: true }));
app.use(express.json({ limit: '100kb' }));

app.use(createHealthRouter('card-layout', fonts));
app.use('/cards', createCardsRouter(fonts));

app.use(errorHandler);

const PORT = config.PORT || config.CARD_LAYOUT_SERVICE_PORT;
const server = app.listen(PORT, () => {
  log.info({ port: PORT, host: config.SERVICE_HOST }, 'Card layout service started');
});

// ─── Graceful Shutdown ───────────────────────────────────────────────
function shutdown(signal: string) {
  log.info({ signal }, 'Shutting down gracefully');
  server.close(() => {
    log.info('HTTP server closed');
    process.exit(0);
  });
  setTimeout(() => {
    log.fatal('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
