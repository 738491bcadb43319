import cors, { type CorsOptions } from 'cors';
import express from 'express';
import type { AppConfig } from './config/environment';
import { createCalcRouter } from './routes/calc';
import { BatchCostCalculator } from './services/batchCost';
import { PriceCache } from './services/pricing/priceCache';

type AppDependencies = {
  calculator: BatchCostCalculator;
  cache: PriceCache;
  config: Pick<AppConfig, 'corsOrigins'>;
};

const buildCorsOptions = (allowedOrigins: string[] | null): CorsOptions => ({
  origin(origin, callback) {
    if (!origin || allowedOrigins === null || allowedOrigins.includes(origin)) {
      callback(null, true);
      return;
    }

    callback(new Error('Not allowed by CORS'));
  }
});

/**
 * Assemble the Express app. Kept separate from `listen` so tests can bind it to an ephemeral port.
 */
export const createApp = ({ calculator, cache, config }: AppDependencies): express.Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors(buildCorsOptions(config.corsOrigins)));
  app.use(express.json({ limit: '16kb' }));
  app.use(express.urlencoded({ extended: false, limit: '16kb' }));

  const apiRouter = express.Router();
  app.use('/api', apiRouter);
  apiRouter.use('/calc', createCalcRouter(calculator));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', recipe: calculator.recipeName, cachedQuotes: cache.size });
  });

  return app;
};
