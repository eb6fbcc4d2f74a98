import 'dotenv/config';
import express from 'express';
import { collectDefaultMetrics } from 'prom-client';
import { createHttpMetrics } from './middleware/metrics';
import { keepParamCardinality } from './middleware/routeCardinality';
import { errorHandler } from './middleware/errorHandler';
import { PromClientSink } from './sink/promClientSink';
import { loadMetricsOptionsFromEnv } from './utils/envValidation';
import { logger } from './utils/logger';

const { valid, options } = loadMetricsOptionsFromEnv();
if (!valid) {
  process.exit(1);
}

const sink = new PromClientSink();
collectDefaultMetrics({ register: sink.registry });

const metrics = createHttpMetrics({
  ...options,
  exclude: [...(options.exclude ?? []), '/metrics'],
  sink,
});

const app = express();

if (process.env.TRUST_PROXY === 'true') {
  app.set('trust proxy', 1);
}

app.use(metrics.middleware);
app.use(express.json({ limit: '1mb' }));

app.get('/health', (_req, res) => {
  res.json({ status: 'ok' });
});

// Language values are few, slugs are not: only the language keeps its literal value.
app.get('/posts/:language/:slug', keepParamCardinality('language'), (req, res) => {
  if (!['en', 'fr', 'de'].includes(req.params.language)) {
    res.status(404).json({ error: 'Unknown language' });
    return;
  }
  res.json({ language: req.params.language, slug: req.params.slug });
});

app.get('/metrics', (_req, res, next) => {
  sink.registry
    .metrics()
    .then((body) => {
      res.set('Content-Type', sink.registry.contentType);
      res.end(body);
    })
    .catch(next);
});

app.use(metrics.errorMiddleware);
app.use(errorHandler);

const PORT = Number(process.env.PORT) || 3000;
const HOST = process.env.HOST || '0.0.0.0';

app.listen(PORT, HOST, () => {
  logger.info(`Server is running on http://${HOST}:${PORT}`);
});
