import express from "express";
import cors from "cors";
import type { Pipeline } from "./pipeline";
import articlesRouter from "./routes/articles";
import narrativesRouter from "./routes/narratives";

export interface AppOptions {
  corsOrigins?: string[];
}

const defaultOrigins = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:3000'
];

export function isOriginAllowed(origin: string, allowedOrigins: string[]): boolean {
  if (allowedOrigins.includes(origin)) return true;
  // Subdomain wildcard such as *.example.org
  const wildcard = allowedOrigins.find(o => o.startsWith('*.'));
  return wildcard !== undefined && origin.endsWith(wildcard.substring(1));
}

export function createApp(pipeline: Pipeline, options: AppOptions = {}): express.Express {
  const app = express();

  const configured = options.corsOrigins ?? [];
  const allowAll = configured.includes('*');
  // Merged with the defaults unless '*' is given
  const allowedOrigins = allowAll ? [] : Array.from(new Set([...defaultOrigins, ...configured]));

  if (allowAll) {
    console.log('[CORS] Allowing all origins due to * in CORS_ORIGINS');
  } else {
    console.log('[CORS] Allowed origins:', allowedOrigins.join(', '));
  }

  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      if (allowAll || isOriginAllowed(origin, allowedOrigins)) return callback(null, true);
      console.warn(`[CORS] Blocked origin: ${origin}`);
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true
  }));
  app.use(express.json({ limit: '10mb' }));

  app.use((req, _res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      modelVersion: pipeline.modelVersion
    });
  });

  app.use('/api/articles', articlesRouter(pipeline));
  app.use('/api/narratives', narrativesRouter(pipeline));

  app.use('*', (req, res) => {
    res.status(404).json({ error: `Route ${req.originalUrl} not found` });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ error: 'Invalid JSON' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
