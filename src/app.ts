import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import multer from 'multer';
import { ZodError } from 'zod';
import { BillAnalysisError } from './errors';
import billsRouter from './routes/bills';

export const createApp = () => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '2mb' }));
  app.use(morgan('dev'));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/bills', billsRouter);

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof BillAnalysisError) {
      res.status(422).json({ kind: err.kind, message: err.message, details: err.details });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ message: 'Invalid request', issues: err.issues });
      return;
    }

    const status = err instanceof SyntaxError || err instanceof multer.MulterError ? 400 : 500;
    // eslint-disable-next-line no-console
    console.error(err);
    res.status(status).json({
      message: err instanceof Error ? err.message : 'Unexpected error',
    });
  };

  app.use(errorHandler);

  return app;
};
