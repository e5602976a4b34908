import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { errorMessage } from './errors/sprite-errors';
import { createTaskRouter } from './routes/task.routes';
import { TaskSupervisor } from './services/task-supervisor.service';

/**
 * Build the Express application around a running task supervisor
 */
export function createApp(supervisor: TaskSupervisor): Express {
  const app: Express = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  // Routes
  app.use('/api', createTaskRouter(supervisor));

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      message: 'Sprite extraction API is running',
      activeWorkers: supervisor.getActiveWorkerCount()
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // Handle Multer errors specifically
    if (err instanceof multer.MulterError) {
      console.error(`[Upload] Multer error ${err.code} on ${req.method} ${req.path} (field: ${err.field ?? 'n/a'})`);
      return res.status(400).json({
        error: 'File upload error',
        message: err.message,
        code: err.code,
        field: err.field
      });
    }

    // Malformed JSON bodies
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Invalid request', message: err.message });
    }

    console.error('Error occurred:', err);
    res.status(500).json({
      error: 'Internal Server Error',
      message: errorMessage(err)
    });
  });

  return app;
}
