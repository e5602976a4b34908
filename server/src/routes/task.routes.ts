import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { upload } from '../config/multer';
import { ConfigError, errorMessage } from '../errors/sprite-errors';
import { TaskState } from '../models/task.types';
import { TaskSupervisor } from '../services/task-supervisor.service';

// Form fields that steer the request rather than the extraction
const CONTROL_FIELDS = new Set(['socket_id', 'output_sizes_json', 'prompt', 'model']);

const generateBodySchema = z.object({
  prompt: z.string({ required_error: 'prompt is required' }),
  model: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  socket_id: z.string().optional()
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Turn multipart form fields into a raw parameter bag.
 * `output_sizes_json` is accepted as an alias of `output_sizes`.
 */
export function paramsFromForm(body: unknown, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (isRecord(body)) {
    for (const [key, value] of Object.entries(body)) {
      if (!CONTROL_FIELDS.has(key)) params[key] = value;
    }
    if (body.output_sizes_json !== undefined && params.output_sizes === undefined) {
      params.output_sizes = body.output_sizes_json;
    }
  }
  return { ...params, ...overrides };
}

function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ConfigError) {
    res.status(400).json({ error: 'Invalid request', message: error.message, field: error.field });
    return;
  }
  console.error(`[TaskRoutes] ${context}:`, error);
  res.status(500).json({ error: 'Internal Server Error', message: errorMessage(error) });
}

export function createTaskRouter(supervisor: TaskSupervisor): Router {
  const router = Router();

  const submitUpload = (overrides: Record<string, unknown>) => async (req: Request, res: Response) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: 'Invalid request', message: 'No file uploaded (expected field "file")' });
      }
      const body: unknown = req.body;
      const socketId = isRecord(body) ? stringField(body, 'socket_id') : undefined;

      const { taskId } = await supervisor.submitImage(req.file.buffer, paramsFromForm(body, overrides), { socketId });
      res.status(202).json({ task_id: taskId, status: TaskState.PENDING, message: 'Task queued' });
    } catch (error) {
      sendError(res, error, 'Error submitting image');
    }
  };

  /**
   * Extract sprites from an uploaded sprite sheet
   */
  router.post('/process', upload.single('file'), submitUpload({}));

  /**
   * Same as /process with grid mode forced
   */
  router.post('/process/grid', upload.single('file'), submitUpload({ mode: 'grid' }));

  /**
   * Generate a sprite sheet from a prompt, then extract it
   */
  router.post('/generate', async (req: Request, res: Response) => {
    try {
      const parsed = generateBodySchema.safeParse(req.body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigError(issue.message, issue.path.join('.') || undefined);
      }
      const { prompt, model, params, socket_id: socketId } = parsed.data;

      const { taskId } = await supervisor.submitPrompt(prompt, model, params ?? {}, { socketId });
      res.status(202).json({ task_id: taskId, status: TaskState.PENDING, message: 'Generation queued' });
    } catch (error) {
      sendError(res, error, 'Error submitting prompt');
    }
  });

  /**
   * Prompt-driven generation guided by an uploaded reference image
   */
  router.post('/generate/with-reference', upload.single('file'), async (req: Request, res: Response) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: 'Invalid request', message: 'No reference image uploaded (expected field "file")' });
      }
      const body: unknown = req.body;
      const fields = isRecord(body) ? body : {};

      const { taskId } = await supervisor.submitPrompt(
        stringField(fields, 'prompt') ?? '',
        stringField(fields, 'model'),
        paramsFromForm(body),
        { referenceImage: req.file.buffer, socketId: stringField(fields, 'socket_id') }
      );
      res.status(202).json({ task_id: taskId, status: TaskState.PENDING, message: 'Generation queued' });
    } catch (error) {
      sendError(res, error, 'Error submitting prompt with reference');
    }
  });

  router.get('/status/:id', (req: Request, res: Response) => {
    const status = supervisor.getStatus(req.params.id);
    if (!status) {
      return res.status(404).json({ error: 'Not Found', message: `Task ${req.params.id} not found` });
    }
    res.json(status);
  });

  router.get('/download/:id', async (req: Request, res: Response) => {
    const taskId = req.params.id;
    try {
      const result = await supervisor.getResult(taskId);
      switch (result.status) {
        case 'not_found':
          return res.status(404).json({ error: 'Not Found', message: `Task ${taskId} not found` });
        case 'not_ready':
          return res.status(400).json({ error: 'Not Ready', message: `Task ${taskId} is ${result.state}` });
        case 'missing':
          return res.status(404).json({ error: 'Not Found', message: `No archive available for task ${taskId}` });
        case 'ready':
          res.download(result.path, `sprites_${taskId}.zip`, (error) => {
            if (error && !res.headersSent) {
              sendError(res, error, `Error sending archive for task ${taskId}`);
            }
          });
      }
    } catch (error) {
      sendError(res, error, 'Error downloading result');
    }
  });

  return router;
}
