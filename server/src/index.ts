import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { loadConfig } from './config';
import { createPipelineDependencies, SpritePipeline } from './pipeline/sprite-pipeline';
import { createBackgroundRemover } from './services/background-removal.service';
import { GeminiImageGenerator } from './services/image-generator.service';
import { TaskSupervisor } from './services/task-supervisor.service';
import { ThreadedSpriteLocator } from './services/threaded-sprite-locator.service';
import { WorkspaceService } from './services/workspace.service';
import { errorMessage } from './errors/sprite-errors';

const config = loadConfig();

const imageGenerator = config.geminiApiKey
  ? new GeminiImageGenerator(config.geminiApiKey, config.geminiApiUrl, config.collaboratorTimeoutMs)
  : null;
if (!imageGenerator) {
  console.warn('[Server] GEMINI_API_KEY not set, prompt-driven generation is disabled');
}

// Sprite location is CPU-bound; keep it off the event loop that serves HTTP and Socket.IO
const pipeline = new SpritePipeline(
  createPipelineDependencies(createBackgroundRemover(config), imageGenerator, {
    spriteLocator: new ThreadedSpriteLocator()
  }),
  new WorkspaceService(config.tempDir),
  config.nodeEnv !== 'production'
);

const supervisor = new TaskSupervisor(pipeline, {
  uploadDir: config.uploadDir,
  resultDir: config.resultDir,
  concurrency: config.workerConcurrency,
  retentionMs: config.taskRetentionMs,
  onEvent: (socketId, event, payload) => {
    io.to(socketId).emit(event, payload);
  }
});

const app = createApp(supervisor);
const httpServer = createServer(app);

// Initialize Socket.IO
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: config.nodeEnv === 'production' ? false : '*',
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000, // 60 seconds
  pingInterval: 25000  // 25 seconds
});

// Socket.IO connection handling
io.on('connection', (socket) => {
  console.log(`🔌 Client connected: ${socket.id}`);

  socket.on('disconnect', (reason) => {
    console.log(`❌ Client disconnected: ${socket.id} (${reason})`);
  });

  socket.on('error', (error) => {
    console.error(`⚠️  Socket error for ${socket.id}:`, error);
  });
});

// Graceful shutdown: finish in-flight tasks, then exit
const shutdown = (signal: string) => {
  console.log(`${signal} received, waiting for in-flight tasks...`);
  httpServer.close();
  supervisor
    .stop()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start server
supervisor
  .start()
  .then(() => {
    httpServer.listen(config.port, () => {
      console.log(`⚡️ Server is running on port ${config.port}`);
      console.log(`🧩 Sprite extraction API ready at http://localhost:${config.port}/api`);
      console.log(`🔌 Socket.IO ready for real-time communication`);
    });
  })
  .catch((error) => {
    console.error(`Failed to start task supervisor: ${errorMessage(error)}`);
    process.exit(1);
  });

export default app;
