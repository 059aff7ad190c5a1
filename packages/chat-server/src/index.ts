import 'dotenv/config';
import express from 'express';
import helmet from 'helmet';
import http from 'http';
import {
  ImageClassifierClient,
  InMemorySessionStore,
  OpenAIClient,
  RedisClient,
  RedisSessionStore,
  VectorStoreClient,
  type SessionStore
} from '@careline/shared';
import { loadSettings } from './config/Settings.js';
import { MedicalChatGraph } from './graphs/MedicalChatGraph.js';
import { requestLogger, rateLimiters } from './middleware/RequestMiddleware.js';
import { ChatRouter } from './routes/ChatRoute.js';
import { StatusRouter } from './routes/StatusRoute.js';
import { UploadRouter } from './routes/UploadRoute.js';
import { AttachmentResolver } from './services/AttachmentResolver.js';
import { ChatResponseGenerator } from './services/ChatResponseGenerator.js';
import { PatientRecordRetriever } from './services/PatientRecordRetriever.js';
import { SessionTracker } from './services/SessionTracker.js';
import { SkinImageClassifier } from './services/SkinImageClassifier.js';
import { SpeechTranscriber } from './services/SpeechTranscriber.js';
import { UploadStore } from './services/UploadStore.js';

const SESSION_CLEANUP_INTERVAL_MS = 30 * 60 * 1000;
const UPLOAD_CLEANUP_INTERVAL_MS = 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

const settings = loadSettings();

const openAIClient = new OpenAIClient({
  apiKey: settings.OPENAI_API_KEY,
  baseUrl: settings.OPENAI_BASE_URL,
  chatModel: settings.CHAT_MODEL,
  transcriptionModel: settings.TRANSCRIPTION_MODEL,
  embeddingModel: settings.EMBEDDING_MODEL
});

const vectorStore = new VectorStoreClient({
  baseUrl: settings.QDRANT_URL,
  apiKey: settings.QDRANT_API_KEY,
  collectionName: settings.QDRANT_COLLECTION
}, openAIClient.returnEmbeddingModel());

const imageClassifierClient = new ImageClassifierClient({
  baseUrl: settings.IMAGE_CLASSIFIER_URL,
  timeoutMs: settings.COLLABORATOR_TIMEOUT_MS
});

const redisClient = settings.REDIS_URL ? RedisClient.getInstance(settings.REDIS_URL) : null;
const sessionStore: SessionStore = redisClient
  ? new RedisSessionStore(redisClient, { maxEntries: settings.SESSION_STORE_MAX_ENTRIES })
  : new InMemorySessionStore(settings.SESSION_STORE_MAX_ENTRIES);

const sessionTracker = new SessionTracker();

const chatGraph = new MedicalChatGraph(
  {
    transcriber: new SpeechTranscriber(openAIClient),
    imageClassifier: new SkinImageClassifier(imageClassifierClient),
    recordRetriever: new PatientRecordRetriever(vectorStore),
    responseGenerator: new ChatResponseGenerator(openAIClient.returnChatModel()),
    sessionStore,
    sessionTracker
  },
  {
    historyLimit: settings.HISTORY_WINDOW,
    topK: settings.RETRIEVAL_TOP_K,
    maxSteps: settings.MAX_WORKFLOW_STEPS,
    timeoutMs: settings.COLLABORATOR_TIMEOUT_MS
  }
);

const attachmentResolver = new AttachmentResolver(settings.UPLOAD_DIR);
const uploadStore = new UploadStore(settings.UPLOAD_DIR, attachmentResolver);

const app = express();

app.use(helmet());
app.use(requestLogger());
app.use(...rateLimiters({
  perMinute: settings.RATE_LIMIT_PER_MINUTE,
  perHour: settings.RATE_LIMIT_PER_HOUR
}));
app.use(express.json({ limit: '1mb' }));
app.use(ChatRouter(chatGraph, attachmentResolver));
app.use(UploadRouter(uploadStore));
app.use(StatusRouter({
  modelName: openAIClient.chatModelName,
  activeSessions: () => sessionTracker.activeCount,
  checkDependencies: async () => {
    const [classifier, redis] = await Promise.all([
      imageClassifierClient.isHealthy(),
      redisClient ? redisClient.ping() : Promise.resolve(true)
    ]);
    return { imageClassifier: classifier, sessionStore: redis };
  }
}));

const server = http.createServer(app);

const cleanupTimer = setInterval(() => {
  sessionTracker.cleanupInactive(settings.SESSION_IDLE_MINUTES);
}, SESSION_CLEANUP_INTERVAL_MS);
cleanupTimer.unref();

const uploadCleanupTimer = setInterval(() => {
  uploadStore.removeOlderThan(settings.UPLOAD_RETENTION_DAYS * DAY_MS).catch(error => {
    console.error('[Chat Server] Upload cleanup failed:', error);
  });
}, UPLOAD_CLEANUP_INTERVAL_MS);
uploadCleanupTimer.unref();

function startServer(): void {
  uploadStore.ensureDirectory().then(() => listen()).catch(error => {
    console.error('[Chat Server] Failed to prepare upload directory:', error);
    process.exit(1);
  });
}

function listen(): void {
  server.listen(settings.PORT, () => {
    console.log(`Chat Server running on port ${settings.PORT}`);
    console.log(`Chat turn endpoint: http://localhost:${settings.PORT}/v1/chat/turns`);
    console.log(`Upload endpoints: http://localhost:${settings.PORT}/v1/uploads/{image,audio}`);
    console.log(`Session store: ${redisClient ? 'redis' : 'in-memory'}`);
  });
}

if (redisClient) {
  redisClient.connect().then(() => {
    console.log('[Chat Server] Redis connected');
    startServer();
  }).catch(error => {
    console.error('[Chat Server] Failed to connect to Redis:', error);
    process.exit(1);
  });
} else {
  startServer();
}

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.log(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }

  isShuttingDown = true;
  console.log(`\n${signal} received - Shutting down gracefully...`);
  clearInterval(cleanupTimer);
  clearInterval(uploadCleanupTimer);

  let exitCode = 0;

  try {
    if (redisClient) {
      try {
        await redisClient.disconnect();
        console.log('Redis disconnected');
      } catch (error) {
        console.error('Error disconnecting Redis:', error);
      }
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err && !server.listening) {
          console.log('HTTP server was not running');
          resolve();
        } else if (err) {
          console.error('Error closing HTTP server:', err);
          reject(err);
        } else {
          console.log('HTTP server closed');
          resolve();
        }
      });
    });

    console.log('Graceful shutdown complete');

  } catch (error) {
    console.error('Error during shutdown:', error);
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  void gracefulShutdown('UNHANDLED_REJECTION');
});
