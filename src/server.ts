/**
 * Application composition
 * Wires providers, coordinators and the session registry into an Express app
 * and a WebSocket server sharing one HTTP server. Nothing listens until the
 * caller does; tests pass fakes through the options.
 */

import express, { Express } from 'express';
import cors from 'cors';
import { createServer, Server as HTTPServer } from 'http';
import type { WebSocketServer } from 'ws';
import { env } from '@/shared/config';
import { logger } from '@/shared/utils';
import { AudioCache, LruAudioCache, cacheConfig } from '@/modules/cache';
import {
  CartesiaSynthesizer,
  MockSynthesizer,
  SpeechSynthesizer,
  SynthesisCoordinator,
  TtsConfig,
  cartesiaConfig,
  ttsConfig,
} from '@/modules/tts';
import {
  CharacterConfig,
  ChatCompletionProvider,
  EchoCompletionProvider,
  GenerationConfig,
  GenerationCoordinator,
  OpenAICompletionProvider,
  characterConfig,
  generationConfig,
  openaiConfig,
} from '@/modules/llm';
import {
  EmotionPolicy,
  emotionConfig,
  interactionTrigger,
  validateEmotionConfig,
} from '@/modules/emotion';
import { SessionConfig, SessionRegistry, sessionConfig } from '@/modules/conversation';
import { getSocketStats, initializeSocketServer, shutdownSocketServer } from '@/modules/socket';

export interface AppServerOptions {
  chatProvider?: ChatCompletionProvider;
  speechSynthesizer?: SpeechSynthesizer;
  cache?: AudioCache;
  generation?: Readonly<GenerationConfig>;
  tts?: Readonly<TtsConfig>;
  session?: Readonly<SessionConfig>;
  character?: Readonly<CharacterConfig>;
  emotionPolicy?: Readonly<EmotionPolicy>;
}

export interface AppServer {
  app: Express;
  httpServer: HTTPServer;
  wss: WebSocketServer;
  registry: SessionRegistry;
  generation: GenerationCoordinator;
  synthesis: SynthesisCoordinator;
  /** Close sessions, the WebSocket server and the HTTP server */
  close(): Promise<void>;
}

/**
 * Real providers when their API keys are configured, offline ones otherwise
 */
export function createDefaultProviders(): {
  chatProvider: ChatCompletionProvider;
  speechSynthesizer: SpeechSynthesizer;
} {
  const chatProvider = openaiConfig.apiKey
    ? new OpenAICompletionProvider(openaiConfig)
    : new EchoCompletionProvider();
  const speechSynthesizer = cartesiaConfig.apiKey
    ? new CartesiaSynthesizer(cartesiaConfig)
    : new MockSynthesizer();

  if (!openaiConfig.apiKey) {
    logger.warn('LLM_API_KEY not set - using echo chat provider');
  }
  if (!cartesiaConfig.apiKey) {
    logger.warn('CARTESIA_API_KEY not set - using silent mock synthesizer');
  }

  return { chatProvider, speechSynthesizer };
}

function corsOrigin(origin: string): string | string[] {
  if (origin === '*') {
    return origin;
  }
  return origin
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function createAppServer(options: AppServerOptions = {}): AppServer {
  const defaults =
    options.chatProvider && options.speechSynthesizer ? undefined : createDefaultProviders();
  const chatProvider = options.chatProvider ?? defaults?.chatProvider;
  const speechSynthesizer = options.speechSynthesizer ?? defaults?.speechSynthesizer;
  if (!chatProvider || !speechSynthesizer) {
    throw new Error('Providers could not be created');
  }

  const character = options.character ?? characterConfig;
  const tts = options.tts ?? ttsConfig;
  const emotionPolicy = options.emotionPolicy ?? emotionConfig;
  validateEmotionConfig(emotionPolicy);

  const generation = new GenerationCoordinator(
    chatProvider,
    options.generation ?? generationConfig
  );
  const synthesis = new SynthesisCoordinator(
    speechSynthesizer,
    options.cache ?? new LruAudioCache(cacheConfig),
    tts
  );

  const registry = new SessionRegistry(
    {
      generator: generation,
      synthesizer: synthesis,
      trigger: interactionTrigger,
      character,
      voice: { language: character.language },
      emotionPolicy,
    },
    options.session ?? sessionConfig
  );

  // Create Express app
  const app = express();

  // Middleware
  app.use(cors({ origin: corsOrigin(env.CORS_ORIGIN) }));
  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({ status: 'ok', message: `${character.name} companion backend is running` });
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    const socketStats = getSocketStats(wss, registry);

    res.json({
      status: 'ok',
      uptime: process.uptime(),
      sessions: socketStats.sessionStats,
      websocketServer: {
        totalConnections: socketStats.totalConnections,
      },
      generation: generation.getMetrics(),
      synthesis: synthesis.getMetrics(),
      cache: synthesis.getCacheStats(),
    });
  });

  // Create HTTP server
  const httpServer = createServer(app);

  // Initialize WebSocket server
  const wss = initializeSocketServer(httpServer, registry);

  async function close(): Promise<void> {
    await shutdownSocketServer(wss, registry);

    if (!httpServer.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('HTTP server closed');
  }

  return { app, httpServer, wss, registry, generation, synthesis, close };
}
