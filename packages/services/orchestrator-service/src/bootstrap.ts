// ============================================
// Bootstrap
// Explicit construction of the per-process objects.
// One router, one orchestrator, one publisher; sessions live in the store.
// ============================================

import type { AppConfig } from '../../shared/config';
import {
   KafkaEventPublisher,
   NoopEventPublisher,
   type EventPublisher,
} from '../../shared/event-publisher';
import { createKafka, createProducer } from '../../shared/kafka-client';
import { createOpenAITextGenerator } from '../../shared/llm-client';
import { KnowledgeBase } from '../../knowledge-base/knowledgeBase';
import { InMemorySessionStore } from '../../memory-service/sessionStore';
import { KeywordRouter } from '../../router-service/routerService';
import { createAgents } from '../../workers/specializedAgent';
import { Orchestrator } from './service';

/** Sweep idle sessions every 5 minutes */
const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export interface Assistant {
   orchestrator: Orchestrator;
   knowledgeBase: KnowledgeBase;
   /** Stop the cleanup timer and disconnect the publisher */
   close(): Promise<void>;
}

export function createPublisher(config: AppConfig): EventPublisher {
   if (!config.kafka) {
      console.log('📭 Bootstrap: KAFKA_BROKERS not set, event publishing disabled');
      return new NoopEventPublisher();
   }

   console.log(`🔌 Bootstrap: Publishing events to ${config.kafka.brokers.join(', ')}`);
   return new KafkaEventPublisher(createProducer(createKafka(config.kafka)), {
      retryBackoffMs: config.kafka.retryBackoffMs,
   });
}

/**
 * Build the assistant from validated config.
 * @throws DataError when the knowledge base cannot be loaded
 * @throws KafkaJSError when brokers are configured but unreachable
 */
export async function createAssistant(config: AppConfig): Promise<Assistant> {
   const knowledgeBase = await KnowledgeBase.load(config.knowledgeBasePath);

   const generator = createOpenAITextGenerator(config.openai.apiKey, {
      model: config.openai.model,
      temperature: config.openai.temperature,
      maxTokens: config.openai.maxTokens,
      timeoutMs: config.openai.timeoutMs,
   });

   // An unreachable broker fails startup instead of slowing every turn
   const publisher = createPublisher(config);
   await publisher.connect();

   const orchestrator = new Orchestrator({
      router: new KeywordRouter(),
      agents: createAgents(generator),
      knowledgeBase,
      sessions: new InMemorySessionStore(),
      publisher,
      model: generator.model,
   });

   const cleanupInterval = setInterval(
      () => orchestrator.cleanupIdleSessions(config.sessionIdleTtlMs),
      CLEANUP_INTERVAL_MS
   );
   cleanupInterval.unref();

   console.log(`✅ Bootstrap: Assistant ready (model: ${generator.model})`);

   return {
      orchestrator,
      knowledgeBase,
      async close() {
         clearInterval(cleanupInterval);
         await publisher.close();
      },
   };
}
