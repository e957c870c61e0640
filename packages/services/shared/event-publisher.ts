// ============================================
// Event Publisher
// Produces validated assistant events to Kafka.
// Publishing never fails a turn: errors are logged and dropped,
// and a broker failure pauses publishing for a back-off window.
// ============================================

import type { ProducerRecord, RecordMetadata } from 'kafkajs';
import {
   AssistantEventSchema,
   topicForEvent,
   type AssistantEvent,
} from './event-schemas';
import { describeError } from './errors';

export interface EventPublisher {
   /** Open the broker connection; rejects when it cannot be reached */
   connect(): Promise<void>;
   publish(event: AssistantEvent): Promise<void>;
   close(): Promise<void>;
}

/** The slice of a kafkajs Producer the publisher relies on */
export interface EventProducer {
   connect(): Promise<void>;
   send(record: ProducerRecord): Promise<RecordMetadata[]>;
   disconnect(): Promise<void>;
}

export interface KafkaEventPublisherOptions {
   /** How long events are dropped after a broker failure */
   retryBackoffMs?: number;
   now?: () => number;
}

export const DEFAULT_RETRY_BACKOFF_MS = 30_000;

export class KafkaEventPublisher implements EventPublisher {
   private connecting: Promise<void> | null = null;
   /** Epoch ms before which publish() does not touch the broker */
   private suspendedUntil = 0;
   private readonly retryBackoffMs: number;
   private readonly now: () => number;

   constructor(
      private readonly producer: EventProducer,
      options: KafkaEventPublisherOptions = {}
   ) {
      this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
      this.now = options.now ?? Date.now;
   }

   async connect(): Promise<void> {
      try {
         await this.ensureConnected();
      } catch (error) {
         this.connecting = null;
         throw error;
      }
   }

   async publish(event: AssistantEvent): Promise<void> {
      const validation = AssistantEventSchema.safeParse(event);
      if (!validation.success) {
         console.error(
            `❌ EventPublisher: Invalid ${event.eventType} event:`,
            validation.error.format()
         );
         return;
      }

      const topic = topicForEvent(event);

      if (this.now() < this.suspendedUntil) {
         console.warn(
            `⏸️ EventPublisher: Broker unavailable, dropped ${event.eventType} [${event.correlationId}]`
         );
         return;
      }

      try {
         await this.ensureConnected();
         await this.producer.send({
            topic,
            messages: [
               { key: event.sessionId, value: JSON.stringify(validation.data) },
            ],
         });
         console.log(
            `📤 EventPublisher: ${event.eventType} [${event.correlationId}] → ${topic}`
         );
      } catch (error) {
         // Reconnect only once the back-off window has passed
         this.connecting = null;
         this.suspendedUntil = this.now() + this.retryBackoffMs;
         console.error(
            `❌ EventPublisher: Failed to publish ${event.eventType} → ${topic}: ${describeError(error)} ` +
               `(pausing for ${this.retryBackoffMs}ms)`
         );
      }
   }

   async close(): Promise<void> {
      if (!this.connecting) return;
      this.connecting = null;
      await this.producer.disconnect();
   }

   private ensureConnected(): Promise<void> {
      if (!this.connecting) {
         this.connecting = this.producer.connect();
      }
      return this.connecting;
   }
}

/** Used when no Kafka brokers are configured */
export class NoopEventPublisher implements EventPublisher {
   async connect(): Promise<void> {}

   async publish(_event: AssistantEvent): Promise<void> {}

   async close(): Promise<void> {}
}
