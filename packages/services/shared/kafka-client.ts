// ============================================
// Kafka Client - Factory
// Built from AppConfig; no module-level broker connection
// ============================================

import { Kafka, type Admin, type Producer, logLevel } from 'kafkajs';

export interface KafkaSettings {
   brokers: string[];
   clientId: string;
}

/**
 * Create a Kafka instance for the configured brokers
 */
export function createKafka(settings: KafkaSettings): Kafka {
   return new Kafka({
      clientId: settings.clientId,
      brokers: settings.brokers,
      logLevel: logLevel.WARN,
      retry: {
         initialRetryTime: 100,
         retries: 8,
      },
   });
}

/**
 * Create a producer instance
 * Remember to connect before using: await producer.connect()
 */
export function createProducer(kafka: Kafka): Producer {
   return kafka.producer();
}

/**
 * Get the admin client for topic management
 */
export function getAdmin(kafka: Kafka): Admin {
   return kafka.admin();
}
