// ============================================
// Topic Initialization Script
// Creates the assistant's Kafka topics using the Admin API
// Run: npm run init-topics
// ============================================

import dotenv from 'dotenv';
import { ConfigurationError } from './errors';
import { createKafka, getAdmin, type KafkaSettings } from './kafka-client';
import { ALL_TOPICS, TOPICS } from './kafka-topics';

/** Topics requiring longer retention (audit trail of routing decisions) */
const LONG_RETENTION_TOPICS = new Set<string>([TOPICS.ROUTER_DECISION]);

/** Retention period for the routing audit trail (7 days in ms) */
const AUDIT_RETENTION_MS = String(7 * 24 * 60 * 60 * 1000); // 604800000

/** Default retention period (1 day in ms) */
const DEFAULT_RETENTION_MS = String(24 * 60 * 60 * 1000); // 86400000

export function readKafkaSettings(env: Record<string, string | undefined>): KafkaSettings {
   const brokers = (env.KAFKA_BROKERS ?? '')
      .split(',')
      .map((broker) => broker.trim())
      .filter((broker) => broker.length > 0);

   if (brokers.length === 0) {
      throw new ConfigurationError('KAFKA_BROKERS is not set');
   }

   return { brokers, clientId: env.KAFKA_CLIENT_ID || 'course-assistant-admin' };
}

/**
 * Initialize all Kafka topics
 * Safe to run multiple times - skips existing topics
 */
export async function initializeTopics(settings: KafkaSettings): Promise<void> {
   const admin = getAdmin(createKafka(settings));

   console.log('🔌 Connecting to Kafka...');
   await admin.connect();

   try {
      const existingTopics = await admin.listTopics();
      console.log(
         `📋 Existing topics: ${existingTopics.length > 0 ? existingTopics.join(', ') : '(none)'}`
      );

      const topicsToCreate = ALL_TOPICS.filter(
         (topic) => !existingTopics.includes(topic)
      );

      if (topicsToCreate.length === 0) {
         console.log('✅ All topics already exist. Nothing to create.');
         return;
      }

      console.log(`📝 Creating topics: ${topicsToCreate.join(', ')}`);

      await admin.createTopics({
         topics: topicsToCreate.map((topic) => ({
            topic,
            numPartitions: 3,
            replicationFactor: 1,
            configEntries: [
               {
                  name: 'retention.ms',
                  value: LONG_RETENTION_TOPICS.has(topic)
                     ? AUDIT_RETENTION_MS
                     : DEFAULT_RETENTION_MS,
               },
            ],
         })),
         waitForLeaders: true,
      });

      console.log('✅ Topics created successfully!');
   } finally {
      await admin.disconnect();
      console.log('🔌 Disconnected from Kafka.');
   }
}

if (require.main === module) {
   dotenv.config();

   Promise.resolve()
      .then(() => initializeTopics(readKafkaSettings(process.env)))
      .then(() => {
         console.log('🎉 Topic initialization complete!');
         process.exit(0);
      })
      .catch((error: unknown) => {
         console.error('💥 Topic initialization failed:', error);
         process.exit(1);
      });
}
