// ============================================
// Event Schemas - Zod Validation
// Every event must validate before it is produced
// ============================================

import { z } from 'zod';
import { AGENT_CATEGORIES } from './agent-categories';
import { TOPICS, type Topic } from './kafka-topics';

const CategorySchema = z.enum(AGENT_CATEGORIES);

const ScoreVectorSchema = z.object({
   courses: z.number().int().min(0),
   career_paths: z.number().int().min(0),
   sales: z.number().int().min(0),
});

// ============================================
// Base Event Schema
// ============================================

const BaseEventSchema = z.object({
   /** Ties every event of one turn together */
   correlationId: z.string().min(1),
   sessionId: z.string().min(1),
   /** Unix epoch milliseconds */
   timestamp: z.number().int().positive(),
});

// ============================================
// 1. RouterDecision
// ============================================

export const RouterDecisionSchema = BaseEventSchema.extend({
   eventType: z.literal('RouterDecision'),
   payload: z.object({
      message: z.string(),
      category: CategorySchema,
      scores: ScoreVectorSchema,
      contributions: z.array(
         z.object({
            category: CategorySchema,
            points: z.number().int(),
            reason: z.string(),
         })
      ),
      previousCategory: CategorySchema.nullable(),
      lastCategory: CategorySchema.nullable(),
   }),
});
export type RouterDecision = z.infer<typeof RouterDecisionSchema>;

// ============================================
// 2. LLMPromptRequested
// ============================================

export const LLMPromptRequestedSchema = BaseEventSchema.extend({
   eventType: z.literal('LLMPromptRequested'),
   payload: z.object({
      category: CategorySchema,
      model: z.string().min(1),
      context: z.string(),
      query: z.string(),
      historyLines: z.number().int().min(0),
   }),
});
export type LLMPromptRequested = z.infer<typeof LLMPromptRequestedSchema>;

// ============================================
// 3. LLMResponseReceived
// ============================================

export const LLMResponseReceivedSchema = BaseEventSchema.extend({
   eventType: z.literal('LLMResponseReceived'),
   payload: z.object({
      category: CategorySchema,
      text: z.string(),
      durationMs: z.number().int().min(0),
   }),
});
export type LLMResponseReceived = z.infer<typeof LLMResponseReceivedSchema>;

// ============================================
// 4. SessionReset
// ============================================

export const SessionResetSchema = BaseEventSchema.extend({
   eventType: z.literal('SessionReset'),
   payload: z.object({
      action: z.enum(['reset', 'clear']),
   }),
});
export type SessionReset = z.infer<typeof SessionResetSchema>;

// ============================================
// 5. TurnFailed
// ============================================

export const TurnFailedSchema = BaseEventSchema.extend({
   eventType: z.literal('TurnFailed'),
   payload: z.object({
      category: CategorySchema,
      errorType: z.string().min(1),
      errorMessage: z.string(),
   }),
});
export type TurnFailed = z.infer<typeof TurnFailedSchema>;

// ============================================
// Union + topic mapping
// ============================================

export const AssistantEventSchema = z.discriminatedUnion('eventType', [
   RouterDecisionSchema,
   LLMPromptRequestedSchema,
   LLMResponseReceivedSchema,
   SessionResetSchema,
   TurnFailedSchema,
]);
export type AssistantEvent = z.infer<typeof AssistantEventSchema>;

const TOPIC_BY_EVENT_TYPE: Record<AssistantEvent['eventType'], Topic> = {
   RouterDecision: TOPICS.ROUTER_DECISION,
   LLMPromptRequested: TOPICS.LLM_PROMPT,
   LLMResponseReceived: TOPICS.LLM_RESPONSE,
   SessionReset: TOPICS.USER_CONTROL,
   TurnFailed: TOPICS.ERROR_EVENTS,
};

export function topicForEvent(event: AssistantEvent): Topic {
   return TOPIC_BY_EVENT_TYPE[event.eventType];
}
