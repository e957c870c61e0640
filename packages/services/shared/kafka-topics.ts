// ============================================
// Kafka Topics - Constants
// ============================================

/**
 * Kafka Topic Names
 * Central definition of all topics the assistant publishes to
 */
export const TOPICS = {
   /** Routing decision per turn, with the full score vector */
   ROUTER_DECISION: 'router_decision_events',

   /** Prompt variables sent TO the LLM */
   LLM_PROMPT: 'llm_prompt_requests',

   /** Text returned by the LLM */
   LLM_RESPONSE: 'llm_response_events',

   /** Control events (reset) */
   USER_CONTROL: 'user-control-events',

   /** Generation failures and other recovered errors */
   ERROR_EVENTS: 'error_events',
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];

/** All topics as an array for initialization */
export const ALL_TOPICS: Topic[] = Object.values(TOPICS);
