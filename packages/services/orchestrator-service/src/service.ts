// ============================================
// Orchestrator Service
// Runs one turn: context refresh → routing → agent → history.
//
// Publishes: router_decision_events, llm_prompt_requests,
//            llm_response_events, error_events, user-control-events
//
// Turns for one session run one after another; sessions are independent.
// ============================================

import { randomUUID } from 'node:crypto';
import {
   CATEGORY_LABELS,
   DEFAULT_CATEGORY,
   type AgentCategory,
} from '../../shared/agent-categories';
import { describeError } from '../../shared/errors';
import type { EventPublisher } from '../../shared/event-publisher';
import type { AssistantEvent } from '../../shared/event-schemas';
import { NO_CURRENT_COURSE_TEXT, type PromptVariables } from '../../shared/prompts';
import {
   DEFAULT_COURSE_ALIASES,
   HISTORY_WINDOW,
   formatContext,
   refersToCurrentCourse,
   refreshContext,
   type CourseCatalog,
   type CourseRef,
} from '../../context-tracker/contextTracker';
import type { KnowledgeBase } from '../../knowledge-base/knowledgeBase';
import {
   clearSession,
   type SessionState,
   type SessionStore,
} from '../../memory-service/sessionStore';
import {
   emptyScores,
   type KeywordRouter,
   type ScoreVector,
} from '../../router-service/routerService';
import type { AgentRegistry } from '../../workers/specializedAgent';

export const APOLOGY_MESSAGE =
   'Lo siento, no pude procesar tu consulta en este momento. Por favor, intenta de nuevo.';

export interface TurnResult {
   correlationId: string;
   text: string;
   category: AgentCategory;
   /** Display label for the category (cursos, carreras, ventas) */
   agentLabel: string;
   scores: ScoreVector;
   processingTimeMs: number;
   model: string;
   /** Failure detail; the user only ever sees APOLOGY_MESSAGE */
   error?: string;
}

export interface OrchestratorOptions {
   router: KeywordRouter;
   agents: AgentRegistry;
   knowledgeBase: KnowledgeBase;
   sessions: SessionStore;
   publisher: EventPublisher;
   /** Model name reported with every turn */
   model: string;
   aliases?: Readonly<Record<string, CourseRef>>;
   now?: () => number;
   createId?: () => string;
}

export class Orchestrator {
   private readonly router: KeywordRouter;
   private readonly agents: AgentRegistry;
   private readonly sessions: SessionStore;
   private readonly publisher: EventPublisher;
   private readonly knowledgeBase: KnowledgeBase;
   private readonly model: string;
   private readonly catalog: CourseCatalog;
   private readonly knowledgeSnippet: string;
   private readonly now: () => number;
   private readonly createId: () => string;

   /** Tail of the pending work per session (sessionId → promise) */
   private readonly queues = new Map<string, Promise<void>>();

   constructor(options: OrchestratorOptions) {
      this.router = options.router;
      this.agents = options.agents;
      this.sessions = options.sessions;
      this.publisher = options.publisher;
      this.knowledgeBase = options.knowledgeBase;
      this.model = options.model;
      this.now = options.now ?? Date.now;
      this.createId = options.createId ?? randomUUID;
      this.catalog = {
         knownCourses: options.knowledgeBase.courseNames(),
         aliases: options.aliases ?? DEFAULT_COURSE_ALIASES,
      };
      // The catalogue is read-only, so the prompt block is rendered once
      this.knowledgeSnippet = options.knowledgeBase.formatSnippet();
   }

   get activeSessions(): number {
      return this.sessions.size;
   }

   /**
    * Process one user message for a session.
    * Never rejects: failures come back as the apology text with `error` set.
    */
   handleMessage(sessionId: string, message: string): Promise<TurnResult> {
      return this.runExclusive(sessionId, () => this.processTurn(sessionId, message));
   }

   /**
    * Clear router state, context and history for a session
    */
   resetSession(sessionId: string): Promise<void> {
      return this.runExclusive(sessionId, async () => {
         const state = this.sessions.get(sessionId);
         if (state) {
            clearSession(state, this.now());
         }
         console.log(`🗑️ Orchestrator: Session [${sessionId}] reset`);

         await this.safePublish({
            eventType: 'SessionReset',
            correlationId: this.createId(),
            sessionId,
            timestamp: this.now(),
            payload: { action: 'reset' },
         });
      });
   }

   cleanupIdleSessions(maxIdleMs: number): number {
      return this.sessions.cleanupIdleSessions(maxIdleMs);
   }

   // ========================================
   // Turn pipeline
   // ========================================

   private async processTurn(sessionId: string, message: string): Promise<TurnResult> {
      const startTime = this.now();
      const correlationId = this.createId();
      let category: AgentCategory = DEFAULT_CATEGORY;
      let scores = emptyScores();

      console.log(`📥 Orchestrator: Received [${correlationId}] session=${sessionId}`);

      try {
         const session = this.sessions.getOrCreate(sessionId);

         this.updateContext(session, message);

         const previousCategory = session.lastCategory;
         const decision = this.router.select(message, previousCategory);
         session.lastCategory = decision.lastCategory;
         session.updatedAt = this.now();
         category = decision.category;
         scores = decision.scores;

         console.log(
            `🎯 Orchestrator: Routed [${correlationId}] → ${category} ` +
               `(scores: courses=${scores.courses} career_paths=${scores.career_paths} sales=${scores.sales})`
         );

         await this.safePublish({
            eventType: 'RouterDecision',
            correlationId,
            sessionId,
            timestamp: this.now(),
            payload: {
               message,
               category,
               scores,
               contributions: decision.contributions,
               previousCategory,
               lastCategory: decision.lastCategory,
            },
         });

         const variables: PromptVariables = {
            history: session.history.format(),
            knowledgeSnippet: this.knowledgeSnippet,
            context: formatContext(session.context),
            courseDetails: this.describeCourse(session.context.currentCourse),
            query: message,
         };

         await this.safePublish({
            eventType: 'LLMPromptRequested',
            correlationId,
            sessionId,
            timestamp: this.now(),
            payload: {
               category,
               model: this.model,
               context: variables.context,
               query: message,
               historyLines: session.history.length,
            },
         });

         const text = await this.agents[category].respond(variables);

         session.history.append('user', message);
         session.history.append('assistant', text, category);
         session.updatedAt = this.now();

         const processingTimeMs = this.now() - startTime;
         console.log(
            `📤 Orchestrator: Answered [${correlationId}] via ${category} in ${processingTimeMs}ms`
         );

         await this.safePublish({
            eventType: 'LLMResponseReceived',
            correlationId,
            sessionId,
            timestamp: this.now(),
            payload: { category, text, durationMs: processingTimeMs },
         });

         return {
            correlationId,
            text,
            category,
            agentLabel: CATEGORY_LABELS[category],
            scores,
            processingTimeMs,
            model: this.model,
         };
      } catch (error) {
         const detail = describeError(error);
         console.error(`❌ Orchestrator: Turn [${correlationId}] failed: ${detail}`);

         await this.safePublish({
            eventType: 'TurnFailed',
            correlationId,
            sessionId,
            timestamp: this.now(),
            payload: {
               category,
               errorType: error instanceof Error ? error.name : 'UnknownError',
               errorMessage: detail,
            },
         });

         return {
            correlationId,
            text: APOLOGY_MESSAGE,
            category,
            agentLabel: CATEGORY_LABELS[category],
            scores,
            processingTimeMs: this.now() - startTime,
            model: this.model,
            error: detail,
         };
      }
   }

   /**
    * Re-derive context from the trailing history window plus the message.
    * Runs before routing so the turn sees the message's course.
    */
   private updateContext(session: SessionState, message: string): void {
      const before = session.context.currentCourse;
      const windowTexts = session.history
         .lastN(HISTORY_WINDOW)
         .map((entry) => entry.content);

      session.context = refreshContext(windowTexts, message, session.context, this.catalog);

      const after = session.context.currentCourse;
      if (after !== before) {
         console.log(`📌 Orchestrator: Current course set to: ${after}`);
      } else if (refersToCurrentCourse(message, session.context)) {
         console.log(`📌 Orchestrator: Maintaining current course context: ${after}`);
      }
   }

   // ========================================
   // Helpers
   // ========================================

   private describeCourse(course: CourseRef | null): string {
      const record = course ? this.knowledgeBase.getCourseByName(course) : undefined;
      if (!record) return NO_CURRENT_COURSE_TEXT;

      return `${record.name}: ${record.costSoles} soles. Inscripción: ${record.enrollmentLink}`;
   }

   private async safePublish(event: AssistantEvent): Promise<void> {
      try {
         await this.publisher.publish(event);
      } catch (error) {
         console.error(
            `❌ Orchestrator: Event ${event.eventType} not published: ${describeError(error)}`
         );
      }
   }

   private runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
      const previous = this.queues.get(sessionId) ?? Promise.resolve();
      const run = previous.then(task);
      const tail: Promise<void> = run
         .then(
            () => undefined,
            () => undefined
         )
         .then(() => {
            if (this.queues.get(sessionId) === tail) {
               this.queues.delete(sessionId);
            }
         });
      this.queues.set(sessionId, tail);
      return run;
   }
}
