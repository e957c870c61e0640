// ============================================
// Session Store - In-Memory Per-Session State
// Router state, conversation context and history, keyed by session id.
// ============================================

import type { AgentCategory } from '../shared/agent-categories';
import {
   emptyContext,
   type ConversationContext,
} from '../context-tracker/contextTracker';
import { ConversationHistory } from './conversationHistory';

export interface SessionState {
   sessionId: string;
   /** Router state: the last agent selected with a positive score */
   lastCategory: AgentCategory | null;
   context: ConversationContext;
   history: ConversationHistory;
   createdAt: number;
   updatedAt: number;
}

export interface SessionStore {
   getOrCreate(sessionId: string): SessionState;
   get(sessionId: string): SessionState | undefined;
   delete(sessionId: string): boolean;
   cleanupIdleSessions(maxIdleMs: number): number;
   readonly size: number;
}

export class InMemorySessionStore implements SessionStore {
   /** In-memory state store: sessionId → SessionState */
   private store = new Map<string, SessionState>();

   constructor(private readonly now: () => number = Date.now) {}

   get size(): number {
      return this.store.size;
   }

   get(sessionId: string): SessionState | undefined {
      return this.store.get(sessionId);
   }

   getOrCreate(sessionId: string): SessionState {
      const existing = this.store.get(sessionId);
      if (existing) return existing;

      const createdAt = this.now();
      const state: SessionState = {
         sessionId,
         lastCategory: null,
         context: emptyContext(),
         history: new ConversationHistory(this.now),
         createdAt,
         updatedAt: createdAt,
      };
      this.store.set(sessionId, state);

      console.log(`🆕 SessionStore: Created session [${sessionId}]`);
      return state;
   }

   delete(sessionId: string): boolean {
      return this.store.delete(sessionId);
   }

   /**
    * Remove sessions idle for longer than maxIdleMs.
    * Prevents unbounded memory growth.
    */
   cleanupIdleSessions(maxIdleMs: number): number {
      const cutoff = this.now() - maxIdleMs;
      let removed = 0;

      for (const [key, state] of this.store) {
         if (state.updatedAt < cutoff) {
            this.store.delete(key);
            removed++;
         }
      }

      if (removed > 0) {
         console.log(`🧹 SessionStore: Cleaned up ${removed} idle sessions`);
      }

      return removed;
   }
}

/**
 * Reset router state, context and history in place
 */
export function clearSession(state: SessionState, now: number): void {
   state.lastCategory = null;
   state.context = emptyContext();
   state.history.clear();
   state.updatedAt = now;
}
