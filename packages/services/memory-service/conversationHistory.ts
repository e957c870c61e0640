// ============================================
// ConversationHistory
// Append-only transcript for one session
// ============================================

import type { AgentCategory } from '../shared/agent-categories';

export type HistoryRole = 'user' | 'assistant';

export interface HistoryEntry {
   role: HistoryRole;
   content: string;
   /** Agent that produced an assistant entry */
   agent?: AgentCategory;
   timestamp: number;
}

const ROLE_LABELS: Record<HistoryRole, string> = {
   user: 'User',
   assistant: 'Assistant',
};

export class ConversationHistory {
   private entries: HistoryEntry[] = [];

   constructor(private readonly now: () => number = Date.now) {}

   get length(): number {
      return this.entries.length;
   }

   append(role: HistoryRole, content: string, agent?: AgentCategory): HistoryEntry {
      const entry: HistoryEntry = {
         role,
         content,
         ...(agent && { agent }),
         timestamp: this.now(),
      };
      this.entries.push(entry);
      return entry;
   }

   /** The last `count` entries, oldest first */
   lastN(count: number): HistoryEntry[] {
      if (count <= 0) return [];
      return this.entries.slice(-count);
   }

   all(): HistoryEntry[] {
      return [...this.entries];
   }

   clear(): void {
      this.entries = [];
   }

   /**
    * "Role: text" lines, newest last
    */
   format(): string {
      return this.entries
         .map((entry) => `${ROLE_LABELS[entry.role]}: ${entry.content}`)
         .join('\n');
   }
}
