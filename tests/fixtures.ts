import type { EventPublisher } from '../packages/services/shared/event-publisher';
import type { AssistantEvent } from '../packages/services/shared/event-schemas';
import type { ChatPrompt, TextGenerator } from '../packages/services/shared/llm-client';
import type { CourseRecord } from '../packages/services/knowledge-base/knowledgeBase';

export const SQL_COURSE = 'Gestión de Bases de Datos con SQL';
export const DATA_MINING_COURSE = 'Data Mining y Análisis de Datos';
export const POWER_BI_COURSE = 'Power BI para la Gestión de Datos (Grupo 1)';

export const TEST_COURSES: CourseRecord[] = [
   {
      name: DATA_MINING_COURSE,
      format: 'Virtual',
      costSoles: 1800,
      objective: 'Encontrar patrones en datos',
      enrollmentLink: 'https://example.test/data-mining',
   },
   {
      name: SQL_COURSE,
      format: 'Virtual',
      costSoles: 1100,
      objective: 'Consultar bases relacionales',
      enrollmentLink: 'https://example.test/sql',
   },
   {
      name: POWER_BI_COURSE,
      format: 'Presencial',
      costSoles: 1800,
      objective: 'Construir tableros',
      enrollmentLink: 'https://example.test/power-bi',
   },
];

export class RecordingPublisher implements EventPublisher {
   readonly events: AssistantEvent[] = [];
   closed = false;

   async connect(): Promise<void> {}

   async publish(event: AssistantEvent): Promise<void> {
      this.events.push(event);
   }

   async close(): Promise<void> {
      this.closed = true;
   }

   types(): string[] {
      return this.events.map((event) => event.eventType);
   }
}

/** Replies from a script; a reply of type Error is thrown instead */
export class ScriptedGenerator implements TextGenerator {
   readonly model = 'test-model';
   readonly prompts: ChatPrompt[] = [];

   constructor(
      private readonly replies: Array<string | Error>,
      private readonly onCall: () => void = () => {}
   ) {}

   async generate(prompt: ChatPrompt): Promise<string> {
      this.prompts.push(prompt);
      this.onCall();
      const reply = this.replies.shift() ?? 'respuesta';
      if (reply instanceof Error) {
         throw reply;
      }
      return reply;
   }
}

/** Holds every call open until the test resolves it */
export class DeferredGenerator implements TextGenerator {
   readonly model = 'test-model';
   readonly prompts: ChatPrompt[] = [];
   readonly pending: Array<(text: string) => void> = [];

   generate(prompt: ChatPrompt): Promise<string> {
      this.prompts.push(prompt);
      return new Promise((resolve) => {
         this.pending.push(resolve);
      });
   }
}

export function flush(): Promise<void> {
   return new Promise((resolve) => setImmediate(resolve));
}
