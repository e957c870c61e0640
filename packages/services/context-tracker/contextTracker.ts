// ============================================
// ContextTracker
// Tracks the course under discussion and the courses mentioned so far.
// Every update is pure: it returns a new context and never mutates input.
// ============================================

/** Canonical course name from the knowledge base */
export type CourseRef = string;

export interface ConversationContext {
   currentCourse: CourseRef | null;
   /** Insertion order, no duplicates */
   mentionedCourses: CourseRef[];
}

/** Course lookup data for one update */
export interface CourseCatalog {
   knownCourses: readonly CourseRef[];
   /** alias (matched case-insensitively) → canonical course name */
   aliases: Readonly<Record<string, CourseRef>>;
}

export const DEFAULT_COURSE_ALIASES: Readonly<Record<string, CourseRef>> = {
   'Data Mining': 'Data Mining y Análisis de Datos',
   SQL: 'Gestión de Bases de Datos con SQL',
   'Power BI': 'Power BI para la Gestión de Datos (Grupo 1)',
};

/** Words that point back at the course already under discussion */
export const REFERENCE_WORDS = [
   'curso',
   'comprar',
   'pagar',
   'inscribirme',
   'matricularme',
   'ese',
   'este curso',
] as const;

export const HISTORY_WINDOW = 4;

export const NO_CONTEXT_TEXT = 'No hay contexto adicional.';

export function emptyContext(): ConversationContext {
   return { currentCourse: null, mentionedCourses: [] };
}

function focusOn(context: ConversationContext, course: CourseRef): ConversationContext {
   return {
      currentCourse: course,
      mentionedCourses: context.mentionedCourses.includes(course)
         ? [...context.mentionedCourses]
         : [...context.mentionedCourses, course],
   };
}

function copyContext(context: ConversationContext): ConversationContext {
   return {
      currentCourse: context.currentCourse,
      mentionedCourses: [...context.mentionedCourses],
   };
}

/**
 * Apply one message to a context. First matching rule wins:
 *   1. a full course name
 *   2. an alias
 *   3. a generic reference while a course is set (keep it)
 *   4. nothing matched (keep it)
 */
export function updateFromMessage(
   message: string,
   context: ConversationContext,
   knownCourses: readonly CourseRef[],
   aliasTable: Readonly<Record<string, CourseRef>>
): ConversationContext {
   const text = message.toLowerCase();

   for (const course of knownCourses) {
      if (text.includes(course.toLowerCase())) {
         return focusOn(context, course);
      }
   }

   for (const [alias, course] of Object.entries(aliasTable)) {
      if (text.includes(alias.toLowerCase())) {
         return focusOn(context, course);
      }
   }

   // Rules 3 and 4 both leave the context as it was
   return copyContext(context);
}

/**
 * True when the message only refers back to the current course
 * (rule 3), so the course is kept on purpose rather than by default.
 */
export function refersToCurrentCourse(
   message: string,
   context: ConversationContext
): boolean {
   const text = message.toLowerCase();
   return (
      context.currentCourse !== null &&
      REFERENCE_WORDS.some((word) => text.includes(word))
   );
}

/**
 * Apply a sequence of texts, oldest first
 */
export function applyMessages(
   texts: readonly string[],
   context: ConversationContext,
   catalog: CourseCatalog
): ConversationContext {
   return texts.reduce(
      (current, text) =>
         text ? updateFromMessage(text, current, catalog.knownCourses, catalog.aliases) : current,
      copyContext(context)
   );
}

/**
 * Re-scan the trailing history window, then apply the new message.
 * Entries already applied on earlier turns are idempotent, so this matches
 * applying the whole transcript once, in order.
 */
export function refreshContext(
   historyTexts: readonly string[],
   message: string,
   context: ConversationContext,
   catalog: CourseCatalog
): ConversationContext {
   const window = historyTexts.slice(-HISTORY_WINDOW);
   return applyMessages([...window, message], context, catalog);
}

/**
 * Context summary for prompts
 */
export function formatContext(context: ConversationContext): string {
   const lines: string[] = [];

   if (context.currentCourse) {
      lines.push(`Curso actual en discusión: ${context.currentCourse}`);
   }
   if (context.mentionedCourses.length > 0) {
      lines.push(
         `Cursos mencionados previamente: ${context.mentionedCourses.join(', ')}`
      );
   }

   return lines.length > 0 ? lines.join('\n') : NO_CONTEXT_TEXT;
}
