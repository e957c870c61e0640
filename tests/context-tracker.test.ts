import test from 'node:test';
import assert from 'node:assert/strict';
import {
   DEFAULT_COURSE_ALIASES,
   NO_CONTEXT_TEXT,
   applyMessages,
   emptyContext,
   formatContext,
   refersToCurrentCourse,
   refreshContext,
   updateFromMessage,
   type ConversationContext,
   type CourseCatalog,
} from '../packages/services/context-tracker/contextTracker';
import { DATA_MINING_COURSE, POWER_BI_COURSE, SQL_COURSE } from './fixtures';

const catalog: CourseCatalog = {
   knownCourses: [DATA_MINING_COURSE, SQL_COURSE, POWER_BI_COURSE],
   aliases: DEFAULT_COURSE_ALIASES,
};

function update(message: string, context: ConversationContext): ConversationContext {
   return updateFromMessage(message, context, catalog.knownCourses, catalog.aliases);
}

test('full course name sets the current course', () => {
   const context = update('Me interesa data mining y análisis de datos', emptyContext());

   assert.deepEqual(context, {
      currentCourse: DATA_MINING_COURSE,
      mentionedCourses: [DATA_MINING_COURSE],
   });
});

test('alias resolves to the full course name', () => {
   const context = update('¿qué tal el de power bi?', emptyContext());

   assert.equal(context.currentCourse, POWER_BI_COURSE);
   assert.deepEqual(context.mentionedCourses, [POWER_BI_COURSE]);
});

test('generic reference keeps the course under discussion', () => {
   const before: ConversationContext = {
      currentCourse: SQL_COURSE,
      mentionedCourses: [SQL_COURSE],
   };
   const after = update('quiero comprar ese curso', before);

   assert.deepEqual(after, before);
   assert.equal(refersToCurrentCourse('quiero comprar ese curso', before), true);
});

test('generic reference without a current course does not count', () => {
   assert.equal(refersToCurrentCourse('quiero comprar ese curso', emptyContext()), false);
});

test('unrelated message leaves the context unchanged', () => {
   const before: ConversationContext = {
      currentCourse: POWER_BI_COURSE,
      mentionedCourses: [DATA_MINING_COURSE, POWER_BI_COURSE],
   };

   assert.deepEqual(update('gracias por la ayuda', before), before);
});

test('updates never mutate the input context', () => {
   const before = emptyContext();
   const after = update('cuéntame de SQL', before);

   assert.deepEqual(before, { currentCourse: null, mentionedCourses: [] });
   assert.equal(after.currentCourse, SQL_COURSE);
   assert.notEqual(after.mentionedCourses, before.mentionedCourses);
});

test('mentioned courses keep first-mention order without duplicates', () => {
   const context = applyMessages(
      ['primero SQL', 'luego Power BI', 'vuelvo a SQL'],
      emptyContext(),
      catalog
   );

   assert.deepEqual(context, {
      currentCourse: SQL_COURSE,
      mentionedCourses: [SQL_COURSE, POWER_BI_COURSE],
   });
});

test('back-scan only looks at the last four history entries', () => {
   const history = [
      'háblame de data mining',
      'claro',
      'ok',
      'gracias',
      'entendido',
   ];

   const context = refreshContext(history, 'y el precio?', emptyContext(), catalog);

   assert.deepEqual(context, emptyContext());
});

test('back-scan picks up a course named by the assistant', () => {
   const history = ['¿qué me recomiendas?', 'Te recomiendo Power BI para empezar.'];

   const context = refreshContext(history, 'me interesa', emptyContext(), catalog);

   assert.equal(context.currentCourse, POWER_BI_COURSE);
});

test('back-scanned context matches incremental derivation over the transcript', () => {
   const turns: Array<[string, string]> = [
      ['hola', 'Hola, tenemos Data Mining, SQL y Power BI.'],
      ['cuéntame de SQL', 'El curso de SQL cubre consultas y modelado.'],
      ['¿y cuánto cuesta?', 'Cuesta 1100 soles.'],
      ['quiero comprar ese curso', 'Perfecto, aquí tienes el link.'],
      ['también me interesa data mining', 'Data Mining dura ocho semanas.'],
      ['sí', 'Genial.'],
   ];

   let context = emptyContext();
   const history: string[] = [];
   const transcript: string[] = [];

   for (const [userText, assistantText] of turns) {
      context = refreshContext(history, userText, context, catalog);
      transcript.push(userText);

      const incremental = applyMessages(transcript, emptyContext(), catalog);
      assert.deepEqual(context, incremental, `diverged at "${userText}"`);

      history.push(userText, assistantText);
      transcript.push(assistantText);
   }

   assert.deepEqual(context, {
      currentCourse: DATA_MINING_COURSE,
      mentionedCourses: [DATA_MINING_COURSE, SQL_COURSE],
   });
});

test('formatContext renders both lines or a placeholder', () => {
   assert.equal(formatContext(emptyContext()), NO_CONTEXT_TEXT);
   assert.equal(
      formatContext({
         currentCourse: SQL_COURSE,
         mentionedCourses: [DATA_MINING_COURSE, SQL_COURSE],
      }),
      `Curso actual en discusión: ${SQL_COURSE}\n` +
         `Cursos mencionados previamente: ${DATA_MINING_COURSE}, ${SQL_COURSE}`
   );
});
