import test from 'node:test';
import assert from 'node:assert/strict';
import { ConversationHistory } from '../packages/services/memory-service/conversationHistory';
import {
   InMemorySessionStore,
   clearSession,
} from '../packages/services/memory-service/sessionStore';
import { SQL_COURSE } from './fixtures';

test('history appends in order and formats role lines', () => {
   let clock = 100;
   const history = new ConversationHistory(() => clock++);

   history.append('user', '¿Qué cursos tienen?');
   history.append('assistant', 'Tenemos tres cursos.', 'courses');

   assert.equal(history.length, 2);
   assert.deepEqual(history.all(), [
      { role: 'user', content: '¿Qué cursos tienen?', timestamp: 100 },
      {
         role: 'assistant',
         content: 'Tenemos tres cursos.',
         agent: 'courses',
         timestamp: 101,
      },
   ]);
   assert.equal(
      history.format(),
      'User: ¿Qué cursos tienen?\nAssistant: Tenemos tres cursos.'
   );
});

test('lastN returns the newest entries, oldest first', () => {
   const history = new ConversationHistory();
   for (const text of ['a', 'b', 'c', 'd', 'e']) {
      history.append('user', text);
   }

   assert.deepEqual(
      history.lastN(3).map((entry) => entry.content),
      ['c', 'd', 'e']
   );
   assert.equal(history.lastN(10).length, 5);
   assert.deepEqual(history.lastN(0), []);
});

test('clear empties the history', () => {
   const history = new ConversationHistory();
   history.append('user', 'hola');
   history.clear();

   assert.equal(history.length, 0);
   assert.equal(history.format(), '');
});

test('getOrCreate returns one state per session id', () => {
   const store = new InMemorySessionStore(() => 5);

   const first = store.getOrCreate('session-a');
   const again = store.getOrCreate('session-a');
   const other = store.getOrCreate('session-b');

   assert.equal(first, again);
   assert.notEqual(first, other);
   assert.equal(store.size, 2);
   assert.equal(first.lastCategory, null);
   assert.deepEqual(first.context, { currentCourse: null, mentionedCourses: [] });
   assert.equal(first.createdAt, 5);
});

test('delete and idle cleanup remove sessions', () => {
   let clock = 0;
   const store = new InMemorySessionStore(() => clock);

   store.getOrCreate('old');
   clock = 1000;
   store.getOrCreate('fresh');
   store.getOrCreate('gone');

   assert.equal(store.delete('gone'), true);
   assert.equal(store.delete('gone'), false);

   clock = 1500;
   assert.equal(store.cleanupIdleSessions(1000), 1);
   assert.equal(store.get('old'), undefined);
   assert.ok(store.get('fresh'));
});

test('clearSession resets router state, context and history', () => {
   const store = new InMemorySessionStore(() => 1);
   const state = store.getOrCreate('session-a');
   state.lastCategory = 'sales';
   state.context = { currentCourse: SQL_COURSE, mentionedCourses: [SQL_COURSE] };
   state.history.append('user', 'quiero comprar');

   clearSession(state, 42);

   assert.equal(state.lastCategory, null);
   assert.deepEqual(state.context, { currentCourse: null, mentionedCourses: [] });
   assert.equal(state.history.length, 0);
   assert.equal(state.updatedAt, 42);
});
