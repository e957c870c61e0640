import test from 'node:test';
import assert from 'node:assert/strict';
import type { TurnResult } from '../packages/services/orchestrator-service/src/service';
import {
   GOODBYE_MESSAGE,
   RESET_CONFIRMATION,
   handleLine,
   parseCommand,
   type CliOrchestrator,
} from '../packages/services/user-interface/userInterface';

class FakeOrchestrator implements CliOrchestrator {
   readonly calls: string[] = [];

   async handleMessage(sessionId: string, message: string): Promise<TurnResult> {
      this.calls.push(`message:${sessionId}:${message}`);
      return {
         correlationId: 'turn-1',
         text: 'Tenemos tres cursos.',
         category: 'courses',
         agentLabel: 'cursos',
         scores: { courses: 10, career_paths: 0, sales: 0 },
         processingTimeMs: 80,
         model: 'test-model',
      };
   }

   async resetSession(sessionId: string): Promise<void> {
      this.calls.push(`reset:${sessionId}`);
   }
}

test('parseCommand recognises exit and reset words', () => {
   assert.deepEqual(parseCommand('salir'), { kind: 'exit' });
   assert.deepEqual(parseCommand('  SALIR '), { kind: 'exit' });
   assert.deepEqual(parseCommand('/exit'), { kind: 'exit' });
   assert.deepEqual(parseCommand('Reiniciar'), { kind: 'reset' });
   assert.deepEqual(parseCommand('/reset'), { kind: 'reset' });
   assert.deepEqual(parseCommand('   '), { kind: 'empty' });
   assert.deepEqual(parseCommand('  ¿Qué cursos hay? '), {
      kind: 'message',
      text: '¿Qué cursos hay?',
   });
});

test('a message prints the reply with its agent label', async () => {
   const orchestrator = new FakeOrchestrator();

   const result = await handleLine(orchestrator, 'cli', '¿Qué cursos hay?');

   assert.deepEqual(result, {
      output: 'Asistente (cursos): Tenemos tres cursos.',
      done: false,
   });
   assert.deepEqual(orchestrator.calls, ['message:cli:¿Qué cursos hay?']);
});

test('reset, exit and blank lines do not run a turn', async () => {
   const orchestrator = new FakeOrchestrator();

   assert.deepEqual(await handleLine(orchestrator, 'cli', 'reiniciar'), {
      output: RESET_CONFIRMATION,
      done: false,
   });
   assert.deepEqual(await handleLine(orchestrator, 'cli', ''), { output: null, done: false });
   assert.deepEqual(await handleLine(orchestrator, 'cli', 'salir'), {
      output: GOODBYE_MESSAGE,
      done: true,
   });
   assert.deepEqual(orchestrator.calls, ['reset:cli']);
});
