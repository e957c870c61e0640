#!/usr/bin/env node
// ============================================
// UserInterface - Command-Line Chat
// Reads turns from stdin and prints the routed agent's reply.
// Commands: "reiniciar" / "/reset" clears the session, "salir" / "/exit" quits.
// ============================================

import { randomUUID } from 'node:crypto';
import { createInterface } from 'node:readline/promises';
import { loadConfig } from '../shared/config';
import { describeError } from '../shared/errors';
import { createAssistant } from '../orchestrator-service/src/bootstrap';
import type { Orchestrator, TurnResult } from '../orchestrator-service/src/service';

export type CliCommand =
   | { kind: 'exit' }
   | { kind: 'reset' }
   | { kind: 'empty' }
   | { kind: 'message'; text: string };

const EXIT_COMMANDS = new Set(['salir', '/exit']);
const RESET_COMMANDS = new Set(['reiniciar', '/reset']);

export const BANNER = [
   '=== Asistente Educativo ===',
   "Escribe 'salir' para terminar, 'reiniciar' para limpiar el historial.",
].join('\n');
export const GOODBYE_MESSAGE = '¡Hasta luego!';
export const RESET_CONFIRMATION = 'Historial de conversación borrado.';

export type CliOrchestrator = Pick<Orchestrator, 'handleMessage' | 'resetSession'>;

export function parseCommand(line: string): CliCommand {
   const text = line.trim();
   const normalized = text.toLowerCase();

   if (text.length === 0) return { kind: 'empty' };
   if (EXIT_COMMANDS.has(normalized)) return { kind: 'exit' };
   if (RESET_COMMANDS.has(normalized)) return { kind: 'reset' };
   return { kind: 'message', text };
}

export function formatReply(turn: TurnResult): string {
   return `Asistente (${turn.agentLabel}): ${turn.text}`;
}

/**
 * Handle one input line.
 * `output` is what to print (null for nothing), `done` ends the loop.
 */
export async function handleLine(
   orchestrator: CliOrchestrator,
   sessionId: string,
   line: string
): Promise<{ output: string | null; done: boolean }> {
   const command = parseCommand(line);

   switch (command.kind) {
      case 'empty':
         return { output: null, done: false };
      case 'exit':
         return { output: GOODBYE_MESSAGE, done: true };
      case 'reset':
         await orchestrator.resetSession(sessionId);
         return { output: RESET_CONFIRMATION, done: false };
      case 'message': {
         const turn = await orchestrator.handleMessage(sessionId, command.text);
         return { output: formatReply(turn), done: false };
      }
   }
}

async function main(): Promise<void> {
   const config = loadConfig();
   const assistant = await createAssistant(config);
   const sessionId = randomUUID();
   const rl = createInterface({ input: process.stdin, output: process.stdout });

   console.log(BANNER);

   try {
      for (;;) {
         const line = await rl.question('\nTú: ');
         const { output, done } = await handleLine(assistant.orchestrator, sessionId, line);
         if (output) console.log(`\n${output}`);
         if (done) break;
      }
   } finally {
      rl.close();
      await assistant.close();
   }
}

if (require.main === module) {
   main().catch((error: unknown) => {
      console.error(`💥 ${describeError(error)}`);
      process.exit(1);
   });
}
