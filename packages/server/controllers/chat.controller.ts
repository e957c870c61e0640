import type { Request, Response } from 'express';
import { z } from 'zod';
import type { Orchestrator } from '../../services/orchestrator-service/src/service';
import type { ScoreVector } from '../../services/router-service/routerService';

// Zod schema for validating incoming chat requests
const chatSchema = z.object({
   prompt: z
      .string()
      .trim()
      .min(1, 'prompt is required')
      .max(1000, 'prompt is too long (max 1000 characters)'),
   conversationId: z.string().uuid(),
});

const resetSchema = z.object({
   conversationId: z.string().uuid(),
});

export const RESET_COMMAND = '/reset';
export const RESET_MESSAGE =
   'La conversación fue reiniciada. ¿En qué puedo ayudarte?';

/** The orchestrator surface the controller needs */
export type ChatOrchestrator = Pick<
   Orchestrator,
   'handleMessage' | 'resetSession' | 'activeSessions'
>;

export interface ChatResponseBody {
   id: string;
   message: string;
   agent: string | null;
   scores: ScoreVector | null;
   processingTimeMs: number;
}

export interface HttpResult<T> {
   status: number;
   body: T;
}

type ChatResult =
   | HttpResult<ChatResponseBody>
   | HttpResult<z.inferFormattedError<typeof chatSchema>>
   | HttpResult<{ error: string }>;

type ResetResult =
   | HttpResult<{ message: string }>
   | HttpResult<z.inferFormattedError<typeof resetSchema>>
   | HttpResult<{ error: string }>;

// Generate unique ID for responses that don't come from a turn
function generateId(): string {
   return `msg_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

export function createChatController(
   orchestrator: ChatOrchestrator,
   createId: () => string = generateId
) {
   /**
    * Validate the body, then run a turn (or a reset for "/reset")
    */
   async function processChat(body: unknown): Promise<ChatResult> {
      const parseResult = chatSchema.safeParse(body);

      // ==> If validation fails
      if (!parseResult.success) {
         return { status: 400, body: parseResult.error.format() };
      }

      // ==> If validation succeeds
      try {
         const { prompt, conversationId } = parseResult.data;

         if (prompt === RESET_COMMAND) {
            await orchestrator.resetSession(conversationId);
            return {
               status: 200,
               body: {
                  id: createId(),
                  message: RESET_MESSAGE,
                  agent: null,
                  scores: null,
                  processingTimeMs: 0,
               },
            };
         }

         const turn = await orchestrator.handleMessage(conversationId, prompt);

         return {
            status: 200,
            body: {
               id: turn.correlationId,
               message: turn.text,
               agent: turn.agentLabel,
               scores: turn.scores,
               processingTimeMs: turn.processingTimeMs,
            },
         };
      } catch (error) {
         console.error('Chat processing error:', error);
         return { status: 500, body: { error: 'Failed to process the request' } };
      }
   }

   async function processReset(body: unknown): Promise<ResetResult> {
      const parseResult = resetSchema.safeParse(body);
      if (!parseResult.success) {
         return { status: 400, body: parseResult.error.format() };
      }

      try {
         await orchestrator.resetSession(parseResult.data.conversationId);
         return {
            status: 200,
            body: { message: 'Conversation history has been reset.' },
         };
      } catch (error) {
         console.error('Reset error:', error);
         return { status: 500, body: { error: 'Failed to reset conversation' } };
      }
   }

   // Public interface
   return {
      processChat,
      processReset,

      async handleChat(req: Request, res: Response) {
         const result = await processChat(req.body);
         res.status(result.status).json(result.body);
      },

      async handleReset(req: Request, res: Response) {
         const result = await processReset(req.body);
         res.status(result.status).json(result.body);
      },

      handleHealth(_req: Request, res: Response) {
         res.json({ status: 'ok', sessions: orchestrator.activeSessions });
      },
   };
}

export type ChatController = ReturnType<typeof createChatController>;
