import express from 'express';
import type { ChatController } from './controllers/chat.controller';

export function createRouter(chatController: ChatController): express.Router {
   const router = express.Router();

   router.get('/api/health', chatController.handleHealth);

   // Chat route: one turn per request, "/reset" as prompt clears the session
   router.post('/api/chat', chatController.handleChat);

   router.post('/api/reset', chatController.handleReset);

   return router;
}
