import express from 'express';
import { createChatController, type ChatOrchestrator } from './controllers/chat.controller';
import { createRouter } from './routes';

export function createApp(orchestrator: ChatOrchestrator): express.Express {
   const app = express();
   app.use(express.json());
   app.use(createRouter(createChatController(orchestrator)));
   return app;
}
