import { loadConfig } from '../services/shared/config';
import { describeError } from '../services/shared/errors';
import { createAssistant } from '../services/orchestrator-service/src/bootstrap';
import { createApp } from './app';

async function main(): Promise<void> {
   // ConfigurationError / DataError abort startup before anything listens
   const config = loadConfig();
   const assistant = await createAssistant(config);

   const app = createApp(assistant.orchestrator);
   const server = app.listen(config.port, () => {
      console.log(`Server is running on http://localhost:${config.port}`);
   });

   const shutdown = () => {
      console.log('🔌 Server: Stopping...');
      server.close(() => {
         assistant
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
               console.error('Shutdown error:', error);
               process.exit(1);
            });
      });
   };

   process.on('SIGINT', shutdown);
   process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
   console.error(`💥 Startup failed: ${describeError(error)}`);
   process.exit(1);
});
