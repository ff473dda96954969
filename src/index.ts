import 'dotenv/config';
import { createApp, createShutdownHandler } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { ConfigError } from './errors.js';

async function main(): Promise<void> {
  console.log('PDF answer service starting...\n');

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Error: invalid configuration');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      console.error('See .env.example for the recognized variables.');
      process.exit(1);
    }
    throw error;
  }

  console.log(`[Init] Embedding model: ${config.embeddingModel} (batch size ${config.batchSize})`);
  console.log(`[Init] Chat model: ${config.chatModel} (top-K ${config.topK})`);
  console.log(`[Init] Vector store: ${config.lanceDbPath} table=${config.vectorIndex}`);
  console.log(`[Init] Documents: ${config.documentsDir}`);

  const { server } = await createApp(config);
  await server.start();

  // Handle shutdown
  const shutdown = createShutdownHandler(server);

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
