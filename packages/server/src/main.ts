import 'dotenv/config';
import path from 'path';
import { createContainer, errorMessage } from '@voxqueue/client';
import { buildServer } from './index';

const PORT = parseInt(process.env.PORT || '3000', 10);
const HOST = process.env.HOST || '127.0.0.1';

async function main(): Promise<void> {
  const app = createContainer({ dataDir: process.env.VOXQUEUE_DATA_DIR });
  await app.orchestrator.start();

  const server = buildServer({
    orchestrator: app.orchestrator,
    ledger: app.ledger,
    exporter: app.exporter,
    uploadDir: path.join(app.paths.data, 'uploads'),
    apiKey: process.env.API_KEY
  });

  const shutdown = async (signal: string) => {
    console.log(`\n👋 ${signal} received, shutting down`);
    await server.close();
    await app.orchestrator.shutdown();
  };
  process.once('SIGINT', () => {
    shutdown('SIGINT').catch(error => console.error('❌ Shutdown failed:', errorMessage(error)));
  });
  process.once('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => console.error('❌ Shutdown failed:', errorMessage(error)));
  });

  await server.listen({ port: PORT, host: HOST });
  console.log(`\n🚀 Server listening at http://${HOST}:${PORT}`);
  if (!process.env.API_KEY) console.warn('⚠️ API_KEY is not set; the API is open to anyone who can reach it');
}

main().catch(error => {
  console.error('❌ Server failed to start:', errorMessage(error));
  process.exit(1);
});
