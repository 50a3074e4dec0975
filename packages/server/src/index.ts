import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { ServerDeps } from './context';
import { jobRoutes } from './routes/jobs';
import { uploadRoutes } from './routes/upload';

export type { ServerDeps } from './context';

export function buildServer(deps: ServerDeps): FastifyInstance {
  const server = Fastify({
    logger: false,
    bodyLimit: 1048576 * 500, // 500MB
  });

  server.register(cors, { origin: '*' });
  server.register(multipart, { limits: { fileSize: 1048576 * 500 } });

  // --- AUTHENTICATION ---
  server.addHook('onRequest', async (request, reply) => {
    if (deps.apiKey) {
      const clientKey = request.headers['x-api-key'];
      if (!clientKey || clientKey !== deps.apiKey) {
        console.warn(`🔒 Unauthorized access attempt from ${request.ip}`);
        return reply.code(401).send({ error: 'Unauthorized: Invalid or missing API Key' });
      }
    }
  });

  server.get('/', async () => ({ status: 'online', service: 'voxqueue' }));

  server.register(uploadRoutes(deps));
  server.register(jobRoutes(deps));

  return server;
}
