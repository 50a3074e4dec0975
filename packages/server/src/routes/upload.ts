import { FastifyPluginAsync } from 'fastify';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { EnqueueResponse, ErrorResponse } from '@voxqueue/shared';
import { errorMessage, isSupportedAudio } from '@voxqueue/client';
import { ServerDeps } from '../context';
import { uploadFileName } from '../utils/helper';

const uploadHeadersSchema = z.object({
  'x-title': z.string().trim().min(1).max(200).optional()
});

/**
 * Upload Route
 * 1. Optional job title comes from the x-title header.
 * 2. The file is streamed straight to the upload folder.
 * 3. The stored copy is queued; the orchestrator owns it from there.
 */
export function uploadRoutes(deps: ServerDeps): FastifyPluginAsync {
  return async server => {
    server.post<{ Reply: EnqueueResponse | ErrorResponse }>('/upload', async (req, reply) => {
      const headers = uploadHeadersSchema.safeParse(req.headers);
      if (!headers.success) {
        return reply.status(400).send({ error: 'Invalid x-title header' });
      }

      const data = await req.file();
      if (!data) {
        return reply.status(400).send({ error: 'No file uploaded' });
      }
      if (!isSupportedAudio(data.filename)) {
        // Drain the part so the request can complete
        data.file.resume();
        return reply.status(400).send({ error: `Unsupported audio format: ${data.filename}` });
      }

      const savePath = path.join(deps.uploadDir, uploadFileName(randomUUID(), data.filename));
      await fs.promises.mkdir(deps.uploadDir, { recursive: true });

      try {
        await pipeline(data.file, fs.createWriteStream(savePath));
      } catch (err) {
        console.error('❌ [Upload] Stream failed:', errorMessage(err));
        await fs.promises.rm(savePath, { force: true });
        return reply.status(500).send({ error: 'Stream processing failed' });
      }

      const filename = headers.data['x-title'] ?? data.filename;
      const jobId = deps.orchestrator.enqueue(savePath, filename);
      console.log(`📥 [Upload] ${data.filename} -> job ${jobId}`);

      return { success: true, jobId, message: 'File queued.' };
    });
  };
}
