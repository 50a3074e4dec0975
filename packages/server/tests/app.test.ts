import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import FormData from 'form-data';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FastifyInstance } from 'fastify';
import { AppContainer, ConfigService, createContainer } from '@voxqueue/client';
import { buildServer } from '../src/index';

describe('Server API', () => {
    let root: string;
    let container: AppContainer;
    let app: FastifyInstance;

    function serverWith(apiKey?: string): FastifyInstance {
        return buildServer({
            orchestrator: container.orchestrator,
            ledger: container.ledger,
            exporter: container.exporter,
            uploadDir: path.join(root, 'uploads'),
            apiKey
        });
    }

    function upload(filename: string, headers: Record<string, string> = {}) {
        const form = new FormData();
        form.append('file', Buffer.from('RIFF'), { filename, contentType: 'audio/wav' });
        return app.inject({
            method: 'POST',
            url: '/upload',
            headers: { ...form.getHeaders(), ...headers },
            payload: form.getBuffer()
        });
    }

    function completedJob(filename: string) {
        return container.orchestrator.addCompletedLiveJob({
            audioPath: '',
            filename,
            result: { text: 'Hello there.', segments: [{ start: 0, end: 2, text: 'Hello there.' }], duration: 2 }
        });
    }

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        vi.spyOn(console, 'error').mockImplementation(() => { });

        root = fs.mkdtempSync(path.join(os.tmpdir(), 'voxqueue-server-'));
        container = createContainer({
            config: new ConfigService({ cwd: path.join(root, 'config') }),
            dataDir: path.join(root, 'data'),
            autoRun: false
        });
        app = serverWith();
        await app.ready();
    });

    afterEach(async () => {
        await app.close();
        vi.restoreAllMocks();
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('GET / should return online status', async () => {
        const response = await app.inject({ method: 'GET', url: '/' });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ status: 'online', service: 'voxqueue' });
    });

    // --- Upload ---

    it('POST /upload should return 400 when file is missing', async () => {
        // Arrange
        const form = new FormData();
        form.append('language', 'en');

        // Act
        const response = await app.inject({
            method: 'POST',
            url: '/upload',
            headers: form.getHeaders(),
            payload: form.getBuffer()
        });

        // Assert
        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({ error: 'No file uploaded' });
    });

    it('POST /upload should store the file and queue a job', async () => {
        // Act
        const response = await upload('weekly sync.wav', { 'x-title': 'Weekly' });

        // Assert
        expect(response.statusCode).toBe(200);
        const body = response.json();
        expect(body).toMatchObject({ success: true, message: 'File queued.' });

        const job = container.orchestrator.get(body.jobId);
        expect(job).toMatchObject({ status: 'queued', filename: 'Weekly' });
        expect(path.dirname(job?.audioPath ?? '')).toBe(path.join(root, 'uploads'));
        expect(path.basename(job?.audioPath ?? '')).toMatch(/_weekly_sync\.wav$/);
        expect(fs.readFileSync(job?.audioPath ?? '', 'utf-8')).toBe('RIFF');
    });

    it('POST /upload should reject unsupported formats', async () => {
        // Act
        const response = await upload('notes.txt');

        // Assert
        expect(response.statusCode).toBe(400);
        expect(response.json()).toEqual({ error: 'Unsupported audio format: notes.txt' });
        expect(container.ledger.list()).toEqual([]);
    });

    // --- Listing ---

    it('GET /jobs should list summaries and filter by status', async () => {
        // Arrange
        const done = completedJob('Standup');
        await upload('a.wav');

        // Act
        const all = await app.inject({ method: 'GET', url: '/jobs' });
        const completed = await app.inject({ method: 'GET', url: '/jobs?status=completed' });
        const invalid = await app.inject({ method: 'GET', url: '/jobs?status=finished' });

        // Assert
        expect(all.json()).toHaveLength(2);
        expect(completed.json()).toEqual([{
            id: done.id,
            createdAt: done.createdAt,
            filename: 'Standup',
            status: 'completed',
            stage: 'live',
            progress: 1
        }]);
        expect(invalid.statusCode).toBe(400);
        expect(invalid.json()).toEqual({ error: 'Unknown status: finished' });
    });

    it('GET /jobs/:id should hide local paths', async () => {
        // Arrange
        const done = completedJob('Standup');

        // Act
        const response = await app.inject({ method: 'GET', url: `/jobs/${done.id}` });
        const missing = await app.inject({ method: 'GET', url: '/jobs/nope' });

        // Assert
        expect(response.statusCode).toBe(200);
        expect(response.json()).not.toHaveProperty('audioPath');
        expect(response.json()).toMatchObject({ id: done.id, result: { text: 'Hello there.' } });
        expect(missing.statusCode).toBe(404);
    });

    // --- Lifecycle operations ---

    it('POST /jobs/:id/retry should only re-queue failed jobs', async () => {
        // Arrange
        const id = container.orchestrator.enqueue(path.join(root, 'gone.wav'), 'gone.wav');
        const queuedAttempt = await app.inject({ method: 'POST', url: `/jobs/${id}/retry` });
        await container.orchestrator.run(id);

        // Act
        const response = await app.inject({ method: 'POST', url: `/jobs/${id}/retry` });

        // Assert
        expect(queuedAttempt.statusCode).toBe(409);
        expect(queuedAttempt.json()).toEqual({ error: 'Job is queued; only failed jobs can be retried' });
        expect(response.statusCode).toBe(200);
        expect(container.orchestrator.get(id)).toMatchObject({ status: 'queued', progress: 0 });
        expect(container.orchestrator.get(id)?.error).toBeUndefined();
    });

    it('POST /jobs/:id/cancel should cancel a queued job once', async () => {
        // Arrange
        const body = (await upload('a.wav')).json();

        // Act
        const first = await app.inject({ method: 'POST', url: `/jobs/${body.jobId}/cancel` });
        const second = await app.inject({ method: 'POST', url: `/jobs/${body.jobId}/cancel` });

        // Assert
        expect(first.json()).toEqual({ success: true, jobId: body.jobId, message: 'Job cancelled.' });
        expect(container.orchestrator.get(body.jobId)).toMatchObject({ status: 'cancelled', error: 'Cancelled by user' });
        expect(second.statusCode).toBe(409);
    });

    it('DELETE /jobs/:id should remove the job', async () => {
        // Arrange
        const done = completedJob('Standup');

        // Act
        const removed = await app.inject({ method: 'DELETE', url: `/jobs/${done.id}` });
        const again = await app.inject({ method: 'DELETE', url: `/jobs/${done.id}` });

        // Assert
        expect(removed.statusCode).toBe(200);
        expect(container.ledger.get(done.id)).toBeUndefined();
        expect(again.statusCode).toBe(404);
    });

    // --- Export ---

    it('GET /jobs/:id/export/:format should return the rendered transcript', async () => {
        // Arrange
        const done = completedJob('Standup');

        // Act
        const response = await app.inject({ method: 'GET', url: `/jobs/${done.id}/export/vtt` });

        // Assert
        expect(response.statusCode).toBe(200);
        expect(response.headers['content-type']).toBe('text/vtt; charset=utf-8');
        expect(response.headers['content-disposition']).toBe('attachment; filename="Standup.vtt"');
        expect(response.body).toBe('WEBVTT\n\n00:00:00.000 --> 00:00:02.000\nHello there.\n');
    });

    it('GET /jobs/:id/export/:format should reject bad formats and unfinished jobs', async () => {
        // Arrange
        const done = completedJob('Standup');
        const queued = (await upload('a.wav')).json();

        // Act
        const badFormat = await app.inject({ method: 'GET', url: `/jobs/${done.id}/export/docx` });
        const unfinished = await app.inject({ method: 'GET', url: `/jobs/${queued.jobId}/export/txt` });

        // Assert
        expect(badFormat.statusCode).toBe(400);
        expect(unfinished.statusCode).toBe(409);
    });

    // --- Authentication ---

    it('should require the API key when one is configured', async () => {
        // Arrange
        const guarded = serverWith('test-secret');
        await guarded.ready();

        // Act
        const denied = await guarded.inject({ method: 'GET', url: '/' });
        const allowed = await guarded.inject({ method: 'GET', url: '/', headers: { 'x-api-key': 'test-secret' } });

        // Assert
        expect(denied.statusCode).toBe(401);
        expect(allowed.statusCode).toBe(200);
        await guarded.close();
    });
});
