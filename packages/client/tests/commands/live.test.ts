import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import path from 'path';
import { JobRecord, LiveBackend } from '@voxqueue/shared';
import { InputError } from '../../src/domain/errors';
import { IStreamingEngine, StreamingHandlers } from '../../src/domain/ports';
import { liveCommand, parseLiveBackend } from '../../src/commands/live';
import { ExportService } from '../../src/services/export';
import { LiveSessionController } from '../../src/services/liveSession';
import { CompletedJobInput } from '../../src/services/orchestrator';
import { promptForTitle, waitForEnter } from '../../src/ui/prompts';
import { FakeCatalog, FakeSettings } from '../helpers/fakes';

vi.mock('../../src/ui/prompts', () => ({
    waitForEnter: vi.fn(),
    promptForTitle: vi.fn()
}));

class StubEngine implements IStreamingEngine {
    readonly backend = LiveBackend.NATIVE;
    start = vi.fn(async (_handlers: StreamingHandlers, _language?: string) => undefined);
    stop = vi.fn(async (): Promise<string | undefined> => '/recordings/live-1.wav');
}

describe('liveCommand', () => {
    let engine: StubEngine;
    let addCompletedLiveJob: Mock<(input: CompletedJobInput) => JobRecord>;
    let live: LiveSessionController;

    beforeEach(() => {
        engine = new StubEngine();
        addCompletedLiveJob = vi.fn((input: CompletedJobInput): JobRecord => ({
            id: 'live-job',
            createdAt: '2026-01-01T10:00:00.000Z',
            audioPath: input.audioPath,
            filename: input.filename,
            status: 'completed',
            stage: 'live',
            progress: 1,
            result: input.result
        }));
        live = new LiveSessionController({
            createEngine: () => engine,
            catalog: new FakeCatalog(),
            settings: new FakeSettings(),
            jobs: { addCompletedLiveJob },
            exporter: new ExportService({
                writeFile: async () => undefined,
                joinPaths: (...parts: string[]) => path.join(...parts)
            }),
            exportDir: () => '/exports'
        });

        vi.mocked(waitForEnter).mockResolvedValue(undefined);
        vi.mocked(promptForTitle).mockResolvedValue(undefined);
        vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
        vi.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should stream until Enter and save the session under the given title', async () => {
        // Act
        await liveCommand({ live }, { title: 'Standup' });

        // Assert
        expect(engine.start).toHaveBeenCalledTimes(1);
        expect(engine.stop).toHaveBeenCalledTimes(1);
        expect(promptForTitle).not.toHaveBeenCalled();
        expect(addCompletedLiveJob).toHaveBeenCalledWith(
            expect.objectContaining({ audioPath: '/recordings/live-1.wav', filename: 'Standup' })
        );
        expect(console.log).toHaveBeenCalledWith('💾 Saved live session as job live-job');
    });

    it('should stop the engine when the stop prompt fails', async () => {
        // Arrange
        vi.mocked(waitForEnter).mockRejectedValueOnce(new Error('stdin closed'));

        // Act & Assert
        await expect(liveCommand({ live })).rejects.toThrow('stdin closed');
        expect(engine.stop).toHaveBeenCalledTimes(1);
        expect(live.snapshot().state).toBe('idle');
        expect(addCompletedLiveJob).not.toHaveBeenCalled();
    });
});

describe('parseLiveBackend', () => {
    it('should accept known backends and reject the rest', () => {
        expect(parseLiveBackend('native')).toBe(LiveBackend.NATIVE);
        expect(() => parseLiveBackend('cloud')).toThrow(InputError);
    });
});
