import fsPromises from 'fs/promises';
import path from 'path';
import { JobRecord } from '@voxqueue/shared';
import { InputError, errorMessage } from '../domain/errors';
import { IFileManager } from '../domain/ports';
import { EnqueueOptions } from './orchestrator';
import { safeBaseName } from '../utils/transcriptText';

export const SUPPORTED_EXTENSIONS = ['.wav', '.mp3', '.m4a', '.opus', '.ogg', '.flac', '.mkv', '.mp4', '.webm'];

export interface JobSink {
    enqueue(audioPath: string, filename: string, options?: EnqueueOptions): string;
    list(): JobRecord[];
}

export interface ImportServiceDeps {
    jobs: JobSink;
    files: Pick<IFileManager, 'copyFile' | 'fileExists' | 'joinPaths'>;
    recordingsDir: () => string;
    now?: () => Date;
}

export function isSupportedAudio(filePath: string): boolean {
    return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

/**
 * Copies user audio into the recordings folder and queues it.
 * The original file is never modified; its location is kept as `sourcePath`.
 */
export class ImportService {
    private readonly now: () => Date;

    constructor(private deps: ImportServiceDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Imports one file and returns the new job id.
     */
    public async importFile(sourcePath: string, title?: string): Promise<string> {
        const absolute = path.resolve(sourcePath);
        if (!isSupportedAudio(absolute)) {
            throw new InputError(`Unsupported audio format: ${path.basename(absolute)}`);
        }
        if (!(await this.deps.files.fileExists(absolute))) {
            throw new InputError(`Audio file not found: ${absolute}`);
        }

        const filename = title?.trim() || path.basename(absolute);
        const target = this.deps.files.joinPaths(this.deps.recordingsDir(), this.storedName(absolute, filename));
        await this.deps.files.copyFile(absolute, target);

        return this.deps.jobs.enqueue(target, filename, { sourcePath: absolute });
    }

    /**
     * Imports every supported file in `dir` that no job references yet.
     * Returns the ids of the jobs created.
     */
    public async scanDirectory(dir: string): Promise<string[]> {
        const root = path.resolve(dir);
        let entries: string[];
        try {
            entries = await fsPromises.readdir(root);
        } catch (error) {
            throw new InputError(`Cannot read directory ${root}: ${errorMessage(error)}`);
        }

        const tracked = new Set(this.deps.jobs.list().flatMap(job => (job.sourcePath ? [job.sourcePath] : [])));
        const created: string[] = [];

        for (const entry of entries.sort()) {
            const fullPath = path.join(root, entry);
            if (!isSupportedAudio(fullPath) || tracked.has(fullPath)) continue;

            console.log(`📄 Found new recording: ${entry}`);
            created.push(await this.importFile(fullPath));
        }

        if (created.length === 0) {
            console.log('✅ Directory scanned. All files are already tracked.');
        } else {
            console.log(`✅ Imported ${created.length} new file(s).`);
        }
        return created;
    }

    // YYYY-MM-DD_HH-mm-ss_Title.ext
    private storedName(sourcePath: string, title: string): string {
        const stamp = this.now().toISOString().slice(0, 19).replace('T', '_').replace(/:/g, '-');
        return `${stamp}_${safeBaseName(title)}${path.extname(sourcePath).toLowerCase()}`;
    }
}
