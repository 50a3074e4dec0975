import fsPromises from 'fs/promises';
import * as path from 'path';
import { IFileManager } from '../domain/ports';

export class NodeFileSystem implements IFileManager {
    public async writeFile(filePath: string, content: string): Promise<void> {
        // The recordings and exports folders may not exist on a fresh install
        await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
        await fsPromises.writeFile(filePath, content, { encoding: 'utf-8' });
    }

    public async copyFile(from: string, to: string): Promise<void> {
        await fsPromises.mkdir(path.dirname(to), { recursive: true });
        await fsPromises.copyFile(from, to);
    }

    public joinPaths(...parts: string[]): string {
        return path.join(...parts);
    }

    public async fileExists(filePath: string): Promise<boolean> {
        try {
            await fsPromises.access(filePath);
            return true;
        } catch {
            return false;
        }
    }
}
