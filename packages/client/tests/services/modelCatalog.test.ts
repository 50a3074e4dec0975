import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileModelCatalog, MANIFEST_FILE } from '../../src/services/modelCatalog';
import { NetworkConnectivity } from '../../src/services/connectivity';

describe('FileModelCatalog', () => {
    let modelsDir: string;
    let catalog: FileModelCatalog;

    beforeEach(() => {
        modelsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'voxqueue-models-'));
        catalog = new FileModelCatalog(modelsDir);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(modelsDir, { recursive: true, force: true });
    });

    it('should resolve known models to their file name and unknown ones to their id', () => {
        expect(catalog.pathFor('whisper-tiny-en')).toBe(path.join(modelsDir, 'ggml-tiny.en.bin'));
        expect(catalog.pathFor('custom.bin')).toBe(path.join(modelsDir, 'custom.bin'));
    });

    it('should report a model available only once its file exists', () => {
        // Arrange
        expect(catalog.isAvailable('whisper-small-en')).toBe(false);

        // Act
        fs.writeFileSync(path.join(modelsDir, 'ggml-small.en.bin'), 'weights');

        // Assert
        expect(catalog.isAvailable('whisper-small-en')).toBe(true);
    });

    it('should read checksums from the manifest', () => {
        // Arrange
        fs.writeFileSync(path.join(modelsDir, MANIFEST_FILE), JSON.stringify({
            models: { 'whisper-small-en': { checksum: 'abc123', source: 'bundled' } }
        }));

        // Act & Assert
        expect(catalog.checksum('whisper-small-en')).toBe('abc123');
        expect(catalog.checksum('whisper-tiny-en')).toBeUndefined();
    });

    it('should ignore a malformed manifest', () => {
        // Arrange
        const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => { });
        fs.writeFileSync(path.join(modelsDir, MANIFEST_FILE), '{ not json');

        // Act & Assert
        expect(catalog.checksum('whisper-small-en')).toBeUndefined();
        expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should follow a directory getter', () => {
        // Arrange
        let dir = modelsDir;
        const dynamic = new FileModelCatalog(() => dir);

        // Act
        dir = path.join(modelsDir, 'elsewhere');

        // Assert
        expect(dynamic.pathFor('whisper-base-en')).toBe(path.join(modelsDir, 'elsewhere', 'ggml-base.en.bin'));
    });
});

describe('NetworkConnectivity', () => {
    it('should be offline with only loopback interfaces', () => {
        // Arrange
        const connectivity = new NetworkConnectivity(() => ({
            lo: [{ address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' }]
        }));

        // Act & Assert
        expect(connectivity.hasActiveConnection()).toBe(false);
    });

    it('should be online with an external interface', () => {
        // Arrange
        const connectivity = new NetworkConnectivity(() => ({
            eth0: [{ address: '192.168.1.20', netmask: '255.255.255.0', family: 'IPv4', mac: '02:00:00:00:00:01', internal: false, cidr: '192.168.1.20/24' }]
        }));

        // Act & Assert
        expect(connectivity.hasActiveConnection()).toBe(true);
    });
});
