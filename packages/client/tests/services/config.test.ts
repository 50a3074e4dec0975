import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CloudProvider, LiveBackend } from '@voxqueue/shared';
import { ConfigService, defaultSettings } from '../../src/services/config';

describe('ConfigService', () => {
    let cwd: string;
    let config: ConfigService;

    beforeEach(() => {
        cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'voxqueue-config-'));
        config = new ConfigService({ cwd });
    });

    afterEach(() => {
        fs.rmSync(cwd, { recursive: true, force: true });
    });

    it('should start from the defaults', () => {
        expect(config.getAll()).toEqual(defaultSettings());
    });

    it('should persist values across instances', () => {
        // Act
        config.set('liveBackend', LiveBackend.WHISPER_BASE);
        config.set('cancelGraceMs', 1000);

        // Assert
        const reloaded = new ConfigService({ cwd });
        expect(reloaded.get('liveBackend')).toBe(LiveBackend.WHISPER_BASE);
        expect(reloaded.get('cancelGraceMs')).toBe(1000);
        expect(config.path).toBe(path.join(cwd, 'config.json'));
    });

    it('should normalize path settings', () => {
        // Act
        config.setPath('models', '/opt/voxqueue/../models/');

        // Assert
        expect(config.get('paths').models).toBe(path.normalize('/opt/models/'));
        expect(config.get('paths').data).toBe(defaultSettings().paths.data);
    });

    it('should know whether the selected cloud provider has a key', () => {
        // Arrange
        config.set('cloudProvider', CloudProvider.GEMINI);
        config.set('openAIAPIKey', 'test-secret');

        // Act & Assert
        expect(config.hasCloudCredential()).toBe(false);
        config.set('geminiAPIKey', 'test-secret');
        expect(config.hasCloudCredential()).toBe(true);
    });

    it('should hand out frozen snapshots that later writes do not change', () => {
        // Arrange
        const before = config.snapshot();

        // Act
        config.set('offlineMode', true);

        // Assert
        expect(Object.isFrozen(before)).toBe(true);
        expect(Object.isFrozen(before.paths)).toBe(true);
        expect(before.offlineMode).toBe(false);
        expect(config.snapshot().offlineMode).toBe(true);
    });

    it('should fill nested groups missing from a hand-edited file', () => {
        // Arrange
        fs.writeFileSync(config.path, JSON.stringify({ live: { nativeCommand: 'my-recognizer' } }));

        // Act
        const snapshot = new ConfigService({ cwd }).snapshot();

        // Assert
        expect(snapshot.live).toEqual({ nativeCommand: 'my-recognizer', whisperCommand: 'whisper-stream' });
        expect(snapshot.beamSize).toBe(5);
    });

    it('should restore the defaults on reset', () => {
        // Arrange
        config.set('beamSize', 1);

        // Act
        config.reset();

        // Assert
        expect(config.get('beamSize')).toBe(5);
    });
});
