import { describe, it, expect, vi } from 'vitest';
import { CloudProvider, LiveBackend } from '@voxqueue/shared';
import { isModelHealthy, selectStrategies, selectStreamingBackends } from '../../src/services/backendSelector';
import { FakeCatalog, FakeConnectivity, FakeSettings } from '../helpers/fakes';

// One model definition that pins a checksum
vi.mock('../../src/domain/whisperModels', async importOriginal => {
    const actual = await importOriginal<typeof import('../../src/domain/whisperModels')>();
    return {
        ...actual,
        findModel: (modelId: string) => modelId === 'whisper-pinned'
            ? { id: 'whisper-pinned', displayName: 'Pinned', fileName: 'ggml-pinned.bin', size: '1MB', checksum: 'abc123', languageSupport: ['en'] }
            : actual.findModel(modelId)
    };
});

const input = { audioPath: '/recordings/a.wav', filename: 'a.wav' };

function stages(settings: FakeSettings, catalog: FakeCatalog, online = true): string[] {
    return selectStrategies(input, settings.snapshot(), new FakeConnectivity(online), catalog).map(s => s.stage);
}

describe('selectStrategies', () => {
    it('should put the local model first and the fallback last by default', () => {
        // Arrange
        const catalog = new FakeCatalog(['whisper-small-en', 'whisper-tiny-en']);

        // Act & Assert
        expect(stages(new FakeSettings(), catalog)).toEqual(['local', 'fallback']);
    });

    it('should return nothing when offline and no model is installed', () => {
        // Arrange
        const settings = new FakeSettings({
            offlineMode: true,
            cloudProvider: CloudProvider.OPENAI,
            openAIAPIKey: 'test-secret'
        });

        // Act & Assert
        expect(stages(settings, new FakeCatalog())).toEqual([]);
    });

    it('should never offer cloud in offline mode', () => {
        // Arrange
        const settings = new FakeSettings({
            offlineMode: true,
            cloudProvider: CloudProvider.OPENAI,
            openAIAPIKey: 'test-secret',
            enableCloudFallback: true
        });
        const catalog = new FakeCatalog(['whisper-small-en', 'whisper-tiny-en']);

        // Act & Assert
        expect(stages(settings, catalog)).toEqual(['local', 'fallback']);
    });

    it('should go to the cloud first when the selected model is missing', () => {
        // Arrange
        const settings = new FakeSettings({ cloudProvider: CloudProvider.OPENAI, openAIAPIKey: 'test-secret' });
        const catalog = new FakeCatalog(['whisper-tiny-en']);

        // Act & Assert
        expect(stages(settings, catalog)).toEqual(['cloud-openai', 'fallback']);
    });

    it('should offer only the cloud when no model is installed, even with cloud fallback on', () => {
        // Arrange
        const settings = new FakeSettings({
            cloudProvider: CloudProvider.GEMINI,
            geminiAPIKey: 'test-secret',
            enableCloudFallback: true
        });
        const catalog = new FakeCatalog([]);

        // Act & Assert
        expect(stages(settings, catalog)).toEqual(['cloud-gemini']);
    });

    it('should go to the cloud first when the local model checksum does not match', () => {
        // Arrange
        const settings = new FakeSettings({
            selectedModel: 'whisper-pinned',
            cloudProvider: CloudProvider.OPENAI,
            openAIAPIKey: 'test-secret',
            enableCloudFallback: true
        });
        const catalog = new FakeCatalog(['whisper-pinned'], { 'whisper-pinned': 'stale' });

        // Act & Assert
        expect(stages(settings, catalog)).toEqual(['cloud-openai', 'local']);
    });

    it('should skip the cloud when the key is blank', () => {
        // Arrange
        const settings = new FakeSettings({ cloudProvider: CloudProvider.OPENAI, openAIAPIKey: '   ' });
        const catalog = new FakeCatalog(['whisper-tiny-en']);

        // Act & Assert
        expect(stages(settings, catalog)).toEqual(['fallback']);
    });

    it('should skip the cloud without a network connection', () => {
        // Arrange
        const settings = new FakeSettings({ cloudProvider: CloudProvider.OPENAI, openAIAPIKey: 'test-secret' });
        const catalog = new FakeCatalog(['whisper-tiny-en']);

        // Act & Assert
        expect(stages(settings, catalog, false)).toEqual(['fallback']);
    });

    it('should append the cloud after a healthy local model only when cloud fallback is enabled', () => {
        // Arrange
        const catalog = new FakeCatalog(['whisper-small-en', 'whisper-tiny-en']);
        const base = { cloudProvider: CloudProvider.OPENAI, openAIAPIKey: 'test-secret' };

        // Act & Assert
        expect(stages(new FakeSettings(base), catalog)).toEqual(['local', 'fallback']);
        expect(stages(new FakeSettings({ ...base, enableCloudFallback: true }), catalog))
            .toEqual(['local', 'cloud-openai', 'fallback']);
    });

    it('should keep the same order for different job inputs', () => {
        // Arrange
        const settings = new FakeSettings({ cloudProvider: CloudProvider.OPENAI, openAIAPIKey: 'test-secret' });
        const catalog = new FakeCatalog(['whisper-tiny-en']);
        const connectivity = new FakeConnectivity();

        // Act
        const a = selectStrategies(input, settings.snapshot(), connectivity, catalog);
        const b = selectStrategies({ audioPath: '/x.mp3', filename: 'x.mp3', duration: 3600 }, settings.snapshot(), connectivity, catalog);

        // Assert
        expect(b).toEqual(a);
    });

    it('should carry the configured model ids', () => {
        // Arrange
        const settings = new FakeSettings({ selectedModel: 'whisper-base-en' });
        const catalog = new FakeCatalog(['whisper-base-en', 'whisper-tiny-en']);

        // Act
        const strategies = selectStrategies(input, settings.snapshot(), new FakeConnectivity(), catalog);

        // Assert
        expect(strategies).toEqual([
            { kind: 'local', stage: 'local', modelId: 'whisper-base-en' },
            { kind: 'fallback', stage: 'fallback', modelId: 'whisper-tiny-en' }
        ]);
    });
});

describe('isModelHealthy', () => {
    it('should treat a missing model as unhealthy', () => {
        expect(isModelHealthy(new FakeCatalog(), 'whisper-small-en')).toBe(false);
    });

    it('should treat an installed model without a pinned checksum as healthy', () => {
        // Arrange
        const catalog = new FakeCatalog(['whisper-small-en'], { 'whisper-small-en': 'anything' });

        // Act & Assert
        expect(isModelHealthy(catalog, 'whisper-small-en')).toBe(true);
    });
});

describe('isModelHealthy with a pinned checksum', () => {
    it('should accept a matching manifest checksum', () => {
        // Arrange
        const catalog = new FakeCatalog(['whisper-pinned'], { 'whisper-pinned': 'abc123' });

        // Act & Assert
        expect(isModelHealthy(catalog, 'whisper-pinned')).toBe(true);
    });

    it('should reject a manifest without an entry for the model', () => {
        // Act & Assert
        expect(isModelHealthy(new FakeCatalog(['whisper-pinned']), 'whisper-pinned')).toBe(false);
    });
});

describe('selectStreamingBackends', () => {
    it('should try the preferred backend first, then the others that are installed', () => {
        // Arrange
        const catalog = new FakeCatalog(['whisper-tiny-en']);

        // Act & Assert
        expect(selectStreamingBackends(LiveBackend.WHISPER_TINY, catalog))
            .toEqual([LiveBackend.WHISPER_TINY, LiveBackend.NATIVE]);
    });

    it('should drop a preferred backend whose model is missing', () => {
        // Act & Assert
        expect(selectStreamingBackends(LiveBackend.WHISPER_BASE, new FakeCatalog()))
            .toEqual([LiveBackend.NATIVE]);
    });
});
