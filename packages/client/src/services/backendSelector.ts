import { CloudProvider, LiveBackend } from '@voxqueue/shared';
import { SettingsSnapshot } from '../domain/configs';
import { CloudStrategy, FallbackStrategy, JobInput, LocalStrategy, Strategy } from '../domain/models';
import { IConnectivity, IModelCatalog } from '../domain/ports';
import { findModel, requiredModelFor } from '../domain/whisperModels';

/**
 * A model is unhealthy when its definition pins a checksum and the installed
 * manifest reports a different one. Unknown expectations count as healthy.
 */
export function isModelHealthy(catalog: IModelCatalog, modelId: string): boolean {
  if (!catalog.isAvailable(modelId)) return false;
  const expected = findModel(modelId)?.checksum;
  if (!expected) return true;
  return catalog.checksum(modelId) === expected;
}

function configuredCloud(settings: SettingsSnapshot): CloudStrategy | undefined {
  switch (settings.cloudProvider) {
    case CloudProvider.OPENAI:
      return settings.openAIAPIKey.trim()
        ? { kind: 'cloud', stage: 'cloud-openai', provider: CloudProvider.OPENAI }
        : undefined;
    case CloudProvider.GEMINI:
      return settings.geminiAPIKey.trim()
        ? { kind: 'cloud', stage: 'cloud-gemini', provider: CloudProvider.GEMINI }
        : undefined;
    case CloudProvider.NONE:
      return undefined;
  }
}

/**
 * Ordered candidate list for one job.
 *
 * 1. Offline: local model (if installed) then the fallback engine, nothing remote.
 * 2. Cloud goes first only when it is usable and the selected model is missing or unhealthy.
 * 3. `enableCloudFallback` appends whichever of local/cloud did not go first.
 * 4. The reduced fallback engine closes the list whenever its model is installed.
 *
 * The job input is accepted for the call shape but never influences the order.
 */
export function selectStrategies(
  _input: JobInput,
  settings: SettingsSnapshot,
  connectivity: IConnectivity,
  catalog: IModelCatalog
): Strategy[] {
  const local: LocalStrategy | undefined = catalog.isAvailable(settings.selectedModel)
    ? { kind: 'local', stage: 'local', modelId: settings.selectedModel }
    : undefined;
  const fallback: FallbackStrategy | undefined = catalog.isAvailable(settings.fallbackModel)
    ? { kind: 'fallback', stage: 'fallback', modelId: settings.fallbackModel }
    : undefined;

  const candidates: Strategy[] = [];
  const push = (strategy: Strategy | undefined) => {
    if (strategy) candidates.push(strategy);
  };

  if (settings.offlineMode) {
    push(local);
    push(fallback);
    return candidates;
  }

  const cloud = configuredCloud(settings);
  const cloudUsable = cloud !== undefined && connectivity.hasActiveConnection() ? cloud : undefined;
  const localHealthy = isModelHealthy(catalog, settings.selectedModel);

  if (cloudUsable && !localHealthy) {
    push(cloudUsable);
    if (settings.enableCloudFallback) push(local);
  } else if (local) {
    push(local);
    if (settings.enableCloudFallback) push(cloudUsable);
  }

  push(fallback);
  return candidates;
}

/**
 * Streaming backends in the order the live controller should try them:
 * the preferred one first, then every other backend whose model is installed.
 */
export function selectStreamingBackends(preferred: LiveBackend, catalog: IModelCatalog): LiveBackend[] {
  const usable = (backend: LiveBackend) => {
    const modelId = requiredModelFor(backend);
    return modelId === undefined || catalog.isAvailable(modelId);
  };

  const ordered = [preferred, ...Object.values(LiveBackend).filter(b => b !== preferred)];
  return ordered.filter(usable);
}
