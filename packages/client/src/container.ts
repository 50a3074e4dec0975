import fs from 'fs';
import path from 'path';
import { ConfigService, ConfigServiceOptions } from './services/config';
import { JobLedger } from './services/db';
import { FileModelCatalog } from './services/modelCatalog';
import { NetworkConnectivity } from './services/connectivity';
import { BackendFactory, GeminiBackend, LocalWhisperBackend, OpenAIBackend } from './services/backends';
import { CaptureStatus } from './services/captureStatus';
import { ExportService } from './services/export';
import { ImportService } from './services/importService';
import { LiveSessionController } from './services/liveSession';
import { JobOrchestrator } from './services/orchestrator';
import { createStreamingEngineFactory } from './streaming';
import { NodeFileSystem } from './utils/nodeFS';

export interface ContainerOptions {
  config?: ConfigService | ConfigServiceOptions;
  dataDir?: string; // Overrides paths.data (server deployments)
  autoRun?: boolean;
}

export interface AppPaths {
  data: string;
  ledger: string;
  recordings: string;
  exports: string;
  work: string;
}

export interface AppContainer {
  config: ConfigService;
  paths: AppPaths;
  files: NodeFileSystem;
  ledger: JobLedger;
  captureStatus: CaptureStatus;
  orchestrator: JobOrchestrator;
  exporter: ExportService;
  importer: ImportService;
  live: LiveSessionController;
}

export function resolvePaths(dataDir: string): AppPaths {
  return {
    data: dataDir,
    ledger: path.join(dataDir, 'jobs.json'),
    recordings: path.join(dataDir, 'recordings'),
    exports: path.join(dataDir, 'exports'),
    work: path.join(dataDir, 'work')
  };
}

/**
 * Composition root: one ledger, one orchestrator and one capture status per process.
 */
export function createContainer(options: ContainerOptions = {}): AppContainer {
  const config = options.config instanceof ConfigService ? options.config : new ConfigService(options.config);
  const paths = resolvePaths(options.dataDir ?? config.snapshot().paths.data);
  fs.mkdirSync(paths.data, { recursive: true });

  const files = new NodeFileSystem();
  const ledger = new JobLedger(paths.ledger);
  const catalog = new FileModelCatalog(() => config.snapshot().paths.models);
  const captureStatus = new CaptureStatus();
  const exporter = new ExportService(files);

  const backends = new BackendFactory({
    local: new LocalWhisperBackend({
      command: () => config.snapshot().localEngine.command,
      models: catalog,
      outputDir: paths.work
    }),
    openai: new OpenAIBackend(config),
    gemini: new GeminiBackend(config)
  });

  const orchestrator = new JobOrchestrator(
    {
      ledger,
      settings: config,
      connectivity: new NetworkConnectivity(),
      catalog,
      backends,
      files,
      captureStatus
    },
    { autoRun: options.autoRun }
  );

  const live = new LiveSessionController({
    createEngine: createStreamingEngineFactory(config, catalog, () => paths.recordings),
    catalog,
    settings: config,
    jobs: orchestrator,
    exporter,
    exportDir: () => paths.exports,
    captureStatus
  });

  const importer = new ImportService({
    jobs: orchestrator,
    files,
    recordingsDir: () => paths.recordings
  });

  return { config, paths, files, ledger, captureStatus, orchestrator, exporter, importer, live };
}
