import { ExportService, IJobLedger, JobOrchestrator } from '@voxqueue/client';

export interface ServerDeps {
  orchestrator: Pick<JobOrchestrator, 'enqueue' | 'get' | 'retry' | 'cancel' | 'removeJob'>;
  ledger: IJobLedger;
  exporter: ExportService;
  uploadDir: string;
  apiKey?: string; // Requests must carry it in x-api-key when set
}
