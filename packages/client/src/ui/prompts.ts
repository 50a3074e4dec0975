import inquirer from 'inquirer';
import { CloudProvider, ExportFormat, JobRecord, LiveBackend, TranscriptionLanguage } from '@voxqueue/shared';
import { WHISPER_MODELS } from '../domain/whisperModels';
import { ConfigService } from '../services/config';

interface SettingsAnswers {
  cloudProvider: CloudProvider;
  apiKey?: string; // Skipped when no provider is chosen
  enableCloudFallback: boolean;
  offlineMode: boolean;
  selectedModel: string;
  fallbackModel: string;
  liveBackend: LiveBackend;
  language: TranscriptionLanguage;
  dataPath: string;
  modelsPath: string;
}

const modelChoices = WHISPER_MODELS.map(model => ({ name: `${model.displayName} (${model.size})`, value: model.id }));

/**
 * Interactive settings wizard. Current values are offered as defaults.
 */
export async function runSettingsWizard(config: ConfigService): Promise<void> {
  console.log('=== voxqueue settings ===');
  const current = config.snapshot();

  const answers = await inquirer.prompt<SettingsAnswers>([
    // --- CLOUD ---
    {
      type: 'list',
      name: 'cloudProvider',
      message: 'Cloud transcription provider:',
      choices: [
        { name: 'None (local only)', value: CloudProvider.NONE },
        { name: 'OpenAI', value: CloudProvider.OPENAI },
        { name: 'Gemini', value: CloudProvider.GEMINI }
      ],
      default: current.cloudProvider
    },
    {
      type: 'password',
      name: 'apiKey',
      message: 'API key (leave empty to keep the current one):',
      mask: '*',
      when: (partial: Partial<SettingsAnswers>) => partial.cloudProvider !== CloudProvider.NONE
    },
    {
      type: 'confirm',
      name: 'enableCloudFallback',
      message: 'Fall back to the small local model when the primary backend fails?',
      default: current.enableCloudFallback
    },
    {
      type: 'confirm',
      name: 'offlineMode',
      message: 'Offline mode (never use the network)?',
      default: current.offlineMode
    },

    // --- MODELS ---
    {
      type: 'list',
      name: 'selectedModel',
      message: 'Local model:',
      choices: modelChoices,
      default: current.selectedModel
    },
    {
      type: 'list',
      name: 'fallbackModel',
      message: 'Fallback model:',
      choices: modelChoices,
      default: current.fallbackModel
    },
    {
      type: 'list',
      name: 'liveBackend',
      message: 'Live transcription engine:',
      choices: Object.values(LiveBackend),
      default: current.liveBackend
    },
    {
      type: 'list',
      name: 'language',
      message: 'Spoken language:',
      choices: Object.values(TranscriptionLanguage),
      default: current.language
    },

    // --- PATHS ---
    {
      type: 'input',
      name: 'dataPath',
      message: 'Data directory (job ledger and recordings):',
      default: current.paths.data,
      filter: (input: string) => input.trim()
    },
    {
      type: 'input',
      name: 'modelsPath',
      message: 'Models directory:',
      default: current.paths.models,
      filter: (input: string) => input.trim()
    }
  ]);

  config.set('cloudProvider', answers.cloudProvider);
  const apiKey = answers.apiKey?.trim();
  if (apiKey) {
    config.set(answers.cloudProvider === CloudProvider.OPENAI ? 'openAIAPIKey' : 'geminiAPIKey', apiKey);
  }
  config.set('enableCloudFallback', answers.enableCloudFallback);
  config.set('offlineMode', answers.offlineMode);
  config.set('selectedModel', answers.selectedModel);
  config.set('fallbackModel', answers.fallbackModel);
  config.set('liveBackend', answers.liveBackend);
  config.set('language', answers.language);
  config.set('autoLanguageDetect', answers.language === TranscriptionLanguage.AUTO);
  config.setPath('data', answers.dataPath);
  config.setPath('models', answers.modelsPath);

  if (answers.cloudProvider !== CloudProvider.NONE && !config.hasCloudCredential()) {
    console.warn(`⚠️ No API key stored for ${answers.cloudProvider}; cloud transcription stays disabled.`);
  }
  console.log('✅ Configuration saved successfully!');
  console.log('Config file location:', config.path);
}

export async function promptForTitle(message = 'Title (optional):'): Promise<string | undefined> {
  const { title } = await inquirer.prompt<{ title: string }>([{
    type: 'input',
    name: 'title',
    message
  }]);
  return title.trim() || undefined;
}

export async function promptForFiles(): Promise<string[]> {
  const { files } = await inquirer.prompt<{ files: string }>([{
    type: 'input',
    name: 'files',
    message: 'Audio file or folder paths (comma separated):',
    validate: (input: string) => input.trim() !== '' ? true : 'At least one path is required'
  }]);
  return files.split(',').map(file => file.trim()).filter(Boolean);
}

export async function selectJob(jobs: readonly JobRecord[], message: string): Promise<JobRecord | undefined> {
  if (jobs.length === 0) {
    console.log('No matching jobs.');
    return undefined;
  }

  const { jobId } = await inquirer.prompt<{ jobId: string }>([{
    type: 'list',
    name: 'jobId',
    message,
    choices: [
      ...jobs.map(job => ({ name: `${job.filename} [${job.status}]`, value: job.id })),
      { name: 'Back', value: '' }
    ]
  }]);
  return jobs.find(job => job.id === jobId);
}

export async function selectExportFormat(): Promise<ExportFormat> {
  const { format } = await inquirer.prompt<{ format: ExportFormat }>([{
    type: 'list',
    name: 'format',
    message: 'Export format:',
    choices: Object.values(ExportFormat),
    default: ExportFormat.TEXT
  }]);
  return format;
}

export async function waitForEnter(message: string): Promise<void> {
  await inquirer.prompt<{ ok: string }>([{ type: 'input', name: 'ok', message }]);
}
