#!/usr/bin/env -S npx tsx
import { program } from 'commander';
import inquirer from 'inquirer';
import { AppContainer, createContainer } from './container';
import {
  cancelJob,
  enqueueFiles,
  exportJob,
  listJobs,
  removeJob,
  reportFailure,
  retryJob
} from './commands/jobs';
import { liveCommand } from './commands/live';
import { ConfigService } from './services/config';
import {
  promptForFiles,
  promptForTitle,
  runSettingsWizard,
  selectExportFormat,
  selectJob
} from './ui/prompts';

type MenuAction = 'enqueue' | 'jobs' | 'retry' | 'cancel' | 'remove' | 'export' | 'live' | 'settings' | 'exit';

program
  .name('voxqueue')
  .description('Queue, transcribe and live-caption audio with local and cloud backends')
  .version('1.0.0');

/**
 * Builds the container for one command. `drain` starts the background queue
 * (after startup recovery); read-only commands leave queued jobs alone.
 */
async function withContainer(drain: boolean, action: (app: AppContainer) => Promise<unknown>): Promise<void> {
  const app = createContainer({ autoRun: drain });
  try {
    if (drain) await app.orchestrator.start();
    await action(app);
  } catch (error) {
    reportFailure(error);
    process.exitCode = 1;
  } finally {
    await app.orchestrator.shutdown();
  }
}

/**
 * The main interactive loop. The queue keeps draining in the background.
 */
async function mainMenuLoop(app: AppContainer): Promise<void> {
  // eslint-disable-next-line no-constant-condition
  while (true) {
    console.log('');

    const { action } = await inquirer.prompt<{ action: MenuAction }>([
      {
        type: 'list',
        name: 'action',
        message: 'What would you like to do?',
        choices: [
          { name: 'Transcribe files 📥', value: 'enqueue' },
          { name: 'List jobs 📋', value: 'jobs' },
          { name: 'Retry a failed job 🔁', value: 'retry' },
          { name: 'Cancel a job 🛑', value: 'cancel' },
          { name: 'Remove a job 🗑️', value: 'remove' },
          { name: 'Export a transcript 📝', value: 'export' },
          { name: 'Live transcription 🔴', value: 'live' },
          { name: 'Settings ⚙️', value: 'settings' },
          { name: 'Exit 🚪', value: 'exit' }
        ]
      }
    ]);

    if (action === 'exit') {
      console.log('Goodbye! 👋');
      return;
    }

    try {
      await runMenuAction(app, action);
    } catch (error) {
      reportFailure(error);
    }
  }
}

async function runMenuAction(app: AppContainer, action: Exclude<MenuAction, 'exit'>): Promise<void> {
  const jobs = app.orchestrator.list();

  switch (action) {
    case 'enqueue': {
      const files = await promptForFiles();
      const title = files.length === 1 ? await promptForTitle() : undefined;
      await enqueueFiles(app, files, title);
      break;
    }
    case 'jobs':
      listJobs(app);
      break;
    case 'retry': {
      const job = await selectJob(jobs.filter(j => j.status === 'failed'), 'Retry which job?');
      if (job) await retryJob(app, job.id);
      break;
    }
    case 'cancel': {
      const job = await selectJob(
        jobs.filter(j => j.status === 'queued' || j.status === 'recording' || j.status === 'transcribing'),
        'Cancel which job?'
      );
      if (job) await cancelJob(app, job.id);
      break;
    }
    case 'remove': {
      const job = await selectJob(jobs, 'Remove which job?');
      if (job) await removeJob(app, job.id);
      break;
    }
    case 'export': {
      const job = await selectJob(jobs.filter(j => j.status === 'completed'), 'Export which job?');
      if (job) await exportJob(app, job.id, await selectExportFormat());
      break;
    }
    case 'live':
      await liveCommand(app);
      break;
    case 'settings':
      await runSettingsWizard(app.config);
      break;
  }
}

// --- CLI Command Definitions ---

program
  .command('start', { isDefault: true })
  .description('Start the interactive main menu')
  .action(async () => {
    console.clear();
    console.log('=== voxqueue ===');
    await withContainer(true, mainMenuLoop);
  });

program
  .command('enqueue')
  .description('Transcribe audio files, or every new file in a folder')
  .argument('<files...>', 'audio files or folders')
  .option('-t, --title <title>', 'job name when a single file is given')
  .action(async (files: string[], options: { title?: string }) => {
    await withContainer(true, app => enqueueFiles(app, files, options.title));
  });

program
  .command('jobs')
  .description('List jobs')
  .option('-s, --status <status>', 'only jobs with this status')
  .action(async (options: { status?: string }) => {
    await withContainer(false, async app => listJobs(app, options.status));
  });

program
  .command('retry')
  .description('Re-queue a failed job and wait for it')
  .argument('<id>', 'job id or prefix')
  .action(async (id: string) => {
    await withContainer(true, app => retryJob(app, id));
  });

program
  .command('cancel')
  .description('Cancel a queued job')
  .argument('<id>', 'job id or prefix')
  .action(async (id: string) => {
    await withContainer(false, app => cancelJob(app, id));
  });

program
  .command('remove')
  .description('Delete a job record')
  .argument('<id>', 'job id or prefix')
  .action(async (id: string) => {
    await withContainer(false, app => removeJob(app, id));
  });

program
  .command('export')
  .description('Write the transcript of a completed job')
  .argument('<id>', 'job id or prefix')
  .option('-f, --format <format>', 'txt, json, srt or vtt', 'txt')
  .option('-o, --out <dir>', 'output directory')
  .action(async (id: string, options: { format: string; out?: string }) => {
    await withContainer(false, app => exportJob(app, id, options.format, options.out));
  });

program
  .command('live')
  .description('Transcribe the microphone until Enter is pressed, then save the session')
  .option('-b, --backend <backend>', 'native, whisper-tiny or whisper-base')
  .option('-t, --title <title>', 'name for the saved session')
  .action(async (options: { backend?: string; title?: string }) => {
    await withContainer(false, app => liveCommand(app, options));
  });

program
  .command('settings')
  .description('Run the settings wizard')
  .action(async () => {
    await runSettingsWizard(new ConfigService());
  });

program.parseAsync().catch(reportFailure);
