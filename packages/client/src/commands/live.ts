import { LiveBackend } from '@voxqueue/shared';
import { InputError } from '../domain/errors';
import { AppContainer } from '../container';
import { LiveSnapshot } from '../services/liveSession';
import { promptForTitle, waitForEnter } from '../ui/prompts';

export interface LiveCommandOptions {
  backend?: string;
  title?: string;
}

export function parseLiveBackend(value: string): LiveBackend {
  const backend = Object.values(LiveBackend).find(b => b === value);
  if (!backend) throw new InputError(`Unknown live backend "${value}". Expected one of: ${Object.values(LiveBackend).join(', ')}`);
  return backend;
}

// Prints committed text once, and keeps the hypothesis on a single rewritten line
function renderTo(stream: NodeJS.WriteStream): (snapshot: LiveSnapshot) => void {
  let printed = 0;
  return snapshot => {
    const fresh = snapshot.finalText.slice(printed).trim();
    printed = snapshot.finalText.length;
    stream.write('\r\u001b[2K');
    if (fresh) stream.write(`${fresh}\n`);
    if (snapshot.partialText) stream.write(`… ${snapshot.partialText}`);
  };
}

export async function liveCommand(ctx: Pick<AppContainer, 'live'>, options: LiveCommandOptions = {}): Promise<void> {
  const { live } = ctx;
  if (options.backend) live.setBackend(parseLiveBackend(options.backend));

  const unsubscribe = live.subscribe(renderTo(process.stdout));
  try {
    await live.start();
    await waitForEnter('Press Enter to stop');
    await live.stop();
  } finally {
    unsubscribe();
    // Never leave the engine running when the prompt goes away
    if (live.snapshot().state === 'streaming') await live.stop();
  }

  const title = options.title ?? (await promptForTitle('Title for this session (optional):'));
  const job = await live.save(title);
  if (job) {
    console.log(`💾 Saved live session as job ${job.id}`);
  } else {
    console.log('Nothing to save.');
  }
}
