/**
 * Interactive Command
 * 
 * A prompt that stays open between runs. Pasted or dropped paths fill
 * the slots; colon commands adjust settings and start a run. A run goes
 * on in the background so the prompt keeps answering while it encodes.
 */

import chalk from 'chalk';
import { createInterface } from 'node:readline';
import { getErrorMessage } from '@dualsub/core';
import { BurnJobExecutor } from '@dualsub/processing';
import { logger } from '@dualsub/utils';
import { config } from '../config/index.js';
import { EmbedSession } from '../session/embedSession.js';
import { SHELL_HELP, parseShellInput, type ShellCommand } from '../lib/shellInput.js';
import {
  printError,
  printHeader,
  printIgnored,
  printInfo,
  printInputs,
  printSuccess,
  printWarning,
} from '../lib/output.js';

// Minimum gap between printed progress lines
const PROGRESS_INTERVAL_MS = 5000;

function printHelp(): void {
  printHeader('Commands');
  for (const [usage, description] of SHELL_HELP) {
    console.log(`  ${chalk.cyan(usage.padEnd(20))} ${description}`);
  }
  console.log();
}

export async function interactiveCommand(): Promise<void> {
  const session = new EmbedSession({
    defaultOutputDir: config.defaultOutputDir,
    executor: new BurnJobExecutor({ resolveOptions: { override: config.ffmpegPath } }),
  });

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.bold('dualsub> '),
  });

  const run: { active: Promise<void> | null } = { active: null };
  let lastProgressAt = 0;

  session.on('progress', () => {
    const now = Date.now();
    if (now - lastProgressAt < PROGRESS_INTERVAL_MS) return;
    lastProgressAt = now;
    console.log(chalk.gray(session.status));
    rl.prompt(true);
  });

  const startRun = (): void => {
    if (session.isBusy) {
      printWarning('A run is already in progress.');
      return;
    }

    lastProgressAt = 0;
    printInfo('Starting...');
    run.active = session
      .start()
      .then((outcome) => {
        if (outcome.ok) {
          printSuccess(outcome.message);
        } else {
          printError(outcome.message);
        }
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Run ended unexpectedly');
        printError(getErrorMessage(error));
      })
      .finally(() => {
        run.active = null;
        rl.prompt(true);
      });
  };

  const handle = async (command: ShellCommand): Promise<boolean> => {
    switch (command.type) {
      case 'empty':
        break;
      case 'drop': {
        const assignment = await session.applyDrop(command.payload);
        printIgnored(assignment.ignored);
        printInputs(session.snapshot());
        break;
      }
      case 'set-path':
        if (command.slot === 'video') session.setVideo(command.path);
        else if (command.slot === 'english') session.setEnglish(command.path);
        else if (command.slot === 'vietnamese') session.setVietnamese(command.path);
        else session.setOutputDir(command.path);
        printInputs(session.snapshot());
        break;
      case 'swap':
        session.swapSubtitles();
        printInputs(session.snapshot());
        break;
      case 'mode':
        printInfo(`Mode set to ${session.setMode(command.mode)}`);
        break;
      case 'downscale':
        session.setDownscale(command.enabled);
        printInfo(`Downscale to 720p ${command.enabled ? 'on' : 'off'}`);
        break;
      case 'font':
        session.setStyle({ fontSize: command.size });
        printInfo(`Font size set to ${command.size}`);
        break;
      case 'margins':
        session.setStyle({ englishMargin: command.english, vietnameseMargin: command.vietnamese });
        printInfo(`Margins set to en ${command.english} / vi ${command.vietnamese}`);
        break;
      case 'show':
        printInputs(session.snapshot());
        printInfo(session.status);
        break;
      case 'start':
        startRun();
        break;
      case 'help':
        printHelp();
        break;
      case 'invalid':
        printWarning(command.message);
        break;
      case 'quit':
        return false;
    }
    return true;
  };

  printHeader('Dual Subtitle Burner');
  printInfo('Drop or paste a video and two subtitle files, then type :start. :help lists commands.');
  printInputs(session.snapshot());
  console.log();

  // Lines are handled one at a time, in order
  let queue: Promise<void> = Promise.resolve();

  await new Promise<void>((resolve) => {
    rl.on('line', (line) => {
      queue = queue
        .then(async () => {
          const keepGoing = await handle(parseShellInput(line));
          if (!keepGoing) {
            rl.close();
            return;
          }
          rl.prompt();
        })
        .catch((error: unknown) => {
          printError(getErrorMessage(error));
          rl.prompt();
        });
    });

    rl.on('close', () => resolve());
    rl.prompt();
  });

  await queue;
  if (run.active) {
    printInfo('Waiting for the current run to finish...');
    await run.active;
  }
}
