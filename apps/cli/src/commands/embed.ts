/**
 * Embed Command
 * 
 * One-shot burn-in. Positional paths are routed the same way a drop is;
 * explicit flags win over whatever the drop assigned.
 */

import ora from 'ora';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { getErrorMessage, type CompressionMode } from '@dualsub/core';
import { formatDuration } from '@dualsub/utils';
import { BurnJobExecutor, describeBurnCommand } from '@dualsub/processing';
import { config } from '../config/index.js';
import { EmbedSession } from '../session/embedSession.js';
import { printError, printIgnored, printInfo, printSuccess } from '../lib/output.js';

export interface EmbedOptions {
  video?: string;
  english?: string;
  vietnamese?: string;
  outputDir?: string;
  mode: CompressionMode;
  downscale?: boolean;
  fontSize?: number;
  enMargin?: number;
  viMargin?: number;
  dryRun?: boolean;
}

export function parseIntegerOption(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

/**
 * Route positional paths into the session. Returns false, with the
 * error printed and the exit code set, when a path cannot be inspected.
 */
export async function applyPositionalPaths(session: EmbedSession, paths: string[]): Promise<boolean> {
  if (paths.length === 0) return true;

  try {
    const assignment = await session.applyPaths(paths);
    printIgnored(assignment.ignored);
    return true;
  } catch (error) {
    printError(getErrorMessage(error));
    process.exitCode = 1;
    return false;
  }
}

export async function embedCommand(paths: string[], options: EmbedOptions): Promise<void> {
  const session = new EmbedSession({
    defaultOutputDir: config.defaultOutputDir,
    defaultMode: options.mode,
    executor: new BurnJobExecutor({ resolveOptions: { override: config.ffmpegPath } }),
  });

  if (!(await applyPositionalPaths(session, paths))) return;

  if (options.video) session.setVideo(options.video);
  if (options.english) session.setEnglish(options.english);
  if (options.vietnamese) session.setVietnamese(options.vietnamese);
  if (options.outputDir) session.setOutputDir(options.outputDir);
  session.setDownscale(options.downscale ?? false);
  session.setStyle({
    ...(options.fontSize !== undefined && { fontSize: options.fontSize }),
    ...(options.enMargin !== undefined && { englishMargin: options.enMargin }),
    ...(options.viMargin !== undefined && { vietnameseMargin: options.viMargin }),
  });

  if (options.dryRun) {
    try {
      const job = await session.validate();
      printInfo('Command that would run:');
      console.log(describeBurnCommand(job, config.ffmpegPath ?? 'ffmpeg'));
    } catch (error) {
      printError(getErrorMessage(error));
      process.exitCode = 1;
    }
    return;
  }

  const spinner = ora('Checking inputs...').start();
  session.on('status', (text) => {
    spinner.text = text;
  });

  const outcome = await session.start();

  if (outcome.ok) {
    spinner.succeed(outcome.message);
    printSuccess(`Saved ${chalk.cyan(outcome.outputPath)} (${formatDuration(outcome.durationMs)})`);
  } else {
    spinner.fail('Burn-in failed');
    printError(outcome.message);
    process.exitCode = 1;
  }
}
