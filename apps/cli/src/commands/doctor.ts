/**
 * Doctor Command
 * 
 * Check that ffmpeg can be found and started.
 */

import ora from 'ora';
import chalk from 'chalk';
import { getErrorMessage, resolveFfmpegPath } from '@dualsub/core';
import { FFmpeg } from '@dualsub/processing';
import { config } from '../config/index.js';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

export async function doctorCommand(): Promise<void> {
  const spinner = ora('Looking for ffmpeg...').start();

  let ffmpegPath: string;
  try {
    ffmpegPath = resolveFfmpegPath({ override: config.ffmpegPath });
  } catch (error) {
    spinner.fail('ffmpeg not found');
    printError(getErrorMessage(error));
    process.exitCode = 1;
    return;
  }

  spinner.text = 'Starting ffmpeg...';
  const probe = await new FFmpeg(ffmpegPath).probe();
  spinner.stop();

  printHeader(`ffmpeg: ${probe.available ? chalk.green('[OK]') : chalk.red('[ERR]')}`);
  printKeyValue('Path', ffmpegPath);
  printKeyValue('Version', probe.version);
  printKeyValue('Configured override', config.ffmpegPath);
  console.log();

  if (probe.available) {
    printSuccess('Ready to burn subtitles');
  } else {
    printError(`${ffmpegPath} was found but did not run. Check that it is a working ffmpeg build.`);
    process.exitCode = 1;
  }
}
