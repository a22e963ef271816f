/**
 * CLI Entry Point
 * 
 * Burns English and Vietnamese subtitles into one video, English on top.
 */

// Must load before the logger is created
import { config } from './config/index.js';

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { COMPRESSION_MODES } from '@dualsub/core';
import { logger, setLogLevel } from '@dualsub/utils';

// Commands
import { interactiveCommand } from './commands/interactive.js';
import { embedCommand, parseIntegerOption } from './commands/embed.js';
import { presetsCommand } from './commands/presets.js';
import { doctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('dualsub')
  .description('Burn English and Vietnamese subtitles into a video, one above the other')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging');

program.hook('preAction', () => {
  if (program.opts<{ debug?: boolean }>().debug) {
    setLogLevel('debug');
  }
  logger.debug({ nodeEnv: config.nodeEnv, outputDir: config.defaultOutputDir }, 'Configuration loaded');
});

program
  .command('interactive', { isDefault: true })
  .description('Open a prompt: drop files, adjust settings, start runs')
  .action(interactiveCommand);

program
  .command('embed [paths...]')
  .description('Burn subtitles once; paths are routed like dropped files')
  .option('-v, --video <path>', 'Video file')
  .option('-e, --english <path>', 'English subtitle (top line)')
  .option('-n, --vietnamese <path>', 'Vietnamese subtitle (bottom line)')
  .option('-o, --output-dir <path>', 'Output folder')
  .addOption(
    new Option('-m, --mode <mode>', 'Compression mode')
      .choices([...COMPRESSION_MODES])
      .default('smaller')
  )
  .option('--downscale', 'Scale the output to 720p')
  .option('--font-size <n>', 'Subtitle font size', parseIntegerOption)
  .option('--en-margin <px>', 'Bottom margin of the English line', parseIntegerOption)
  .option('--vi-margin <px>', 'Bottom margin of the Vietnamese line', parseIntegerOption)
  .option('--dry-run', 'Print the ffmpeg command instead of running it')
  .action(embedCommand);

program
  .command('presets')
  .description('List the compression modes')
  .action(presetsCommand);

program
  .command('doctor')
  .description('Check that ffmpeg can be found and run')
  .action(doctorCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('dualsub --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();
