/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  const shown = value === undefined || value === '' ? chalk.dim('(not set)') : String(value);
  console.log(`  ${chalk.gray(key + ':')} ${shown}`);
}

export interface InputsView {
  videoPath: string;
  englishSubtitlePath: string;
  vietnameseSubtitlePath: string;
  outputDir: string;
  mode: string;
  downscale: boolean;
  style: { fontSize: number; englishMargin: number; vietnameseMargin: number };
}

/**
 * Current selections, one per line
 */
export function printInputs(inputs: InputsView): void {
  printKeyValue('Video', inputs.videoPath);
  printKeyValue('English (top)', inputs.englishSubtitlePath);
  printKeyValue('Vietnamese (bottom)', inputs.vietnameseSubtitlePath);
  printKeyValue('Output folder', inputs.outputDir);
  printKeyValue('Mode', inputs.mode);
  printKeyValue('Downscale to 720p', inputs.downscale ? 'on' : 'off');
  printKeyValue(
    'Style',
    `font ${inputs.style.fontSize}, margins en ${inputs.style.englishMargin} / vi ${inputs.style.vietnameseMargin}`
  );
}

export function printIgnored(ignored: { path: string; reason: string }[]): void {
  for (const item of ignored) {
    printWarning(`Ignored ${item.path}: ${item.reason}`);
  }
}
