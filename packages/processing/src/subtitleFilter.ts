/**
 * Subtitle Burn-in Filter Graph
 * 
 * Builds the -filter_complex string that renders the English track
 * above the Vietnamese track, both bottom-centered:
 * 
 *   [0:v] -> subtitles(EN) -> [v1] -> subtitles(VI) -> [v2] -> scale|format -> [vout]
 * 
 * Both tracks are bottom-aligned, so what stacks English above Vietnamese
 * is the larger MarginV on the English stage, not the stage order.
 */

import {
  DOWNSCALE_HEIGHT,
  SUBTITLE_ALIGNMENT,
  SUBTITLE_FONT,
  SUBTITLE_OUTLINE,
  SUBTITLE_SHADOW,
  type BurnJob,
  type SubtitleStyle,
} from '@dualsub/core';

export const OUTPUT_LABEL = 'vout';

export interface FilterStage {
  input: string;
  filter: string;
  output: string;
}

/**
 * Quote a path for use as a filter option value.
 * Order matters: backslashes first, then colons, then single quotes.
 * 
 *   C:\Vids\it's.srt  ->  'C\:\\Vids\\it\'s.srt'
 */
export function escapeSubtitlePath(path: string): string {
  const escaped = path
    .replace(/\\/g, '\\\\')
    .replace(/:/g, '\\:')
    .replace(/'/g, "\\'");
  return `'${escaped}'`;
}

/**
 * force_style fields shared by both tracks
 */
export function buildSubtitleStyle(style: Pick<SubtitleStyle, 'fontSize'>): string {
  return [
    `FontName=${SUBTITLE_FONT}`,
    `Fontsize=${style.fontSize}`,
    `Outline=${SUBTITLE_OUTLINE}`,
    `Shadow=${SUBTITLE_SHADOW}`,
  ].join(',');
}

function subtitleStage(input: string, output: string, path: string, marginV: number, style: string): FilterStage {
  return {
    input,
    output,
    filter:
      `subtitles=${escapeSubtitlePath(path)}:charenc=UTF-8` +
      `:force_style='Alignment=${SUBTITLE_ALIGNMENT},MarginV=${marginV},${style}'`,
  };
}

/**
 * Ordered stages: English, Vietnamese, then scale or pixel-format passthrough
 */
export function buildBurnInStages(
  job: Pick<BurnJob, 'englishSubtitlePath' | 'vietnameseSubtitlePath' | 'downscale' | 'style'>
): FilterStage[] {
  const style = buildSubtitleStyle(job.style);

  return [
    subtitleStage('0:v', 'v1', job.englishSubtitlePath, job.style.englishMargin, style),
    subtitleStage('v1', 'v2', job.vietnameseSubtitlePath, job.style.vietnameseMargin, style),
    job.downscale
      ? { input: 'v2', filter: `scale=-2:${DOWNSCALE_HEIGHT}`, output: OUTPUT_LABEL }
      : { input: 'v2', filter: 'format=yuv420p', output: OUTPUT_LABEL },
  ];
}

export function renderFilterGraph(stages: FilterStage[]): string {
  return stages.map((stage) => `[${stage.input}]${stage.filter}[${stage.output}]`).join(';');
}

export function buildBurnInFilterGraph(
  job: Pick<BurnJob, 'englishSubtitlePath' | 'vietnameseSubtitlePath' | 'downscale' | 'style'>
): string {
  return renderFilterGraph(buildBurnInStages(job));
}
