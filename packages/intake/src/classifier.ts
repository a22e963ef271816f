/**
 * Dropped Path Classification
 * 
 * Routes dropped paths to the slots of a burn job:
 * - directory      -> output folder (last wins)
 * - video file     -> video input (last wins)
 * - subtitle file  -> Vietnamese slot if the name says so, else the
 *                     English slot while it is empty, else Vietnamese
 * 
 * Best effort only; callers must let the user swap or override.
 */

import { getExtension, getFileName, getPathKind, logger, type PathKind } from '@dualsub/utils';
import { tokenizeDropPayload } from './tokenizer.js';

export enum DroppedPathKind {
  DIRECTORY = 'directory',
  VIDEO = 'video',
  SUBTITLE = 'subtitle',
  UNKNOWN = 'unknown',
}

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set(['mp4', 'mkv', 'mov', 'avi', 'm4v']);
export const SUBTITLE_EXTENSIONS: ReadonlySet<string> = new Set(['srt', 'ass', 'ssa', 'vtt']);

// Whole-word language tags, plus "viet" anywhere in a word
// (vietnamese, vietsub, tiengviet, ...)
const VIETNAMESE_TAGS: ReadonlySet<string> = new Set(['vi', 'vie', 'vn']);
const VIETNAMESE_STEM = 'viet';

export interface SubtitleSlots {
  english?: string;
  vietnamese?: string;
}

export interface IgnoredPath {
  path: string;
  reason: string;
}

export interface DropAssignment {
  videoPath?: string;
  englishSubtitlePath?: string;
  vietnameseSubtitlePath?: string;
  outputDir?: string;
  ignored: IgnoredPath[];
}

export type PathInspector = (path: string) => Promise<PathKind>;

/**
 * Kind of a file judged by its extension alone
 */
export function detectFileKind(path: string): DroppedPathKind {
  const ext = getExtension(path);
  if (VIDEO_EXTENSIONS.has(ext)) return DroppedPathKind.VIDEO;
  if (SUBTITLE_EXTENSIONS.has(ext)) return DroppedPathKind.SUBTITLE;
  return DroppedPathKind.UNKNOWN;
}

/**
 * Whether the file name marks a Vietnamese subtitle
 */
export function hasVietnameseHint(path: string): boolean {
  const words = getFileName(path)
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0);

  return words.some((word) => VIETNAMESE_TAGS.has(word) || word.includes(VIETNAMESE_STEM));
}

/**
 * Classify dropped paths against the slots already filled
 */
export async function classifyDroppedPaths(
  paths: string[],
  current: SubtitleSlots = {},
  inspect: PathInspector = getPathKind
): Promise<DropAssignment> {
  const assignment: DropAssignment = { ignored: [] };
  let englishFilled = Boolean(current.english);

  for (const raw of paths) {
    const path = raw.trim();
    if (!path) continue;

    if ((await inspect(path)) === 'directory') {
      assignment.outputDir = path;
      continue;
    }

    switch (detectFileKind(path)) {
      case DroppedPathKind.VIDEO:
        assignment.videoPath = path;
        break;

      case DroppedPathKind.SUBTITLE:
        if (hasVietnameseHint(path)) {
          assignment.vietnameseSubtitlePath = path;
        } else if (!englishFilled) {
          assignment.englishSubtitlePath = path;
          englishFilled = true;
        } else {
          assignment.vietnameseSubtitlePath = path;
        }
        break;

      default:
        assignment.ignored.push({ path, reason: 'not a video, subtitle file or folder' });
    }
  }

  logger.debug({ paths, assignment }, 'Classified dropped paths');

  return assignment;
}

/**
 * Tokenize a raw drop payload and classify the result
 */
export async function classifyDropPayload(
  payload: string,
  current: SubtitleSlots = {},
  inspect: PathInspector = getPathKind
): Promise<DropAssignment> {
  return classifyDroppedPaths(tokenizeDropPayload(payload), current, inspect);
}
