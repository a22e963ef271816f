/**
 * @dualsub/intake
 * 
 * Drag-and-drop intake: payload tokenizing and path routing.
 */

export { tokenizeDropPayload } from './tokenizer.js';

export {
  DroppedPathKind,
  VIDEO_EXTENSIONS,
  SUBTITLE_EXTENSIONS,
  detectFileKind,
  hasVietnameseHint,
  classifyDroppedPaths,
  classifyDropPayload,
  type SubtitleSlots,
  type IgnoredPath,
  type DropAssignment,
  type PathInspector,
} from './classifier.js';
