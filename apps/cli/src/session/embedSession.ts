/**
 * Embed Session
 * 
 * UI-agnostic driver behind the interactive shell. Holds the current
 * selections, applies drops, and runs one burn-in job at a time:
 * 
 *   IDLE → VALIDATING → RUNNING → IDLE
 *              ↘ IDLE (bad input, the encoder is never started)
 * 
 * Progress and status reach the presentation layer only through events.
 */

import { EventEmitter } from 'node:events';
import {
  DEFAULT_STYLE,
  MissingInputError,
  SessionStateMachine,
  ToolNotFoundError,
  ValidationError,
  getErrorMessage,
  parseBurnJob,
  type BurnJob,
  type CompressionMode,
  type InputField,
  type SessionState,
  type SubtitleStyle,
} from '@dualsub/core';
import { classifyDroppedPaths, tokenizeDropPayload, type DropAssignment, type PathInspector } from '@dualsub/intake';
import {
  BurnJobExecutor,
  formatProgress,
  resolveCompressionMode,
  type ProgressEvent,
} from '@dualsub/processing';
import { createLogger, formatSeconds, getPathKind, isNonEmptyString, type Logger } from '@dualsub/utils';

export interface SessionInputs {
  videoPath: string;
  englishSubtitlePath: string;
  vietnameseSubtitlePath: string;
  outputDir: string;
  mode: CompressionMode;
  downscale: boolean;
  style: SubtitleStyle;
}

export type FailureKind =
  | 'busy'
  | 'missing-input'
  | 'invalid-input'
  | 'missing-tool'
  | 'process-failure'
  | 'unexpected';

export type RunOutcome =
  | { ok: true; outputPath: string; durationMs: number; message: string }
  | { ok: false; kind: FailureKind; message: string };

export interface EmbedSessionOptions {
  defaultOutputDir: string;
  defaultMode?: CompressionMode;
  executor?: BurnJobExecutor;
  inspect?: PathInspector;
}

export interface EmbedSessionEvents {
  state: (state: SessionState) => void;
  status: (text: string) => void;
  progress: (event: ProgressEvent) => void;
}

export interface EmbedSession {
  on<K extends keyof EmbedSessionEvents>(event: K, listener: EmbedSessionEvents[K]): this;
  off<K extends keyof EmbedSessionEvents>(event: K, listener: EmbedSessionEvents[K]): this;
  emit<K extends keyof EmbedSessionEvents>(event: K, ...args: Parameters<EmbedSessionEvents[K]>): boolean;
}

const FILE_INPUTS: { field: InputField; key: 'videoPath' | 'englishSubtitlePath' | 'vietnameseSubtitlePath'; label: string }[] = [
  { field: 'video', key: 'videoPath', label: 'video file' },
  { field: 'english', key: 'englishSubtitlePath', label: 'English subtitle file' },
  { field: 'vietnamese', key: 'vietnameseSubtitlePath', label: 'Vietnamese subtitle file' },
];

export class EmbedSession extends EventEmitter {
  private readonly machine = new SessionStateMachine();
  private readonly executor: BurnJobExecutor;
  private readonly inspect: PathInspector;
  private readonly log: Logger;
  private inputs: SessionInputs;
  private statusText = 'Drop files or set them with :video, :en, :vi';

  constructor(options: EmbedSessionOptions) {
    super();
    this.executor = options.executor ?? new BurnJobExecutor();
    this.inspect = options.inspect ?? getPathKind;
    this.log = createLogger({ component: 'session' });
    this.inputs = {
      videoPath: '',
      englishSubtitlePath: '',
      vietnameseSubtitlePath: '',
      outputDir: options.defaultOutputDir,
      mode: options.defaultMode ?? 'smaller',
      downscale: false,
      style: { ...DEFAULT_STYLE },
    };

    this.executor.on('progress', (event) => {
      if (this.machine.state !== 'RUNNING') return;
      this.setStatus(`Encoding… ${formatProgress(event)}`);
      this.emit('progress', event);
    });
  }

  get state(): SessionState {
    return this.machine.state;
  }

  get status(): string {
    return this.statusText;
  }

  get isBusy(): boolean {
    return this.machine.state !== 'IDLE';
  }

  /**
   * Copy of the current selections
   */
  snapshot(): SessionInputs {
    return { ...this.inputs, style: { ...this.inputs.style } };
  }

  setVideo(path: string): void {
    this.inputs.videoPath = path.trim();
  }

  setEnglish(path: string): void {
    this.inputs.englishSubtitlePath = path.trim();
  }

  setVietnamese(path: string): void {
    this.inputs.vietnameseSubtitlePath = path.trim();
  }

  setOutputDir(path: string): void {
    this.inputs.outputDir = path.trim();
  }

  /**
   * Unknown modes fall back to 'normal'
   */
  setMode(mode: string): CompressionMode {
    this.inputs.mode = resolveCompressionMode(mode);
    return this.inputs.mode;
  }

  setDownscale(enabled: boolean): void {
    this.inputs.downscale = enabled;
  }

  /**
   * Style values are checked when a run starts, so a temporarily
   * inconsistent pair of margins is allowed here.
   */
  setStyle(style: Partial<SubtitleStyle>): void {
    this.inputs.style = { ...this.inputs.style, ...style };
  }

  swapSubtitles(): void {
    const { englishSubtitlePath, vietnameseSubtitlePath } = this.inputs;
    this.inputs.englishSubtitlePath = vietnameseSubtitlePath;
    this.inputs.vietnameseSubtitlePath = englishSubtitlePath;
  }

  /**
   * Route already-split paths into the slots
   */
  async applyPaths(paths: string[]): Promise<DropAssignment> {
    const assignment = await classifyDroppedPaths(
      paths,
      {
        english: this.inputs.englishSubtitlePath || undefined,
        vietnamese: this.inputs.vietnameseSubtitlePath || undefined,
      },
      this.inspect
    );

    if (assignment.videoPath) this.inputs.videoPath = assignment.videoPath;
    if (assignment.englishSubtitlePath) this.inputs.englishSubtitlePath = assignment.englishSubtitlePath;
    if (assignment.vietnameseSubtitlePath) this.inputs.vietnameseSubtitlePath = assignment.vietnameseSubtitlePath;
    if (assignment.outputDir) this.inputs.outputDir = assignment.outputDir;

    return assignment;
  }

  /**
   * Route a raw drop payload (space, newline, brace or quote delimited)
   */
  async applyDrop(payload: string): Promise<DropAssignment> {
    return this.applyPaths(tokenizeDropPayload(payload));
  }

  /**
   * Check the selections and build the job. Throws MissingInputError or
   * ValidationError.
   */
  async validate(): Promise<BurnJob> {
    for (const { field, key, label } of FILE_INPUTS) {
      const path = this.inputs[key];
      if (!isNonEmptyString(path)) {
        throw new MissingInputError(field, path, `Please select the ${label}.`);
      }
      if ((await this.inspect(path)) !== 'file') {
        throw new MissingInputError(field, path, `The ${label} does not exist: ${path}`);
      }
    }

    const { outputDir } = this.inputs;
    if (!isNonEmptyString(outputDir) || (await this.inspect(outputDir)) !== 'directory') {
      throw new MissingInputError('outputDir', outputDir, `Please choose a valid output folder: ${outputDir || '(none)'}`);
    }

    return parseBurnJob(this.snapshot());
  }

  /**
   * Validate and run. Never rejects for input or encoder problems; those
   * come back as a failed outcome with the session idle again.
   */
  async start(): Promise<RunOutcome> {
    if (this.isBusy) {
      return { ok: false, kind: 'busy', message: 'A run is already in progress.' };
    }

    this.transition('VALIDATING');

    let job: BurnJob;
    try {
      job = await this.validate();
    } catch (error) {
      const outcome: RunOutcome = {
        ok: false,
        kind: error instanceof MissingInputError ? 'missing-input'
          : error instanceof ValidationError ? 'invalid-input'
          : 'unexpected',
        message: getErrorMessage(error),
      };
      this.setStatus(outcome.message);
      this.transition('IDLE', 'validation failed');
      return outcome;
    }

    this.transition('RUNNING');
    this.setStatus('Starting ffmpeg…');

    let outcome: RunOutcome;
    try {
      const result = await this.executor.execute(job);
      outcome = result.success
        ? {
            ok: true,
            outputPath: result.outputPath,
            durationMs: result.durationMs,
            message: `Done in ${formatSeconds(result.durationMs)}s → ${result.outputPath}`,
          }
        : { ok: false, kind: 'process-failure', message: result.error?.message ?? 'Encoding failed.' };
    } catch (error) {
      this.log.error({ err: error }, 'Burn-in run failed');
      outcome = {
        ok: false,
        kind: error instanceof ToolNotFoundError ? 'missing-tool' : 'unexpected',
        message: getErrorMessage(error),
      };
    }

    this.setStatus(outcome.message);
    this.transition('IDLE', outcome.ok ? 'completed' : outcome.kind);
    return outcome;
  }

  private transition(to: SessionState, reason?: string): void {
    this.machine.transition(to, reason);
    this.emit('state', to);
  }

  private setStatus(text: string): void {
    this.statusText = text;
    this.emit('status', text);
  }
}
