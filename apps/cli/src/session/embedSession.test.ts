import { mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SessionState } from '@dualsub/core';
import { BurnJobExecutor } from '@dualsub/processing';
import type { CommandRunner } from '@dualsub/utils';
import { EmbedSession } from './embedSession.js';

// Reports halfway progress and writes the output file (last argument)
const writingRunner: CommandRunner = async (_command, args, options) => {
  options?.onStderrLine?.('  Duration: 00:00:10.00, start: 0.000000');
  options?.onStderrLine?.('frame=120 fps=60 q=24.0 size=512kB time=00:00:05.00 bitrate=800kbits/s speed=2x');
  const output = args[args.length - 1];
  if (output) {
    await writeFile(output, 'encoded');
  }
  return 0;
};

describe('EmbedSession', () => {
  let dir: string;
  let outDir: string;
  let video: string;
  let english: string;
  let vietnamese: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dualsub-session-'));
    outDir = join(dir, 'out');
    await mkdir(outDir);
    video = join(dir, 'sample.mp4');
    english = join(dir, 'sample.en.srt');
    vietnamese = join(dir, 'sample.vi.srt');
    await writeFile(video, 'video');
    await writeFile(english, '1\n00:00:01,000 --> 00:00:02,000\nHello\n');
    await writeFile(vietnamese, '1\n00:00:01,000 --> 00:00:02,000\nXin chào\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createSession(runner: CommandRunner): EmbedSession {
    return new EmbedSession({
      defaultOutputDir: outDir,
      executor: new BurnJobExecutor({ ffmpegPath: 'ffmpeg', runner }),
    });
  }

  it('starts idle with the default settings', () => {
    const session = createSession(writingRunner);
    const inputs = session.snapshot();

    expect(session.state).toBe('IDLE');
    expect(session.isBusy).toBe(false);
    expect(inputs.outputDir).toBe(outDir);
    expect(inputs.mode).toBe('smaller');
    expect(inputs.downscale).toBe(false);
    expect(inputs.style).toEqual({ fontSize: 24, englishMargin: 60, vietnameseMargin: 24 });
  });

  it('burns a dropped video and subtitle pair into the output folder', async () => {
    const session = createSession(writingRunner);
    const states: SessionState[] = [];
    const statuses: string[] = [];
    session.on('state', (state) => states.push(state));
    session.on('status', (text) => statuses.push(text));

    const assignment = await session.applyDrop(`${video} ${english} ${vietnamese}`);
    expect(assignment.ignored).toEqual([]);

    const outcome = await session.start();

    const expectedOutput = join(outDir, 'sample_dual_subbed.mp4');
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.outputPath).toBe(expectedOutput);
      expect(outcome.message.endsWith(`s → ${expectedOutput}`)).toBe(true);
    }
    expect((await stat(expectedOutput)).isFile()).toBe(true);
    expect(states).toEqual(['VALIDATING', 'RUNNING', 'IDLE']);
    expect(statuses[0]).toBe('Starting ffmpeg…');
    expect(statuses[1]).toBe('Encoding… time=00:00:05.00 (50.0%)');
    expect(statuses[2]?.startsWith('Done in ')).toBe(true);
    expect(session.state).toBe('IDLE');
  });

  it('updates the status before announcing progress', async () => {
    const runner: CommandRunner = async (_command, args, options) => {
      options?.onStderrLine?.('frame=30 fps=30 time=00:00:01.00 speed=1x');
      options?.onStderrLine?.('frame=60 fps=30 time=00:00:02.00 speed=1x');
      const output = args[args.length - 1];
      if (output) {
        await writeFile(output, 'encoded');
      }
      return 0;
    };
    const session = createSession(runner);
    session.setVideo(video);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);
    const seen: string[] = [];
    session.on('progress', () => seen.push(session.status));

    const outcome = await session.start();

    expect(outcome.ok).toBe(true);
    expect(seen).toEqual(['Encoding… time=00:00:01.00', 'Encoding… time=00:00:02.00']);
  });

  it('never starts ffmpeg when an input is missing', async () => {
    const runner = vi.fn<CommandRunner>(async () => 0);
    const session = createSession(runner);
    session.setVideo(video);
    session.setEnglish(english);

    const outcome = await session.start();

    expect(outcome).toEqual({
      ok: false,
      kind: 'missing-input',
      message: 'Please select the Vietnamese subtitle file.',
    });
    expect(runner).not.toHaveBeenCalled();
    expect(session.state).toBe('IDLE');
    expect(session.status).toBe('Please select the Vietnamese subtitle file.');
  });

  it('reports a selected file that does not exist', async () => {
    const runner = vi.fn<CommandRunner>(async () => 0);
    const session = createSession(runner);
    const missing = join(dir, 'gone.mp4');
    session.setVideo(missing);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);

    const outcome = await session.start();

    expect(outcome).toEqual({
      ok: false,
      kind: 'missing-input',
      message: `The video file does not exist: ${missing}`,
    });
    expect(runner).not.toHaveBeenCalled();
  });

  it('requires an existing output folder', async () => {
    const runner = vi.fn<CommandRunner>(async () => 0);
    const session = createSession(runner);
    session.setVideo(video);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);
    session.setOutputDir(join(dir, 'nowhere'));

    const outcome = await session.start();

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.kind).toBe('missing-input');
      expect(outcome.message).toBe(`Please choose a valid output folder: ${join(dir, 'nowhere')}`);
    }
    expect(runner).not.toHaveBeenCalled();
  });

  it('rejects an English margin that is not above the Vietnamese one', async () => {
    const runner = vi.fn<CommandRunner>(async () => 0);
    const session = createSession(runner);
    session.setVideo(video);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);
    session.setStyle({ englishMargin: 20, vietnameseMargin: 40 });

    const outcome = await session.start();

    expect(outcome).toEqual({
      ok: false,
      kind: 'invalid-input',
      message: 'Validation failed for style.englishMargin: English margin must be greater than the Vietnamese margin',
    });
    expect(runner).not.toHaveBeenCalled();
  });

  it('reports a failed encode and returns to idle', async () => {
    const runner: CommandRunner = async (_command, _args, options) => {
      options?.onStderrLine?.('Error opening input files: Invalid data found when processing input');
      return 1;
    };
    const session = createSession(runner);
    session.setVideo(video);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);

    const outcome = await session.start();

    expect(outcome).toEqual({
      ok: false,
      kind: 'process-failure',
      message: 'ffmpeg exited with code 1: Error opening input files: Invalid data found when processing input',
    });
    expect(session.state).toBe('IDLE');
  });

  it('reports a missing ffmpeg as a missing tool', async () => {
    const session = new EmbedSession({
      defaultOutputDir: outDir,
      executor: new BurnJobExecutor({
        resolveOptions: { env: { PATH: '' }, platform: 'linux', exists: () => false },
      }),
    });
    session.setVideo(video);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);

    const outcome = await session.start();

    expect(outcome).toEqual({
      ok: false,
      kind: 'missing-tool',
      message: 'ffmpeg executable not found. Install it or add it to PATH.',
    });
    expect(session.state).toBe('IDLE');
  });

  it('rejects a second start while a run is in flight', async () => {
    let finish: (code: number) => void = () => undefined;
    const runner = vi.fn<CommandRunner>(
      () => new Promise<number>((resolve) => {
        finish = resolve;
      })
    );
    const session = createSession(runner);
    session.setVideo(video);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);

    const first = session.start();
    await vi.waitFor(() => expect(runner).toHaveBeenCalled());

    const second = await session.start();
    expect(second).toEqual({ ok: false, kind: 'busy', message: 'A run is already in progress.' });
    expect(session.state).toBe('RUNNING');

    finish(1);
    const outcome = await first;
    expect(outcome.ok).toBe(false);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(session.isBusy).toBe(false);
  });

  it('swaps the English and Vietnamese subtitles', () => {
    const session = createSession(writingRunner);
    session.setEnglish(english);
    session.setVietnamese(vietnamese);

    session.swapSubtitles();

    expect(session.snapshot().englishSubtitlePath).toBe(vietnamese);
    expect(session.snapshot().vietnameseSubtitlePath).toBe(english);
  });

  it('routes a dropped folder to the output slot and keeps English already chosen', async () => {
    const session = createSession(writingRunner);
    session.setEnglish(english);
    const other = join(dir, 'other.srt');
    await writeFile(other, '');

    const assignment = await session.applyDrop(`"${dir}" ${other} notes.txt`);

    expect(assignment.ignored).toEqual([{ path: 'notes.txt', reason: 'not a video, subtitle file or folder' }]);
    expect(session.snapshot().outputDir).toBe(dir);
    expect(session.snapshot().englishSubtitlePath).toBe(english);
    expect(session.snapshot().vietnameseSubtitlePath).toBe(other);
  });

  it('falls back to normal for an unknown mode', () => {
    const session = createSession(writingRunner);

    expect(session.setMode(' SMALLEST ')).toBe('smallest');
    expect(session.setMode('tiny')).toBe('normal');
    expect(session.snapshot().mode).toBe('normal');
  });

  it('merges partial style updates', () => {
    const session = createSession(writingRunner);

    session.setStyle({ fontSize: 30 });

    expect(session.snapshot().style).toEqual({ fontSize: 30, englishMargin: 60, vietnameseMargin: 24 });
  });
});
