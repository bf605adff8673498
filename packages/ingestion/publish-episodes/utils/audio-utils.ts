import * as path from 'path';
import fs from 'fs-extra';
import { spawn } from 'child_process';
import { z } from 'zod';
import { TaggingFailureError, TransientIOError, describeError } from '@tube-to-pod/errors';
import { getLogger } from '@tube-to-pod/logging';
import type { AudioFetcher, AudioProber, AudioTagger, AudioTags } from '@tube-to-pod/types';

const log = getLogger('audio-utils');

const PROGRESS_LOG_INTERVAL_MS = 30_000;
const FETCHED_FILE_BASENAME = 'audio';

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

/**
 * Run an external binary, collecting its output.
 * Rejects on spawn errors, non-zero exit codes and timeouts (the process is SIGKILLed).
 */
export function runProcess(command: string, args: string[], timeoutMs: number): Promise<ProcessResult> {
  const label = path.basename(command);

  return new Promise((resolve, reject) => {
    log.debug(`Running command: ${command} ${args.join(' ')}`);
    const startedAt = Date.now();
    const child = spawn(command, args);

    let stdout = '';
    let stderr = '';

    const progressInterval = setInterval(() => {
      const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);
      log.debug(`${label} still running (${elapsed}s elapsed)`);
    }, PROGRESS_LOG_INTERVAL_MS);

    const timeout = setTimeout(() => {
      clearInterval(progressInterval);
      log.warn(`${label} timed out after ${timeoutMs}ms`);
      log.warn(`${label} stderr during timeout: ${stderr}`);
      child.kill('SIGKILL');
      reject(new Error(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      clearTimeout(timeout);
      clearInterval(progressInterval);
      const elapsed = ((Date.now() - startedAt) / 1000).toFixed(1);

      if (code !== 0) {
        log.debug(`${label} stderr: ${stderr}`);
        reject(new Error(`${label} failed with exit code ${code}: ${stderr.trim()}`));
        return;
      }

      log.debug(`${label} completed successfully in ${elapsed}s`);
      resolve({ stdout, stderr });
    });

    child.on('error', (error: Error) => {
      clearTimeout(timeout);
      clearInterval(progressInterval);
      reject(new Error(`${label} spawn error: ${error.message}`));
    });
  });
}

/**
 * Check that a binary can be started at all.
 * Throws with installation hints when it is not on the PATH.
 */
export async function checkBinaryAvailability(command: string, versionArgs: string[] = ['-version']): Promise<void> {
  try {
    await runProcess(command, versionArgs, 10_000);
  } catch (error) {
    const reason = describeError(error);
    throw new Error(
      `
❌ ${command} is not available.

  - yt-dlp: pip install yt-dlp, or brew install yt-dlp
  - ffmpeg / ffprobe: brew install ffmpeg, or sudo apt install ffmpeg
  - Or point YT_DLP_PATH / FFMPEG_PATH / FFPROBE_PATH at the binaries

Original error: ${reason}
      `.trim()
    );
  }
}

export interface YtDlpFetcherOptions {
  ytDlpPath: string;
  ffmpegPath: string;
  audioChannels: 1 | 2;
  timeoutMs: number;
}

export function getVideoUrl(identity: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(identity)}`;
}

/** yt-dlp extracts the audio track and re-encodes it through ffmpeg */
export function createYtDlpFetcher(options: YtDlpFetcherOptions): AudioFetcher {
  return {
    async fetchAudio(identity: string, targetBitrateKbps: number, workDir: string): Promise<string> {
      const outputPath = path.join(workDir, `${FETCHED_FILE_BASENAME}.mp3`);
      const args = [
        '--extract-audio',
        '--audio-format', 'mp3',
        '--audio-quality', `${targetBitrateKbps}K`,
        '--postprocessor-args', `ExtractAudio:-ac ${options.audioChannels}`,
        '--no-playlist',
        '--no-progress',
        '--output', path.join(workDir, `${FETCHED_FILE_BASENAME}.%(ext)s`),
      ];
      if (options.ffmpegPath !== 'ffmpeg') {
        args.push('--ffmpeg-location', options.ffmpegPath);
      }
      args.push(getVideoUrl(identity));

      try {
        await runProcess(options.ytDlpPath, args, options.timeoutMs);
      } catch (error) {
        throw new TransientIOError('fetch', `could not fetch ${identity}: ${describeError(error)}`, { cause: error });
      }

      if (!(await fs.pathExists(outputPath))) {
        throw new TransientIOError('fetch', `yt-dlp finished but ${outputPath} was not produced`);
      }
      return outputPath;
    },
  };
}

const FfprobeOutputSchema = z.object({
  format: z.object({
    // ffprobe prints numbers as strings, and "N/A" when it cannot tell
    duration: z.union([z.string(), z.number()]).optional(),
  }),
});

export interface FfprobeProberOptions {
  ffprobePath: string;
  timeoutMs: number;
}

export function createFfprobeProber(options: FfprobeProberOptions): AudioProber {
  return {
    async probe(localPath: string) {
      const { stdout } = await runProcess(
        options.ffprobePath,
        ['-v', 'quiet', '-print_format', 'json', '-show_format', localPath],
        options.timeoutMs
      );

      let json: unknown;
      try {
        json = JSON.parse(stdout);
      } catch (error) {
        throw new Error(`Failed to parse ffprobe output: ${error}`);
      }
      const parsed = FfprobeOutputSchema.safeParse(json);
      if (!parsed.success) {
        throw new Error(`Unexpected ffprobe output for ${localPath}`);
      }
      const duration = Number(parsed.data.format.duration);
      return Number.isFinite(duration) && duration > 0
        ? { durationSeconds: Math.round(duration) }
        : {};
    },
  };
}

export function buildMetadataArgs(tags: AudioTags): string[] {
  const entries: Array<[string, string | undefined]> = [
    ['title', tags.title],
    ['artist', tags.artist],
    ['album', tags.album],
    ['genre', tags.genre],
    ['date', tags.year],
    ['track', String(tags.track)],
    ['comment', tags.comment],
  ];
  return entries.flatMap(([key, value]) => (value ? ['-metadata', `${key}=${value}`] : []));
}

export interface FfmpegTaggerOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

/** Rewrites ID3 tags without re-encoding, into a sibling file that then replaces the original */
export function createFfmpegTagger(options: FfmpegTaggerOptions): AudioTagger {
  return {
    async tag(localPath: string, tags: AudioTags): Promise<void> {
      const taggedPath = `${localPath}.tagged.mp3`;
      const args = [
        '-y',
        '-i', localPath,
        '-map', '0',
        '-c', 'copy',
        '-id3v2_version', '3',
        ...buildMetadataArgs(tags),
        taggedPath,
      ];

      try {
        await runProcess(options.ffmpegPath, args, options.timeoutMs);
        await fs.move(taggedPath, localPath, { overwrite: true });
      } catch (error) {
        await fs.remove(taggedPath);
        throw new TaggingFailureError(localPath, { cause: error });
      }
    },
  };
}
