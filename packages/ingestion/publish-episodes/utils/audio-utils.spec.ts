import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import * as path from 'path';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import { TaggingFailureError, TransientIOError } from '@tube-to-pod/errors';
import {
  buildMetadataArgs,
  checkBinaryAvailability,
  createFfmpegTagger,
  createFfprobeProber,
  createYtDlpFetcher,
  runProcess,
} from './audio-utils.js';

vi.mock('child_process');
vi.mock('@tube-to-pod/logging', () => ({
  getLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
}));

const mockSpawn = vi.mocked(spawn);

class MockProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = vi.fn();
}

/** Queue a fake child process; `script` runs once the caller has attached its listeners */
function spawnReturns(script?: (proc: MockProcess) => void): MockProcess {
  const proc = new MockProcess();
  if (script) {
    setImmediate(() => script(proc));
  }
  mockSpawn.mockReturnValueOnce(proc as unknown as ChildProcess);
  return proc;
}

function exitsWith(code: number, stdout = '', stderr = '') {
  return (proc: MockProcess) => {
    if (stdout) proc.stdout.emit('data', Buffer.from(stdout));
    if (stderr) proc.stderr.emit('data', Buffer.from(stderr));
    proc.emit('close', code);
  };
}

describe('audio-utils', () => {
  let tempDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-utils-'));
  });

  afterEach(async () => {
    vi.useRealTimers();
    vi.resetAllMocks();
    await fs.remove(tempDir);
  });

  describe('runProcess', () => {
    it('resolves with the collected output', async () => {
      spawnReturns(exitsWith(0, 'hello', 'note'));

      await expect(runProcess('/usr/local/bin/tool', ['--flag'], 1000)).resolves.toEqual({
        stdout: 'hello',
        stderr: 'note',
      });
      expect(mockSpawn).toHaveBeenCalledWith('/usr/local/bin/tool', ['--flag']);
    });

    it('rejects with stderr on a non-zero exit code', async () => {
      spawnReturns(exitsWith(1, '', 'boom\n'));

      await expect(runProcess('/usr/local/bin/tool', [], 1000)).rejects.toThrow('tool failed with exit code 1: boom');
    });

    it('rejects when the binary cannot be spawned', async () => {
      spawnReturns(proc => proc.emit('error', new Error('spawn tool ENOENT')));

      await expect(runProcess('tool', [], 1000)).rejects.toThrow('tool spawn error: spawn tool ENOENT');
    });

    it('kills the process when it runs past the timeout', async () => {
      vi.useFakeTimers();
      const proc = spawnReturns();

      const assertion = expect(runProcess('ffprobe', [], 5000)).rejects.toThrow('ffprobe timed out after 5000ms');
      await vi.advanceTimersByTimeAsync(5000);

      await assertion;
      expect(proc.kill).toHaveBeenCalledWith('SIGKILL');
    });
  });

  describe('checkBinaryAvailability', () => {
    it('resolves when the binary starts', async () => {
      spawnReturns(exitsWith(0, 'ffmpeg version 6.1'));

      await expect(checkBinaryAvailability('ffmpeg')).resolves.toBeUndefined();
      expect(mockSpawn).toHaveBeenCalledWith('ffmpeg', ['-version']);
    });

    it('explains how to install a missing binary', async () => {
      spawnReturns(proc => proc.emit('error', new Error('spawn yt-dlp ENOENT')));

      await expect(checkBinaryAvailability('yt-dlp', ['--version'])).rejects.toThrow('❌ yt-dlp is not available.');
    });
  });

  describe('createYtDlpFetcher', () => {
    const fetcher = createYtDlpFetcher({
      ytDlpPath: 'yt-dlp',
      ffmpegPath: 'ffmpeg',
      audioChannels: 1,
      timeoutMs: 60_000,
    });

    it('extracts mp3 audio at the target bitrate into the work directory', async () => {
      spawnReturns(proc => {
        fs.writeFileSync(path.join(tempDir, 'audio.mp3'), 'mp3-bytes');
        proc.emit('close', 0);
      });

      const localPath = await fetcher.fetchAudio('vid1', 96, tempDir);

      expect(localPath).toBe(path.join(tempDir, 'audio.mp3'));
      expect(mockSpawn).toHaveBeenCalledWith('yt-dlp', [
        '--extract-audio',
        '--audio-format', 'mp3',
        '--audio-quality', '96K',
        '--postprocessor-args', 'ExtractAudio:-ac 1',
        '--no-playlist',
        '--no-progress',
        '--output', path.join(tempDir, 'audio.%(ext)s'),
        'https://www.youtube.com/watch?v=vid1',
      ]);
    });

    it('points yt-dlp at a custom ffmpeg', async () => {
      const custom = createYtDlpFetcher({
        ytDlpPath: '/opt/bin/yt-dlp',
        ffmpegPath: '/opt/bin/ffmpeg',
        audioChannels: 2,
        timeoutMs: 60_000,
      });
      spawnReturns(proc => {
        fs.writeFileSync(path.join(tempDir, 'audio.mp3'), 'mp3-bytes');
        proc.emit('close', 0);
      });

      await custom.fetchAudio('vid1', 128, tempDir);

      const args = mockSpawn.mock.calls[0][1];
      expect(args).toContain('ExtractAudio:-ac 2');
      expect(args).toContain('--ffmpeg-location');
      expect(args).toContain('/opt/bin/ffmpeg');
    });

    it('wraps yt-dlp failures as fetch-stage transient errors', async () => {
      spawnReturns(exitsWith(1, '', 'ERROR: Video unavailable'));

      const error = await fetcher.fetchAudio('vid1', 128, tempDir).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransientIOError);
      expect(error).toMatchObject({
        stage: 'fetch',
        message: '[fetch] could not fetch vid1: yt-dlp failed with exit code 1: ERROR: Video unavailable',
      });
    });

    it('fails when yt-dlp exits cleanly without producing a file', async () => {
      spawnReturns(exitsWith(0));

      await expect(fetcher.fetchAudio('vid1', 128, tempDir)).rejects.toThrow('was not produced');
    });
  });

  describe('createFfprobeProber', () => {
    const prober = createFfprobeProber({ ffprobePath: 'ffprobe', timeoutMs: 10_000 });

    it('returns the rounded container duration', async () => {
      spawnReturns(exitsWith(0, JSON.stringify({ format: { duration: '180.400000' } })));

      await expect(prober.probe('/tmp/audio.mp3')).resolves.toEqual({ durationSeconds: 180 });
      expect(mockSpawn).toHaveBeenCalledWith('ffprobe', [
        '-v', 'quiet',
        '-print_format', 'json',
        '-show_format',
        '/tmp/audio.mp3',
      ]);
    });

    it('returns no duration when ffprobe cannot tell', async () => {
      spawnReturns(exitsWith(0, JSON.stringify({ format: { duration: 'N/A' } })));

      await expect(prober.probe('/tmp/audio.mp3')).resolves.toEqual({});
    });

    it('rejects output that is not JSON', async () => {
      spawnReturns(exitsWith(0, 'not json'));

      await expect(prober.probe('/tmp/audio.mp3')).rejects.toThrow('Failed to parse ffprobe output');
    });
  });

  describe('buildMetadataArgs', () => {
    it('emits one -metadata pair per tag and skips empty ones', () => {
      expect(
        buildMetadataArgs({
          title: 'Commonwealth v. Doe, SJC-1',
          artist: 'Test Court',
          album: 'Test Court Arguments',
          genre: 'Podcast',
          year: '2024',
          track: 3,
        })
      ).toEqual([
        '-metadata', 'title=Commonwealth v. Doe, SJC-1',
        '-metadata', 'artist=Test Court',
        '-metadata', 'album=Test Court Arguments',
        '-metadata', 'genre=Podcast',
        '-metadata', 'date=2024',
        '-metadata', 'track=3',
      ]);
    });
  });

  describe('createFfmpegTagger', () => {
    const tagger = createFfmpegTagger({ ffmpegPath: 'ffmpeg', timeoutMs: 60_000 });
    const tags = { title: 'Title', artist: 'Artist', album: 'Album', genre: 'Podcast', track: 1 };

    it('replaces the original with the tagged copy', async () => {
      const localPath = path.join(tempDir, 'audio.mp3');
      await fs.writeFile(localPath, 'untagged');
      spawnReturns(proc => {
        fs.writeFileSync(`${localPath}.tagged.mp3`, 'tagged');
        proc.emit('close', 0);
      });

      await tagger.tag(localPath, tags);

      expect(await fs.readFile(localPath, 'utf-8')).toBe('tagged');
      expect(await fs.pathExists(`${localPath}.tagged.mp3`)).toBe(false);
      const args = mockSpawn.mock.calls[0][1];
      expect(args).toEqual(expect.arrayContaining(['-c', 'copy', '-id3v2_version', '3']));
    });

    it('throws a tagging failure and keeps the original untouched', async () => {
      const localPath = path.join(tempDir, 'audio.mp3');
      await fs.writeFile(localPath, 'untagged');
      spawnReturns(proc => {
        fs.writeFileSync(`${localPath}.tagged.mp3`, 'partial');
        proc.emit('close', 1);
      });

      await expect(tagger.tag(localPath, tags)).rejects.toBeInstanceOf(TaggingFailureError);
      expect(await fs.readFile(localPath, 'utf-8')).toBe('untagged');
      expect(await fs.pathExists(`${localPath}.tagged.mp3`)).toBe(false);
    });
  });
});
