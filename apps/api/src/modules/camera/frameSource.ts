import { spawn } from 'node:child_process';
import { ServiceUnavailableError } from '../../core/errors/AppError';
import type { RgbaFrame } from '../../core/qr/qrImage';

export interface FrameSource {
  /** Yields frames until the signal aborts or the device goes away. */
  frames(signal: AbortSignal): AsyncIterable<RgbaFrame>;
}

export type FfmpegFrameSourceOptions = {
  device: string;
  width: number;
  height: number;
  fps?: number;
  ffmpegPath?: string;
  /** ffmpeg input driver; defaults per platform (v4l2, avfoundation, dshow). */
  inputFormat?: string;
};

function defaultInputFormat() {
  switch (process.platform) {
    case 'darwin':
      return 'avfoundation';
    case 'win32':
      return 'dshow';
    default:
      return 'v4l2';
  }
}

/**
 * Reads raw RGBA frames from a local capture device through ffmpeg.
 * Only usable on a host that actually has the camera attached.
 */
export function createFfmpegFrameSource(opts: FfmpegFrameSourceOptions): FrameSource {
  const { device, width, height } = opts;
  const frameBytes = width * height * 4;

  return {
    async *frames(signal) {
      const args = [
        '-loglevel', 'error',
        '-f', opts.inputFormat ?? defaultInputFormat(),
        '-framerate', String(opts.fps ?? 15),
        '-video_size', `${width}x${height}`,
        '-i', device,
        '-f', 'rawvideo',
        '-pix_fmt', 'rgba',
        '-s', `${width}x${height}`,
        'pipe:1'
      ];

      const child = spawn(opts.ffmpegPath ?? 'ffmpeg', args, {
        stdio: ['ignore', 'pipe', 'pipe']
      });

      const failure: { spawnError: Error | null } = { spawnError: null };
      let stderrTail = '';

      const finished = new Promise<number | null>((resolve) => {
        child.once('error', (err) => {
          failure.spawnError = err;
          resolve(null);
        });
        child.once('close', (code) => resolve(code));
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString('utf8')).slice(-500);
      });

      const onAbort = () => {
        child.kill('SIGTERM');
      };
      signal.addEventListener('abort', onAbort, { once: true });

      let pending = Buffer.alloc(0);

      try {
        for await (const chunk of child.stdout) {
          pending = pending.length ? Buffer.concat([pending, chunk]) : Buffer.from(chunk);

          while (pending.length >= frameBytes) {
            yield { data: pending.subarray(0, frameBytes), width, height };
            pending = pending.subarray(frameBytes);
          }

          if (signal.aborted) break;
        }

        const code = await finished;

        if (failure.spawnError) {
          throw new ServiceUnavailableError('Camera not available on this host', failure.spawnError);
        }
        if (!signal.aborted && code !== 0) {
          throw new ServiceUnavailableError(
            `Camera capture stopped (ffmpeg exit ${code ?? 'unknown'}): ${stderrTail.trim()}`
          );
        }
      } finally {
        signal.removeEventListener('abort', onAbort);
        if (child.exitCode === null && !child.killed) {
          child.kill('SIGTERM');
        }
      }
    }
  };
}
