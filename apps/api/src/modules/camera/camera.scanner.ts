import type { CameraStatusDto } from '@checkpass/types';
import { decodeQrFrame, type RgbaFrame } from '../../core/qr/qrImage';
import type { ScanSubmitter, VerificationResult } from '../checkins/checkins.service';
import type { FrameSource } from './frameSource';

export type CameraScannerDeps = {
  source: FrameSource;
  submitter: ScanSubmitter;
  /** Decode every Nth frame; QR decoding is the expensive part of the loop. */
  frameSkip: number;
  /** Ignore the same payload for this long after submitting it (0 = never ignore). */
  repeatCooldownMs: number;
  decodeFrame?: (frame: RgbaFrame) => string | null;
  nowMs?: () => number;
};

type Waiter = {
  onResult(result: VerificationResult): void;
  onEnd(err: unknown): void;
};

export function createCameraScanner(deps: CameraScannerDeps) {
  const decodeFrame = deps.decodeFrame ?? decodeQrFrame;
  const nowMs = deps.nowMs ?? Date.now;
  const frameSkip = Math.max(1, deps.frameSkip);

  let controller: AbortController | null = null;
  let loop: Promise<void> | null = null;
  // false while the only reason the loop runs is a pending scanOnce
  let persistent = false;
  let lastPayload: { text: string; at: number } | null = null;
  const waiters = new Set<Waiter>();

  const stats: Omit<CameraStatusDto, 'available' | 'running'> = {
    framesSeen: 0,
    payloadsSubmitted: 0,
    lastOutcome: null,
    lastReason: null,
    lastScanAt: null,
    lastError: null
  };

  function isRepeat(text: string, at: number) {
    return (
      deps.repeatCooldownMs > 0 &&
      lastPayload !== null &&
      lastPayload.text === text &&
      at - lastPayload.at < deps.repeatCooldownMs
    );
  }

  async function run(signal: AbortSignal) {
    let index = 0;

    for await (const frame of deps.source.frames(signal)) {
      if (signal.aborted) break;

      stats.framesSeen += 1;
      index += 1;
      if (index % frameSkip !== 0) continue;

      // frames without a readable code never reach the engine
      const text = decodeFrame(frame);
      if (!text) continue;

      const at = nowMs();
      if (isRepeat(text, at)) continue;
      lastPayload = { text, at };

      let result: VerificationResult;
      try {
        result = await deps.submitter.submit(text, { source: 'LOCAL_CAMERA' });
      } catch (err) {
        // could not evaluate; keep watching, the visitor can hold the pass up again
        stats.lastError = err instanceof Error ? err.message : String(err);
        console.error('[camera] scan could not be evaluated', err);
        continue;
      }

      stats.payloadsSubmitted += 1;
      stats.lastOutcome = result.outcome;
      stats.lastReason = result.reason;
      stats.lastScanAt = result.attempt.occurredAt.toISOString();

      for (const w of [...waiters]) w.onResult(result);
    }
  }

  function launch(keep: boolean): boolean {
    if (loop) {
      if (keep && !persistent) {
        persistent = true;
        console.log('[camera] capture loop kept running after scan-once');
        return true;
      }
      return false;
    }

    const ac = new AbortController();
    controller = ac;
    persistent = keep;
    stats.lastError = null;
    console.log('[camera] capture loop started');

    loop = run(ac.signal)
      .then(
        () => {
          for (const w of [...waiters]) w.onEnd(null);
        },
        (err: unknown) => {
          stats.lastError = err instanceof Error ? err.message : String(err);
          console.error('[camera] capture loop stopped', err);
          for (const w of [...waiters]) w.onEnd(err);
        }
      )
      .finally(() => {
        if (controller === ac) {
          controller = null;
          loop = null;
          persistent = false;
        }
        console.log('[camera] capture loop ended');
      });

    return true;
  }

  function start(): boolean {
    return launch(true);
  }

  async function stop(): Promise<boolean> {
    const current = loop;
    if (!current || !controller) return false;
    controller.abort();
    await current;
    return true;
  }

  /**
   * Waits for the next decoded pass. Starts the loop for the duration of
   * the call when it is not already running; a start() meanwhile keeps it
   * running afterwards. Resolves null on timeout.
   */
  async function scanOnce(timeoutMs: number): Promise<VerificationResult | null> {
    const startedHere = launch(false);
    const ownLoop = loop;

    try {
      return await new Promise<VerificationResult | null>((resolve, reject) => {
        const waiter: Waiter = {
          onResult(result) {
            clearTimeout(timer);
            waiters.delete(waiter);
            resolve(result);
          },
          onEnd(err) {
            clearTimeout(timer);
            waiters.delete(waiter);
            if (err) reject(err);
            else resolve(null);
          }
        };
        const timer = setTimeout(() => {
          waiters.delete(waiter);
          resolve(null);
        }, timeoutMs);
        waiters.add(waiter);
      });
    } finally {
      if (startedHere && loop === ownLoop && !persistent) await stop();
    }
  }

  function status(): CameraStatusDto {
    return { available: true, running: loop !== null, ...stats };
  }

  return { start, stop, scanOnce, status };
}

export type CameraScanner = ReturnType<typeof createCameraScanner>;
