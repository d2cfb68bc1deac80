import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ServiceUnavailableError } from '../../core/errors/AppError';
import type { RgbaFrame } from '../../core/qr/qrImage';
import type { ScanMetadata, ScanSubmitter, VerificationResult } from '../checkins/checkins.service';
import { createCameraScanner } from './camera.scanner';
import type { FrameSource } from './frameSource';

// frame i carries texts[i]; a null entry is a frame with no code in view
function framesFor(texts: (string | null)[]) {
  const frames: RgbaFrame[] = texts.map((_, i) => ({ data: new Uint8Array([i]), width: 1, height: 1 }));
  const decodeFrame = (frame: RgbaFrame) => texts[frame.data[0]] ?? null;
  return { frames, decodeFrame };
}

function finiteSource(frames: RgbaFrame[]): FrameSource {
  return {
    async *frames(signal) {
      for (const frame of frames) {
        if (signal.aborted) return;
        yield frame;
      }
    }
  };
}

function endlessSource(frame: RgbaFrame): FrameSource {
  return {
    async *frames(signal) {
      while (!signal.aborted) {
        await new Promise((resolve) => setTimeout(resolve, 5));
        yield frame;
      }
    }
  };
}

function admitted(payload: string): VerificationResult {
  return {
    outcome: 'ADMITTED',
    reason: null,
    subject: payload,
    credentialId: 'cred_x',
    attempt: {
      seq: 1,
      credentialId: 'cred_x',
      source: 'LOCAL_CAMERA',
      occurredAt: new Date('2030-01-01T00:00:00.000Z'),
      outcome: 'ADMITTED',
      reason: null,
      payloadHash: 'h',
      operator: null
    }
  };
}

function recordingSubmitter() {
  const calls: [string, ScanMetadata][] = [];
  const submitter: ScanSubmitter = {
    async submit(payload, meta) {
      calls.push([payload, meta]);
      return admitted(payload);
    }
  };
  return { calls, submitter };
}

describe('camera scanner', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('decodes every nth frame and submits what it reads', async () => {
    const { frames, decodeFrame } = framesFor(['a', 'b', null, 'd', 'e', 'f']);
    const { calls, submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: finiteSource(frames),
      submitter,
      frameSkip: 2,
      repeatCooldownMs: 0,
      decodeFrame
    });

    expect(scanner.start()).toBe(true);
    expect(scanner.start()).toBe(false);
    await vi.waitFor(() => expect(scanner.status().running).toBe(false));

    expect(calls).toEqual([
      ['b', { source: 'LOCAL_CAMERA' }],
      ['d', { source: 'LOCAL_CAMERA' }],
      ['f', { source: 'LOCAL_CAMERA' }]
    ]);
    expect(scanner.status()).toMatchObject({
      available: true,
      framesSeen: 6,
      payloadsSubmitted: 3,
      lastOutcome: 'ADMITTED',
      lastScanAt: '2030-01-01T00:00:00.000Z'
    });
  });

  it('ignores a repeated payload inside the cooldown', async () => {
    const { frames, decodeFrame } = framesFor(['x', 'x', 'y', 'x']);
    const { calls, submitter } = recordingSubmitter();
    const times = [1000, 1500, 2000, 7000];
    const scanner = createCameraScanner({
      source: finiteSource(frames),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 5000,
      decodeFrame,
      nowMs: () => times.shift() ?? 0
    });

    scanner.start();
    await vi.waitFor(() => expect(scanner.status().running).toBe(false));

    expect(calls.map(([payload]) => payload)).toEqual(['x', 'y', 'x']);
  });

  it('forwards repeats when the cooldown is off', async () => {
    const { frames, decodeFrame } = framesFor(['x', 'x', 'x']);
    const { calls, submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: finiteSource(frames),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0,
      decodeFrame
    });

    scanner.start();
    await vi.waitFor(() => expect(scanner.status().running).toBe(false));

    expect(calls).toHaveLength(3);
  });

  it('keeps scanning after a submission cannot be evaluated', async () => {
    const { frames, decodeFrame } = framesFor(['a', 'b']);
    let first = true;
    const submitter: ScanSubmitter = {
      async submit(payload) {
        if (first) {
          first = false;
          throw new ServiceUnavailableError('Credential store unavailable');
        }
        return admitted(payload);
      }
    };
    const scanner = createCameraScanner({
      source: finiteSource(frames),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0,
      decodeFrame
    });

    scanner.start();
    await vi.waitFor(() => expect(scanner.status().running).toBe(false));

    expect(scanner.status()).toMatchObject({
      payloadsSubmitted: 1,
      lastOutcome: 'ADMITTED',
      lastError: 'Credential store unavailable'
    });
  });

  it('scanOnce resolves with the next result and stops the loop it started', async () => {
    const { frames, decodeFrame } = framesFor(['pass']);
    const { submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: endlessSource(frames[0]),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0,
      decodeFrame
    });

    const result = await scanner.scanOnce(1000);

    expect(result?.outcome).toBe('ADMITTED');
    expect(result?.subject).toBe('pass');
    expect(scanner.status().running).toBe(false);
  });

  it('scanOnce resolves null when nothing is read in time', async () => {
    const { frames, decodeFrame } = framesFor([null]);
    const { calls, submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: endlessSource(frames[0]),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0,
      decodeFrame
    });

    await expect(scanner.scanOnce(50)).resolves.toBeNull();
    expect(calls).toEqual([]);
    expect(scanner.status().running).toBe(false);
  });

  it('keeps the loop running when start is called during scanOnce', async () => {
    const { frames, decodeFrame } = framesFor([null]);
    const { submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: endlessSource(frames[0]),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0,
      decodeFrame
    });

    const once = scanner.scanOnce(50);
    expect(scanner.start()).toBe(true);
    expect(scanner.start()).toBe(false);

    await expect(once).resolves.toBeNull();
    expect(scanner.status().running).toBe(true);

    await expect(scanner.stop()).resolves.toBe(true);
    expect(scanner.status().running).toBe(false);
  });

  it('scanOnce leaves an already running loop alone', async () => {
    const { frames, decodeFrame } = framesFor([null]);
    const { submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: endlessSource(frames[0]),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0,
      decodeFrame
    });

    scanner.start();
    await expect(scanner.scanOnce(30)).resolves.toBeNull();
    expect(scanner.status().running).toBe(true);

    await scanner.stop();
  });

  it('scanOnce rejects when the device cannot be opened', async () => {
    const { submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: {
        async *frames() {
          throw new ServiceUnavailableError('Camera not available on this host');
        }
      },
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0
    });

    await expect(scanner.scanOnce(1000)).rejects.toThrow('Camera not available on this host');
    expect(scanner.status().lastError).toBe('Camera not available on this host');
  });

  it('stop reports false when nothing is running', async () => {
    const { submitter } = recordingSubmitter();
    const scanner = createCameraScanner({
      source: finiteSource([]),
      submitter,
      frameSkip: 1,
      repeatCooldownMs: 0
    });

    await expect(scanner.stop()).resolves.toBe(false);
  });
});
