import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import type { CameraConfig } from "./config.js";
import type { RawImage } from "./types.js";

export type Camera = Readonly<{
  read: () => Promise<RawImage | null>;
  release: () => void;
}>;

export type CameraOpenResult = Readonly<
  { ok: true; camera: Camera } | { ok: false; reason: string }
>;

export type FrameReader = Readonly<{
  next: () => Promise<Buffer | null>;
}>;

// Older frames are dropped beyond this, so recognition sees recent ones.
const MAX_BUFFERED_FRAMES = 2;
const STDERR_TAIL_BYTES = 2048;

// `next` resolves null once the stream has ended without a whole frame left.
export const createFrameReader = (
  stream: Readable,
  frameBytes: number,
  maxBufferedFrames: number = MAX_BUFFERED_FRAMES,
): FrameReader => {
  let chunks: Buffer[] = [];
  let buffered = 0;
  let ended = false;
  let wake: (() => void) | undefined;

  const notify = (): void => {
    const w = wake;
    wake = undefined;
    w?.();
  };

  stream.on("data", (b: Buffer) => {
    chunks.push(b);
    buffered += b.length;

    const limit = frameBytes * maxBufferedFrames;
    if (buffered > limit) {
      const whole = Math.floor((buffered - limit) / frameBytes) * frameBytes;
      if (whole > 0) {
        const rest = Buffer.concat(chunks).subarray(whole);
        chunks = [rest];
        buffered = rest.length;
      }
    }
    notify();
  });
  stream.on("end", () => {
    ended = true;
    notify();
  });
  stream.on("close", () => {
    ended = true;
    notify();
  });
  stream.on("error", () => {
    ended = true;
    notify();
  });

  const next = async (): Promise<Buffer | null> => {
    while (buffered < frameBytes) {
      if (ended) return null;
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }

    const all = Buffer.concat(chunks);
    const frame = Buffer.from(all.subarray(0, frameBytes));
    const rest = all.subarray(frameBytes);
    chunks = rest.length > 0 ? [rest] : [];
    buffered = rest.length;
    return frame;
  };

  return { next };
};

export const cameraInputArgs = (
  cfg: CameraConfig,
): readonly string[] | undefined => {
  const size = `${cfg.width}x${cfg.height}`;
  if (cfg.device === undefined) return undefined;

  switch (cfg.platform) {
    case "linux":
      return ["-f", "v4l2", "-video_size", size, "-i", cfg.device];
    case "darwin":
      return [
        "-f",
        "avfoundation",
        "-framerate",
        "30",
        "-video_size",
        size,
        "-i",
        cfg.device,
      ];
    case "win32":
      return ["-f", "dshow", "-video_size", size, "-i", `video=${cfg.device}`];
    default:
      return undefined;
  }
};

export type CaptureProcess = Readonly<{
  stdout: Readable;
  stderr: Readable;
  exitCode: number | null;
  signalCode: NodeJS.Signals | null;
  kill: (signal?: NodeJS.Signals) => boolean;
  on: (event: "error", listener: (err: Error) => void) => unknown;
}>;

export type SpawnCapture = (args: readonly string[]) => CaptureProcess;

const spawnFfmpeg: SpawnCapture = (args) =>
  spawn("ffmpeg", [...args], { stdio: ["ignore", "pipe", "pipe"] });

// Resolves once the first bgr24 frame has arrived, or with the reason it never did.
export const openCamera = async (
  cfg: CameraConfig,
  spawnCapture: SpawnCapture = spawnFfmpeg,
): Promise<CameraOpenResult> => {
  const input = cameraInputArgs(cfg);
  if (!input)
    return {
      ok: false,
      reason:
        cfg.device === undefined
          ? "no camera device configured (set CAMERA_DEVICE)"
          : `unsupported platform: ${cfg.platform}`,
    };

  const child = spawnCapture([
    "-hide_banner",
    "-loglevel",
    "error",
    ...input,
    "-vf",
    `scale=${cfg.width}:${cfg.height}`,
    "-f",
    "rawvideo",
    "-pix_fmt",
    "bgr24",
    "-",
  ]);

  let stderrTail = "";
  let spawnError: string | undefined;
  child.stderr.on("data", (b: Buffer) => {
    stderrTail = (stderrTail + b.toString("utf8")).slice(-STDERR_TAIL_BYTES);
  });
  child.on("error", (err) => {
    spawnError = err.message;
  });

  let released = false;
  const release = (): void => {
    if (released) return;
    released = true;
    if (child.exitCode === null && child.signalCode === null) child.kill("SIGTERM");
  };

  const reader = createFrameReader(child.stdout, cfg.width * cfg.height * 3);
  const toImage = (data: Buffer): RawImage => ({
    width: cfg.width,
    height: cfg.height,
    order: "bgr",
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
  });

  const first = await reader.next();
  if (!first) {
    release();
    return {
      ok: false,
      reason: spawnError ?? (stderrTail.trim() || "camera produced no frames"),
    };
  }

  let pending: Buffer | null = first;
  const read = async (): Promise<RawImage | null> => {
    if (pending) {
      const frame = pending;
      pending = null;
      return toImage(frame);
    }
    if (released) return null;
    const next = await reader.next();
    return next ? toImage(next) : null;
  };

  return { ok: true, camera: { read, release } };
};
