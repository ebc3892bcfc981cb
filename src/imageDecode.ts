import { exec } from "./exec.js";
import { isImageFile } from "./mediaDetect.js";
import type { RawImage } from "./types.js";

export type DecodeResult = Readonly<
  | { ok: true; image: RawImage }
  | { ok: false; reason: "unsupported-format" | "unreadable"; detail: string }
>;

export type ImageDecoder = (absPath: string) => Promise<DecodeResult>;

export const decodeImageFile: ImageDecoder = async (absPath) => {
  if (!isImageFile(absPath))
    return {
      ok: false,
      reason: "unsupported-format",
      detail: "not an image extension",
    };

  const info = await exec("ffprobe", [
    "-v",
    "error",
    "-select_streams",
    "v:0",
    "-show_entries",
    "stream=width,height",
    "-of",
    "csv=s=x:p=0",
    absPath,
  ]);
  if (info.code !== 0)
    return { ok: false, reason: "unreadable", detail: firstLine(info.stderr) };

  const size = parseImageSize(info.stdout.toString("utf8"));
  if (!size)
    return {
      ok: false,
      reason: "unreadable",
      detail: "ffprobe reported no image size",
    };

  const raw = await exec("ffmpeg", [
    "-hide_banner",
    "-loglevel",
    "error",
    "-i",
    absPath,
    "-frames:v",
    "1",
    "-f",
    "rawvideo",
    "-pix_fmt",
    "rgb24",
    "-",
  ]);
  if (raw.code !== 0)
    return { ok: false, reason: "unreadable", detail: firstLine(raw.stderr) };

  const expected = size.width * size.height * 3;
  if (raw.stdout.length !== expected)
    return {
      ok: false,
      reason: "unreadable",
      detail: `decoded ${raw.stdout.length} bytes, expected ${expected}`,
    };

  return {
    ok: true,
    image: {
      width: size.width,
      height: size.height,
      order: "rgb",
      data: new Uint8Array(raw.stdout),
    },
  };
};

// ffprobe csv output: "640x480"
export const parseImageSize = (
  out: string,
): Readonly<{ width: number; height: number }> | undefined => {
  const m = /^(\d+)x(\d+)/.exec(out.trim());
  if (!m) return undefined;
  const width = Number(m[1]);
  const height = Number(m[2]);
  if (width <= 0 || height <= 0) return undefined;
  return { width, height };
};

export const toRgb = (image: RawImage): RawImage => {
  if (image.order === "rgb") return image;

  const src = image.data;
  const out = new Uint8Array(src.length);
  for (let i = 0; i + 2 < src.length; i += 3) {
    out[i] = src[i + 2] ?? 0;
    out[i + 1] = src[i + 1] ?? 0;
    out[i + 2] = src[i] ?? 0;
  }
  return { ...image, order: "rgb", data: out };
};

const firstLine = (s: string): string =>
  s.split("\n").find((l) => l.trim() !== "")?.trim() ?? "decode failed";
