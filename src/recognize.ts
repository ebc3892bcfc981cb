import { DEFAULT_TOLERANCE } from "./config.js";
import type { BackendProvider } from "./faceBackend.js";
import { toRgb } from "./imageDecode.js";
import { compareFaces } from "./matching.js";
import type { KnownFaces, RawImage } from "./types.js";

// First known encoding within tolerance wins, in registry order, not the closest.
export const recognizeFaces = async (
  frame: RawImage,
  known: KnownFaces,
  backend: BackendProvider,
  tolerance: number = DEFAULT_TOLERANCE,
): Promise<readonly string[]> => {
  if (known.encodings.length === 0) return [];

  const face = await backend();
  const detected = await face.detectFaces(toRgb(frame));

  const out: string[] = [];
  for (const d of detected) {
    const matches = compareFaces(face, known.encodings, d.embedding, tolerance);
    const idx = matches.indexOf(true);
    const name = idx >= 0 ? known.names[idx] : undefined;
    if (name !== undefined) out.push(name);
  }
  return out;
};
