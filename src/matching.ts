import type { FaceBackend } from "./faceBackend.js";
import type { FaceEmbedding } from "./types.js";

// One flag per known encoding: true when within tolerance (inclusive).
export const compareFaces = (
  backend: FaceBackend,
  known: readonly FaceEmbedding[],
  candidate: FaceEmbedding,
  tolerance: number,
): readonly boolean[] =>
  known.map((k) => backend.distance(k, candidate) <= tolerance);
