import path from "node:path";
import { errorMessage } from "./errors.js";
import type { BackendProvider, FaceBackend } from "./faceBackend.js";
import { isDirectory, listDirs, listFiles } from "./fsUtils.js";
import { decodeImageFile } from "./imageDecode.js";
import type { ImageDecoder } from "./imageDecode.js";
import type {
  FaceEmbedding,
  FileOutcome,
  KnownFaces,
  SkipReason,
} from "./types.js";

export type KnownFacesLoad = Readonly<{
  known: KnownFaces;
  outcomes: readonly FileOutcome[];
}>;

export type LoadKnownFacesDeps = Readonly<{
  backend: BackendProvider;
  decode?: ImageDecoder;
}>;

export type OutcomeSummary = Readonly<{
  encoded: number;
  skipped: Readonly<Record<SkipReason, number>>;
}>;

// <knownDir>/<Label>/<image>; one embedding per image, from its first face.
export const loadKnownFaces = async (
  knownDir: string,
  deps: LoadKnownFacesDeps,
): Promise<KnownFacesLoad> => {
  const encodings: FaceEmbedding[] = [];
  const names: string[] = [];
  const outcomes: FileOutcome[] = [];

  if (!(await isDirectory(knownDir)))
    return { known: { encodings, names }, outcomes };

  const decode = deps.decode ?? decodeImageFile;
  let backend: FaceBackend | undefined;

  for (const label of await listDirs(knownDir)) {
    for (const file of await listFiles(path.join(knownDir, label))) {
      const decoded = await decode(file);
      if (!decoded.ok) {
        outcomes.push({
          kind: "skipped",
          label,
          path: file,
          reason: decoded.reason,
          detail: decoded.detail,
        });
        continue;
      }

      // Resolving the backend is outside the per-file try: if it cannot load
      // at all, nothing can be encoded.
      backend ??= await deps.backend();

      try {
        const faces = await backend.detectFaces(decoded.image);
        const first = faces[0];
        if (!first) {
          outcomes.push({ kind: "skipped", label, path: file, reason: "no-face" });
          continue;
        }
        encodings.push(first.embedding);
        names.push(label);
        outcomes.push({ kind: "encoded", label, path: file });
      } catch (e: unknown) {
        outcomes.push({
          kind: "skipped",
          label,
          path: file,
          reason: "unreadable",
          detail: errorMessage(e),
        });
      }
    }
  }

  return { known: { encodings, names }, outcomes };
};

export const summarizeOutcomes = (
  outcomes: readonly FileOutcome[],
): OutcomeSummary => {
  const skipped: Record<SkipReason, number> = {
    "unsupported-format": 0,
    unreadable: 0,
    "no-face": 0,
  };
  let encoded = 0;
  for (const o of outcomes) {
    if (o.kind === "encoded") encoded += 1;
    else skipped[o.reason] += 1;
  }
  return { encoded, skipped };
};

export const distinctNames = (known: KnownFaces): readonly string[] =>
  [...new Set(known.names)];
