import type { FaceModelConfig } from "./config.js";
import type { DetectedFace, FaceEmbedding, RawImage } from "./types.js";

// Detection, embedding and distance all come from the face library.
export type FaceBackend = Readonly<{
  detectFaces: (rgb: RawImage) => Promise<readonly DetectedFace[]>;
  distance: (a: FaceEmbedding, b: FaceEmbedding) => number;
}>;

export type BackendProvider = () => Promise<FaceBackend>;

export const createLazyBackend = (
  load: () => Promise<FaceBackend>,
): BackendProvider => {
  let pending: Promise<FaceBackend> | undefined;
  return async () => {
    pending ??= load();
    return await pending;
  };
};

// face-api and TF.js load on the first detection.
export const faceApiBackend = (cfg: FaceModelConfig): BackendProvider =>
  createLazyBackend(async () => {
    const { createFaceApiBackend } = await import("./faceApiBackend.js");
    return await createFaceApiBackend(cfg);
  });
