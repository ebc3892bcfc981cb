import * as tf from "@tensorflow/tfjs";
import "@tensorflow/tfjs-backend-wasm";
import * as faceapi from "@vladmandic/face-api/dist/face-api.node-wasm.js";
import type { FaceModelConfig } from "./config.js";
import type { FaceBackend } from "./faceBackend.js";
import { fileExists } from "./fsUtils.js";
import type { DetectedFace, RawImage } from "./types.js";

export const createFaceApiBackend = async (
  cfg: FaceModelConfig,
): Promise<FaceBackend> => {
  if (!(await fileExists(cfg.modelsDir)))
    throw new Error(
      `Face models not found at ${cfg.modelsDir}. Set FACE_MODELS_DIR or reinstall @vladmandic/face-api.`,
    );

  await tf.setBackend("wasm");
  await tf.ready();

  await faceapi.nets.ssdMobilenetv1.loadFromDisk(cfg.modelsDir);
  await faceapi.nets.faceLandmark68Net.loadFromDisk(cfg.modelsDir);
  await faceapi.nets.faceRecognitionNet.loadFromDisk(cfg.modelsDir);

  const options = new faceapi.SsdMobilenetv1Options({
    minConfidence: cfg.minConfidence,
  });

  const detectFaces = async (
    rgb: RawImage,
  ): Promise<readonly DetectedFace[]> => {
    const tensor = faceapi.tf.tensor3d(
      rgb.data,
      [rgb.height, rgb.width, 3],
      "int32",
    );
    try {
      const results = await faceapi
        .detectAllFaces(tensor, options)
        .withFaceLandmarks()
        .withFaceDescriptors();

      return results.map((r) => ({
        box: {
          x: r.detection.box.x,
          y: r.detection.box.y,
          width: r.detection.box.width,
          height: r.detection.box.height,
        },
        score: r.detection.score,
        embedding: r.descriptor,
      }));
    } finally {
      tensor.dispose();
    }
  };

  return {
    detectFaces,
    distance: (a, b) => faceapi.euclideanDistance(a, b),
  };
};
