export type ChannelOrder = "rgb" | "bgr";

// Three bytes per pixel, row-major.
export type RawImage = Readonly<{
  width: number;
  height: number;
  order: ChannelOrder;
  data: Uint8Array;
}>;

export type FaceEmbedding = Float32Array;

export type FaceBox = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type DetectedFace = Readonly<{
  box: FaceBox;
  score: number;
  embedding: FaceEmbedding;
}>;

// encodings[i] belongs to names[i].
export type KnownFaces = Readonly<{
  encodings: readonly FaceEmbedding[];
  names: readonly string[];
}>;

export type SkipReason = "unsupported-format" | "unreadable" | "no-face";

export type FileOutcome = Readonly<
  | { kind: "encoded"; label: string; path: string }
  | { kind: "skipped"; label: string; path: string; reason: SkipReason; detail?: string }
>;

export type PlayRequest = Readonly<{ uris: string[] } | { context_uri: string }>;

export type TriggerResult = Readonly<
  | { kind: "played"; label: string; uri: string; request: PlayRequest }
  | { kind: "no-mapping"; label: string }
  | { kind: "failed"; label: string; uri: string; error: string }
>;
