import type { Camera } from "./camera.js";
import type { Cooldown } from "./cooldown.js";
import { describeTrigger } from "./playback.js";
import type { RawImage, TriggerResult } from "./types.js";

export type LoopDeps = Readonly<{
  camera: Camera;
  recognize: (frame: RawImage) => Promise<readonly string[]>;
  trigger: (label: string) => Promise<TriggerResult>;
  cooldown: Cooldown;
  now?: () => number;
  signal?: AbortSignal;
  report?: (line: string) => void;
}>;

export type StopReason = "end-of-stream" | "quit";

export type LoopSummary = Readonly<{
  frames: number;
  triggers: number;
  stopReason: StopReason;
}>;

export const runRecognitionLoop = async (
  deps: LoopDeps,
): Promise<LoopSummary> => {
  const now = deps.now ?? Date.now;
  const report = deps.report ?? ((): void => undefined);
  const { camera, signal } = deps;

  // Releasing ends a pending read with null.
  const onAbort = (): void => camera.release();
  signal?.addEventListener("abort", onAbort, { once: true });

  let frames = 0;
  let triggers = 0;

  try {
    for (;;) {
      if (signal?.aborted) return { frames, triggers, stopReason: "quit" };

      const frame = await camera.read();
      if (!frame)
        return {
          frames,
          triggers,
          stopReason: signal?.aborted ? "quit" : "end-of-stream",
        };
      frames += 1;

      const names = await deps.recognize(frame);
      for (const name of names) {
        const t = now();
        if (!deps.cooldown.isEligible(name, t)) continue;

        report(`Recognized: ${name}; triggering Spotify playback`);
        report(describeTrigger(await deps.trigger(name)));
        deps.cooldown.stamp(name, t);
        triggers += 1;
      }
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    camera.release();
  }
};
