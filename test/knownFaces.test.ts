import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ImageDecoder } from "../src/imageDecode.js";
import { loadKnownFaces, summarizeOutcomes } from "../src/knownFaces.js";
import { countingProvider, face, fakeBackend, image } from "./fakes.js";

const makeTree = async (files: readonly string[]): Promise<string> => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "known-faces-"));
  for (const f of files) {
    const abs = path.join(root, f);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, "placeholder");
  }
  return root;
};

// Images whose name starts with "face" carry one face (value 0.25).
const decodeByName: ImageDecoder = async (p) => {
  const base = path.basename(p);
  if (base.endsWith(".txt"))
    return { ok: false, reason: "unsupported-format", detail: "txt" };
  if (base.startsWith("broken"))
    return { ok: false, reason: "unreadable", detail: "bad header" };
  return { ok: true, image: image(base.startsWith("face") ? [1, 1, 1] : [0, 0, 0]) };
};

const backend = fakeBackend((rgb) => (rgb.data[0] === 1 ? [face(0.25)] : []));

test("person folders become labels; images without faces contribute nothing", async () => {
  const root = await makeTree(["Alice/face-a.jpg", "Bob/b.jpg"]);
  const r = await loadKnownFaces(root, {
    backend: countingProvider(backend),
    decode: decodeByName,
  });

  assert.deepEqual(r.known.names, ["Alice"]);
  assert.equal(r.known.encodings.length, 1);
  assert.deepEqual([...(r.known.encodings[0] ?? [])], [0.25]);
  assert.deepEqual(
    r.outcomes.map((o) => [o.kind, o.label, path.basename(o.path)]),
    [
      ["encoded", "Alice", "face-a.jpg"],
      ["skipped", "Bob", "b.jpg"],
    ],
  );
});

test("a missing directory yields an empty registry without loading the backend", async () => {
  const provider = countingProvider(backend);
  const r = await loadKnownFaces(
    path.join(os.tmpdir(), "definitely-not-here-known-faces"),
    { backend: provider, decode: decodeByName },
  );

  assert.deepEqual(r.known.names, []);
  assert.deepEqual(r.known.encodings, []);
  assert.deepEqual(r.outcomes, []);
  assert.equal(provider.calls(), 0);
});

test("skip reasons tell unsupported, unreadable and faceless files apart", async () => {
  const root = await makeTree([
    "Carol/notes.txt",
    "Carol/broken.jpg",
    "Carol/plain.jpg",
    "Carol/face-1.jpg",
    "Carol/face-2.jpg",
    "stray.jpg",
  ]);
  const r = await loadKnownFaces(root, {
    backend: countingProvider(backend),
    decode: decodeByName,
  });

  assert.deepEqual(r.known.names, ["Carol", "Carol"]);
  assert.equal(r.known.encodings.length, r.known.names.length);
  assert.deepEqual(summarizeOutcomes(r.outcomes), {
    encoded: 2,
    skipped: { "unsupported-format": 1, unreadable: 1, "no-face": 1 },
  });
});

test("a backend error on one file skips that file as unreadable", async () => {
  const root = await makeTree(["Dan/face-1.jpg"]);
  const failing = fakeBackend(() => {
    throw new Error("tensor shape mismatch");
  });
  const r = await loadKnownFaces(root, {
    backend: countingProvider(failing),
    decode: decodeByName,
  });

  assert.deepEqual(r.known.names, []);
  assert.deepEqual(r.outcomes, [
    {
      kind: "skipped",
      label: "Dan",
      path: path.join(root, "Dan", "face-1.jpg"),
      reason: "unreadable",
      detail: "tensor shape mismatch",
    },
  ]);
});

test("a backend that cannot load is fatal", async () => {
  const root = await makeTree(["Eve/face-1.jpg"]);
  await assert.rejects(
    loadKnownFaces(root, {
      backend: async () => {
        throw new Error("Cannot find package '@vladmandic/face-api'");
      },
      decode: decodeByName,
    }),
    /Cannot find package/,
  );
});

test("only the first face of a reference image is kept", async () => {
  const root = await makeTree(["Finn/face-group.jpg"]);
  const group = fakeBackend(() => [face(0.1), face(0.9)]);
  const r = await loadKnownFaces(root, {
    backend: countingProvider(group),
    decode: decodeByName,
  });

  assert.deepEqual(r.known.names, ["Finn"]);
  assert.deepEqual([...(r.known.encodings[0] ?? [])], [Math.fround(0.1)]);
});
