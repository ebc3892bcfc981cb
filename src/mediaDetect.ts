import path from "node:path";

const imageExts = new Set([
  "jpg",
  "jpeg",
  "png",
  "gif",
  "bmp",
  "webp",
  "tif",
  "tiff",
]);

export const isImageFile = (absPath: string): boolean => {
  const ext = path.extname(absPath).toLowerCase().replace(".", "");
  return imageExts.has(ext);
};
