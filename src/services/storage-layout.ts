import { mkdir } from "node:fs/promises";
import path from "node:path";

export const JSON_KINDS = ["illust", "user", "ranking"] as const;
export const IMAGE_KINDS = ["square", "medium", "large", "origin", "avatar"] as const;

export type JsonKind = (typeof JSON_KINDS)[number];
export type ImageKind = (typeof IMAGE_KINDS)[number];

export interface StorageLayout {
  root: string;
  json: Record<JsonKind, string>;
  img: Record<ImageKind, string>;
}

export const STORAGE_ROOT_NAME = "illust-harvest";

export function resolveStorageLayout(baseDir: string): StorageLayout {
  const root = path.resolve(baseDir, STORAGE_ROOT_NAME);
  return {
    root,
    json: {
      illust: path.join(root, "json", "illust"),
      user: path.join(root, "json", "user"),
      ranking: path.join(root, "json", "ranking"),
    },
    img: {
      square: path.join(root, "img", "square"),
      medium: path.join(root, "img", "medium"),
      large: path.join(root, "img", "large"),
      origin: path.join(root, "img", "origin"),
      avatar: path.join(root, "img", "avatar"),
    },
  };
}

/** Resolves the layout under baseDir and creates every directory in it. */
export async function createStorageLayout(baseDir: string): Promise<StorageLayout> {
  const layout = resolveStorageLayout(baseDir);
  const dirs = [...Object.values(layout.json), ...Object.values(layout.img)];
  for (const dir of dirs) {
    await mkdir(dir, { recursive: true, mode: 0o755 });
  }
  return layout;
}
