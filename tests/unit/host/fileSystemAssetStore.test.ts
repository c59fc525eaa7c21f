import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, writeFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createHash } from "crypto";
import {
  FileSystemAssetStore,
  THUMBNAIL_DIR,
} from "../../../apps/host/src/assets/fileSystemAssetStore.js";
import { ResourceError } from "../../../apps/host/src/errors.js";

function idOf(relativePath: string): string {
  return createHash("sha1").update(relativePath).digest("hex").slice(0, 16);
}

async function readAll(chunks: AsyncIterable<Buffer>): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) {
    parts.push(chunk);
  }
  return Buffer.concat(parts);
}

describe("FileSystemAssetStore", () => {
  let root: string;
  let store: FileSystemAssetStore;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), "medialink-library-"));
    await mkdir(join(root, "sub"));
    await mkdir(join(root, THUMBNAIL_DIR));
    await writeFile(join(root, "IMG_0001.jpg"), "abc");
    await writeFile(join(root, "IMG_0001.mov"), "12345");
    await writeFile(join(root, "clip.mp4"), "wxyz");
    await writeFile(join(root, "sub", "beach.png"), "pq");
    await writeFile(join(root, THUMBNAIL_DIR, "IMG_0001.jpg"), "thumb");
    await writeFile(join(root, ".hidden.jpg"), "nope");
    await writeFile(join(root, "notes.txt"), "not media");
    store = new FileSystemAssetStore(root);
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists media files and pairs stills with their motion clip", async () => {
    const assets = await store.listAssets();

    const byId = new Map(assets.map((asset) => [asset.id, asset]));
    expect(assets).toHaveLength(3);
    expect(byId.get(idOf("IMG_0001.jpg"))).toMatchObject({
      filename: "IMG_0001.jpg",
      type: "live_photo",
      isLivePhoto: true,
      durationSeconds: null,
    });
    expect(byId.get(idOf("clip.mp4"))?.type).toBe("video");
    expect(byId.get(idOf("sub/beach.png"))?.type).toBe("photo");
  });

  it("sizes a live photo as still plus clip", async () => {
    expect(await store.sizeOf(idOf("IMG_0001.jpg"))).toBe(8);
    expect(await store.sizeOf(idOf("clip.mp4"))).toBe(4);
  });

  it("rejects sizing an unknown id", async () => {
    await expect(store.sizeOf("0000000000000000")).rejects.toBeInstanceOf(ResourceError);
  });

  it("reads thumbnails from the sidecar directory", async () => {
    expect(await store.thumbnail(idOf("IMG_0001.jpg"))).toEqual(Buffer.from("thumb"));
    expect(await store.thumbnail(idOf("clip.mp4"))).toBeNull();
    expect(await store.thumbnail("0000000000000000")).toBeNull();
  });

  it("streams the still image of a live photo", async () => {
    const content = await store.openFile(idOf("IMG_0001.jpg"));

    expect(content?.size).toBe(3);
    expect(content && (await readAll(content.chunks)).toString()).toBe("abc");
  });

  it("has nothing to open for an unknown id", async () => {
    expect(await store.openFile("0000000000000000")).toBeNull();
  });
});
