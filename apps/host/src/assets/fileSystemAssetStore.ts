import { createReadStream } from "fs";
import type { Stats } from "fs";
import { readdir, readFile, stat } from "fs/promises";
import { createHash } from "crypto";
import { join, relative, extname, basename, dirname, sep } from "path";
import { CHUNK_SIZE } from "../../../../packages/protocol/src/constants.js";
import type { AssetType } from "../../../../packages/protocol/src/assetList.js";
import type { PayloadStream } from "../../../../packages/protocol/src/types.js";
import type { AssetRecord, AssetStore } from "./assetStore.js";
import { ResourceError } from "../errors.js";

const PHOTO_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".heic", ".heif", ".gif", ".webp"]);
const VIDEO_EXTENSIONS = new Set([".mov", ".mp4", ".m4v"]);
const MOTION_EXTENSION = ".mov";
export const THUMBNAIL_DIR = ".thumbnails";

type LibraryEntry = {
  record: AssetRecord;
  path: string; // primary file: the image for photos and live photos
  motionPath: string | null; // paired clip of a live photo
};

type ScannedFile = {
  path: string;
  ext: string;
};

/**
 * AssetStore over a directory tree.
 *
 * Images and clips are found by extension. An image with a same-named .mov
 * beside it is a live photo; the clip is its motion component and is not
 * listed on its own. Thumbnails are read from a .thumbnails/ directory next
 * to each asset (photo.jpg → .thumbnails/photo.jpg).
 */
export class FileSystemAssetStore implements AssetStore {
  private entries: Map<string, LibraryEntry> = new Map();
  private scanned: boolean = false;

  constructor(private readonly root: string) {}

  async listAssets(): Promise<AssetRecord[]> {
    await this.scan();
    return Array.from(this.entries.values(), (entry) => entry.record).sort(
      (a, b) => b.creationDate.localeCompare(a.creationDate)
    );
  }

  async sizeOf(id: string): Promise<number> {
    const entry = await this.lookup(id);
    if (!entry) {
      throw new ResourceError(`Unknown asset: ${id}`, id);
    }

    try {
      let size = (await stat(entry.path)).size;
      if (entry.motionPath) {
        size += (await stat(entry.motionPath)).size;
      }
      return size;
    } catch (err) {
      throw new ResourceError(`Cannot stat asset ${id}: ${describe(err)}`, id);
    }
  }

  async thumbnail(id: string): Promise<Buffer | null> {
    const entry = await this.lookup(id);
    if (!entry) return null;

    const name = basename(entry.path, extname(entry.path));
    const sidecar = join(dirname(entry.path), THUMBNAIL_DIR, `${name}.jpg`);
    try {
      return await readFile(sidecar);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new ResourceError(`Cannot read thumbnail for ${id}: ${describe(err)}`, id);
    }
  }

  async openFile(id: string): Promise<PayloadStream | null> {
    const entry = await this.lookup(id);
    if (!entry) return null;

    try {
      const { size } = await stat(entry.path);
      return {
        size,
        chunks: createReadStream(entry.path, { highWaterMark: CHUNK_SIZE }),
      };
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new ResourceError(`Cannot open asset ${id}: ${describe(err)}`, id);
    }
  }

  private async lookup(id: string): Promise<LibraryEntry | null> {
    if (!this.scanned) {
      await this.scan();
    }
    return this.entries.get(id) ?? null;
  }

  /**
   * Rebuild the index from disk
   */
  private async scan(): Promise<void> {
    let files: ScannedFile[];
    try {
      files = await this.walk(this.root);
    } catch (err) {
      throw new ResourceError(`Cannot read library at ${this.root}: ${describe(err)}`);
    }

    // Group by directory + base name so stills can find their clips
    const groups = new Map<string, ScannedFile[]>();
    for (const file of files) {
      const key = join(dirname(file.path), basename(file.path, file.ext)).toLowerCase();
      const group = groups.get(key);
      if (group) {
        group.push(file);
      } else {
        groups.set(key, [file]);
      }
    }

    const entries = new Map<string, LibraryEntry>();
    for (const group of groups.values()) {
      const images = group.filter((file) => PHOTO_EXTENSIONS.has(file.ext));
      const videos = group.filter((file) => VIDEO_EXTENSIONS.has(file.ext));
      const motion = videos.find((file) => file.ext === MOTION_EXTENSION);

      if (images.length === 1 && motion) {
        await this.addEntry(entries, images[0].path, "live_photo", motion.path);
        for (const video of videos) {
          if (video !== motion) await this.addEntry(entries, video.path, "video", null);
        }
        continue;
      }

      for (const image of images) {
        await this.addEntry(entries, image.path, "photo", null);
      }
      for (const video of videos) {
        await this.addEntry(entries, video.path, "video", null);
      }
    }

    this.entries = entries;
    this.scanned = true;
  }

  private async addEntry(
    entries: Map<string, LibraryEntry>,
    path: string,
    type: AssetType,
    motionPath: string | null
  ): Promise<void> {
    let info: Stats;
    try {
      info = await stat(path);
    } catch (err) {
      throw new ResourceError(`Cannot stat ${path}: ${describe(err)}`);
    }
    const relativePath = relative(this.root, path).split(sep).join("/");
    const created = info.birthtime.getTime() > 0 ? info.birthtime : info.mtime;
    const id = createHash("sha1").update(relativePath).digest("hex").slice(0, 16);

    entries.set(id, {
      path,
      motionPath,
      record: {
        id,
        filename: basename(path),
        type,
        // Dimensions and duration need a media decoder; unknown here
        width: 0,
        height: 0,
        durationSeconds: null,
        creationDate: created.toISOString(),
        isLivePhoto: type === "live_photo",
      },
    });
  }

  private async walk(dir: string): Promise<ScannedFile[]> {
    const found: ScannedFile[] = [];
    const dirents = await readdir(dir, { withFileTypes: true });

    for (const dirent of dirents) {
      if (dirent.name.startsWith(".")) continue;

      const path = join(dir, dirent.name);
      if (dirent.isDirectory()) {
        found.push(...(await this.walk(path)));
      } else if (dirent.isFile()) {
        const ext = extname(dirent.name).toLowerCase();
        if (PHOTO_EXTENSIONS.has(ext) || VIDEO_EXTENSIONS.has(ext)) {
          found.push({ path, ext });
        }
      }
    }

    return found;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
