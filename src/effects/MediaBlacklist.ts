import { mkdir, rename, copyFile, unlink } from "node:fs/promises";
import { basename, join } from "node:path";
import type { PopupMedia } from "../types";

export interface DesktopNotification {
  title: string;
  message: string;
}

/** Delivers desktop notifications. Provided by the host. */
export interface Notifier {
  send(notification: DesktopNotification): void | Promise<void>;
}

/** Pack names become directory names with all whitespace removed. */
export function blacklistDirFor(root: string, packName: string): string {
  return join(root, packName.replace(/\s+/g, ""));
}

function isCrossDeviceError(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "EXDEV";
}

/**
 * Moves media a user rejected into a per-pack blacklist directory and
 * tells them it happened.
 */
export class MediaBlacklist {
  private root: string;
  private notifier: Notifier;

  constructor(root: string, notifier: Notifier) {
    this.root = root;
    this.notifier = notifier;
  }

  /**
   * Move the file, then notify. Returns the new path. Rejects on
   * filesystem errors; nothing is retried.
   */
  async add(media: PopupMedia): Promise<string> {
    const dir = blacklistDirFor(this.root, media.packName);
    const fileName = basename(media.path);
    const target = join(dir, fileName);

    await mkdir(dir, { recursive: true });
    try {
      await rename(media.path, target);
    } catch (e) {
      if (!isCrossDeviceError(e)) throw e;
      await copyFile(media.path, target);
      await unlink(media.path);
    }

    await this.notifier.send({
      title: media.packName,
      message: `${fileName} has been successfully sent to blacklist`,
    });
    return target;
  }
}
