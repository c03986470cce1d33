import type { Logger } from "pino";
import { extensionOf, fileNameOf, normalizeExtension } from "../common/files";
import {
  DialogNotification,
  HandlerAction,
  HandlerResult,
  StatusNotification,
} from "../common/types";
import { RemoteLockClient } from "./lockClient";
import { PathQueue } from "./pathQueue";
import { FileAttributes, fsFileAttributes } from "./readOnly";

export const DEFAULT_PLUGIN_NAME = "Drive File Locker";
export const DEFAULT_NATIVE_EXTENSIONS = [".3dm", ".gh", ".ghx"];

/** Where user-facing messages go; the host decides how to render them. */
export interface NotificationSink {
  status(notification: StatusNotification): void;
  dialog(notification: DialogNotification): void | Promise<void>;
}

export interface CoordinatorOptions {
  client: RemoteLockClient;
  notifications: NotificationSink;
  logger: Logger;
  setReadOnly?: boolean;
  nativeExtensions?: string[];
  pluginName?: string;
  attributes?: FileAttributes;
}

export interface OpenOptions {
  /** The host is importing or merging the file rather than opening it. */
  imported?: boolean;
  /** Overrides the extension taken from the path. */
  extension?: string;
}

/**
 * Turns document open/close events into lock service calls. Holds no lock
 * state of its own: every event re-queries the service.
 *
 * Lock, unlock and sync run in the background, serialized per path, so a
 * handler returns as soon as the queries are done.
 */
export class DocumentLockCoordinator {
  readonly pluginName: string;
  private readonly client: RemoteLockClient;
  private readonly notifications: NotificationSink;
  private readonly logger: Logger;
  private readonly setReadOnly: boolean;
  private readonly nativeExtensions: Set<string>;
  private readonly attributes: FileAttributes;
  private readonly queue: PathQueue;

  constructor(options: CoordinatorOptions) {
    this.client = options.client;
    this.notifications = options.notifications;
    this.logger = options.logger;
    this.setReadOnly = options.setReadOnly ?? false;
    this.pluginName = options.pluginName ?? DEFAULT_PLUGIN_NAME;
    this.attributes = options.attributes ?? fsFileAttributes;
    this.nativeExtensions = new Set(
      (options.nativeExtensions ?? DEFAULT_NATIVE_EXTENSIONS)
        .map(normalizeExtension)
        .filter(Boolean)
    );
    this.queue = new PathQueue(this.logger);
  }

  onOpen(filePath: string | null | undefined, options: OpenOptions = {}): Promise<HandlerResult> {
    return this.capture("open", filePath, async (target) => {
      if (options.imported || !this.isNative(target, options.extension)) {
        return "skipped";
      }
      if (!(await this.client.contains(target))) {
        this.logger.info({ path: target }, "file is not on a managed drive");
        return "untracked";
      }
      if (await this.client.isLockedByOther(target)) {
        await this.notifyLockedByOther(target);
        return "conflict";
      }
      this.queue.enqueue(target, "lock", () => this.lockFile(target));
      return "locking";
    });
  }

  onClose(filePath: string | null | undefined): Promise<HandlerResult> {
    return this.capture("close", filePath, async (target) => {
      if (!(await this.client.contains(target))) {
        this.logger.info({ path: target }, "file is not on a managed drive");
        return "untracked";
      }
      if (!(await this.client.isLockedByOther(target))) {
        this.queue.enqueue(target, "unlock", () => this.unlockAndSync(target));
        return "unlocking";
      }
      if (this.setReadOnly) {
        await this.attributes.setReadOnly(target, false);
      }
      return "released-foreign";
    });
  }

  /** Resolves when all scheduled lock, unlock and sync work has settled. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  private async capture(
    event: "open" | "close",
    filePath: string | null | undefined,
    run: (filePath: string) => Promise<HandlerAction>
  ): Promise<HandlerResult> {
    if (!filePath) {
      return { ok: true, action: "skipped" };
    }
    try {
      const action = await run(filePath);
      this.logger.debug({ event, path: filePath, action }, "handled document event");
      return { ok: true, action };
    } catch (err) {
      this.logger.error({ err, event, path: filePath }, "failed handling document event");
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  private isNative(filePath: string, extension?: string): boolean {
    const ext = extension === undefined ? extensionOf(filePath) : normalizeExtension(extension);
    return this.nativeExtensions.has(ext);
  }

  private async notifyLockedByOther(filePath: string) {
    const info = await this.client.getFileInfo(filePath);
    const fileName = fileNameOf(filePath);
    this.logger.info(
      { path: filePath, owner: info.owner, lockTimestamp: info.lockTimestamp },
      "file is already locked by another session"
    );
    if (this.setReadOnly) {
      await this.attributes.setReadOnly(filePath, true);
    }
    await this.notifications.dialog({
      title: this.pluginName,
      icon: "stop",
      message:
        `File is locked!\n\n` +
        `"${fileName}" was locked by:\n\n` +
        `Lock Owner:  ${info.owner}\n` +
        `Lock Time:   ${info.lockTimestamp}\n\n` +
        `Any edits you make may be sent to recycle bin!`,
    });
  }

  private async lockFile(filePath: string) {
    this.logger.info({ path: filePath }, "locking");
    if (!(await this.client.lockFile(filePath))) {
      this.logger.warn({ path: filePath }, "failed locking");
    }
    this.notifications.status({ message: `Locked "${fileNameOf(filePath)}"` });
  }

  private async unlockAndSync(filePath: string) {
    this.logger.info({ path: filePath }, "unlocking");
    if (!(await this.client.unlockFile(filePath))) {
      this.logger.warn({ path: filePath }, "failed unlocking");
    }
    this.logger.info({ path: filePath }, "syncing");
    await this.client.syncFile(filePath, true);
    this.notifications.status({ message: `UnLocked "${fileNameOf(filePath)}"` });
  }
}
