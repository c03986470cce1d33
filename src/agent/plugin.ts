import type { Logger } from "pino";
import { SessionWelcome } from "../common/types";
import { DEFAULT_PLUGIN_NAME, DocumentLockCoordinator } from "./coordinator";
import { HostBridge } from "./hostBridge";
import {
  connectRelayLockClient,
  RelayLockClientOptions,
  RemoteLockClient,
} from "./lockClient";
import { FileAttributes } from "./readOnly";

export interface ClosableLockClient extends RemoteLockClient {
  close(): void;
}

export type LockServiceConnector = (
  url: string,
  owner: string,
  options: RelayLockClientOptions
) => Promise<{ client: ClosableLockClient; welcome: SessionWelcome }>;

export interface PluginOptions {
  relayUrl: string;
  owner: string;
  /** Port for the host shim; null keeps the bridge in-process only. */
  hostPort: number | null;
  logger: Logger;
  setReadOnly?: boolean;
  nativeExtensions?: string[];
  timeoutMs?: number;
  pluginName?: string;
  attributes?: FileAttributes;
  connect?: LockServiceConnector;
}

export interface LoadedPlugin {
  coordinator: DocumentLockCoordinator;
  bridge: HostBridge;
  welcome: SessionWelcome;
  unload(): Promise<void>;
}

export type LoadResult =
  | { code: "success"; plugin: LoadedPlugin }
  | { code: "error-no-dialog"; errorMessage: string };

/**
 * Connects to the lock service and starts listening for host document
 * events. A lock service that cannot be reached fails the load.
 */
export async function loadPlugin(options: PluginOptions): Promise<LoadResult> {
  const pluginName = options.pluginName ?? DEFAULT_PLUGIN_NAME;
  const logger = options.logger;
  const connect = options.connect ?? connectRelayLockClient;

  let connected: Awaited<ReturnType<LockServiceConnector>>;
  try {
    connected = await connect(options.relayUrl, options.owner, {
      timeoutMs: options.timeoutMs,
      logger,
    });
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error({ err }, `Error loading ${pluginName}`);
    return { code: "error-no-dialog", errorMessage };
  }

  const { client, welcome } = connected;
  const bridge = new HostBridge({ pluginName, logger });
  const coordinator = new DocumentLockCoordinator({
    client,
    notifications: bridge,
    logger,
    pluginName,
    setReadOnly: options.setReadOnly,
    nativeExtensions: options.nativeExtensions,
    attributes: options.attributes,
  });

  if (options.hostPort !== null) {
    try {
      await bridge.listen(options.hostPort, coordinator);
    } catch (err) {
      client.close();
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error({ err }, `Error loading ${pluginName}`);
      return { code: "error-no-dialog", errorMessage };
    }
  }

  logger.info(
    { relay: options.relayUrl, owner: options.owner, sessionId: welcome.sessionId, roots: welcome.roots },
    "connected to lock service"
  );

  return {
    code: "success",
    plugin: {
      coordinator,
      bridge,
      welcome,
      async unload() {
        await coordinator.idle();
        await bridge.close();
        client.close();
      },
    },
  };
}
