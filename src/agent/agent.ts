import os from "os";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import pino from "pino";
import { DEFAULT_NATIVE_EXTENSIONS } from "./coordinator";
import { ensureDeviceId, sessionOwner } from "./device";
import { DEFAULT_HOST_PORT } from "./hostBridge";
import { DEFAULT_TIMEOUT_MS } from "./lockClient";
import { loadPlugin } from "./plugin";

const logger = pino({
  name: "drive-lock-agent",
  level: process.env.LOG_LEVEL || "info",
});

async function main() {
  const argv = yargs(hideBin(process.argv))
    .option("relay", {
      type: "string",
      default: "ws://localhost:8787",
      description: "Lock service WebSocket URL",
    })
    .option("host-port", {
      type: "number",
      default: DEFAULT_HOST_PORT,
      description: "Port the host shim connects to",
    })
    .option("user", {
      type: "string",
      default: os.userInfo().username,
      description: "Owner name shown to other sessions",
    })
    .option("read-only", {
      type: "boolean",
      default: false,
      description: "Mark files locked by others read-only while open",
    })
    .option("extension", {
      type: "string",
      array: true,
      default: DEFAULT_NATIVE_EXTENSIONS,
      description: "Native document extensions to lock",
    })
    .option("timeout", {
      type: "number",
      default: DEFAULT_TIMEOUT_MS,
      description: "Lock service request timeout in milliseconds",
    })
    .strict()
    .parseSync();

  const deviceId = await ensureDeviceId();
  const owner = sessionOwner(argv.user, deviceId);

  const loaded = await loadPlugin({
    relayUrl: argv.relay,
    owner,
    hostPort: argv["host-port"],
    logger,
    setReadOnly: argv["read-only"],
    nativeExtensions: argv.extension,
    timeoutMs: argv.timeout,
  });

  if (loaded.code !== "success") {
    logger.error({ error: loaded.errorMessage }, "plugin failed to load");
    process.exit(1);
  }

  const { plugin } = loaded;
  const shutdown = () => {
    plugin
      .unload()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "failed unloading");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.error({ err }, "fatal error");
  process.exit(1);
});
