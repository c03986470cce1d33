import crypto from "crypto";
import fse from "fs-extra";
import os from "os";
import path from "path";

export const HOME_DRIVE_LOCK = path.join(os.homedir(), ".drive-lock");

/** Returns this machine's device id, creating it on first use. */
export async function ensureDeviceId(home = HOME_DRIVE_LOCK): Promise<string> {
  const devicePath = path.join(home, "device.json");
  await fse.ensureDir(home);
  if (await fse.pathExists(devicePath)) {
    const stored: unknown = await fse.readJson(devicePath);
    if (
      typeof stored === "object" &&
      stored !== null &&
      "deviceId" in stored &&
      typeof stored.deviceId === "string" &&
      stored.deviceId
    ) {
      return stored.deviceId;
    }
  }
  const deviceId = crypto.randomUUID();
  await fse.writeJson(devicePath, { deviceId }, { spaces: 2 });
  return deviceId;
}

export function sessionOwner(user: string, deviceId: string): string {
  return `${user}@${deviceId}`;
}
