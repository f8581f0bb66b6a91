import { existsSync, rmSync } from "fs";
import type { StopSignal } from "../../ports/StopSignal";

/**
 * Sentinel-file stop signal: creating the file asks a running scheduler to exit after the
 * job in flight.
 */
export const createFileStopSignal = (filePath: string): StopSignal => ({
  isRaised: () => existsSync(filePath),
  clear: () => rmSync(filePath, { force: true })
});
