import { spawn } from "node:child_process";
import { logger } from "../utils/logger";
import { isErrnoException } from "../utils/typeGuards";

export interface LaunchViewerOptions {
  bin: string;
  target: string;
}

/**
 * Opens `target` (the dataset cache directory) in the Rerun Viewer and
 * resolves with the viewer's exit code once it is closed.
 */
export function launchViewer({ bin, target }: LaunchViewerOptions): Promise<number> {
  return new Promise((resolve, reject) => {
    logger.info(`Opening ${target} in the Rerun Viewer`);
    const child = spawn(bin, [target], { stdio: "inherit" });

    child.once("error", (error) => {
      if (isErrnoException(error) && error.code === "ENOENT") {
        reject(
          new Error(
            `Rerun Viewer executable "${bin}" not found. Install it with "pip install rerun-sdk" or pass --rerun-bin`,
          ),
        );
        return;
      }
      reject(error);
    });

    child.once("exit", (code, signal) => {
      logger.debug(`Rerun Viewer exited (code ${String(code)}, signal ${String(signal)})`);
      resolve(code ?? 1);
    });
  });
}
