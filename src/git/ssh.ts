import fs from "fs";
import os from "os";
import path from "path";
import { ConfigError } from "../errors";

interface SshCommandOptions {
  skipHostKeyCheck?: boolean;
  homeDir?: string;
  exists?: (file: string) => boolean;
}

function expandHome(file: string, homeDir: string = os.homedir()): string {
  if (file === "~") return homeDir;
  if (file.startsWith("~/") || file.startsWith("~\\")) {
    return path.join(homeDir, file.slice(2));
  }
  return file;
}

/**
 * Build the GIT_SSH_COMMAND value that makes git authenticate with `keyPath`.
 * The path is absolute and uses forward slashes so ssh accepts it on every platform.
 */
function buildSshCommand(keyPath: string, options: SshCommandOptions = {}): string {
  const exists = options.exists || ((file: string) => fs.existsSync(file) && fs.statSync(file).isFile());
  const resolved = path.resolve(expandHome(keyPath, options.homeDir)).split(path.sep).join("/");

  if (!exists(resolved)) {
    throw new ConfigError(`SSH key not found: ${resolved}`);
  }

  let command = `ssh -i "${resolved}"`;
  if (options.skipHostKeyCheck) {
    command += " -o StrictHostKeyChecking=no";
  }
  return command;
}

export { buildSshCommand, expandHome };
export type { SshCommandOptions };
