/**
 * External command runner using node:child_process
 */

import { execFile } from "node:child_process";
import { logger } from "./logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run a command and collect its output. Resolves for non-zero exits;
 * a command that cannot be started resolves with exit code 127.
 */
export const runCommand: CommandRunner = (command, args) => {
  logger.debug(`Running: ${command} ${args.join(" ")}`);

  return new Promise((resolve) => {
    execFile(command, args, { maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
      if (!error) {
        resolve({ success: true, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 });
        return;
      }

      const exitCode = typeof error.code === "number" ? error.code : 127;
      resolve({
        success: false,
        stdout: stdout.trim(),
        stderr: stderr.trim() || error.message,
        exitCode,
      });
    });
  });
};
