import { execFile } from "child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[]): Promise<CommandResult>;
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly stderr: string;

  constructor(command: string, message: string, stderr: string) {
    super(message);
    this.name = "CommandFailedError";
    this.command = command;
    this.stderr = stderr;
  }
}

const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

export const execFileRunner: CommandRunner = {
  run(command, args) {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        { windowsHide: true, maxBuffer: MAX_BUFFER_BYTES, encoding: "utf-8" },
        (error, stdout, stderr) => {
          if (error) {
            const message = stderr?.trim() || stdout?.trim() || error.message;
            reject(new CommandFailedError(command, message, stderr ?? ""));
            return;
          }
          resolve({ stdout, stderr });
        },
      );
    });
  },
};
