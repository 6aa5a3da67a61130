import { spawn } from "node:child_process";

export interface RunProcessOptions {
  /** Written to stdin, which is then closed. */
  input?: Uint8Array;
  signal?: AbortSignal;
}

export class ProcessError extends Error {
  constructor(
    public command: string,
    public exitCode: number | null,
    public stderr: string,
  ) {
    super(`${command} exited with code ${exitCode}: ${stderr.trim().split("\n").pop() ?? ""}`);
    this.name = "ProcessError";
  }
}

/** The binary could not be started at all, e.g. it is not installed. */
export class ProcessLaunchError extends Error {
  constructor(
    public command: string,
    cause: Error,
  ) {
    super(`Could not start ${command}: ${cause.message}`, { cause });
    this.name = "ProcessLaunchError";
  }
}

/**
 * Runs a decoder binary and collects stdout. Aborting the signal kills the
 * child, so a timed-out or cancelled job never leaves ffmpeg running.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {},
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal: options.signal });

    const stdout: Buffer[] = [];
    let stderr = "";
    let spawned = false;
    child.on("spawn", () => {
      spawned = true;
    });
    let stdinError: Error | null = null;

    child.stdout.on("data", (chunk: Buffer) => {
      stdout.push(chunk);
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (err) => {
      if (options.signal?.aborted) {
        reject(options.signal.reason);
        return;
      }
      reject(spawned ? err : new ProcessLaunchError(command, err));
    });

    child.on("close", (code) => {
      if (options.signal?.aborted) {
        reject(options.signal.reason);
        return;
      }
      if (code !== 0) {
        reject(new ProcessError(command, code, stderr));
        return;
      }
      if (stdinError) {
        reject(stdinError);
        return;
      }
      resolve(Buffer.concat(stdout));
    });

    // EPIPE when the decoder exits early; a non-zero exit code takes precedence.
    child.stdin.on("error", (err) => {
      stdinError = err;
    });
    child.stdin.end(options.input);
  });
}
