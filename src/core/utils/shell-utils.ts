import { spawn } from "node:child_process";
import { Effect } from "effect";

/**
 * Execute a command and return its stdout once it exits.
 * Uses spawn with shell: false, so arguments are never interpreted by a shell.
 * Interrupting the effect kills the child process.
 *
 * @param command - The command to execute
 * @param args - Arguments to pass to the command
 * @returns Effect that resolves with stdout on success, or fails with Error
 */
export function execCommand(
  command: string,
  args: readonly string[],
): Effect.Effect<string, Error> {
  return Effect.async<string, Error>((resume) => {
    const child = spawn(command, [...args], {
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });

    let stdout = "";
    let stderr = "";

    if (child.stdout) {
      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (child.stderr) {
      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });
    }

    child.on("close", (code) => {
      if (code === 0) {
        resume(Effect.succeed(stdout));
      } else {
        resume(Effect.fail(new Error(`Command failed (exit ${code}): ${(stderr || stdout).trim()}`)));
      }
    });

    child.on("error", (err) => {
      resume(Effect.fail(err));
    });

    return Effect.sync(() => {
      if (child.exitCode === null) {
        child.kill();
      }
    });
  });
}
