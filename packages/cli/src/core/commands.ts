/**
 * Pre/post generation command hooks
 */

import { spawn } from "node:child_process";

/**
 * Run a command in array form inside `cwd`, streaming its output to the
 * terminal. Resolves on exit code 0 and rejects otherwise.
 */
export function runCommand(
  argv: readonly string[],
  cwd: string,
  label: string,
): Promise<void> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error(`${label} command is empty`));
  }
  const display = argv.join(" ");

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: "inherit" });

    child.on("error", (error) => {
      reject(
        new Error(
          `${label} command could not be started: ${display}: ${error.message}`,
        ),
      );
    });

    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      const status = signal ? `signal ${signal}` : `exit code ${code}`;
      reject(new Error(`${label} command failed (${status}): ${display}`));
    });
  });
}
