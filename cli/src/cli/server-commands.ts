/**
 * CLI handlers for starting the daemon
 */

import { spawn, type ChildProcess } from "child_process";
import chalk from "chalk";

export const SERVER_BINARY = "screen-narrator-server";

export interface ServerStartOptions {
  port?: string;
  /** false when --no-keys was given */
  keys?: boolean;
  quiet?: boolean;
}

/**
 * Environment handed to the daemon for the given options
 */
export function buildServerEnv(
  options: ServerStartOptions,
  base: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  if (options.port) {
    env.NARRATOR_PORT = options.port;
  }
  if (options.keys === false) {
    env.NARRATOR_KEYS = "false";
  }
  if (options.quiet) {
    env.NARRATOR_WELCOME = "false";
  }
  return env;
}

function isValidPort(value: string): boolean {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536;
}

/**
 * Start the daemon in the foreground with inherited stdio
 */
export function handleServerStart(
  options: ServerStartOptions
): ChildProcess | null {
  if (options.port !== undefined && !isValidPort(options.port)) {
    console.error(chalk.red(`✗ Invalid port: ${options.port}`));
    process.exitCode = 1;
    return null;
  }

  const env = buildServerEnv(options);
  console.log(chalk.blue("Starting Screen Narrator..."));
  if (options.port) {
    console.log(chalk.gray(`Port: ${options.port}`));
  }

  const serverProcess = spawn(SERVER_BINARY, [], {
    stdio: "inherit",
    env,
  });

  // Stay up until the daemon exits; it shuts down without a farewell on
  // SIGINT and ignores repeats
  const forwardInterrupt = () => {
    serverProcess.kill("SIGINT");
  };
  process.on("SIGINT", forwardInterrupt);
  const detach = () => {
    process.off("SIGINT", forwardInterrupt);
  };

  serverProcess.on("error", (error: NodeJS.ErrnoException) => {
    detach();
    if (error.code === "ENOENT") {
      console.error(chalk.red(`✗ ${SERVER_BINARY} is not installed`));
      console.error(chalk.gray("  Install the server package and try again."));
    } else {
      console.error(chalk.red(`✗ Failed to start daemon: ${error.message}`));
    }
    process.exitCode = 1;
  });

  serverProcess.on("exit", (code) => {
    detach();
    if (code !== 0 && code !== null) {
      console.error(chalk.red(`Daemon exited with code ${code}`));
      process.exitCode = code;
    }
  });

  return serverProcess;
}
