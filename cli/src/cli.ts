#!/usr/bin/env node

/**
 * screen-narrator CLI - start the narrator daemon and send it triggers
 */

import { Command } from "commander";
import { DaemonClient, resolveDaemonUrl } from "./daemon-client.js";
import {
  handleSend,
  handleSetKey,
  handleStatus,
  type CommandContext,
} from "./cli/daemon-commands.js";
import { handleServerStart } from "./cli/server-commands.js";
import { VERSION } from "./version.js";

let daemonUrl: string | undefined;
let jsonOutput = false;

function getContext(): CommandContext {
  return {
    client: new DaemonClient(resolveDaemonUrl(daemonUrl)),
    jsonOutput,
  };
}

const program = new Command();

program
  .name("screen-narrator")
  .description("Hotkey-driven screen narration for blind and low-vision users")
  .version(VERSION)
  .option("--url <url>", "Daemon URL (default: NARRATOR_URL or http://127.0.0.1:4799)")
  .option("--json", "Output in JSON format")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts();
    daemonUrl = typeof opts.url === "string" ? opts.url : undefined;
    jsonOutput = opts.json === true;
  });

// ============================================================================
// DAEMON COMMANDS
// ============================================================================

program
  .command("start")
  .description("Start the narrator daemon in the foreground")
  .option("-p, --port <port>", "Port for the local control API")
  .option("--no-keys", "Do not read hotkeys from this terminal")
  .option("--quiet", "Skip the spoken welcome instructions")
  .action((options) => {
    handleServerStart(options);
  });

program
  .command("send <command>")
  .description(
    "Send a trigger to the running daemon (capture, follow-up-toggle, stop-speech, cancel-task, set-credential, next-detail, previous-detail, shutdown)"
  )
  .action(async (command: string) => {
    await handleSend(getContext(), command);
  });

program
  .command("status")
  .description("Show daemon status")
  .action(async () => {
    await handleStatus(getContext());
  });

program
  .command("set-key")
  .description("Store a new Gemini API key in the running daemon")
  .action(async () => {
    await handleSetKey(getContext());
  });

await program.parseAsync(process.argv);
