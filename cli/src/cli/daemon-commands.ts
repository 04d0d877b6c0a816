/**
 * CLI handlers for talking to a running daemon
 */

import * as readline from "readline";
import { Writable } from "stream";
import chalk from "chalk";
import Table from "cli-table3";
import type { AssistantStatus, TriggerOutcome } from "@screen-narrator/types";
import {
  DaemonClient,
  DaemonRequestError,
  DaemonUnreachableError,
} from "../daemon-client.js";

export interface CommandContext {
  client: DaemonClient;
  jsonOutput: boolean;
}

const OUTCOME_LABELS: Record<TriggerOutcome, string> = {
  admitted: "task started",
  denied: "another task is still running",
  submitted: "follow-up question sent",
  stopped: "speech stopped",
  canceled: "cancel requested",
  started: "started",
  "shutting-down": "daemon is shutting down",
};

function reportFailure(ctx: CommandContext, error: unknown): void {
  process.exitCode = 1;
  const message = error instanceof Error ? error.message : String(error);

  if (ctx.jsonOutput) {
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
    return;
  }

  console.error(chalk.red(`✗ ${message}`));
  if (error instanceof DaemonUnreachableError) {
    console.error(chalk.gray("  Start it with: screen-narrator start"));
  } else if (!(error instanceof DaemonRequestError)) {
    console.error(chalk.gray("  Unexpected error while contacting the daemon"));
  }
}

/**
 * Send a trigger command to the daemon
 */
export async function handleSend(
  ctx: CommandContext,
  command: string
): Promise<void> {
  try {
    const receipt = await ctx.client.sendCommand(command);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(receipt, null, 2));
      return;
    }

    const label = OUTCOME_LABELS[receipt.outcome];
    if (receipt.outcome === "denied") {
      console.log(chalk.yellow(`⚠ ${receipt.command}: ${label}`));
    } else {
      console.log(chalk.green(`✓ ${receipt.command}: ${label}`));
    }
  } catch (error) {
    reportFailure(ctx, error);
  }
}

export function formatDetailPosition(status: AssistantStatus): string {
  if (status.detailCount === 0) {
    return "none";
  }
  if (status.detailIndex < 0) {
    return `${status.detailCount} available`;
  }
  return `${status.detailIndex + 1} of ${status.detailCount}`;
}

/**
 * Show the daemon status
 */
export async function handleStatus(ctx: CommandContext): Promise<void> {
  try {
    const status = await ctx.client.getStatus();

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    const table = new Table({
      head: [chalk.cyan("Field"), chalk.cyan("Value")],
    });
    table.push(
      ["Running", status.running ? chalk.green("yes") : chalk.yellow("shutting down")],
      ["Active task", status.activeTask ?? chalk.gray("none")],
      ["Follow-up", status.followUp],
      ["Speaking", status.speaking ? "yes" : "no"],
      ["API key", status.credentialConfigured ? chalk.green("configured") : chalk.red("missing")],
      ["Details", formatDetailPosition(status)]
    );

    console.log(chalk.bold(`Screen Narrator at ${ctx.client.baseUrl}\n`));
    console.log(table.toString());
  } catch (error) {
    reportFailure(ctx, error);
  }
}

/**
 * Read one line from the terminal without echoing it
 */
export function readHiddenLine(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  target: NodeJS.WritableStream = process.stdout
): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback) {
      if (!muted) {
        target.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({ input, output, terminal: true });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      target.write("\n");
      resolve(answer);
    });
    muted = true;
  });
}

/**
 * Prompt for an API key and hand it to the daemon
 */
export async function handleSetKey(
  ctx: CommandContext,
  ask: (question: string) => Promise<string> = readHiddenLine
): Promise<void> {
  const key = (await ask("Gemini API key (input hidden): ")).trim();
  if (!key) {
    console.log(chalk.yellow("⚠ No API key entered. Existing value unchanged."));
    return;
  }

  try {
    await ctx.client.setCredential(key);
    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ success: true }, null, 2));
      return;
    }
    console.log(chalk.green("✓ API key saved"));
  } catch (error) {
    reportFailure(ctx, error);
  }
}
