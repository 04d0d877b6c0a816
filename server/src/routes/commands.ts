import { Router, Request, Response } from "express";
import type {
  AssistantCommand,
  CommandResult,
} from "@screen-narrator/types";
import type { Orchestrator } from "../services/orchestrator.js";

export const ASSISTANT_COMMANDS: readonly AssistantCommand[] = [
  "capture",
  "follow-up-toggle",
  "stop-speech",
  "cancel-task",
  "set-credential",
  "next-detail",
  "previous-detail",
  "shutdown",
];

export function isAssistantCommand(value: string): value is AssistantCommand {
  return ASSISTANT_COMMANDS.some((command) => command === value);
}

export function createCommandsRouter(orchestrator: Orchestrator): Router {
  const router = Router();

  // Trigger a command; the task itself runs in the background
  router.post("/:command", async (req: Request, res: Response) => {
    const { command } = req.params;
    if (!isAssistantCommand(command)) {
      res.status(400).json({
        success: false,
        data: null,
        message: `Unknown command: ${command}. Expected one of: ${ASSISTANT_COMMANDS.join(", ")}`,
      });
      return;
    }

    try {
      const outcome = await orchestrator.dispatch(command);
      const result: CommandResult = { command, outcome };
      res.status(202).json({
        success: true,
        data: result,
      });
    } catch (error) {
      console.error(`[server] Failed to dispatch ${command}:`, error);
      res.status(500).json({
        success: false,
        data: null,
        message: `Failed to dispatch ${command}`,
      });
    }
  });

  return router;
}
