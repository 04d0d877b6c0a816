import { Router, Request, Response } from "express";
import type { Orchestrator } from "../services/orchestrator.js";

export function createCredentialRouter(orchestrator: Orchestrator): Router {
  const router = Router();

  // Store a new API key; the key itself is never echoed back
  router.post("/", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const key =
      typeof body === "object" && body !== null && "key" in body
        ? body.key
        : undefined;

    if (typeof key !== "string" || key.trim() === "") {
      res.status(400).json({
        success: false,
        data: null,
        message: "key is required",
      });
      return;
    }

    try {
      const stored = await orchestrator.submitCredential(key);
      if (!stored) {
        res.status(500).json({
          success: false,
          data: null,
          message: "Failed to save API key",
        });
        return;
      }
      res.status(200).json({
        success: true,
        data: { credentialConfigured: true },
        message: "API key saved",
      });
    } catch (error) {
      console.error("[server] Failed to store API key:", error);
      res.status(500).json({
        success: false,
        data: null,
        message: "Failed to save API key",
      });
    }
  });

  return router;
}
