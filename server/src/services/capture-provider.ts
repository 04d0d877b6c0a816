/**
 * Screen Capture Provider
 *
 * Takes a PNG screenshot of the primary display with the first screenshot
 * command available on this platform.
 *
 * @module services/capture-provider
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
  fillPlaceholders,
  formatProcessError,
  generateId,
  isCommandAvailable,
  runProcess,
  type CommandTemplate,
} from "../execution/process/index.js";
import { CaptureError } from "../errors/assistant-errors.js";

/**
 * Interface for capture providers
 */
export interface CaptureProvider {
  /**
   * @returns PNG bytes of the current screen
   * @throws CaptureError
   */
  capture(): Promise<Buffer>;
}

const WINDOWS_SCREENSHOT = [
  "Add-Type -AssemblyName System.Windows.Forms;",
  "Add-Type -AssemblyName System.Drawing;",
  "$bounds = [System.Windows.Forms.Screen]::PrimaryScreen.Bounds;",
  "$bitmap = New-Object System.Drawing.Bitmap $bounds.Width, $bounds.Height;",
  "$graphics = [System.Drawing.Graphics]::FromImage($bitmap);",
  "$graphics.CopyFromScreen($bounds.Location, [System.Drawing.Point]::Empty, $bounds.Size);",
  "$bitmap.Save($env:NARRATOR_CAPTURE_PATH, [System.Drawing.Imaging.ImageFormat]::Png);",
  "$graphics.Dispose();",
  "$bitmap.Dispose();",
].join(" ");

/**
 * Screenshot commands for a platform, in preference order. `{png}` is the
 * output path (also exported as NARRATOR_CAPTURE_PATH).
 */
export function getCaptureCommands(
  platform: NodeJS.Platform = process.platform
): CommandTemplate[] {
  switch (platform) {
    case "win32":
      return [
        {
          command: "powershell",
          args: ["-NoProfile", "-Command", WINDOWS_SCREENSHOT],
        },
      ];
    case "darwin":
      return [{ command: "screencapture", args: ["-x", "-t", "png", "{png}"] }];
    default:
      return [
        { command: "gnome-screenshot", args: ["-f", "{png}"] },
        { command: "grim", args: ["{png}"] },
        { command: "import", args: ["-window", "root", "{png}"] },
      ];
  }
}

export interface ScreenCaptureConfig {
  commands?: CommandTemplate[];
  /** Directory for the temporary image (default: OS temp dir) */
  tempDir?: string;
  timeoutMs?: number;
}

export class ScreenCaptureProvider implements CaptureProvider {
  private readonly commands: CommandTemplate[];

  constructor(private readonly config: ScreenCaptureConfig = {}) {
    this.commands = config.commands ?? getCaptureCommands();
  }

  async capture(): Promise<Buffer> {
    const template = await this.findCommand();
    if (!template) {
      throw new CaptureError("no screenshot command is available", {
        tried: this.commands.map((candidate) => candidate.command),
      });
    }

    const pngPath = path.join(
      this.config.tempDir ?? os.tmpdir(),
      `${generateId("narrator_capture")}.png`
    );

    try {
      const result = await runProcess(null, {
        command: template.command,
        args: fillPlaceholders(template.args, { png: pngPath }),
        env: { NARRATOR_CAPTURE_PATH: pngPath },
        timeoutMs: this.config.timeoutMs ?? 15000,
      });
      if (result.error || result.status !== 0) {
        throw new CaptureError(
          result.error?.message ??
            (result.stderr.trim() ||
              formatProcessError(result.status, result.signal)),
          { command: template.command }
        );
      }

      let image: Buffer;
      try {
        image = await fs.readFile(pngPath);
      } catch (error) {
        throw new CaptureError(
          `screenshot file was not written: ${error instanceof Error ? error.message : String(error)}`,
          { command: template.command }
        );
      }
      if (image.length === 0) {
        throw new CaptureError("screenshot file is empty", {
          command: template.command,
        });
      }
      return image;
    } finally {
      await fs.rm(pngPath, { force: true });
    }
  }

  private async findCommand(): Promise<CommandTemplate | null> {
    for (const candidate of this.commands) {
      if (await isCommandAvailable(candidate.command)) {
        return candidate;
      }
    }
    return null;
  }
}
