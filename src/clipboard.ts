import { spawn } from "node:child_process";

export type ClipboardReader = () => Promise<string>;

type ClipboardCommand = { command: string; args: string[] };

export function clipboardCommand(
  platform: NodeJS.Platform = process.platform,
  env: Record<string, string | undefined> = process.env,
): ClipboardCommand | null {
  switch (platform) {
    case "darwin":
      return { command: "pbpaste", args: [] };
    case "win32":
      return { command: "powershell", args: ["-NoProfile", "-Command", "Get-Clipboard"] };
    case "linux":
    case "freebsd":
    case "openbsd":
      return env.WAYLAND_DISPLAY
        ? { command: "wl-paste", args: ["--no-newline"] }
        : { command: "xclip", args: ["-selection", "clipboard", "-o"] };
    default:
      return null;
  }
}

/**
 * Reads text from the system clipboard through the platform's paste command.
 */
export function readClipboardText(timeoutMs = 2000): Promise<string> {
  const target = clipboardCommand();
  if (!target) {
    return Promise.reject(new Error(`Clipboard is not supported on ${process.platform}`));
  }

  return new Promise((resolve, reject) => {
    const proc = spawn(target.command, target.args, { stdio: ["ignore", "pipe", "ignore"] });
    const chunks: Buffer[] = [];

    const timer = setTimeout(() => {
      proc.kill();
      reject(new Error(`${target.command} timed out`));
    }, timeoutMs);

    proc.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    proc.on("error", (error) => {
      clearTimeout(timer);
      reject(error);
    });
    proc.on("close", (exitCode) => {
      clearTimeout(timer);
      if (exitCode === 0) {
        resolve(Buffer.concat(chunks).toString("utf8"));
      } else {
        reject(new Error(`${target.command} exited with code ${exitCode ?? "null"}`));
      }
    });
  });
}
