/**
 * Desktop notification commands per platform. Each returns argv for the
 * executor; nothing here touches a shell.
 */

export type PopupType = "info" | "warning" | "error" | "success";

export interface PopupOptions {
  title: string;
  message: string;
  type: PopupType;
  /** Seconds the notification stays up; 0 leaves it to the desktop. */
  timeout: number;
}

const LINUX_URGENCY: Record<PopupType, string> = {
  info: "normal",
  success: "low",
  warning: "normal",
  error: "critical",
};

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** argv for the platform's notifier, or undefined when the platform has none. */
export function notificationCommand(platform: NodeJS.Platform, options: PopupOptions): string[] | undefined {
  switch (platform) {
    case "linux":
    case "freebsd":
    case "openbsd": {
      const argv = ["notify-send", "--urgency", LINUX_URGENCY[options.type]];
      if (options.timeout > 0) argv.push("--expire-time", String(options.timeout * 1000));
      argv.push(options.title, options.message);
      return argv;
    }
    case "darwin":
      return [
        "osascript",
        "-e",
        `display notification ${appleScriptString(options.message)} with title ${appleScriptString(options.title)}`,
      ];
    case "win32": {
      const argv = ["msg", "*"];
      if (options.timeout > 0) argv.push(`/TIME:${options.timeout}`);
      argv.push(`${options.title}: ${options.message}`);
      return argv;
    }
    default:
      return undefined;
  }
}
