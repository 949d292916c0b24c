/** argv that powers the host off after `delaySeconds`. */
export function shutdownCommand(platform: NodeJS.Platform, delaySeconds: number): string[] {
  if (platform === "win32") {
    // /s shutdown, /f force-close applications, /t delay in seconds
    return ["shutdown", "/s", "/f", "/t", String(delaySeconds)];
  }
  // POSIX shutdown takes whole minutes
  const when = delaySeconds === 0 ? "now" : `+${Math.ceil(delaySeconds / 60)}`;
  return ["shutdown", "-h", when];
}
