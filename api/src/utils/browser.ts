import { FastifyBaseLogger } from "fastify";
import fs from "fs";
import path from "path";

const platformDefaults: Partial<Record<NodeJS.Platform, string[]>> = {
  win32: [
    `${process.env["ProgramFiles"]}\\Google\\Chrome\\Application\\chrome.exe`,
    "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
  ],
  darwin: ["/Applications/Google Chrome.app/Contents/MacOS/Google Chrome"],
  linux: ["/usr/bin/google-chrome", "/usr/bin/chromium-browser"],
};

/**
 * Resolves the Chrome binary the driver launches. A configured path wins when
 * it exists; otherwise the first installed browser for the platform, falling
 * back to `/usr/bin/chromium`.
 */
export function getChromeExecutablePath(logger: FastifyBaseLogger, configuredPath?: string): string {
  if (configuredPath) {
    const normalizedPath = path.normalize(configuredPath);
    if (fs.existsSync(normalizedPath)) {
      return normalizedPath;
    }
    logger.warn(`[Browser] Configured Chrome executable does not exist: ${normalizedPath}`);
  }

  const candidates = platformDefaults[process.platform] ?? [];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? "/usr/bin/chromium";
}
