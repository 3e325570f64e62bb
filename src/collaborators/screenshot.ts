import type { HostServer, RunScope, ScreenshotCollaborator, ScreenshotSession } from "./types.js";

/**
 * Capture needs a headless browser, which this package does not install.
 * STATIC_CAPTURE passes with a CAPTURE_DISABLED warning.
 */
export class NoScreenshots implements ScreenshotCollaborator {
  async open(scope: RunScope, server: HostServer): Promise<ScreenshotSession | null> {
    scope.logger.debug("screenshot capture unavailable", { server: server.baseUrl });
    return null;
  }
}
