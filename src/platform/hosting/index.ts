import type { Logger } from "pino";
import type { HostingBackend } from "../../core/hosting/HostingBackendPort";
import type { UploaderConfig } from "../../config";
import { createImageKitBackend } from "./imagekit";

export function createHostingBackend(
  config: Pick<UploaderConfig, "hostingBackend" | "imageKit">,
  logger: Logger
): HostingBackend {
  switch (config.hostingBackend) {
    case "imagekit":
      return createImageKitBackend(config.imageKit, logger.child({ module: "imagekit" }));
  }
}
