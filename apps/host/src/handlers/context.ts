import type { Connection } from "../../../../packages/transport/src/connection/connection.js";
import type { AssetStore } from "../assets/assetStore.js";
import type { ThumbnailService } from "../catalog/thumbnailService.js";
import type { Logger } from "../observability/logger.js";
import type { Metrics } from "../observability/metrics.js";

/**
 * Everything a request handler needs to answer one request.
 *
 * signal is aborted when the session that issued the request is torn down;
 * handlers check it after every await and hand it to send(), which stops a
 * payload in flight when it fires.
 */
export type HandlerContext = {
  connection: Connection;
  signal: AbortSignal;
  assetStore: AssetStore;
  thumbnails: ThumbnailService;
  logger: Logger;
  metrics: Metrics;
};
