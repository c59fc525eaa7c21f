import { describe, it, expect } from "vitest";
import { Metrics, formatBytes } from "../../../apps/host/src/observability/metrics.js";

describe("Metrics", () => {
  it("never lets active connections go negative", () => {
    const metrics = new Metrics();

    metrics.connectionOpened();
    metrics.connectionClosed();
    metrics.connectionClosed();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.connections).toBe(0);
    expect(snapshot.totalConnections).toBe(1);
  });

  it("reports byte totals and cache hit rate", () => {
    const metrics = new Metrics();

    metrics.bytesSent(2048);
    metrics.bytesReceived(59);
    metrics.cacheHit();
    metrics.cacheMiss();
    metrics.cacheMiss();
    metrics.cacheMiss();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.totalBytesSent).toBe("2.00KB");
    expect(snapshot.totalBytesReceived).toBe("59B");
    expect(snapshot.cacheHitRate).toBe("25.0%");
  });

  it("has no hit rate before the first lookup", () => {
    expect(new Metrics().getSnapshot().cacheHitRate).toBe("n/a");
  });
});

describe("formatBytes", () => {
  it("switches units at 1KB and 1MB", () => {
    expect(formatBytes(1023)).toBe("1023B");
    expect(formatBytes(1536)).toBe("1.50KB");
    expect(formatBytes(3 * 1024 * 1024)).toBe("3.00MB");
  });
});
