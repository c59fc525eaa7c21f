/**
 * Host counters, printed on shutdown
 */

type Counter =
  | "connectionsActive"
  | "connectionsTotal"
  | "pairingsSucceeded"
  | "pairingsFailed"
  | "bytesSent"
  | "bytesReceived"
  | "framesIn"
  | "framesOut"
  | "thumbnailsServed"
  | "filesServed"
  | "cacheHits"
  | "cacheMisses";

export type MetricsSnapshot = {
  uptime: string;
  connections: number;
  totalConnections: number;
  pairingsSucceeded: number;
  pairingsFailed: number;
  totalBytesSent: string;
  totalBytesReceived: string;
  framesIn: number;
  framesOut: number;
  thumbnailsServed: number;
  filesServed: number;
  cacheHitRate: string;
};

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
}

export class Metrics {
  private counters: Record<Counter, number> = {
    connectionsActive: 0,
    connectionsTotal: 0,
    pairingsSucceeded: 0,
    pairingsFailed: 0,
    bytesSent: 0,
    bytesReceived: 0,
    framesIn: 0,
    framesOut: 0,
    thumbnailsServed: 0,
    filesServed: 0,
    cacheHits: 0,
    cacheMisses: 0,
  };
  private readonly startTime: number = Date.now();

  private add(counter: Counter, amount: number = 1): void {
    this.counters[counter] += amount;
  }

  connectionOpened(): void {
    this.add("connectionsActive");
    this.add("connectionsTotal");
  }

  connectionClosed(): void {
    if (this.counters.connectionsActive > 0) {
      this.add("connectionsActive", -1);
    }
  }

  pairingSucceeded(): void {
    this.add("pairingsSucceeded");
  }

  pairingFailed(): void {
    this.add("pairingsFailed");
  }

  bytesSent(bytes: number): void {
    this.add("bytesSent", bytes);
  }

  bytesReceived(bytes: number): void {
    this.add("bytesReceived", bytes);
  }

  frameReceived(): void {
    this.add("framesIn");
  }

  frameSent(): void {
    this.add("framesOut");
  }

  thumbnailServed(): void {
    this.add("thumbnailsServed");
  }

  fileServed(): void {
    this.add("filesServed");
  }

  cacheHit(): void {
    this.add("cacheHits");
  }

  cacheMiss(): void {
    this.add("cacheMisses");
  }

  getSnapshot(): MetricsSnapshot {
    const c = this.counters;
    const lookups = c.cacheHits + c.cacheMisses;

    return {
      uptime: `${Math.floor((Date.now() - this.startTime) / 1000)}s`,
      connections: c.connectionsActive,
      totalConnections: c.connectionsTotal,
      pairingsSucceeded: c.pairingsSucceeded,
      pairingsFailed: c.pairingsFailed,
      totalBytesSent: formatBytes(c.bytesSent),
      totalBytesReceived: formatBytes(c.bytesReceived),
      framesIn: c.framesIn,
      framesOut: c.framesOut,
      thumbnailsServed: c.thumbnailsServed,
      filesServed: c.filesServed,
      cacheHitRate: lookups > 0 ? `${((c.cacheHits / lookups) * 100).toFixed(1)}%` : "n/a",
    };
  }

  /**
   * Print a summary table to stdout
   */
  print(): void {
    const s = this.getSnapshot();
    const rows: Array<[string, string | number]> = [
      ["Uptime", s.uptime],
      ["Active Connections", s.connections],
      ["Total Connections", s.totalConnections],
      ["Pairings OK/Failed", `${s.pairingsSucceeded}/${s.pairingsFailed}`],
      ["Bytes Sent", s.totalBytesSent],
      ["Bytes Received", s.totalBytesReceived],
      ["Frames In/Out", `${s.framesIn}/${s.framesOut}`],
      ["Thumbnails Served", s.thumbnailsServed],
      ["Files Served", s.filesServed],
      ["Cache Hit Rate", s.cacheHitRate],
    ];

    console.log("\nHost Metrics:");
    for (const [label, value] of rows) {
      console.log(`  ${`${label}:`.padEnd(21)}${value}`);
    }
    console.log();
  }
}

export const metrics = new Metrics();
