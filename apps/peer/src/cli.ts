import { writeFile } from "fs/promises";
import * as readline from "readline";
import { MediaLinkPeer } from "./peer.js";
import type { AssetListResponse } from "../../../packages/protocol/src/assetList.js";

export type PeerCLIOptions = {
  name: string;
  timeoutMs?: number;
};

/**
 * CLI for the MediaLink peer
 */
export class PeerCLI {
  private peer: MediaLinkPeer;
  private rl: readline.Interface;
  private readonly name: string;
  private readonly timeoutMs: number | undefined;

  constructor(options: PeerCLIOptions) {
    this.name = options.name;
    this.timeoutMs = options.timeoutMs;
    this.peer = new MediaLinkPeer();
    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: "medialink> ",
    });

    this.wirePeer();
    this.wireReadline();
  }

  /**
   * Wire peer events
   */
  private wirePeer(): void {
    this.peer.on("connected", () => {
      console.log("Connected to host, pairing...");
      this.peer.pair(this.name).catch((err: unknown) => {
        console.error("Pairing request failed:", describe(err));
      });
    });

    this.peer.on("pinChallenge", (code: string) => {
      console.log(`\nHost shows PIN ${code}. Enter it with: pin <code>`);
      this.rl.prompt();
    });

    this.peer.on("notification", (text: string) => {
      console.log(`\n[host] ${text}`);
      this.rl.prompt();
    });

    this.peer.on("disconnected", (reason?: string) => {
      console.log(`Disconnected from host${reason ? ` (${reason})` : ""}`);
      this.rl.close();
    });

    this.peer.on("error", (err: Error) => {
      console.error("Error:", err.message);
    });
  }

  /**
   * Wire readline
   */
  private wireReadline(): void {
    this.rl.on("line", (input: string) => {
      const trimmed = input.trim();
      if (!trimmed) {
        this.rl.prompt();
        return;
      }
      this.handleCommand(trimmed)
        .catch((err: unknown) => console.error("Command failed:", describe(err)))
        .finally(() => this.rl.prompt());
    });

    this.rl.on("close", () => {
      console.log("\nGoodbye!");
      this.peer
        .disconnect()
        .catch((err: unknown) => console.error("Disconnect failed:", describe(err)))
        .then(() => this.peer.stop())
        .then(
          () => process.exit(0),
          (err: unknown) => {
            console.error("Shutdown failed:", describe(err));
            process.exit(1);
          }
        );
    });
  }

  /**
   * Handle CLI command
   */
  private async handleCommand(input: string): Promise<void> {
    const [command, ...args] = input.split(/\s+/);

    switch (command) {
      case "pin": {
        const code = args[0];
        if (!code) {
          console.log("Usage: pin <code>");
          return;
        }
        const accepted = await this.peer.verifyPin(code, this.timeoutMs);
        console.log(accepted ? "Paired." : "PIN rejected.");
        return;
      }

      case "list":
        this.printAssets(await this.peer.listAssets(this.timeoutMs));
        return;

      case "thumb":
      case "get": {
        const [assetId, target] = args;
        if (!assetId) {
          console.log(`Usage: ${command} <asset-id> [file]`);
          return;
        }
        const data =
          command === "thumb"
            ? await this.peer.getThumbnail(assetId, this.timeoutMs)
            : await this.peer.getFile(assetId, this.timeoutMs);
        if (!data) {
          console.log(`No data for ${assetId}`);
          return;
        }
        if (target) {
          await writeFile(target, data);
          console.log(`Saved ${data.length}B to ${target}`);
        } else {
          console.log(`Received ${data.length}B for ${assetId}`);
        }
        return;
      }

      case "quit":
      case "exit":
        this.rl.close();
        return;

      case "help":
        this.showHelp();
        return;

      default:
        console.log(`Unknown command: ${command}. Type 'help' for available commands.`);
    }
  }

  private printAssets(list: AssetListResponse): void {
    console.log(
      `${list.totalCount} assets (${list.photosCount} photos, ${list.videosCount} videos)`
    );
    for (const asset of list.assets) {
      const duration = asset.durationSeconds === null ? "" : ` ${asset.durationSeconds}s`;
      console.log(
        `  ${asset.id}  ${asset.type.padEnd(10)} ${asset.creationDate}  ${asset.sizeBytes}B${duration}`
      );
    }
  }

  /**
   * Show help
   */
  private showHelp(): void {
    console.log(`
Available commands:
  pin <code>            - Answer the host's PIN challenge
  list                  - List the host's library
  thumb <id> [file]     - Fetch a thumbnail (optionally save it)
  get <id> [file]       - Fetch a full file (optionally save it)
  help                  - Show this help
  quit / exit           - Disconnect and exit
`);
  }

  /**
   * Dial a host and start the prompt
   */
  async connect(host: string, port: number): Promise<void> {
    console.log(`Connecting to ${host}:${port}...`);
    this.showHelp();
    await this.peer.connect(host, port);
    this.rl.prompt();
  }

  /**
   * Wait for the host to dial us
   */
  async listen(port: number): Promise<void> {
    const address = await this.peer.listen(port);
    console.log(`Waiting for a host on ${address.address}:${address.port}...`);
    this.showHelp();
    this.rl.prompt();
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
