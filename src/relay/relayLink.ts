import type { MessagePort } from "node:worker_threads";
import type { RelayMessage } from "./messages.js";

/** The foreground end of a channel to the background relay. Fire and forget. */
export interface RelayLink {
  readonly closed: boolean;
  post(message: RelayMessage): void;
  close(): void;
}

export class MessagePortLink implements RelayLink {
  private isClosed = false;

  constructor(private readonly port: MessagePort) {
    port.once("close", () => {
      this.isClosed = true;
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  post(message: RelayMessage): void {
    if (this.isClosed) {
      console.warn(`Relay link closed, dropping ${message.type} for '${message.data.id}'`);
      return;
    }
    this.port.postMessage(message);
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.port.close();
  }
}
