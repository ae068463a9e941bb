/**
 * Persistent UDP sender.
 *
 * One socket for the life of the sink rather than one per message,
 * since note traffic arrives at button-press rate.
 */

import dgram from "node:dgram";

export interface UdpSendOptions {
  host: string;
  port: number;
}

export class UdpSender {
  private socket: dgram.Socket | undefined;

  constructor(private readonly options: UdpSendOptions) {}

  get ready(): boolean {
    return this.socket !== undefined;
  }

  get target(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  /**
   * Create the socket. `onError` receives asynchronous socket errors,
   * after which the sender is closed and no longer ready.
   */
  open(onError: (err: Error) => void): void {
    if (this.socket) return;
    const socket = dgram.createSocket("udp4");
    socket.on("error", (err) => {
      this.close();
      onError(err);
    });
    this.socket = socket;
  }

  /** Send one datagram. Rejects when closed or on send error. */
  send(buf: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error(`UDP sender for ${this.target} is closed`));
    }
    return new Promise((resolve, reject) => {
      socket.send(buf, 0, buf.length, this.options.port, this.options.host, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    const socket = this.socket;
    this.socket = undefined;
    socket?.close();
  }
}
