/**
 * CommandBridge - queue-or-run dispatch for commands that need a player
 * handle which only exists once the embedded player reports ready.
 *
 * States:
 * - `not-ready` (initial): commands are appended to a FIFO queue; no bound,
 *   no deduplication
 * - `ready` (terminal): the queue has been drained once, in order, and new
 *   commands run immediately
 *
 * A bridge never returns to `not-ready`. Reloading the embed means creating
 * a new bridge; whatever the old one still had queued is gone.
 */

import { TypedEventEmitter } from "./EventEmitter";

export type BridgeState = "not-ready" | "ready";

/** Queued instruction, a closure over the player handle */
export type PendingCommand<H> = (handle: H) => void;

export interface CommandBridgeEvents {
  queued: { pending: number };
  ready: { drained: number };
}

type BridgeStatus<H> = { state: "not-ready" } | { state: "ready"; handle: H };

export class CommandBridge<H> extends TypedEventEmitter<CommandBridgeEvents> {
  private status: BridgeStatus<H> = { state: "not-ready" };
  private queue: PendingCommand<H>[] = [];

  get state(): BridgeState {
    return this.status.state;
  }

  get isReady(): boolean {
    return this.status.state === "ready";
  }

  /** Number of commands waiting for the ready signal */
  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Run the command now if ready, otherwise queue it.
   * @returns true when the command ran immediately
   */
  dispatch(command: PendingCommand<H>): boolean {
    if (this.status.state === "ready") {
      this.run(command, this.status.handle);
      return true;
    }
    this.queue.push(command);
    this.emit("queued", { pending: this.queue.length });
    return false;
  }

  /**
   * Ready signal. Drains the queue in FIFO order and switches to `ready`.
   * Later signals are ignored.
   */
  signalReady(handle: H): void {
    if (this.status.state === "ready") return;

    this.status = { state: "ready", handle };
    const pending = this.queue;
    this.queue = [];
    for (const command of pending) {
      this.run(command, handle);
    }
    this.emit("ready", { drained: pending.length });
  }

  /**
   * Drop everything still queued.
   * @returns number of commands dropped
   */
  clear(): number {
    const dropped = this.queue.length;
    this.queue = [];
    return dropped;
  }

  private run(command: PendingCommand<H>, handle: H): void {
    try {
      command(handle);
    } catch (err) {
      console.error("[CommandBridge] Command failed:", err);
    }
  }
}

export default CommandBridge;
