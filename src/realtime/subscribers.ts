import type { SnapshotTransport } from '../presence/types.js';

export interface Subscriber {
  id: string;
  send: (payload: string) => void;
  close: () => void;
}

/**
 * Fire-and-forget fan-out. A subscriber whose send throws is closed and
 * dropped; the rest still get the message.
 */
export class SubscriberSet implements SnapshotTransport {
  private readonly subscribers = new Map<string, Subscriber>();

  add(subscriber: Subscriber): void {
    this.subscribers.set(subscriber.id, subscriber);
    console.log(`[Socket.IO] CLIENT +1 (now ${this.subscribers.size}) ${subscriber.id}`);
  }

  remove(id: string): void {
    if (this.subscribers.delete(id)) {
      console.log(`[Socket.IO] CLIENT -1 (now ${this.subscribers.size})`);
    }
  }

  subscriberCount(): number {
    return this.subscribers.size;
  }

  publish(payload: string): void {
    const dead: Subscriber[] = [];
    for (const subscriber of this.subscribers.values()) {
      try {
        subscriber.send(payload);
      } catch (err) {
        console.warn(`[Socket.IO] Send to ${subscriber.id} failed:`, err instanceof Error ? err.message : err);
        dead.push(subscriber);
      }
    }
    for (const subscriber of dead) {
      this.remove(subscriber.id);
      try {
        subscriber.close();
      } catch (err) {
        console.warn(`[Socket.IO] Close of ${subscriber.id} failed:`, err instanceof Error ? err.message : err);
      }
    }
  }
}
