/**
 * EventEmitter.ts
 *
 * A lightweight, typed event emitter for framework-agnostic components.
 * Used by CommandBridge and the vanilla players.
 */

type Listener<T> = (data: T) => void;

type ListenerSets<Events> = { [K in keyof Events]?: Set<Listener<Events[K]>> };

/**
 * Typed event emitter that provides type-safe event handling.
 *
 * @example
 * ```typescript
 * interface MyEvents {
 *   render: { html: string };
 *   ready: void;
 * }
 *
 * class MyClass extends TypedEventEmitter<MyEvents> {
 *   doSomething() {
 *     this.emit('render', { html: '<p>hi</p>' });
 *   }
 * }
 *
 * const instance = new MyClass();
 * const unsub = instance.on('render', ({ html }) => console.log(html.length));
 * unsub(); // unsubscribe
 * ```
 */
export class TypedEventEmitter<Events extends object> {
  private listeners: ListenerSets<Events> = {};

  /**
   * Subscribe to an event.
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    let set: Set<Listener<Events[K]>> | undefined = this.listeners[event];
    if (!set) {
      set = new Set<Listener<Events[K]>>();
      this.listeners[event] = set;
    }
    set.add(listener);

    return () => this.off(event, listener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    this.listeners[event]?.delete(listener);
  }

  /**
   * Emit an event to all subscribers. A throwing listener is logged and
   * does not stop the others.
   */
  protected emit<K extends keyof Events>(event: K, data: Events[K]): void {
    this.listeners[event]?.forEach((listener) => {
      try {
        listener(data);
      } catch (e) {
        console.error(`[EventEmitter] Error in ${String(event)} listener:`, e);
      }
    });
  }

  removeAllListeners(): void {
    this.listeners = {};
  }
}

export default TypedEventEmitter;
