/**
 * Disposable interface for consistent cleanup across players and surfaces.
 */

export interface Disposable {
  /**
   * Clean up all resources held by this object.
   * Safe to call multiple times - subsequent calls are no-ops.
   */
  dispose(): void;

  readonly disposed: boolean;
}

/**
 * Base class for disposable objects that provides:
 * - disposed flag tracking
 * - Double-dispose protection
 * - Template method for subclass cleanup
 */
export abstract class BaseDisposable implements Disposable {
  private _disposed = false;

  get disposed(): boolean {
    return this._disposed;
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this.onDispose();
  }

  /**
   * Called exactly once when dispose() is first called.
   */
  protected abstract onDispose(): void;

  /**
   * Throw if this object has been disposed.
   * Use at the start of methods that shouldn't run after disposal.
   */
  protected throwIfDisposed(operation: string = "operation"): void {
    if (this._disposed) {
      throw new Error(`Cannot perform ${operation} on disposed object`);
    }
  }
}

export default BaseDisposable;
