import type { ErrorInfo, ReactNode } from "react";
import React, { Component } from "react";

/** Static fallback, or one built from the caught error and a retry callback */
export type PlayerErrorFallback = ReactNode | ((error: Error, retry: () => void) => ReactNode);

export interface PlayerErrorBoundaryProps {
  children: ReactNode;
  fallback?: PlayerErrorFallback;
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
  onRetry?: () => void;
  /** A new key clears a caught error and mounts the children again */
  resetKey?: string;
}

interface State {
  hasError: boolean;
  error: Error | null;
}

/**
 * Error boundary around an embedded player subtree. A failing player
 * renders the fallback instead of unmounting the host page. Both player
 * components mount inside one, keyed by their config.
 */
class PlayerErrorBoundary extends Component<PlayerErrorBoundaryProps, State> {
  constructor(props: PlayerErrorBoundaryProps) {
    super(props);
    this.state = { hasError: false, error: null };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    console.error("[PlayerErrorBoundary] Caught error:", error, errorInfo);
    this.props.onError?.(error, errorInfo);
  }

  componentDidUpdate(prevProps: PlayerErrorBoundaryProps): void {
    if (this.state.hasError && prevProps.resetKey !== this.props.resetKey) {
      this.setState({ hasError: false, error: null });
    }
  }

  handleRetry = (): void => {
    this.setState({ hasError: false, error: null });
    this.props.onRetry?.();
  };

  render(): ReactNode {
    const { error } = this.state;
    if (this.state.hasError) {
      const { fallback } = this.props;
      if (typeof fallback === "function") {
        return fallback(error ?? new Error("Unknown player error"), this.handleRetry);
      }
      if (fallback) {
        return fallback;
      }

      return (
        <div className="twitch-player-error" role="alert">
          <div className="twitch-player-error__title">Player unavailable</div>
          <p className="twitch-player-error__message">
            {error?.message || "The embedded player failed to load."}
          </p>
          <button type="button" onClick={this.handleRetry}>
            Try Again
          </button>
        </div>
      );
    }

    return this.props.children;
  }
}

export default PlayerErrorBoundary;
