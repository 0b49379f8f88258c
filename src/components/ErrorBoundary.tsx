import React, { Component } from 'react';
import type { ErrorInfo, ReactNode } from 'react';

interface Props {
  children?: ReactNode;
}

interface State {
  hasError: boolean;
  error: Error | null;
}

class ErrorBoundary extends Component<Props, State> {
  public state: State = {
    hasError: false,
    error: null,
  };

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    console.error('Uncaught error:', error, errorInfo);
  }

  render() {
    if (this.state.hasError) {
      return (
        <div className="mobile-container">
          <div className="card text-center">
            <div className="card-body">
              <h1 className="text-xl font-bold text-gray-900 mb-2">Something went wrong</h1>
              <p className="text-gray-600 mb-6">
                The calculator hit an unexpected error. Reloading the page keeps your recipe, since it lives in the link.
              </p>
              {this.state.error && (
                <details className="text-xs text-left mb-4">
                  <summary>Error details</summary>
                  {this.state.error.toString()}
                </details>
              )}
              <button onClick={() => window.location.reload()} className="btn btn-primary">
                Reload
              </button>
            </div>
          </div>
        </div>
      );
    }

    return this.props.children || null;
  }
}

export default ErrorBoundary;
