import React from 'react';
import { Logger } from '@/lib/logger';

interface AppErrorBoundaryState {
  hasError: boolean;
  message: string;
}

export class AppErrorBoundary extends React.Component<React.PropsWithChildren, AppErrorBoundaryState> {
  constructor(props: React.PropsWithChildren) {
    super(props);
    this.state = { hasError: false, message: '' };
  }

  static getDerivedStateFromError(error: Error): AppErrorBoundaryState {
    return { hasError: true, message: error?.message ?? 'Unknown runtime error' };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    Logger.log('RENDER_CRASHED', { error: error.message, componentStack: info.componentStack ?? '' }, 'error');
  }

  render() {
    if (!this.state.hasError) return this.props.children;

    return (
      <div className="drawer-fallback">
        <div className="drawer-panel drawer-panel-error">
          <h1 className="drawer-title">Something went wrong</h1>
          <p className="drawer-note">The drawing board stopped rendering. Stored samples that were not exported are lost on reload.</p>
          <pre className="drawer-error-detail">{this.state.message}</pre>
          <button type="button" className="drawer-chip" onClick={() => this.setState({ hasError: false, message: '' })}>
            Try again
          </button>
        </div>
      </div>
    );
  }
}
