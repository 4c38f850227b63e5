/**
 * Session Event Hooks
 *
 * Extension points around build actions, e.g. for audit trails or metrics.
 * Events carry counts and ids only, never invoice or claimant data.
 *
 * @packageDocumentation
 */

import { createLogger, type Logger } from '@cfdi-bundle/shared';

export type BuildAction = 'spreadsheet' | 'package';

/**
 * Event emitted when a build action starts.
 */
export interface BuildStartEvent {
  sessionId: string;
  buildId: string;
  action: BuildAction;
  timestamp: string;
  /** Session revision the build reads */
  revision: number;
  recordCount: number;
  uploadCount: number;
}

/**
 * Event emitted when a build action completes or fails.
 */
export interface BuildCompleteEvent {
  sessionId: string;
  buildId: string;
  action: BuildAction;
  timestamp: string;
  durationMs: number;
  status: 'success' | 'failed';
  diagnosticCount: number;
  unresolvedCount: number;
  /** SubmissionError code when status is 'failed' */
  errorCode?: string;
}

/**
 * Abstract event hooks interface.
 *
 * All methods are optional and async-safe; the session awaits them.
 *
 * @example
 * ```typescript
 * class AuditHooks implements SessionEventHooks {
 *   onBuildComplete(event: BuildCompleteEvent) {
 *     this.audit.record(event.buildId, event.status);
 *   }
 * }
 * ```
 */
export interface SessionEventHooks {
  onBuildStart?(event: BuildStartEvent): void | Promise<void>;

  onBuildComplete?(event: BuildCompleteEvent): void | Promise<void>;

  /**
   * Flush any buffered events (for async implementations).
   */
  flush?(): Promise<void>;
}

/**
 * Composite event hooks that dispatches to multiple listeners.
 */
export class CompositeEventHooks implements SessionEventHooks {
  private readonly hooks: SessionEventHooks[];

  constructor(hooks: SessionEventHooks[]) {
    this.hooks = hooks;
  }

  async onBuildStart(event: BuildStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onBuildStart?.(event)));
  }

  async onBuildComplete(event: BuildCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onBuildComplete?.(event)));
  }

  async flush(): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.flush?.()));
  }
}

/**
 * No-op event hooks (default when no hooks configured).
 */
export class NoopEventHooks implements SessionEventHooks {
  // All methods are no-ops by default (interface methods are optional)
}

/**
 * Logging event hooks for debugging.
 */
export class ConsoleEventHooks implements SessionEventHooks {
  private readonly logger: Logger;

  constructor(options?: { logger?: Logger; prefix?: string }) {
    this.logger = options?.logger ?? createLogger({ prefix: options?.prefix ?? 'session-events', level: 'debug' });
  }

  onBuildStart(event: BuildStartEvent): void {
    this.logger.debug('Build started', {
      buildId: event.buildId,
      action: event.action,
      recordCount: event.recordCount,
    });
  }

  onBuildComplete(event: BuildCompleteEvent): void {
    this.logger.debug('Build completed', {
      buildId: event.buildId,
      action: event.action,
      status: event.status,
      durationMs: event.durationMs,
    });
  }
}
