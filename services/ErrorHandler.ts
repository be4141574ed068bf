/**
 * Error Handler for the posture monitor
 *
 * Implements resilient frame handling with:
 * - Consecutive failure tracking
 * - Degraded and disabled monitoring states
 * - Recovery on the next good frame or after a quiet period
 */

import type { PostureError } from '../types/posture';

export interface ErrorContext {
  operation?: string;
  timestamp?: number;
  [key: string]: unknown;
}

export interface ErrorHandlerConfig {
  maxConsecutiveFailures?: number;
  recoveryIntervalMs?: number;
  now?: () => number;
}

export type MonitorStatus = 'enabled' | 'degraded' | 'disabled';

export interface ErrorHandlerState {
  consecutiveFailures: number;
  status: MonitorStatus;
  lastError: PostureError | null;
  lastErrorTime: number | null;
}

export class ErrorHandler {
  private consecutiveFailures: number = 0;
  private maxConsecutiveFailures: number;
  private status: MonitorStatus = 'enabled';
  private lastError: PostureError | null = null;
  private lastErrorTime: number | null = null;
  private recoveryIntervalMs: number;
  private now: () => number;

  // Event handlers
  public onStatusChange: ((status: MonitorStatus) => void) | null = null;
  public onNotification: ((message: string) => void) | null = null;

  constructor(config?: ErrorHandlerConfig) {
    this.maxConsecutiveFailures = config?.maxConsecutiveFailures ?? 5;
    this.recoveryIntervalMs = config?.recoveryIntervalMs ?? 30000;
    this.now = config?.now ?? Date.now;
  }

  /**
   * Record a failed frame
   * Degrades after half the allowed failures, disables at the limit
   */
  handleError(error: PostureError, context?: ErrorContext): void {
    this.consecutiveFailures++;
    this.lastError = error;
    this.lastErrorTime = this.now();

    console.error('[PostureMonitor]', error.type, error.message, context?.operation);

    if (this.consecutiveFailures >= this.maxConsecutiveFailures) {
      if (this.status !== 'disabled') {
        this.setStatus('disabled');
        this.notify('Posture feedback paused: too many unreadable frames');
      }
    } else if (this.consecutiveFailures >= Math.floor(this.maxConsecutiveFailures / 2)) {
      if (this.status === 'enabled') {
        this.setStatus('degraded');
        this.notify('Posture feedback is missing frames');
      }
    }
  }

  /**
   * Record a good frame
   * Resets the failure counter and re-enables feedback
   */
  onSuccess(): void {
    const wasDisabled = this.status === 'disabled';

    this.consecutiveFailures = 0;
    this.lastError = null;

    if (this.status !== 'enabled') {
      this.setStatus('enabled');
      if (wasDisabled) {
        this.notify('Posture feedback restored');
      }
    }
  }

  isAvailable(): boolean {
    return this.status !== 'disabled';
  }

  isDegraded(): boolean {
    return this.status === 'degraded';
  }

  getStatus(): MonitorStatus {
    return this.status;
  }

  /**
   * Get current state for debugging/testing
   */
  getState(): ErrorHandlerState {
    return {
      consecutiveFailures: this.consecutiveFailures,
      status: this.status,
      lastError: this.lastError,
      lastErrorTime: this.lastErrorTime,
    };
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.lastError = null;
    this.lastErrorTime = null;
    this.setStatus('enabled');
  }

  /**
   * Re-enable a disabled monitor once no error has been seen for the
   * recovery interval
   */
  attemptRecovery(): boolean {
    if (this.status !== 'disabled') {
      return true;
    }

    const timeSinceLastError = this.lastErrorTime !== null
      ? this.now() - this.lastErrorTime
      : Infinity;

    if (timeSinceLastError >= this.recoveryIntervalMs) {
      this.consecutiveFailures = 0;
      this.setStatus('enabled');
      return true;
    }

    return false;
  }

  private setStatus(status: MonitorStatus): void {
    if (this.status !== status) {
      this.status = status;
      this.onStatusChange?.(status);
    }
  }

  private notify(message: string): void {
    this.onNotification?.(message);
  }
}
