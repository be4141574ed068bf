/**
 * Posture Monitor
 *
 * Consumes decoded sensor frames one at a time, classifies every tracked
 * skeleton with the current settings and publishes the result together with
 * an overlay plan for the renderer. Unreadable frames go through the error
 * handler; a run of them pauses the monitor until frames have been quiet for
 * the recovery interval.
 */

import { RegionCode } from '../types/posture';
import type { SkeletonClassification } from '../types/posture';
import { SkeletonTrackingState } from '../types/skeleton';
import type { SkeletonFrame } from '../types/skeleton';
import { safeParseSkeletonFrame } from './snapshotParser';
import { classifyFrame } from './frameClassifier';
import { planOverlay } from './overlayPlanner';
import type { OverlayPlan } from './overlayPlanner';
import { ErrorHandler } from './ErrorHandler';
import { createSettingsStore, selectClassificationConfig } from '../store/settingsStore';
import type { SettingsStoreApi } from '../store/settingsStore';

export interface PostureUpdate {
  timestamp: number;
  results: SkeletonClassification[];
  overlays: OverlayPlan[];
}

export type PostureListener = (update: PostureUpdate) => void;

export type RegionCodeCounts = Record<RegionCode, number>;

export interface SessionSummary {
  framesProcessed: number;
  framesRejected: number;
  framesDropped: number;
  arms: RegionCodeCounts;
  leg: RegionCodeCounts;
}

export interface PostureMonitorConfig {
  settingsStore?: SettingsStoreApi;
  errorHandler?: ErrorHandler;
  enabled?: boolean;
}

function emptyCounts(): RegionCodeCounts {
  return {
    [RegionCode.INVALID]: 0,
    [RegionCode.INCORRECT]: 0,
    [RegionCode.CORRECT]: 0,
    [RegionCode.BELOW]: 0,
    [RegionCode.ABOVE]: 0,
  };
}

export class PostureMonitor {
  private settingsStore: SettingsStoreApi;
  private errorHandler: ErrorHandler;
  private enabled: boolean;
  private listeners = new Set<PostureListener>();
  private framesProcessed: number = 0;
  private framesRejected: number = 0;
  private framesDropped: number = 0;
  private armsCounts: RegionCodeCounts = emptyCounts();
  private legCounts: RegionCodeCounts = emptyCounts();

  constructor(config?: PostureMonitorConfig) {
    this.settingsStore = config?.settingsStore ?? createSettingsStore();
    this.errorHandler = config?.errorHandler ?? new ErrorHandler();
    this.enabled = config?.enabled !== undefined ? config.enabled : true;
  }

  /**
   * Main entry point - called once per sensor frame
   * Returns the published update, or null when the frame was not used
   */
  public processFrame(input: unknown): PostureUpdate | null {
    if (!this.enabled) {
      return null;
    }

    if (!this.errorHandler.isAvailable() && !this.errorHandler.attemptRecovery()) {
      this.framesDropped++;
      return null;
    }

    const parsed = safeParseSkeletonFrame(input);
    if (!parsed.success) {
      this.framesRejected++;
      this.errorHandler.handleError(parsed.error, { operation: 'parseSkeletonFrame' });
      return null;
    }

    this.errorHandler.onSuccess();
    const update = this.classify(parsed.frame);
    this.publish(update);
    return update;
  }

  public subscribe(listener: PostureListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public getSummary(): SessionSummary {
    return {
      framesProcessed: this.framesProcessed,
      framesRejected: this.framesRejected,
      framesDropped: this.framesDropped,
      arms: { ...this.armsCounts },
      leg: { ...this.legCounts },
    };
  }

  /**
   * Clear session counters and error state; subscribers stay attached
   */
  public reset(): void {
    this.framesProcessed = 0;
    this.framesRejected = 0;
    this.framesDropped = 0;
    this.armsCounts = emptyCounts();
    this.legCounts = emptyCounts();
    this.errorHandler.reset();
  }

  // Overlays pair with classifications by frame position; tracking ids may repeat
  private classify(frame: SkeletonFrame): PostureUpdate {
    const config = selectClassificationConfig(this.settingsStore.getState());
    const results: SkeletonClassification[] = [];

    const overlays = frame.skeletons.map((skeleton) => {
      if (skeleton.trackingState !== SkeletonTrackingState.TRACKED) {
        return planOverlay(skeleton, null);
      }
      const classification = classifyFrame(skeleton.joints, config);
      results.push({ trackingId: skeleton.trackingId, classification });
      return planOverlay(skeleton, classification);
    });

    this.framesProcessed++;
    results.forEach(({ classification }) => {
      this.armsCounts[classification.armsCode]++;
      this.legCounts[classification.legCode]++;
    });

    return { timestamp: frame.timestamp, results, overlays };
  }

  private publish(update: PostureUpdate): void {
    this.listeners.forEach((listener) => {
      try {
        listener(update);
      } catch (error) {
        console.error('[PostureMonitor] Listener failed:', error);
      }
    });
  }
}
