/**
 * Type definitions for posture classification results and configuration
 */
import {
  DEFAULT_TARGET_LEG_ANGLE_DEGREES,
  DEFAULT_TOLERANCE_FACTOR,
} from '../config/thresholds';

// Numbered the way the overlay has always keyed its colors
export enum RegionCode {
  INVALID = -1,
  INCORRECT = 0,
  CORRECT = 1,
  BELOW = 2,
  ABOVE = 3,
}

export type BodyRegion = 'arms' | 'leg';

export interface FrameClassification {
  armsCode: RegionCode;
  legCode: RegionCode;
}

export interface SkeletonClassification {
  trackingId: number;
  classification: FrameClassification;
}

export interface ClassificationConfig {
  targetLegAngleDegrees: number;
  toleranceFactor: number;
  // Short-circuit a region to INVALID when one of its joints is not tracked
  requireTrackedJoints: boolean;
}

export const DEFAULT_CLASSIFICATION_CONFIG: ClassificationConfig = {
  targetLegAngleDegrees: DEFAULT_TARGET_LEG_ANGLE_DEGREES,
  toleranceFactor: DEFAULT_TOLERANCE_FACTOR,
  requireTrackedJoints: false,
};

// Frames that cannot be classified; region codes are never errors
export interface PostureError {
  type: 'invalid_payload';
  message: string;
  context?: Record<string, unknown>;
}
