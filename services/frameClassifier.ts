/**
 * Frame Classification Service
 * Runs both region classifiers for a skeleton and collects their codes
 */

import { SkeletonTrackingState } from '../types/skeleton';
import type { JointSnapshot, SkeletonFrame } from '../types/skeleton';
import { DEFAULT_CLASSIFICATION_CONFIG } from '../types/posture';
import type {
  ClassificationConfig,
  FrameClassification,
  SkeletonClassification,
} from '../types/posture';
import { classifyArmsCross } from './armsCrossClassifier';
import { classifyLegLift } from './legLiftClassifier';

export function classifyFrame(
  snapshot: JointSnapshot,
  config: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): FrameClassification {
  return {
    armsCode: classifyArmsCross(snapshot, config),
    legCode: classifyLegLift(snapshot, config),
  };
}

/**
 * Classify every fully tracked skeleton in a frame, in frame order.
 * Position-only and untracked skeletons have no joints worth measuring.
 */
export function classifySkeletons(
  frame: SkeletonFrame,
  config: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): SkeletonClassification[] {
  return frame.skeletons
    .filter((skeleton) => skeleton.trackingState === SkeletonTrackingState.TRACKED)
    .map((skeleton) => ({
      trackingId: skeleton.trackingId,
      classification: classifyFrame(skeleton.joints, config),
    }));
}
