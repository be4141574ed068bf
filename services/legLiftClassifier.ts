/**
 * Leg Lift Classifier
 * Compares the lifted left leg's knee-ankle angle with the configured target
 */

import { JointType } from '../types/skeleton';
import type { JointSnapshot } from '../types/skeleton';
import { RegionCode, DEFAULT_CLASSIFICATION_CONFIG } from '../types/posture';
import type { ClassificationConfig } from '../types/posture';
import {
  MIN_TARGET_LEG_ANGLE_DEGREES,
  MAX_TARGET_LEG_ANGLE_DEGREES,
} from '../config/thresholds';
import { euclideanDistance, radiansToDegrees } from '../utils/geometry';
import { isRegionTracked } from './trackingGate';

export function isValidTargetAngle(target: number): boolean {
  return target >= MIN_TARGET_LEG_ANGLE_DEGREES && target <= MAX_TARGET_LEG_ANGLE_DEGREES;
}

/**
 * Measure the left leg angle in degrees
 *
 * The two sides are taken from mixed axes: the adjacent side is the knee-ankle
 * height difference, the opposite side the knee-ankle depth difference.
 * Returns null when the opposite side is zero and the ratio has no value.
 */
export function measureLegAngle(snapshot: JointSnapshot): number | null {
  const knee = snapshot[JointType.KNEE_LEFT].position;
  const ankle = snapshot[JointType.ANKLE_LEFT].position;

  const adjacent = euclideanDistance(ankle.z, ankle.z, knee.y, ankle.y);
  const opposite = euclideanDistance(ankle.z, knee.z, knee.y, knee.y);

  if (opposite === 0) {
    return null;
  }

  const ratio = adjacent / opposite;
  if (!Number.isFinite(ratio)) {
    return null;
  }

  return radiansToDegrees(Math.atan(ratio));
}

/**
 * Band a measured angle against the target
 *
 * At or under the lower edge (and non-zero) is ABOVE, at or over the upper
 * edge is BELOW. The CORRECT test asks for both edges at once and cannot
 * hold for a positive target, so anything inside the band is INCORRECT.
 */
export function classifyLegAngle(
  currentAngle: number,
  targetAngle: number,
  toleranceFactor: number = DEFAULT_CLASSIFICATION_CONFIG.toleranceFactor
): RegionCode {
  const lowerEdge = targetAngle * (1 - toleranceFactor);
  const upperEdge = targetAngle * (1 + toleranceFactor);

  if (currentAngle <= lowerEdge && currentAngle !== 0) {
    return RegionCode.ABOVE;
  }
  if (currentAngle >= upperEdge) {
    return RegionCode.BELOW;
  }
  if (currentAngle >= upperEdge && currentAngle <= lowerEdge) {
    return RegionCode.CORRECT;
  }
  return RegionCode.INCORRECT;
}

export function classifyLegLift(
  snapshot: JointSnapshot,
  config: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): RegionCode {
  const target = config.targetLegAngleDegrees;
  if (!isValidTargetAngle(target)) {
    return RegionCode.INVALID;
  }

  if (config.requireTrackedJoints && !isRegionTracked(snapshot, 'leg')) {
    return RegionCode.INVALID;
  }

  const currentAngle = measureLegAngle(snapshot);
  if (currentAngle === null) {
    return RegionCode.INCORRECT;
  }

  return classifyLegAngle(currentAngle, target, config.toleranceFactor);
}

export const LegLiftClassifier = {
  classify: classifyLegLift,
};
