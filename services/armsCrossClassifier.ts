/**
 * Arms Cross Classifier
 * Decides whether both arms are held out level with the shoulders
 */

import { JointType } from '../types/skeleton';
import type { JointSnapshot } from '../types/skeleton';
import { RegionCode, DEFAULT_CLASSIFICATION_CONFIG } from '../types/posture';
import type { ClassificationConfig } from '../types/posture';
import { isRegionTracked } from './trackingGate';

interface ArmHeights {
  shoulder: number;
  joint: number;
}

// Each arm joint is compared against the shoulder on its own side
export const ARM_JOINT_PAIRS: ReadonlyArray<readonly [JointType, JointType]> = [
  [JointType.SHOULDER_LEFT, JointType.ELBOW_LEFT],
  [JointType.SHOULDER_LEFT, JointType.WRIST_LEFT],
  [JointType.SHOULDER_RIGHT, JointType.ELBOW_RIGHT],
  [JointType.SHOULDER_RIGHT, JointType.WRIST_RIGHT],
];

function readArmHeights(snapshot: JointSnapshot): ArmHeights[] {
  return ARM_JOINT_PAIRS.map(([shoulder, joint]) => ({
    shoulder: snapshot[shoulder].position.y,
    joint: snapshot[joint].position.y,
  }));
}

/**
 * Classify the arms of one skeleton
 *
 * CORRECT when every elbow and wrist sits at or beyond the tolerance band
 * around its shoulder height; otherwise ABOVE or BELOW when all four joints
 * share a side of the upper band edge, INCORRECT when they do not.
 * Band edges are inclusive.
 */
export function classifyArmsCross(
  snapshot: JointSnapshot,
  config: ClassificationConfig = DEFAULT_CLASSIFICATION_CONFIG
): RegionCode {
  if (config.requireTrackedJoints && !isRegionTracked(snapshot, 'arms')) {
    return RegionCode.INVALID;
  }

  const t = config.toleranceFactor;
  const heights = readArmHeights(snapshot);
  const upperEdge = (h: ArmHeights) => h.shoulder * (1 + t);
  const lowerEdge = (h: ArmHeights) => h.shoulder * (1 - t);

  if (heights.every((h) => h.joint >= upperEdge(h) || h.joint <= lowerEdge(h))) {
    return RegionCode.CORRECT;
  }

  if (heights.every((h) => h.joint >= upperEdge(h))) {
    return RegionCode.ABOVE;
  }

  if (heights.every((h) => h.joint <= upperEdge(h))) {
    return RegionCode.BELOW;
  }

  return RegionCode.INCORRECT;
}

export const ArmsCrossClassifier = {
  classify: classifyArmsCross,
};
