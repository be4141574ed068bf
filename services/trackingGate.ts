/**
 * Tracking-state gate for region classifiers
 *
 * Off by default. When a config turns it on, a region whose joints are not
 * all tracked (or inferred) is reported as INVALID instead of being measured.
 */

import { JointTrackingState, JointType } from '../types/skeleton';
import type { JointSnapshot } from '../types/skeleton';
import type { BodyRegion } from '../types/posture';

export const REGION_REQUIRED_JOINTS: Record<BodyRegion, readonly JointType[]> = {
  arms: [
    JointType.SHOULDER_LEFT,
    JointType.ELBOW_LEFT,
    JointType.WRIST_LEFT,
    JointType.SHOULDER_RIGHT,
    JointType.ELBOW_RIGHT,
    JointType.WRIST_RIGHT,
  ],
  // The right leg takes no part in the angle but is still expected in view
  leg: [
    JointType.KNEE_LEFT,
    JointType.ANKLE_LEFT,
    JointType.KNEE_RIGHT,
    JointType.ANKLE_RIGHT,
  ],
};

export function getUntrackedJoints(
  snapshot: JointSnapshot,
  joints: readonly JointType[]
): JointType[] {
  return joints.filter(
    (joint) => snapshot[joint].trackingState === JointTrackingState.NOT_TRACKED
  );
}

export function isRegionTracked(snapshot: JointSnapshot, region: BodyRegion): boolean {
  return getUntrackedJoints(snapshot, REGION_REQUIRED_JOINTS[region]).length === 0;
}
