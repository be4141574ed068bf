/**
 * Helpers for building per-joint records
 */

import { JointType } from '../types/skeleton';
import type { Joint, JointSnapshot } from '../types/skeleton';

/**
 * Build a record with one entry for every joint type
 */
export function mapJointTypes<T>(fn: (type: JointType) => T): Record<JointType, T> {
  return {
    [JointType.HIP_CENTER]: fn(JointType.HIP_CENTER),
    [JointType.SPINE]: fn(JointType.SPINE),
    [JointType.SHOULDER_CENTER]: fn(JointType.SHOULDER_CENTER),
    [JointType.HEAD]: fn(JointType.HEAD),
    [JointType.SHOULDER_LEFT]: fn(JointType.SHOULDER_LEFT),
    [JointType.ELBOW_LEFT]: fn(JointType.ELBOW_LEFT),
    [JointType.WRIST_LEFT]: fn(JointType.WRIST_LEFT),
    [JointType.HAND_LEFT]: fn(JointType.HAND_LEFT),
    [JointType.SHOULDER_RIGHT]: fn(JointType.SHOULDER_RIGHT),
    [JointType.ELBOW_RIGHT]: fn(JointType.ELBOW_RIGHT),
    [JointType.WRIST_RIGHT]: fn(JointType.WRIST_RIGHT),
    [JointType.HAND_RIGHT]: fn(JointType.HAND_RIGHT),
    [JointType.HIP_LEFT]: fn(JointType.HIP_LEFT),
    [JointType.KNEE_LEFT]: fn(JointType.KNEE_LEFT),
    [JointType.ANKLE_LEFT]: fn(JointType.ANKLE_LEFT),
    [JointType.FOOT_LEFT]: fn(JointType.FOOT_LEFT),
    [JointType.HIP_RIGHT]: fn(JointType.HIP_RIGHT),
    [JointType.KNEE_RIGHT]: fn(JointType.KNEE_RIGHT),
    [JointType.ANKLE_RIGHT]: fn(JointType.ANKLE_RIGHT),
    [JointType.FOOT_RIGHT]: fn(JointType.FOOT_RIGHT),
  };
}

export function createJointSnapshot(
  fn: (type: JointType) => Omit<Joint, 'type'>
): JointSnapshot {
  return mapJointTypes((type) => ({ type, ...fn(type) }));
}

/**
 * Copy of a snapshot with some joints replaced
 */
export function withJoints(
  snapshot: JointSnapshot,
  overrides: Partial<Record<JointType, Partial<Omit<Joint, 'type'>>>>
): JointSnapshot {
  return createJointSnapshot((type) => ({
    position: overrides[type]?.position ?? snapshot[type].position,
    trackingState: overrides[type]?.trackingState ?? snapshot[type].trackingState,
  }));
}
