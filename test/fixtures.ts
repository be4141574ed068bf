/**
 * Skeleton builders shared by the test suites
 */

import * as fc from 'fast-check';
import {
  ALL_JOINT_TYPES,
  JointTrackingState,
  JointType,
  SkeletonTrackingState,
} from '../types/skeleton';
import type { JointSnapshot, Skeleton, SkeletonFrame, Vector3 } from '../types/skeleton';
import type { ClassificationConfig } from '../types/posture';
import { createJointSnapshot, mapJointTypes, withJoints } from '../utils/snapshot';

export interface ArmHeightsInput {
  shoulderLeft: number;
  elbowLeft: number;
  wristLeft: number;
  shoulderRight: number;
  elbowRight: number;
  wristRight: number;
}

export interface LegInput {
  knee: { y: number; z: number };
  ankle: { y: number; z: number };
}

// Everyone tracked, standing two meters from the sensor
export function trackedSnapshot(): JointSnapshot {
  return createJointSnapshot(() => ({
    position: { x: 0, y: 0, z: 2 },
    trackingState: JointTrackingState.TRACKED,
  }));
}

export function armsSnapshot(
  heights: ArmHeightsInput,
  base: JointSnapshot = trackedSnapshot()
): JointSnapshot {
  const at = (y: number): { position: Vector3 } => ({ position: { x: 0, y, z: 2 } });
  return withJoints(base, {
    [JointType.SHOULDER_LEFT]: at(heights.shoulderLeft),
    [JointType.ELBOW_LEFT]: at(heights.elbowLeft),
    [JointType.WRIST_LEFT]: at(heights.wristLeft),
    [JointType.SHOULDER_RIGHT]: at(heights.shoulderRight),
    [JointType.ELBOW_RIGHT]: at(heights.elbowRight),
    [JointType.WRIST_RIGHT]: at(heights.wristRight),
  });
}

export function legSnapshot(leg: LegInput, base: JointSnapshot = trackedSnapshot()): JointSnapshot {
  return withJoints(base, {
    [JointType.KNEE_LEFT]: { position: { x: -0.1, y: leg.knee.y, z: leg.knee.z } },
    [JointType.ANKLE_LEFT]: { position: { x: -0.1, y: leg.ankle.y, z: leg.ankle.z } },
  });
}

export function armsLevelHeights(shoulder: number, reach: number): ArmHeightsInput {
  return {
    shoulderLeft: shoulder,
    elbowLeft: reach,
    wristLeft: reach,
    shoulderRight: shoulder,
    elbowRight: reach,
    wristRight: reach,
  };
}

export function buildSkeleton(overrides: Partial<Skeleton> = {}): Skeleton {
  return {
    trackingId: 1,
    trackingState: SkeletonTrackingState.TRACKED,
    position: { x: 0, y: 0, z: 2 },
    joints: trackedSnapshot(),
    clippedEdges: [],
    ...overrides,
  };
}

/**
 * The wire shape parseSkeletonFrame accepts for a skeleton
 */
export function toPayload(skeleton: Skeleton) {
  return {
    trackingId: skeleton.trackingId,
    trackingState: skeleton.trackingState,
    position: skeleton.position,
    clippedEdges: skeleton.clippedEdges,
    joints: mapJointTypes((type) => ({
      position: skeleton.joints[type].position,
      trackingState: skeleton.joints[type].trackingState,
    })),
  };
}

export function framePayload(skeletons: Skeleton[], timestamp = 1000) {
  return { timestamp, skeletons: skeletons.map(toPayload) };
}

export function buildFrame(skeletons: Skeleton[], timestamp = 1000): SkeletonFrame {
  return { timestamp, skeletons };
}

// Sensor-range coordinates, kept to a few meters either side
export const coordinateArb = fc.double({ min: -3, max: 3, noNaN: true, noDefaultInfinity: true });

export const trackingStateArb = fc.constantFrom(
  JointTrackingState.NOT_TRACKED,
  JointTrackingState.INFERRED,
  JointTrackingState.TRACKED
);

export const snapshotArb: fc.Arbitrary<JointSnapshot> = fc
  .array(
    fc.record({
      x: coordinateArb,
      y: coordinateArb,
      z: coordinateArb,
      trackingState: trackingStateArb,
    }),
    { minLength: ALL_JOINT_TYPES.length, maxLength: ALL_JOINT_TYPES.length }
  )
  .map((joints) =>
    createJointSnapshot((type) => {
      const joint = joints[ALL_JOINT_TYPES.indexOf(type)];
      return {
        position: { x: joint.x, y: joint.y, z: joint.z },
        trackingState: joint.trackingState,
      };
    })
  );

/**
 * Step a double to its neighbour toward +Infinity or -Infinity
 */
export function nextDouble(value: number, direction: 1 | -1): number {
  if (value === 0) {
    return direction * Number.MIN_VALUE;
  }
  const buffer = new DataView(new ArrayBuffer(8));
  buffer.setFloat64(0, value);
  const bits = buffer.getBigUint64(0);
  const awayFromZero = (value > 0) === (direction > 0);
  buffer.setBigUint64(0, awayFromZero ? bits + BigInt(1) : bits - BigInt(1));
  return buffer.getFloat64(0);
}

// Pinned so suites do not pick up POSTURE_* overrides from the environment
export const TEST_CONFIG: ClassificationConfig = {
  targetLegAngleDegrees: 10,
  toleranceFactor: 0.05,
  requireTrackedJoints: false,
};

// Arms hanging at the sides, left leg lifted to 45 degrees
export const CROSS_POSE: JointSnapshot = legSnapshot(
  { knee: { y: 0.5, z: 1.75 }, ankle: { y: 0.25, z: 2.0 } },
  armsSnapshot(armsLevelHeights(0.4, 0.4))
);
