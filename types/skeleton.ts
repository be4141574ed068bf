/**
 * Type definitions for skeleton frames delivered by the depth sensor
 */

export enum JointType {
  HIP_CENTER = 'HipCenter',
  SPINE = 'Spine',
  SHOULDER_CENTER = 'ShoulderCenter',
  HEAD = 'Head',
  SHOULDER_LEFT = 'ShoulderLeft',
  ELBOW_LEFT = 'ElbowLeft',
  WRIST_LEFT = 'WristLeft',
  HAND_LEFT = 'HandLeft',
  SHOULDER_RIGHT = 'ShoulderRight',
  ELBOW_RIGHT = 'ElbowRight',
  WRIST_RIGHT = 'WristRight',
  HAND_RIGHT = 'HandRight',
  HIP_LEFT = 'HipLeft',
  KNEE_LEFT = 'KneeLeft',
  ANKLE_LEFT = 'AnkleLeft',
  FOOT_LEFT = 'FootLeft',
  HIP_RIGHT = 'HipRight',
  KNEE_RIGHT = 'KneeRight',
  ANKLE_RIGHT = 'AnkleRight',
  FOOT_RIGHT = 'FootRight',
}

export enum JointTrackingState {
  NOT_TRACKED = 'NotTracked',
  INFERRED = 'Inferred',
  TRACKED = 'Tracked',
}

export enum SkeletonTrackingState {
  NOT_TRACKED = 'NotTracked',
  POSITION_ONLY = 'PositionOnly',
  TRACKED = 'Tracked',
}

export type FrameEdge = 'Top' | 'Bottom' | 'Left' | 'Right';

// Sensor space, y up, z is depth away from the sensor
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface Joint {
  type: JointType;
  position: Vector3;
  trackingState: JointTrackingState;
}

export type JointSnapshot = Readonly<Record<JointType, Readonly<Joint>>>;

export interface Skeleton {
  trackingId: number;
  trackingState: SkeletonTrackingState;
  position: Vector3;
  joints: JointSnapshot;
  clippedEdges: FrameEdge[];
}

export interface SkeletonFrame {
  timestamp: number;
  skeletons: Skeleton[];
}

export const ALL_JOINT_TYPES: readonly JointType[] = Object.values(JointType);
