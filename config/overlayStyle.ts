/**
 * Overlay colors and bone layout for the posture feedback view
 */

import { JointType } from '../types/skeleton';
import { RegionCode } from '../types/posture';

export type Bone = readonly [JointType, JointType];

export interface PenStyle {
  color: string;
  thickness: number;
}

export const RENDER_WIDTH = 640;
export const RENDER_HEIGHT = 480;
export const CLIP_BOUNDS_THICKNESS = 10;
export const JOINT_THICKNESS = 3;
export const BODY_CENTER_THICKNESS = 10;

export const CLIP_EDGE_COLOR = '#FF0000';
export const CENTER_POINT_COLOR = '#0000FF';

export const TRACKED_BONE_PEN: PenStyle = { color: '#FF0000', thickness: 6 };
export const INFERRED_JOINT_BRUSH = '#FFFF00';

// Joints keep the peach brush until a region reports something other than INCORRECT
export const DEFAULT_JOINT_BRUSH = '#FFDAB9';
export const HIGHLIGHT_JOINT_BRUSH = '#44C044';

export const REGION_COLORS: Record<RegionCode, string | null> = {
  [RegionCode.INVALID]: null,
  [RegionCode.INCORRECT]: '#FF0000',
  [RegionCode.CORRECT]: '#008000',
  [RegionCode.BELOW]: '#FFFF00',
  [RegionCode.ABOVE]: '#0000FF',
};

/**
 * Bones drawn in the plain tracked color whatever the pose.
 * The arms and the left leg are left out; their regions draw them.
 */
export const BASE_BONES: readonly Bone[] = [
  [JointType.HEAD, JointType.SHOULDER_CENTER],
  [JointType.SHOULDER_CENTER, JointType.SHOULDER_LEFT],
  [JointType.SHOULDER_CENTER, JointType.SHOULDER_RIGHT],
  [JointType.SHOULDER_CENTER, JointType.SPINE],
  [JointType.SPINE, JointType.HIP_CENTER],
  [JointType.HIP_CENTER, JointType.HIP_LEFT],
  [JointType.HIP_CENTER, JointType.HIP_RIGHT],
  [JointType.HIP_RIGHT, JointType.KNEE_RIGHT],
  [JointType.KNEE_RIGHT, JointType.ANKLE_RIGHT],
  [JointType.ANKLE_RIGHT, JointType.FOOT_RIGHT],
];

export const ARMS_CROSS_BONES: readonly Bone[] = [
  [JointType.SHOULDER_CENTER, JointType.SHOULDER_LEFT],
  [JointType.SHOULDER_CENTER, JointType.SHOULDER_RIGHT],
  [JointType.SHOULDER_LEFT, JointType.ELBOW_LEFT],
  [JointType.ELBOW_LEFT, JointType.WRIST_LEFT],
  [JointType.WRIST_LEFT, JointType.HAND_LEFT],
  [JointType.SHOULDER_RIGHT, JointType.ELBOW_RIGHT],
  [JointType.ELBOW_RIGHT, JointType.WRIST_RIGHT],
  [JointType.WRIST_RIGHT, JointType.HAND_RIGHT],
];

export const LIFTED_LEG_BONES: readonly Bone[] = [
  [JointType.HIP_LEFT, JointType.KNEE_LEFT],
  [JointType.KNEE_LEFT, JointType.ANKLE_LEFT],
  [JointType.ANKLE_LEFT, JointType.FOOT_LEFT],
];
