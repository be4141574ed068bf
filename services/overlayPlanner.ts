/**
 * Overlay Planner
 *
 * Turns a skeleton and its classification into a list of shapes for the
 * renderer. Colors come from the region codes on every call; nothing about
 * the previous frame is remembered. Positions stay in sensor space and the
 * renderer projects them.
 *
 * Draw order is clip rectangles, center point, bones, joints. Bones listed
 * later paint over earlier ones, which is how a region recolors the
 * shoulder bones it shares with the torso.
 */

import { ALL_JOINT_TYPES, JointTrackingState, SkeletonTrackingState } from '../types/skeleton';
import type { FrameEdge, JointType, Skeleton, Vector3 } from '../types/skeleton';
import { RegionCode } from '../types/posture';
import type { BodyRegion, FrameClassification } from '../types/posture';
import {
  ARMS_CROSS_BONES,
  BASE_BONES,
  BODY_CENTER_THICKNESS,
  CENTER_POINT_COLOR,
  CLIP_BOUNDS_THICKNESS,
  CLIP_EDGE_COLOR,
  DEFAULT_JOINT_BRUSH,
  HIGHLIGHT_JOINT_BRUSH,
  INFERRED_JOINT_BRUSH,
  JOINT_THICKNESS,
  LIFTED_LEG_BONES,
  REGION_COLORS,
  RENDER_HEIGHT,
  RENDER_WIDTH,
  TRACKED_BONE_PEN,
} from '../config/overlayStyle';
import type { Bone, PenStyle } from '../config/overlayStyle';

export interface RectShape {
  x: number;
  y: number;
  width: number;
  height: number;
  color: string;
}

export interface PointShape {
  position: Vector3;
  radius: number;
  color: string;
}

export interface BoneShape {
  from: JointType;
  to: JointType;
  start: Vector3;
  end: Vector3;
  pen: PenStyle;
  region: BodyRegion | 'base';
}

export interface JointShape extends PointShape {
  type: JointType;
}

export interface OverlayPlan {
  trackingId: number;
  clipRects: RectShape[];
  centerPoint: PointShape | null;
  bones: BoneShape[];
  joints: JointShape[];
}

/**
 * Color for a region code, null when the region should not be drawn
 */
export function regionColor(code: RegionCode): string | null {
  return REGION_COLORS[code];
}

export function regionJointBrush(code: RegionCode): string {
  return code === RegionCode.INCORRECT || code === RegionCode.INVALID
    ? DEFAULT_JOINT_BRUSH
    : HIGHLIGHT_JOINT_BRUSH;
}

export function clipEdgeRect(edge: FrameEdge): RectShape {
  switch (edge) {
    case 'Bottom':
      return {
        x: 0,
        y: RENDER_HEIGHT - CLIP_BOUNDS_THICKNESS,
        width: RENDER_WIDTH,
        height: CLIP_BOUNDS_THICKNESS,
        color: CLIP_EDGE_COLOR,
      };
    case 'Top':
      return { x: 0, y: 0, width: RENDER_WIDTH, height: CLIP_BOUNDS_THICKNESS, color: CLIP_EDGE_COLOR };
    case 'Left':
      return { x: 0, y: 0, width: CLIP_BOUNDS_THICKNESS, height: RENDER_HEIGHT, color: CLIP_EDGE_COLOR };
    case 'Right':
      return {
        x: RENDER_WIDTH - CLIP_BOUNDS_THICKNESS,
        y: 0,
        width: CLIP_BOUNDS_THICKNESS,
        height: RENDER_HEIGHT,
        color: CLIP_EDGE_COLOR,
      };
  }
}

// Only bones with both ends fully tracked are drawn
function isBoneDrawable(skeleton: Skeleton, [from, to]: Bone): boolean {
  return (
    skeleton.joints[from].trackingState === JointTrackingState.TRACKED &&
    skeleton.joints[to].trackingState === JointTrackingState.TRACKED
  );
}

function planBones(
  skeleton: Skeleton,
  bones: readonly Bone[],
  pen: PenStyle,
  region: BodyRegion | 'base'
): BoneShape[] {
  return bones.filter((bone) => isBoneDrawable(skeleton, bone)).map(([from, to]) => ({
    from,
    to,
    start: skeleton.joints[from].position,
    end: skeleton.joints[to].position,
    pen,
    region,
  }));
}

function planRegionBones(
  skeleton: Skeleton,
  bones: readonly Bone[],
  code: RegionCode,
  region: BodyRegion
): BoneShape[] {
  const color = regionColor(code);
  if (color === null) {
    return [];
  }
  return planBones(skeleton, bones, { color, thickness: TRACKED_BONE_PEN.thickness }, region);
}

function jointRegionCodes(classification: FrameClassification): Map<JointType, RegionCode> {
  const codes = new Map<JointType, RegionCode>();
  const assign = (bones: readonly Bone[], code: RegionCode) => {
    bones.forEach(([from, to]) => {
      codes.set(from, code);
      codes.set(to, code);
    });
  };
  assign(ARMS_CROSS_BONES, classification.armsCode);
  assign(LIFTED_LEG_BONES, classification.legCode);
  return codes;
}

function planJoints(skeleton: Skeleton, classification: FrameClassification): JointShape[] {
  const codes = jointRegionCodes(classification);
  const shapes: JointShape[] = [];

  ALL_JOINT_TYPES.forEach((type) => {
    const joint = skeleton.joints[type];
    let color: string | null = null;
    if (joint.trackingState === JointTrackingState.TRACKED) {
      const code = codes.get(joint.type);
      color = code === undefined ? DEFAULT_JOINT_BRUSH : regionJointBrush(code);
    } else if (joint.trackingState === JointTrackingState.INFERRED) {
      color = INFERRED_JOINT_BRUSH;
    }

    if (color !== null) {
      shapes.push({ type: joint.type, position: joint.position, radius: JOINT_THICKNESS, color });
    }
  });

  return shapes;
}

/**
 * Build the overlay for one skeleton
 *
 * A tracked skeleton needs its classification; position-only and untracked
 * skeletons ignore it.
 */
export function planOverlay(
  skeleton: Skeleton,
  classification: FrameClassification | null
): OverlayPlan {
  const plan: OverlayPlan = {
    trackingId: skeleton.trackingId,
    clipRects: skeleton.clippedEdges.map(clipEdgeRect),
    centerPoint: null,
    bones: [],
    joints: [],
  };

  if (skeleton.trackingState === SkeletonTrackingState.POSITION_ONLY) {
    plan.centerPoint = {
      position: skeleton.position,
      radius: BODY_CENTER_THICKNESS,
      color: CENTER_POINT_COLOR,
    };
    return plan;
  }

  if (skeleton.trackingState !== SkeletonTrackingState.TRACKED || classification === null) {
    return plan;
  }

  plan.bones = [
    ...planBones(skeleton, BASE_BONES, TRACKED_BONE_PEN, 'base'),
    ...planRegionBones(skeleton, ARMS_CROSS_BONES, classification.armsCode, 'arms'),
    ...planRegionBones(skeleton, LIFTED_LEG_BONES, classification.legCode, 'leg'),
  ];
  plan.joints = planJoints(skeleton, classification);

  return plan;
}
