/**
 * Cross-pose posture feedback barrel export
 */

export { JointType, JointTrackingState, SkeletonTrackingState, ALL_JOINT_TYPES } from './types/skeleton';
export type { FrameEdge, Vector3, Joint, JointSnapshot, Skeleton, SkeletonFrame } from './types/skeleton';
export { RegionCode, DEFAULT_CLASSIFICATION_CONFIG } from './types/posture';
export type {
  BodyRegion,
  FrameClassification,
  SkeletonClassification,
  ClassificationConfig,
  PostureError,
} from './types/posture';

export {
  TOLERANCE_FACTOR,
  MIN_TARGET_LEG_ANGLE_DEGREES,
  MAX_TARGET_LEG_ANGLE_DEGREES,
  DEFAULT_TARGET_LEG_ANGLE_DEGREES,
  DEFAULT_TOLERANCE_FACTOR,
} from './config/thresholds';
export { REGION_COLORS } from './config/overlayStyle';

export { euclideanDistance, radiansToDegrees } from './utils/geometry';
export { createJointSnapshot, withJoints } from './utils/snapshot';

export { ArmsCrossClassifier, classifyArmsCross } from './services/armsCrossClassifier';
export {
  LegLiftClassifier,
  classifyLegLift,
  classifyLegAngle,
  measureLegAngle,
  isValidTargetAngle,
} from './services/legLiftClassifier';
export { classifyFrame, classifySkeletons } from './services/frameClassifier';
export { REGION_REQUIRED_JOINTS, isRegionTracked } from './services/trackingGate';
export { planOverlay, regionColor, regionJointBrush } from './services/overlayPlanner';
export type { OverlayPlan, BoneShape, JointShape, PointShape, RectShape } from './services/overlayPlanner';
export { parseSkeletonFrame, safeParseSkeletonFrame } from './services/snapshotParser';
export type { ParseResult } from './services/snapshotParser';
export { ErrorHandler } from './services/ErrorHandler';
export type { MonitorStatus, ErrorHandlerConfig, ErrorHandlerState } from './services/ErrorHandler';
export { PostureMonitor } from './services/PostureMonitor';
export type { PostureUpdate, PostureListener, SessionSummary, PostureMonitorConfig } from './services/PostureMonitor';

export {
  createSettingsStore,
  selectClassificationConfig,
  loadClassificationSettings,
  saveClassificationSettings,
  clearClassificationSettings,
  SETTINGS_STORAGE_KEY,
} from './store/settingsStore';
export type { SettingsStore, SettingsStoreApi } from './store/settingsStore';
