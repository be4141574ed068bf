/**
 * Skeleton Frame Parser
 *
 * Validates decoded sensor payloads before they reach the classifiers.
 * Joints arrive keyed by joint type; every one of the twenty must be present.
 */

import { z } from 'zod';
import { JointTrackingState, SkeletonTrackingState } from '../types/skeleton';
import type { JointType, SkeletonFrame } from '../types/skeleton';
import type { PostureError } from '../types/posture';
import { mapJointTypes } from '../utils/snapshot';

const vectorSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

const jointSchema = (type: JointType) =>
  z
    .object({
      position: vectorSchema,
      trackingState: z.nativeEnum(JointTrackingState),
    })
    .transform((joint) => ({ type, ...joint }));

const skeletonSchema = z.object({
  trackingId: z.number().int(),
  trackingState: z.nativeEnum(SkeletonTrackingState),
  position: vectorSchema,
  joints: z.object(mapJointTypes(jointSchema)),
  clippedEdges: z.array(z.enum(['Top', 'Bottom', 'Left', 'Right'])).default([]),
});

export const skeletonFrameSchema: z.ZodType<SkeletonFrame, z.ZodTypeDef, unknown> = z.object({
  timestamp: z.number().finite().nonnegative(),
  skeletons: z.array(skeletonSchema),
});

export type ParseResult =
  | { success: true; frame: SkeletonFrame }
  | { success: false; error: PostureError };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function safeParseSkeletonFrame(input: unknown): ParseResult {
  const result = skeletonFrameSchema.safeParse(input);
  if (result.success) {
    return { success: true, frame: result.data };
  }

  const issues = formatIssues(result.error);
  return {
    success: false,
    error: {
      type: 'invalid_payload',
      message: `Invalid skeleton frame: ${issues[0] ?? 'unknown issue'}`,
      context: { issues },
    },
  };
}

/**
 * Parse a skeleton frame payload
 *
 * @throws PostureError of type 'invalid_payload' when validation fails
 */
export function parseSkeletonFrame(input: unknown): SkeletonFrame {
  const result = safeParseSkeletonFrame(input);
  if (!result.success) {
    throw result.error;
  }
  return result.frame;
}
