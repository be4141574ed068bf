/**
 * Geometry helpers for the posture classifiers
 */

/**
 * Distance between (ax, ay) and (bx, by)
 *
 * Arguments are grouped by axis, not by point: both first coordinates come
 * first, then both second coordinates. The leg classifier relies on this to
 * pair a depth axis with a height axis.
 */
export function euclideanDistance(ax: number, bx: number, ay: number, by: number): number {
  return Math.sqrt(Math.pow(bx - ax, 2) + Math.pow(by - ay, 2));
}

export function radiansToDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}
