/**
 * Radial wheel mathematics.
 *
 * Screen coordinates: x grows to the right, y grows downward, so angles run
 * clockwise with 0° pointing right.
 */

import { SLOT_COUNT } from '../types/wheel';

export interface Point {
  x: number;
  y: number;
}

export interface CursorOffset {
  dx: number;
  dy: number;
}

export interface SegmentAngles {
  start: number;
  end: number;
  center: number;
}

export interface SettingsButtonGeometry {
  center: Point;
  radius: number;
}

export interface WheelGeometry {
  innerRadius: number;
  outerRadius: number;
  settingsButton: SettingsButtonGeometry;
}

export type HitTarget = { kind: 'settings' } | { kind: 'slot'; index: number } | { kind: 'none' };

export const SEGMENT_ANGLE = 360 / SLOT_COUNT;
// Half a segment, so slot 0 is centered on the 0° axis.
export const ANGLE_OFFSET = -SEGMENT_ANGLE / 2;

export const SETTINGS_BUTTON_RADIUS = 16;
export const SETTINGS_BUTTON_GAP = 6;
export const SETTINGS_BUTTON_ANGLE = -45;

export const NO_HIT: HitTarget = { kind: 'none' };

/**
 * Convert polar coordinates to cartesian
 * @param angleInDegrees - 0° = right, clockwise
 */
export function polarToCartesian(
  centerX: number,
  centerY: number,
  radius: number,
  angleInDegrees: number
): Point {
  const angleInRadians = (angleInDegrees * Math.PI) / 180;
  return {
    x: centerX + radius * Math.cos(angleInRadians),
    y: centerY + radius * Math.sin(angleInRadians),
  };
}

export function normalizeDegrees(angle: number): number {
  const normalized = angle % 360;
  return normalized < 0 ? normalized + 360 : normalized;
}

/**
 * Start, end and center angles of every slot. Slot 0 spans [-22.5°, 22.5°).
 */
export function calculateSegmentAngles(segmentCount: number = SLOT_COUNT): SegmentAngles[] {
  if (segmentCount <= 0) {
    return [];
  }

  const segmentAngle = 360 / segmentCount;
  const offset = -segmentAngle / 2;

  return Array.from({ length: segmentCount }, (_, i) => {
    const start = offset + i * segmentAngle;
    return { start, end: start + segmentAngle, center: start + segmentAngle / 2 };
  });
}

/** Label anchor halfway between the inner and outer ring. */
export function getLabelPosition(
  center: Point,
  innerRadius: number,
  outerRadius: number,
  index: number
): Point {
  const angles = calculateSegmentAngles()[index];
  const labelRadius = (innerRadius + outerRadius) / 2;
  return polarToCartesian(center.x, center.y, labelRadius, angles ? angles.center : 0);
}

/**
 * The settings button sits on the top-right diagonal just past the ring and
 * overlaps its outer edge. Offsets are relative to the wheel center.
 */
export function getSettingsButtonGeometry(outerRadius: number): SettingsButtonGeometry {
  return {
    center: polarToCartesian(0, 0, outerRadius + SETTINGS_BUTTON_GAP, SETTINGS_BUTTON_ANGLE),
    radius: SETTINGS_BUTTON_RADIUS,
  };
}

export function createWheelGeometry(outerRadius: number, innerRadius: number): WheelGeometry {
  return {
    innerRadius,
    outerRadius,
    settingsButton: getSettingsButtonGeometry(outerRadius),
  };
}

/** Slot index for an angle in degrees, ignoring distance. */
export function slotIndexForAngle(angleInDegrees: number): number {
  const angle = normalizeDegrees(angleInDegrees - ANGLE_OFFSET);
  return Math.floor(angle / SEGMENT_ANGLE) % SLOT_COUNT;
}

export function hitTest(offset: CursorOffset, geometry: WheelGeometry): HitTarget {
  const { dx, dy } = offset;
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) {
    return NO_HIT;
  }
  const button = geometry.settingsButton;
  const bx = dx - button.center.x;
  const by = dy - button.center.y;

  // Checked first: the button overlaps the outer edge of the ring.
  if (Math.sqrt(bx * bx + by * by) <= button.radius) {
    return { kind: 'settings' };
  }

  const distance = Math.sqrt(dx * dx + dy * dy);
  if (distance < geometry.innerRadius || distance > geometry.outerRadius) {
    return NO_HIT;
  }

  const angle = (Math.atan2(dy, dx) * 180) / Math.PI;
  return { kind: 'slot', index: slotIndexForAngle(angle) };
}

export function isSameTarget(a: HitTarget, b: HitTarget): boolean {
  if (a.kind === 'slot' && b.kind === 'slot') {
    return a.index === b.index;
  }
  return a.kind === b.kind;
}

/** Offset of a point on the wheel, handy for synthesizing cursor samples. */
export function offsetAt(radius: number, angleInDegrees: number): CursorOffset {
  const point = polarToCartesian(0, 0, radius, angleInDegrees);
  return { dx: point.x, dy: point.y };
}
