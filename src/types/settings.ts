export type ActivationKey = 'super' | 'alt' | 'ctrl' | 'shift';

export const ACTIVATION_KEYS: readonly ActivationKey[] = ['super', 'alt', 'ctrl', 'shift'];

export type SuppressionClearMode = 'slot-change' | 'first-observation';

export type Rgba = [number, number, number, number];

export interface WheelSettings {
  wheelRadius: number;
  innerRadius: number;
  dwellMs: number;
  autoContinueExtraMs: number;
  pollIntervalMs: number;
  keystrokeDelayMs: number;
  activationKeys: [ActivationKey, ActivationKey];
  suppressionClear: SuppressionClearMode;
  // Renderer-only values below.
  bgOpacity: number;
  fontSize: number;
  segmentColor: Rgba;
  hoverColor: Rgba;
  textColor: Rgba;
  borderColor: Rgba;
}

export const DEFAULT_SETTINGS: WheelSettings = {
  wheelRadius: 180,
  innerRadius: 50,
  dwellMs: 400,
  autoContinueExtraMs: 200,
  pollIntervalMs: 16,
  keystrokeDelayMs: 150,
  activationKeys: ['super', 'alt'],
  suppressionClear: 'slot-change',
  bgOpacity: 220,
  fontSize: 9,
  segmentColor: [50, 50, 55, 200],
  hoverColor: [80, 120, 200, 200],
  textColor: [220, 220, 220, 255],
  borderColor: [100, 100, 110, 180],
};

interface NumericRange {
  min: number;
  max: number;
}

export const SETTINGS_RANGES = {
  wheelRadius: { min: 100, max: 400 },
  innerRadius: { min: 20, max: 100 },
  dwellMs: { min: 100, max: 2000 },
  autoContinueExtraMs: { min: 0, max: 2000 },
  pollIntervalMs: { min: 4, max: 100 },
  keystrokeDelayMs: { min: 0, max: 1000 },
  bgOpacity: { min: 50, max: 255 },
  fontSize: { min: 6, max: 18 },
} satisfies Record<string, NumericRange>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clampNumber(raw: unknown, fallback: number, range: NumericRange): number {
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    return fallback;
  }
  return Math.min(range.max, Math.max(range.min, Math.round(raw)));
}

function normalizeRgba(raw: unknown, fallback: Rgba): Rgba {
  if (!Array.isArray(raw) || raw.length !== 4) {
    return [...fallback];
  }
  const channels = raw.map((channel, index) =>
    typeof channel === 'number' && Number.isFinite(channel)
      ? Math.min(255, Math.max(0, Math.round(channel)))
      : fallback[index],
  );
  return [channels[0], channels[1], channels[2], channels[3]];
}

function isActivationKey(value: unknown): value is ActivationKey {
  return typeof value === 'string' && ACTIVATION_KEYS.some((key) => key === value);
}

function normalizeActivationKeys(raw: unknown): [ActivationKey, ActivationKey] {
  if (Array.isArray(raw) && raw.length === 2) {
    const [first, second] = raw;
    if (isActivationKey(first) && isActivationKey(second) && first !== second) {
      return [first, second];
    }
  }
  return [...DEFAULT_SETTINGS.activationKeys];
}

/**
 * Builds a complete settings object from partial or stored input. Numbers are
 * clamped to their ranges; the inner radius always stays inside the wheel.
 */
export function normalizeSettings(raw: unknown, base: WheelSettings = DEFAULT_SETTINGS): WheelSettings {
  const input = isRecord(raw) ? raw : {};
  const wheelRadius = clampNumber(input.wheelRadius, base.wheelRadius, SETTINGS_RANGES.wheelRadius);
  let innerRadius = clampNumber(input.innerRadius, base.innerRadius, SETTINGS_RANGES.innerRadius);
  if (innerRadius >= wheelRadius) {
    innerRadius = Math.min(DEFAULT_SETTINGS.innerRadius, wheelRadius - 1);
  }

  return {
    wheelRadius,
    innerRadius,
    dwellMs: clampNumber(input.dwellMs, base.dwellMs, SETTINGS_RANGES.dwellMs),
    autoContinueExtraMs: clampNumber(
      input.autoContinueExtraMs,
      base.autoContinueExtraMs,
      SETTINGS_RANGES.autoContinueExtraMs,
    ),
    pollIntervalMs: clampNumber(input.pollIntervalMs, base.pollIntervalMs, SETTINGS_RANGES.pollIntervalMs),
    keystrokeDelayMs: clampNumber(input.keystrokeDelayMs, base.keystrokeDelayMs, SETTINGS_RANGES.keystrokeDelayMs),
    activationKeys: input.activationKeys === undefined ? [...base.activationKeys] : normalizeActivationKeys(input.activationKeys),
    suppressionClear:
      input.suppressionClear === 'slot-change' || input.suppressionClear === 'first-observation'
        ? input.suppressionClear
        : base.suppressionClear,
    bgOpacity: clampNumber(input.bgOpacity, base.bgOpacity, SETTINGS_RANGES.bgOpacity),
    fontSize: clampNumber(input.fontSize, base.fontSize, SETTINGS_RANGES.fontSize),
    segmentColor: normalizeRgba(input.segmentColor, base.segmentColor),
    hoverColor: normalizeRgba(input.hoverColor, base.hoverColor),
    textColor: normalizeRgba(input.textColor, base.textColor),
    borderColor: normalizeRgba(input.borderColor, base.borderColor),
  };
}
