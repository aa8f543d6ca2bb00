import { describe, expect, test } from 'vitest';
import { DEFAULT_SETTINGS, normalizeSettings } from '../settings';

describe('normalizeSettings', () => {
  test('falls back to defaults for missing or malformed input', () => {
    expect(normalizeSettings(undefined)).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings('radius=200')).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings({ dwellMs: Number.NaN, fontSize: '12' })).toEqual(DEFAULT_SETTINGS);
  });

  test('clamps and rounds numeric values', () => {
    const settings = normalizeSettings({ dwellMs: 50, wheelRadius: 1000, autoContinueExtraMs: 150.6 });
    expect(settings.dwellMs).toBe(100);
    expect(settings.wheelRadius).toBe(400);
    expect(settings.autoContinueExtraMs).toBe(151);
  });

  test('keeps the inner radius inside the wheel', () => {
    expect(normalizeSettings({ innerRadius: 120 }).innerRadius).toBe(100);
    expect(normalizeSettings({ wheelRadius: 100, innerRadius: 100 }).innerRadius).toBe(50);
  });

  test('requires two distinct activation keys', () => {
    expect(normalizeSettings({ activationKeys: ['ctrl', 'shift'] }).activationKeys).toEqual(['ctrl', 'shift']);
    expect(normalizeSettings({ activationKeys: ['ctrl', 'ctrl'] }).activationKeys).toEqual(['super', 'alt']);
    expect(normalizeSettings({ activationKeys: ['hyper', 'alt'] }).activationKeys).toEqual(['super', 'alt']);
  });

  test('merges onto a base instead of the defaults', () => {
    const base = normalizeSettings({ dwellMs: 700, suppressionClear: 'first-observation' });
    const next = normalizeSettings({ autoContinueExtraMs: 0 }, base);
    expect(next.dwellMs).toBe(700);
    expect(next.autoContinueExtraMs).toBe(0);
    expect(next.suppressionClear).toBe('first-observation');
  });

  test('clamps color channels', () => {
    expect(normalizeSettings({ hoverColor: [300, -5, 12.4, 'x'] }).hoverColor).toEqual([255, 0, 12, 200]);
    expect(normalizeSettings({ textColor: [1, 2, 3] }).textColor).toEqual(DEFAULT_SETTINGS.textColor);
  });
});
