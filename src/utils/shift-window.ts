import { InvalidArgumentError } from "commander";
import type { ShiftName, ShiftWindow } from "../types";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Fixed UTC hours of each shift. Night ends at 06:00 on the following day.
 */
export const SHIFT_HOURS: Record<ShiftName, { start: number; end: number }> = {
  morning: { start: 6, end: 14 },
  afternoon: { start: 14, end: 22 },
  night: { start: 22, end: 30 },
};

export const SHIFT_NAMES: readonly ShiftName[] = ["morning", "afternoon", "night"];

export function isShiftName(value: string): value is ShiftName {
  return SHIFT_NAMES.some((name) => name === value);
}

/**
 * Resolves a shift to the concrete UTC range it covers for `now`.
 * A night shift still running after midnight resolves to the window that
 * started the previous evening.
 */
export function getShiftWindow(shift: ShiftName, now: Date = new Date()): ShiftWindow {
  const { start, end } = SHIFT_HOURS[shift];
  let anchor = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate()
  );

  if (end > 24 && now.getUTCHours() < end - 24) {
    anchor -= DAY_MS;
  }

  return {
    shift,
    start: new Date(anchor + start * HOUR_MS),
    end: new Date(anchor + end * HOUR_MS),
  };
}

/**
 * Commander argument parser for the shift selector
 */
export function parseShiftName(value: string): ShiftName {
  const normalized = value.trim().toLowerCase();
  if (!isShiftName(normalized)) {
    throw new InvalidArgumentError(
      `Expected one of: ${SHIFT_NAMES.join(", ")}`
    );
  }
  return normalized;
}
