// ─── Scale Quantizer ────────────────────────────────────────────────────────
//
// Snaps a value in [0, 1] onto the degrees of a scale spread over an octave
// range. Rounding happens in scale degrees, not semitones, so every pitch
// that comes out is a member of the scale.
// ─────────────────────────────────────────────────────────────────────────────

/** Semitone offsets from the tonic, ascending, within one octave. */
export type ScaleDefinition = readonly number[];

export const MAJOR_PENTATONIC: ScaleDefinition = [0, 2, 4, 7, 9];
export const MINOR_PENTATONIC: ScaleDefinition = [0, 3, 5, 7, 10];
export const HARMONIC_MINOR: ScaleDefinition = [0, 2, 3, 5, 7, 8, 11];

export interface OctaveRange {
  /** MIDI note of the lowest tonic. */
  tonic: number;
  /** Number of octaves spanned; the tonic above the last octave is included. */
  octaves: number;
}

/**
 * Every pitch of the scale across the range, low to high.
 *
 * Example: major pentatonic, tonic 60, 1 octave → [60, 62, 64, 67, 69, 72]
 */
export function scaleLadder(scale: ScaleDefinition, range: OctaveRange): number[] {
  const ladder: number[] = [];
  for (let octave = 0; octave < range.octaves; octave++) {
    for (const offset of scale) {
      ladder.push(range.tonic + octave * 12 + offset);
    }
  }
  ladder.push(range.tonic + range.octaves * 12);
  return ladder;
}

/**
 * Quantize a normalized value to a pitch. Values outside [0, 1] are clamped;
 * halfway between two degrees rounds up to the higher one.
 */
export function quantize(value: number, scale: ScaleDefinition, range: OctaveRange): number {
  const ladder = scaleLadder(scale, range);
  const v = Number.isFinite(value) ? Math.max(0, Math.min(1, value)) : 0;
  const index = Math.floor(v * (ladder.length - 1) + 0.5);
  return ladder[index];
}

/** True when `pitch` lies in the range and its pitch class belongs to the scale. */
export function isScaleMember(pitch: number, scale: ScaleDefinition, range: OctaveRange): boolean {
  const fromTonic = pitch - range.tonic;
  if (fromTonic < 0 || fromTonic > range.octaves * 12) return false;
  return scale.includes(fromTonic % 12);
}

// ─── Value Normalizers ──────────────────────────────────────────────────────

/** Clear sky → 1, overcast → 0. Missing coverage counts as clear. */
export function cloudValue(coverage: number | null): number {
  const pct = Math.max(0, Math.min(100, coverage ?? 0));
  return 1 - pct / 100;
}

/** Unit phase [-1, 1] → [0, 1]. */
export function phaseValue(phase: number): number {
  return (Math.max(-1, Math.min(1, phase)) + 1) / 2;
}

export type SolarEventKind = "sunrise" | "sunset";

export const SUNRISE_VALUE = 0.85;
export const SUNSET_VALUE = 0.2;

/** Fixed register for each event; no event → no note. */
export function eventValue(kind: SolarEventKind | null): number | null {
  if (kind === "sunrise") return SUNRISE_VALUE;
  if (kind === "sunset") return SUNSET_VALUE;
  return null;
}
