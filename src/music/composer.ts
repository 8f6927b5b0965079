// ─── Composer ───────────────────────────────────────────────────────────────
//
// Turns a cleaned table into three channels of notes:
//
//   1. Cloud coverage (inverted): major pentatonic, one note per row
//   2. Solar phase: minor pentatonic, one note per row
//   3. Sunrise/sunset: harmonic minor, only on event rows
//
// Channels differ only by the data in CHANNELS; they share the quantizer and
// the timeline.
// ─────────────────────────────────────────────────────────────────────────────

import type { ChannelId, CleanedTable, NoteEvent, TableEntry } from "../types.js";
import { CHANNEL_IDS } from "../types.js";
import { EmptyInputError } from "../errors.js";
import type { Timeline } from "../timeline/duration.js";
import {
  quantize,
  cloudValue,
  phaseValue,
  eventValue,
  MAJOR_PENTATONIC,
  MINOR_PENTATONIC,
  HARMONIC_MINOR,
  type ScaleDefinition,
  type OctaveRange,
  type SolarEventKind,
} from "./scales.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ChannelSpec {
  id: ChannelId;
  /** Track name written to the MIDI file. */
  name: string;
  /** General MIDI program number. */
  program: number;
  scale: ScaleDefinition;
  range: OctaveRange;
  /** Note length as a fraction of the row spacing. */
  durationFraction: number;
  /** Normalized source value for a row, or null to stay silent. */
  value(entry: TableEntry): number | null;
  velocity(value: number, entry: TableEntry): number;
}

export interface Composition {
  /** All notes ordered by start time, then channel. */
  events: NoteEvent[];
  byChannel: Record<ChannelId, NoteEvent[]>;
  timeline: Timeline;
}

// ─── Channels ───────────────────────────────────────────────────────────────

/** Sunrise wins when a row is near both. */
export function solarEventKind(entry: TableEntry): SolarEventKind | null {
  if (entry.solar.isSunriseEvent) return "sunrise";
  if (entry.solar.isSunsetEvent) return "sunset";
  return null;
}

export const CHANNELS: readonly ChannelSpec[] = [
  {
    id: 1,
    name: "Cloud Coverage (Inverted)",
    program: 0, // acoustic grand piano
    scale: MAJOR_PENTATONIC,
    range: { tonic: 60, octaves: 2 },
    durationFraction: 0.8,
    value: (entry) => cloudValue(entry.row.cloudCoverage),
    velocity: (v) => Math.floor(50 + v * 50),
  },
  {
    id: 2,
    name: "Solar Sine Wave",
    program: 8, // celesta
    scale: MINOR_PENTATONIC,
    range: { tonic: 48, octaves: 2 },
    durationFraction: 0.7,
    value: (entry) => phaseValue(entry.solar.phase),
    velocity: (v) => Math.floor(40 + v * 40),
  },
  {
    id: 3,
    name: "Sunrise/Sunset Events",
    program: 14, // tubular bells
    scale: HARMONIC_MINOR,
    range: { tonic: 36, octaves: 2 },
    durationFraction: 1.2,
    value: (entry) => eventValue(solarEventKind(entry)),
    velocity: (_v, entry) => (solarEventKind(entry) === "sunrise" ? 100 : 80),
  },
];

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Compose the table onto the timeline.
 *
 * @throws EmptyInputError for an empty table.
 */
export function compose(
  table: CleanedTable,
  timeline: Timeline,
  channels: readonly ChannelSpec[] = CHANNELS,
): Composition {
  const { entries } = table;
  if (entries.length === 0) {
    throw new EmptyInputError();
  }
  if (timeline.rowCount !== entries.length) {
    throw new Error(`Timeline covers ${timeline.rowCount} rows but the table has ${entries.length}`);
  }

  const events: NoteEvent[] = [];
  const byChannel: Record<ChannelId, NoteEvent[]> = { 1: [], 2: [], 3: [] };

  entries.forEach((entry, i) => {
    const startTime = timeline.startTime(i);
    for (const channel of channels) {
      const value = channel.value(entry);
      if (value === null) continue;

      const note: NoteEvent = {
        channel: channel.id,
        pitch: quantize(value, channel.scale, channel.range),
        startTime,
        durationSeconds: timeline.noteDuration(channel.durationFraction),
        velocity: channel.velocity(value, entry),
      };
      events.push(note);
      byChannel[channel.id].push(note);
    }
  });

  return { events, byChannel, timeline };
}

/** Notes per channel. */
export function countByChannel(composition: Composition): Record<ChannelId, number> {
  const counts: Record<ChannelId, number> = { 1: 0, 2: 0, 3: 0 };
  for (const id of CHANNEL_IDS) {
    counts[id] = composition.byChannel[id].length;
  }
  return counts;
}
