// ─── MIDI Writer ────────────────────────────────────────────────────────────
//
// Serializes a composition to a format-1 standard MIDI file: one track per
// channel, each with its name, tempo and instrument up front.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiData, type MidiEvent } from "midi-file";
import type { NoteEvent } from "../types.js";
import { CHANNELS, type ChannelSpec } from "../music/composer.js";
import { secondsToBeats } from "../timeline/duration.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_TICKS_PER_BEAT = 480;

export interface MidiWriteOptions {
  bpm: number;
  /** Default: 480 */
  ticksPerBeat?: number;
  /** Track layout. Default: CHANNELS */
  channels?: readonly ChannelSpec[];
}

interface TimedEvent {
  tick: number;
  /** noteOff (0) sorts before noteOn (1) on the same tick. */
  order: number;
  event: MidiEvent;
}

// ─── Internal ────────────────────────────────────────────────────────────────

/** Seconds → ticks at a fixed tempo. */
export function secondsToTicks(seconds: number, bpm: number, ticksPerBeat: number): number {
  return Math.round(secondsToBeats(seconds, bpm) * ticksPerBeat);
}

function buildTrack(
  spec: ChannelSpec,
  notes: readonly NoteEvent[],
  bpm: number,
  ticksPerBeat: number,
): MidiEvent[] {
  const channel = spec.id - 1;
  const timed: TimedEvent[] = [];

  for (const note of notes) {
    const onTick = secondsToTicks(note.startTime, bpm, ticksPerBeat);
    const offTick = Math.max(onTick + 1, secondsToTicks(note.startTime + note.durationSeconds, bpm, ticksPerBeat));
    timed.push({
      tick: onTick,
      order: 1,
      event: { deltaTime: 0, type: "noteOn", channel, noteNumber: note.pitch, velocity: note.velocity },
    });
    timed.push({
      tick: offTick,
      order: 0,
      event: { deltaTime: 0, type: "noteOff", channel, noteNumber: note.pitch, velocity: 0 },
    });
  }

  timed.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const track: MidiEvent[] = [
    { deltaTime: 0, meta: true, type: "trackName", text: spec.name },
    { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: Math.round(60_000_000 / bpm) },
    { deltaTime: 0, type: "programChange", channel, programNumber: spec.program },
  ];

  let prevTick = 0;
  for (const t of timed) {
    t.event.deltaTime = t.tick - prevTick;
    prevTick = t.tick;
    track.push(t.event);
  }
  track.push({ deltaTime: 0, meta: true, type: "endOfTrack" });

  return track;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/** Build the MIDI structure for a note sequence. */
export function buildMidiData(events: readonly NoteEvent[], options: MidiWriteOptions): MidiData {
  const ticksPerBeat = options.ticksPerBeat ?? DEFAULT_TICKS_PER_BEAT;
  const channels = options.channels ?? CHANNELS;

  const tracks = channels.map(spec =>
    buildTrack(spec, events.filter(e => e.channel === spec.id), options.bpm, ticksPerBeat),
  );

  return {
    header: { format: 1, numTracks: tracks.length, ticksPerBeat },
    tracks,
  };
}

/** Encode a note sequence as standard MIDI file bytes. */
export function writeNoteSequence(events: readonly NoteEvent[], options: MidiWriteOptions): Uint8Array {
  return new Uint8Array(writeMidi(buildMidiData(events, options)));
}
