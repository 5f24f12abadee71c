/**
 * HL7v2 segment tokenizer
 *
 * Splits raw HL7v2 text into segment strings. Messages may use CR, LF, CRLF
 * or a mix of them; messages without any line break fall back to inferring
 * segment boundaries from `|XXX|` segment markers.
 */

import {
  type HL7v2ParserProperties,
  getDefaultParserProperties,
  segmentMarkerPattern,
} from './HL7v2Properties.js';

/**
 * Split raw HL7v2 text into ordered segment strings.
 * Blank input yields an empty list.
 */
export function tokenize(raw: string, properties?: Partial<HL7v2ParserProperties>): string[] {
  if (!raw || raw.trim().length === 0) {
    return [];
  }

  if (raw.includes('\r') || raw.includes('\n')) {
    return splitOnLineBreaks(raw);
  }

  const props = { ...getDefaultParserProperties(), ...properties };
  return splitOnSegmentMarkers(raw, props.fieldSeparator);
}

/**
 * Emit a segment at every CR or LF, in a single pass so that mixed line
 * endings split the same way as uniform ones.
 */
function splitOnLineBreaks(raw: string): string[] {
  const segments: string[] = [];
  let start = 0;

  for (let i = 0; i <= raw.length; i++) {
    const ch = raw.charAt(i);
    if (i === raw.length || ch === '\r' || ch === '\n') {
      const segment = raw.substring(start, i).trim();
      if (segment) {
        segments.push(segment);
      }
      start = i + 1;
    }
  }

  return segments;
}

/**
 * Single-line messages: each `|XXX|` marker starts a new segment at the
 * segment name. Without any marker the whole input is one segment.
 */
function splitOnSegmentMarkers(raw: string, fieldSeparator: string): string[] {
  const pattern = segmentMarkerPattern(fieldSeparator);
  const boundaries: number[] = [];

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(raw)) !== null) {
    boundaries.push(match.index + fieldSeparator.length);
  }

  if (boundaries.length === 0) {
    return [raw.trim()];
  }

  const segments: string[] = [];
  let start = 0;

  const emit = (content: string): void => {
    const trimmed = content.trim();
    if (trimmed) {
      segments.push(...repairEmbeddedSegments(trimmed, fieldSeparator));
    }
  };

  for (const boundary of boundaries) {
    if (start < boundary) {
      emit(raw.substring(start, boundary));
    }
    start = boundary;
  }

  if (start < raw.length) {
    emit(raw.substring(start));
  }

  return segments;
}

/**
 * Repair pass for malformed single-line messages whose PID segment was folded
 * into the tail of MSH. An MSH segment containing `|PID|` is split into the
 * MSH portion and a synthesized `PID|...` segment that runs up to the next
 * segment marker or the end of the text.
 *
 * Only MSH-containing-PID is handled. Any other segment is returned as-is.
 */
export function repairEmbeddedSegments(segment: string, fieldSeparator = '|'): string[] {
  if (!segment.startsWith('MSH')) {
    return [segment];
  }

  const pidMarker = `${fieldSeparator}PID${fieldSeparator}`;
  const pidIndex = segment.indexOf(pidMarker);
  if (pidIndex === -1 || pidIndex + pidMarker.length >= segment.length) {
    return [segment];
  }

  const mshPart = segment.substring(0, pidIndex).trim();
  let pidData = segment.substring(pidIndex + pidMarker.length);

  const nextMarker = segmentMarkerPattern(fieldSeparator, '').exec(pidData);
  if (nextMarker) {
    pidData = pidData.substring(0, nextMarker.index);
  }

  return [mshPart, `PID${fieldSeparator}${pidData}`.trim()];
}
