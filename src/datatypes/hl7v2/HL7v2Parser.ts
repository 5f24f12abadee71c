/**
 * HL7v2 field decomposer and message model builder
 *
 * Turns segment strings into ParsedSegment values (segment name plus a map
 * from 1-based field index to field value) and aggregates them into a
 * ParsedMessage keyed by segment name.
 */

import { ParseError } from '../errors.js';
import {
  type Repeated,
  type Value,
  appendRepeated,
  composite,
  first,
  primitive,
  toList,
  valueToJSON,
  type JsonObject,
} from '../../model/Value.js';
import { type HL7v2ParserProperties, getDefaultParserProperties } from './HL7v2Properties.js';

export interface ParsedSegment {
  segmentName: string;
  /** 1-based field index to value. Empty fields are never present. */
  fields: ReadonlyMap<number, Value>;
}

export interface MessageType {
  messageType: string;
  triggerEvent: string;
}

export interface ParsedMessage {
  messageType: MessageType;
  /** A name seen once maps to `one`, a repeated name to `many` in source order */
  segments: ReadonlyMap<string, Repeated<ParsedSegment>>;
  /** Tokenizer output the message was built from */
  rawSegments: readonly string[];
}

/**
 * Decompose one segment string. Element 0 is the segment name; elements
 * 1..N become fields unless their raw content is empty.
 */
export function decomposeSegment(
  segment: string,
  properties?: Partial<HL7v2ParserProperties>
): ParsedSegment {
  const props = { ...getDefaultParserProperties(), ...properties };
  const elements = segment.split(props.fieldSeparator);
  const fields = new Map<number, Value>();

  for (let i = 1; i < elements.length; i++) {
    const raw = elements[i] ?? '';
    if (raw) {
      fields.set(i, decomposeField(raw, props));
    }
  }

  return { segmentName: elements[0] ?? '', fields };
}

/**
 * A field holding the component separator becomes a composite, and each of
 * its components holding the sub-component separator becomes a composite of
 * primitives. Everything else is primitive.
 */
export function decomposeField(raw: string, properties?: Partial<HL7v2ParserProperties>): Value {
  const props = { ...getDefaultParserProperties(), ...properties };

  if (!raw.includes(props.componentSeparator)) {
    return primitive(raw);
  }

  return composite(
    raw.split(props.componentSeparator).map((comp) =>
      comp.includes(props.subcomponentSeparator)
        ? composite(comp.split(props.subcomponentSeparator).map(primitive))
        : primitive(comp)
    )
  );
}

/**
 * Read MSH-9 (split element 8, since MSH-1 is the field separator itself)
 */
export function extractMessageType(
  mshSegment: string,
  properties?: Partial<HL7v2ParserProperties>
): MessageType {
  const props = { ...getDefaultParserProperties(), ...properties };
  const elements = mshSegment.split(props.fieldSeparator);
  const messageTypeField = elements[8];

  if (messageTypeField === undefined) {
    return { messageType: '', triggerEvent: '' };
  }

  if (messageTypeField.includes(props.componentSeparator)) {
    const components = messageTypeField.split(props.componentSeparator);
    return {
      messageType: components[0] ?? '',
      triggerEvent: components[1] ?? '',
    };
  }

  return { messageType: messageTypeField, triggerEvent: '' };
}

/**
 * Build the message model from tokenized segments.
 * @throws ParseError when there are no segments or the first one is not MSH
 */
export function buildMessage(
  segments: readonly string[],
  properties?: Partial<HL7v2ParserProperties>
): ParsedMessage {
  const firstSegment = segments[0];
  if (firstSegment === undefined) {
    throw new ParseError('No segments found in message');
  }

  const parsed = segments.map((segment) => decomposeSegment(segment, properties));
  const header = parsed[0];
  if (!header || header.segmentName !== 'MSH') {
    throw new ParseError(
      `First segment must be MSH, found '${header?.segmentName ?? ''}'`
    );
  }

  const byName = new Map<string, Repeated<ParsedSegment>>();
  for (const segment of parsed) {
    appendRepeated(byName, segment.segmentName, segment);
  }

  return {
    messageType: extractMessageType(firstSegment, properties),
    segments: byName,
    rawSegments: [...segments],
  };
}

/**
 * Field accessor. Returns undefined when the field is absent.
 */
export function field(segment: ParsedSegment | undefined, index: number): Value | undefined {
  return segment?.fields.get(index);
}

/**
 * All occurrences of a segment, in source order
 */
export function segmentsNamed(message: ParsedMessage, name: string): readonly ParsedSegment[] {
  return toList(message.segments.get(name));
}

/**
 * First occurrence of a segment
 */
export function firstSegment(message: ParsedMessage, name: string): ParsedSegment | undefined {
  return first(message.segments.get(name));
}

export function segmentToJSON(segment: ParsedSegment): JsonObject {
  const fields: JsonObject = {};
  for (const [index, value] of segment.fields) {
    fields[String(index)] = valueToJSON(value);
  }
  return { segmentName: segment.segmentName, fields };
}

/**
 * Plain JSON form of a message; repeated segments become arrays
 */
export function messageToJSON(message: ParsedMessage): JsonObject {
  const segments: JsonObject = {};
  for (const [name, entry] of message.segments) {
    segments[name] =
      entry.kind === 'one' ? segmentToJSON(entry.value) : entry.values.map(segmentToJSON);
  }
  return {
    messageType: {
      messageType: message.messageType.messageType,
      triggerEvent: message.messageType.triggerEvent,
    },
    segments,
  };
}
