/**
 * Configuration properties for HL7v2 tokenizing and field decomposition
 */

/**
 * Default HL7v2 delimiters
 */
export const HL7V2_DEFAULTS = {
  FIELD_SEPARATOR: '|',
  COMPONENT_SEPARATOR: '^',
  SUBCOMPONENT_SEPARATOR: '&',
};

/**
 * Delimiters used to decompose segments. Decomposition is decided purely by
 * the presence of these characters; MSH-2 is not consulted.
 */
export interface HL7v2ParserProperties {
  /** Separates fields within a segment and frames inferred segment boundaries */
  fieldSeparator: string;
  /** Separates components within a field */
  componentSeparator: string;
  /** Separates sub-components within a component */
  subcomponentSeparator: string;
}

/**
 * Get default parser properties
 */
export function getDefaultParserProperties(): HL7v2ParserProperties {
  return {
    fieldSeparator: HL7V2_DEFAULTS.FIELD_SEPARATOR,
    componentSeparator: HL7V2_DEFAULTS.COMPONENT_SEPARATOR,
    subcomponentSeparator: HL7V2_DEFAULTS.SUBCOMPONENT_SEPARATOR,
  };
}

/**
 * Escape a delimiter for use inside a regular expression
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern matching a segment marker framed by field separators, e.g. `|PID|`.
 * The segment name is captured in group 1.
 */
export function segmentMarkerPattern(fieldSeparator: string, flags = 'g'): RegExp {
  const sep = escapeRegExp(fieldSeparator);
  return new RegExp(`${sep}([A-Z]{3})${sep}`, flags);
}
