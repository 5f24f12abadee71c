import { describe, it, expect } from '@jest/globals';
import { LogLevel, isLevelEnabled, parseLogLevel } from '../../../src/logging/LogLevel.js';

describe('LogLevel', () => {
  describe('parseLogLevel', () => {
    it('should parse level names case-insensitively', () => {
      expect(parseLogLevel('trace')).toBe(LogLevel.TRACE);
      expect(parseLogLevel('Debug')).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
      expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    });

    it('should accept long aliases', () => {
      expect(parseLogLevel('information')).toBe(LogLevel.INFO);
      expect(parseLogLevel('warning')).toBe(LogLevel.WARN);
    });

    it('should fall back to INFO', () => {
      expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
      expect(parseLogLevel('')).toBe(LogLevel.INFO);
    });
  });

  describe('isLevelEnabled', () => {
    it('should pass levels at or above the threshold', () => {
      expect(isLevelEnabled(LogLevel.ERROR, LogLevel.INFO)).toBe(true);
      expect(isLevelEnabled(LogLevel.INFO, LogLevel.INFO)).toBe(true);
      expect(isLevelEnabled(LogLevel.DEBUG, LogLevel.INFO)).toBe(false);
      expect(isLevelEnabled(LogLevel.TRACE, LogLevel.TRACE)).toBe(true);
    });
  });
});
