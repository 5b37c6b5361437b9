import { describe, it, expect } from 'vitest';
import {
  isRecord,
  readString,
  readNumber,
  readBoolean,
  readNullableString,
  readStringArray,
  readRecordArray,
  readEnum,
} from './firestore-type-guards.js';

describe('firestore-type-guards', () => {
  describe('isRecord', () => {
    it('should accept plain objects', () => {
      expect(isRecord({ sets: 3 })).toBe(true);
    });

    it('should reject arrays, null, and primitives', () => {
      expect(isRecord(['chest'])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('chest')).toBe(false);
      expect(isRecord(3)).toBe(false);
    });
  });

  describe('readString / readNumber / readBoolean', () => {
    it('should read values of the expected type', () => {
      const data = { name: 'Back Squat', sets: 4, supports_1rm: true };
      expect(readString(data, 'name')).toBe('Back Squat');
      expect(readNumber(data, 'sets')).toBe(4);
      expect(readBoolean(data, 'supports_1rm')).toBe(true);
    });

    it('should return null for missing or mistyped values', () => {
      const data = { name: 7, sets: '4', supports_1rm: 'yes' };
      expect(readString(data, 'name')).toBeNull();
      expect(readNumber(data, 'sets')).toBeNull();
      expect(readBoolean(data, 'supports_1rm')).toBeNull();
      expect(readString({}, 'missing')).toBeNull();
    });
  });

  describe('readNullableString', () => {
    it('should distinguish null from missing', () => {
      expect(readNullableString({ notes: 'Brace hard' }, 'notes')).toBe('Brace hard');
      expect(readNullableString({ notes: null }, 'notes')).toBeNull();
      expect(readNullableString({}, 'notes')).toBeUndefined();
      expect(readNullableString({ notes: 3 }, 'notes')).toBeUndefined();
    });
  });

  describe('readStringArray', () => {
    it('should read arrays of strings', () => {
      expect(readStringArray({ equipment: ['barbell', 'rack'] }, 'equipment')).toEqual([
        'barbell',
        'rack',
      ]);
      expect(readStringArray({ equipment: [] }, 'equipment')).toEqual([]);
    });

    it('should return null for mixed or non-array values', () => {
      expect(readStringArray({ equipment: ['barbell', 1] }, 'equipment')).toBeNull();
      expect(readStringArray({ equipment: 'barbell' }, 'equipment')).toBeNull();
      expect(readStringArray({}, 'equipment')).toBeNull();
    });
  });

  describe('readRecordArray', () => {
    it('should read arrays of objects', () => {
      expect(readRecordArray({ weeks: [{ week_pattern: 1 }] }, 'weeks')).toEqual([{ week_pattern: 1 }]);
    });

    it('should return null when any entry is not an object', () => {
      expect(readRecordArray({ weeks: [{ week_pattern: 1 }, 2] }, 'weeks')).toBeNull();
      expect(readRecordArray({ weeks: null }, 'weeks')).toBeNull();
    });
  });

  describe('readEnum', () => {
    it('should read values included in the allowed list', () => {
      expect(readEnum({ status: 'draft' }, 'status', ['draft', 'active'] as const)).toBe('draft');
    });

    it('should return null when value is not allowed', () => {
      expect(readEnum({ status: 'paused' }, 'status', ['draft', 'active'] as const)).toBeNull();
      expect(readEnum({ status: 1 }, 'status', ['draft', 'active'] as const)).toBeNull();
    });
  });
});
